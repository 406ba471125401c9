import pLimit from "p-limit";
import type { CrawlBudget, PageOutcome } from "@shared/audit-types";
import { moduleLogger } from "../logger";
import { getBudget, LINK_CHECK_LIMITS, WORKER_POOL_WIDTH } from "./budgets";
import { extractPageSignals } from "./extractor";
import { fetchWithDeadline, isFetchFailure } from "./fetcher";
import { Frontier, type FrontierItem } from "./frontier";
import { checkInternalLinks, type LinkCheckResult } from "./link-checker";
import { RobotsGate } from "./robots";
import { checkScope } from "./scope";
import {
  CrawlBudgetSchema,
  type CrawlRequest,
  type CrawlResult,
  type FetchPort,
  type LimitNote,
  type PageRecord,
  type SiteSignals,
} from "./types";
import { getOrigin, getSitemapUrl, isHtmlContentType, isSameOrigin, normalizeUrl, validateUrl } from "./url-utils";

const log = moduleLogger("crawler");

const DEFAULT_USER_AGENT = "site-audit/1.0";

export interface CrawlDeps {
  fetcher: FetchPort;
  userAgent?: string;
  /** Replaces the profile budget; used by tests to shrink limits. */
  budget?: CrawlBudget;
  /** Replaces the profile's internal link check limit; 0 turns the check off. */
  linkCheckLimit?: number;
  now?: () => number;
}

type PendingRecord = Omit<PageRecord, "index">;

async function probeSitemap(fetcher: FetchPort, rootUrl: string, timeoutMs: number): Promise<boolean> {
  const sitemapUrl = getSitemapUrl(rootUrl);
  if (!sitemapUrl) return false;
  const result = await fetchWithDeadline(fetcher, sitemapUrl, timeoutMs);
  return !isFetchFailure(result);
}

/**
 * Breadth-first, same-origin crawl under the profile's budgets. The loop below
 * is the only writer of the crawl state; fetch workers hand their results
 * back and the loop applies them in dequeue order, which keeps the page list
 * in BFS discovery order.
 */
export async function runCrawl(request: CrawlRequest, deps: CrawlDeps): Promise<CrawlResult> {
  const now = deps.now ?? Date.now;
  const rootUrl = validateUrl(request.url);
  const budget = deps.budget ? CrawlBudgetSchema.parse(deps.budget) : getBudget(request.profile);
  const linkCheckLimit = deps.linkCheckLimit ?? LINK_CHECK_LIMITS[request.profile];
  const userAgent = deps.userAgent ?? DEFAULT_USER_AGENT;

  const startedAt = now();
  const elapsed = () => now() - startedAt;

  const limit = pLimit(WORKER_POOL_WIDTH);
  const robots = new RobotsGate(deps.fetcher, userAgent, budget.perPageTimeoutMs);

  const frontier = new Frontier(budget.maxDepth);
  const pages: PageRecord[] = [];
  const limitNotes: LimitNote[] = [];
  const statuses = new Map<string, number>();
  const internalLinks = new Set<string>();
  let pagesFetched = 0;
  let linksDropped = false;
  let origin = getOrigin(rootUrl) ?? rootUrl;

  const append = (record: PendingRecord) => {
    pages.push({ index: pages.length, ...record });
  };

  const fetchPage = async (item: FrontierItem): Promise<PendingRecord> => {
    const fetchStart = now();
    const result = await fetchWithDeadline(deps.fetcher, item.url, budget.perPageTimeoutMs);
    const elapsedMs = now() - fetchStart;

    if (isFetchFailure(result)) {
      const outcome: PageOutcome = result.error === "timeout" ? "timeout" : "error";
      return {
        url: item.url,
        depth: item.depth,
        outcome,
        elapsedMs,
        status: result.status,
        error: result.error,
        reason: result.message,
      };
    }

    const base = {
      url: item.url,
      depth: item.depth,
      elapsedMs,
      status: result.status,
      contentType: result.contentType,
      finalUrl: normalizeUrl(result.finalUrl) ?? item.url,
      redirects: result.redirects,
    };

    // Only the seed may land on another origin; any other page that redirects away is out of scope.
    if (item.depth > 0 && !isSameOrigin(base.finalUrl, origin)) {
      return { ...base, outcome: "skipped-scope", reason: "cross-origin" };
    }
    if (!isHtmlContentType(result.contentType)) {
      return { ...base, outcome: "skipped-non-html", reason: `content-type ${result.contentType || "unknown"}` };
    }

    return { ...base, outcome: "success", signals: extractPageSignals(result.body, base.finalUrl) };
  };

  const noteStatus = (record: PendingRecord) => {
    const status = record.status ?? 0;
    statuses.set(record.url, status);
    if (record.finalUrl) statuses.set(record.finalUrl, status);
  };

  const discover = async (record: PendingRecord) => {
    if (!record.signals) return;
    for (const link of record.signals.links) {
      if (checkScope(link, origin).inScope) internalLinks.add(link);
    }

    const nextDepth = record.depth + 1;
    if (nextDepth > budget.maxDepth) return;

    for (const link of record.signals.links) {
      if (frontier.hasSeen(link)) continue;

      const scope = checkScope(link, origin);
      if (!scope.inScope) {
        frontier.markSeen(link);
        append({ url: link, depth: nextDepth, outcome: "skipped-scope", elapsedMs: 0, reason: scope.reason });
        continue;
      }
      // Disallowed links never take a page unit, so they must not take frontier room either.
      if (!(await robots.isAllowed(link))) {
        frontier.markSeen(link);
        append({ url: link, depth: nextDepth, outcome: "skipped-robots", elapsedMs: 0, reason: "disallowed by robots.txt" });
        continue;
      }

      if (pagesFetched + frontier.size >= budget.maxPages) {
        linksDropped = true;
        continue;
      }
      frontier.enqueue({ url: link, depth: nextDepth });
    }
  };

  frontier.enqueue({ url: rootUrl, depth: 0 });
  log.info("crawl started", { url: rootUrl, profile: request.profile, budget });

  while (!frontier.isEmpty()) {
    if (elapsed() >= budget.maxRuntimeMs) {
      limitNotes.push("max-runtime");
      break;
    }
    if (pagesFetched >= budget.maxPages) {
      limitNotes.push("max-pages");
      break;
    }

    const slots: Promise<PendingRecord>[] = [];
    let dispatched = 0;
    while (dispatched < WORKER_POOL_WIDTH && pagesFetched + dispatched < budget.maxPages) {
      const item = frontier.dequeue();
      if (!item) break;

      const scope = checkScope(item.url, origin);
      if (!scope.inScope) {
        slots.push(Promise.resolve<PendingRecord>({ ...item, outcome: "skipped-scope", elapsedMs: 0, reason: scope.reason }));
        continue;
      }
      if (!(await robots.isAllowed(item.url))) {
        slots.push(Promise.resolve<PendingRecord>({ ...item, outcome: "skipped-robots", elapsedMs: 0, reason: "disallowed by robots.txt" }));
        continue;
      }

      slots.push(limit(() => fetchPage(item)));
      dispatched++;
    }
    pagesFetched += dispatched;

    const settled = await Promise.all(slots);

    for (const record of settled) {
      const isSeed = pages.length === 0 && record.depth === 0;
      append(record);
      if (record.outcome !== "skipped-robots" && record.outcome !== "skipped-scope") noteStatus(record);

      if (record.outcome !== "success" || !record.finalUrl) continue;
      frontier.markSeen(record.finalUrl);
      // A seed that redirects (http to https, bare host to www) moves the crawl to where it landed.
      if (isSeed) {
        origin = getOrigin(record.finalUrl) ?? origin;
      }
      await discover(record);
    }
  }

  if (linksDropped && limitNotes.length === 0) {
    limitNotes.push("max-pages");
  }

  const linkCheck: LinkCheckResult =
    linkCheckLimit > 0
      ? await checkInternalLinks(internalLinks, {
          fetcher: deps.fetcher,
          robots,
          statuses,
          maxChecks: linkCheckLimit,
          timeoutMs: budget.perPageTimeoutMs,
          outOfTime: () => elapsed() >= budget.maxRuntimeMs,
        })
      : { checked: 0, broken: [], stoppedBy: null };
  if (linkCheck.stoppedBy && !limitNotes.includes(linkCheck.stoppedBy)) {
    limitNotes.push(linkCheck.stoppedBy);
  }
  if (limitNotes.length > 0) {
    log.warn("crawl truncated", { url: rootUrl, limitNotes });
  }

  // Judged on the origin the crawl settled on, the same one robots.txt was read from.
  const policy = await robots.policyFor(origin);
  const site: SiteSignals = {
    robotsTxtPresent: policy.present,
    sitemapPresent:
      policy.rules.sitemaps.length > 0 || (await probeSitemap(deps.fetcher, origin, budget.perPageTimeoutMs)),
    linksChecked: linkCheck.checked,
    brokenLinks: linkCheck.broken,
  };

  const runtimeMs = elapsed();
  log.info("crawl finished", {
    url: rootUrl,
    profile: request.profile,
    pagesRecorded: pages.length,
    pagesFetched,
    runtimeMs,
    limitNotes,
    brokenLinks: linkCheck.broken.length,
  });

  return {
    url: rootUrl,
    profile: request.profile,
    budget,
    pages,
    pagesFetched,
    startedAt,
    runtimeMs,
    limitNotes,
    site,
  };
}
