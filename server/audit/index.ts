import type { AuditProfile, AuditReport, CrawlBudget, ExecutiveSummary } from "@shared/audit-types";
import { moduleLogger } from "../logger";
import { CACHE_TTL_MS, CATEGORY_WEIGHTS, type CategoryWeights } from "./budgets";
import { AuditCache, auditCache, cacheKey, summaryCache } from "./cache";
import { classifyCrawl } from "./classifier";
import { runCrawl } from "./crawler";
import { SeedUnreachableError } from "./errors";
import { assembleReport } from "./report";
import { scoreFindings } from "./scorer";
import { buildExecutiveSummary, refineSummary, type SummaryRefiner } from "./summary";
import { CrawlRequestSchema, type CrawlRequest, type FetchPort } from "./types";
import { validateUrl } from "./url-utils";

const log = moduleLogger("audit");

export interface AuditDeps {
  fetcher: FetchPort;
  userAgent?: string;
  budget?: CrawlBudget;
  weights?: CategoryWeights;
  now?: () => number;
}

/**
 * Crawl, classify, score and assemble. Throws SeedUnreachableError when the
 * seed failed at the network level; every other per-page failure still yields
 * a report.
 */
export async function runAudit(input: { url: string; profile?: AuditProfile }, deps: AuditDeps): Promise<AuditReport> {
  const request: CrawlRequest = CrawlRequestSchema.parse(input);

  const crawl = await runCrawl(request, deps);

  const seed = crawl.pages[0];
  if (seed && seed.outcome === "error" && seed.error === "network") {
    throw new SeedUnreachableError(crawl.url, seed.reason ?? "network error");
  }

  const classified = classifyCrawl(crawl);
  const scores = scoreFindings(classified, deps.weights ?? CATEGORY_WEIGHTS);
  const report = assembleReport(crawl, classified.findings, scores, classified.crawlFindings);

  log.info("audit complete", {
    url: crawl.url,
    profile: crawl.profile,
    findings: classified.findings.length,
    score: scores.consolidatedScore,
  });

  return report;
}

export interface AuditServiceDeps {
  fetcher: FetchPort;
  cache?: AuditCache<AuditReport>;
  summaries?: AuditCache<ExecutiveSummary>;
  refiner?: SummaryRefiner | null;
  userAgent?: string;
  budgets?: Partial<Record<AuditProfile, CrawlBudget>>;
  weights?: CategoryWeights;
}

export interface AuditService {
  audit(url: string, profile: AuditProfile): Promise<AuditReport>;
  report(url: string): Promise<AuditReport>;
  analyzeSummary(url: string): Promise<ExecutiveSummary>;
}

export function createAuditService(deps: AuditServiceDeps): AuditService {
  const cache = deps.cache ?? auditCache;
  const summaries = deps.summaries ?? summaryCache;
  const refiner = deps.refiner ?? null;

  const audit = (url: string, profile: AuditProfile): Promise<AuditReport> => {
    const normalized = validateUrl(url);
    return cache.getOrCompute(cacheKey(profile, normalized), CACHE_TTL_MS[profile], () =>
      runAudit(
        { url: normalized, profile },
        {
          fetcher: deps.fetcher,
          userAgent: deps.userAgent,
          budget: deps.budgets?.[profile],
          weights: deps.weights,
        }
      )
    );
  };

  return {
    audit,

    report(url) {
      return audit(url, "full");
    },

    analyzeSummary(url) {
      const normalized = validateUrl(url);
      // Finished summaries are cached per URL, so the refiner runs at most once per TTL.
      return summaries.getOrCompute(cacheKey("summary", normalized), CACHE_TTL_MS.summary, async () => {
        // A fresh full report is a superset of what the summary profile would crawl.
        const report = cache.peek(cacheKey("full", normalized)) ?? (await audit(normalized, "summary"));
        return refineSummary(buildExecutiveSummary(report), refiner);
      });
    },
  };
}

export { AuditCache, auditCache, cacheKey, summaryCache } from "./cache";
export { AuditError, InvalidUrlError, SeedUnreachableError, isAuditError } from "./errors";
export { HttpFetchPort } from "./fetcher";
export { renderReportText } from "./report";
export { LlmSummaryRefiner } from "./summary";
export type { SummaryRefiner } from "./summary";
export type { FetchPort } from "./types";
