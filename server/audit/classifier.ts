import { AUDIT_CATEGORIES, type AuditCategory, type Finding } from "@shared/audit-types";
import { CRAWL_RULES, isPenalisingKind, PAGE_RULES, SITE_RULES } from "./rules";
import type {
  AuditRule,
  ClassifiedCrawl,
  CrawlResult,
  CrawlRule,
  PageRecord,
  PageSignals,
  RuleContext,
  SiteRule,
} from "./types";

function toContext(page: PageRecord): RuleContext {
  return {
    index: page.index,
    url: page.url,
    depth: page.depth,
    elapsedMs: page.elapsedMs,
    redirects: page.redirects,
    finalUrl: page.finalUrl,
  };
}

function emptyCounts(): Record<AuditCategory, number> {
  return { performance: 0, seo: 0, ux: 0, accessibility: 0, conversion: 0 };
}

/** Findings for one page, in rule declaration order. */
export function classifyPage(
  signals: PageSignals,
  page: RuleContext,
  rules: readonly AuditRule[] = PAGE_RULES
): Finding[] {
  const findings: Finding[] = [];
  for (const rule of rules) {
    const finding = rule.evaluate(signals, page);
    if (finding) findings.push(finding);
  }
  return findings;
}

/**
 * Runs every page rule over every extracted page, in page order. Site rules
 * run right after the seed's page rules, so evidence stays in page order.
 * `evaluations` counts how many penalising checks ran per category; the
 * scorer sizes each category's capacity from it. Crawl rules run last and
 * land in `crawlFindings`, which the scorer never sees.
 */
export function classifyCrawl(
  crawl: CrawlResult,
  rules: readonly AuditRule[] = PAGE_RULES,
  siteRules: readonly SiteRule[] = SITE_RULES,
  crawlRules: readonly CrawlRule[] = CRAWL_RULES
): ClassifiedCrawl {
  const findings: Finding[] = [];
  const evaluations = emptyCounts();

  const penalisingPerPage = emptyCounts();
  for (const rule of rules) {
    if (isPenalisingKind(rule.kind)) penalisingPerPage[rule.category]++;
  }

  let siteRulesRun = false;
  for (const page of crawl.pages) {
    if (page.outcome !== "success" || !page.signals) continue;
    const context = toContext(page);

    findings.push(...classifyPage(page.signals, context, rules));
    for (const category of AUDIT_CATEGORIES) {
      evaluations[category] += penalisingPerPage[category];
    }

    if (!siteRulesRun) {
      siteRulesRun = true;
      for (const rule of siteRules) {
        if (rule.applies && !rule.applies(crawl.site)) continue;
        const finding = rule.evaluate(crawl.site, context);
        if (finding) findings.push(finding);
        if (isPenalisingKind(rule.kind)) evaluations[rule.category]++;
      }
    }
  }

  const crawlFindings = crawlRules.flatMap((rule) => rule.evaluate(crawl));

  return { findings, crawlFindings, evaluations };
}
