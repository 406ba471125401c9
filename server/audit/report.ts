import type {
  AuditCategory,
  AuditReport,
  CategoryScore,
  CategorySection,
  CategorySectionId,
  CategoryStatus,
  ConsolidatedDiagnosisSection,
  CoverSection,
  FetchErrorSummary,
  Finding,
  FindingGroup,
  FindingKind,
  FindingListSection,
  PageOutcome,
  SiteOverviewSection,
  WorstPage,
  WorstPagesSection,
} from "@shared/audit-types";
import { isPenalisingKind } from "./rules";
import { SEVERITY_WEIGHT } from "./scorer";
import type { CrawlResult, LimitNote, ScoreSheet } from "./types";
import { getPath } from "./url-utils";

export const NO_FINDINGS_NOTICE = "No significant findings.";

const MAX_SECTION_FINDINGS = 10;
const MAX_AFFECTED_URLS = 25;
const MAX_NEXT_ACTIONS = 5;
const MAX_WORST_PAGES = 20;
const MAX_SAMPLED_PATHS = 10;
const MAX_FETCH_ERRORS = 25;
const MAX_CHALLENGES = 3;

interface CategoryMeta {
  id: CategorySectionId;
  title: string;
  label: string;
  measured: string[];
}

export const CATEGORY_META: Record<AuditCategory, CategoryMeta> = {
  performance: {
    id: "technical-performance",
    title: "Technical Performance",
    label: "technical performance",
    measured: [
      "Server response time",
      "HTML document weight",
      "Referenced resources",
      "Render-blocking scripts and stylesheets",
      "Inline script size",
      "Image loading and formats",
    ],
  },
  seo: {
    id: "on-page-seo",
    title: "On-Page SEO",
    label: "on-page SEO",
    measured: [
      "Title and meta description",
      "Canonical URL",
      "H1 headings",
      "Robots meta directives",
      "Structured data and Open Graph",
      "robots.txt and XML sitemap",
    ],
  },
  ux: {
    id: "ux",
    title: "User Experience",
    label: "user experience",
    measured: ["Mobile viewport", "Amount of content", "Redirect chains", "Mixed content", "Navigation"],
  },
  accessibility: {
    id: "accessibility",
    title: "Accessibility",
    label: "accessibility",
    measured: ["Image alt text", "Form field labels", "Document language"],
  },
  conversion: {
    id: "conversion",
    title: "Conversion & Communication",
    label: "conversion and communication",
    measured: ["Calls to action", "Contact channels", "FAQ content", "Social proof"],
  },
};

const LIMIT_NOTE_TEXT: Record<LimitNote, string> = {
  "max-pages": "Page limit reached; the crawl covers part of the site.",
  "max-runtime": "Time limit reached; the crawl covers part of the site.",
  "max-link-checks": "Link check limit reached; some internal links were not checked.",
};

function compareGroups(a: FindingGroup, b: FindingGroup): number {
  const bySeverity = SEVERITY_WEIGHT[b.severity] - SEVERITY_WEIGHT[a.severity];
  if (bySeverity !== 0) return bySeverity;
  if (a.title !== b.title) return a.title < b.title ? -1 : 1;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  return 0;
}

/** Merges findings of the same rule, keeping the first occurrence's text and the worst severity. */
export function groupFindings(findings: Finding[]): FindingGroup[] {
  const groups = new Map<string, FindingGroup>();

  for (const finding of findings) {
    const existing = groups.get(finding.ruleId);
    if (!existing) {
      groups.set(finding.ruleId, {
        ruleId: finding.ruleId,
        category: finding.category,
        kind: finding.kind,
        severity: finding.severity,
        title: finding.title,
        description: finding.description,
        recommendation: finding.recommendation,
        occurrences: 1,
        affectedUrls: [finding.evidence.url],
        evidence: finding.evidence,
      });
      continue;
    }

    existing.occurrences++;
    if (SEVERITY_WEIGHT[finding.severity] > SEVERITY_WEIGHT[existing.severity]) {
      existing.severity = finding.severity;
    }
    if (existing.affectedUrls.length < MAX_AFFECTED_URLS && !existing.affectedUrls.includes(finding.evidence.url)) {
      existing.affectedUrls.push(finding.evidence.url);
    }
  }

  return Array.from(groups.values()).sort(compareGroups);
}

function topGroups(findings: Finding[]): FindingGroup[] {
  return groupFindings(findings).slice(0, MAX_SECTION_FINDINGS);
}

function nextActionsFor(groups: FindingGroup[]): string[] {
  const actions: string[] = [];
  for (const group of groups) {
    if (actions.length >= MAX_NEXT_ACTIONS) break;
    if (!actions.includes(group.recommendation)) actions.push(group.recommendation);
  }
  return actions;
}

function scoreLabel(score: number | null, status: CategoryStatus): string {
  return score === null ? "not evaluated" : `${score}/100 (${status})`;
}

function buildCover(crawl: CrawlResult, scores: ScoreSheet, generatedAt: string): CoverSection {
  return {
    id: "cover",
    title: "Website Audit",
    url: crawl.url,
    profile: crawl.profile,
    generatedAt,
    consolidatedScore: scores.consolidatedScore,
    status: scores.status,
  };
}

function buildSiteOverview(crawl: CrawlResult): SiteOverviewSection {
  const counts: Record<PageOutcome, number> = {
    success: 0,
    timeout: 0,
    error: 0,
    "skipped-robots": 0,
    "skipped-scope": 0,
    "skipped-non-html": 0,
  };
  for (const page of crawl.pages) counts[page.outcome]++;

  const analyzed = crawl.pages.filter((page) => page.outcome === "success");
  const fetchErrors: FetchErrorSummary[] = [];
  for (const page of crawl.pages) {
    if (fetchErrors.length >= MAX_FETCH_ERRORS) break;
    if (page.outcome === "timeout" || page.outcome === "error") {
      fetchErrors.push({ url: page.url, outcome: page.outcome, message: page.reason ?? page.outcome });
    }
  }

  return {
    id: "site-overview",
    title: "Site Overview",
    pagesRecorded: crawl.pages.length,
    pagesFetched: crawl.pagesFetched,
    pagesAnalyzed: analyzed.length,
    outcomes: counts,
    maxDepthReached: crawl.pages.reduce((max, page) => Math.max(max, page.depth), 0),
    runtimeMs: crawl.runtimeMs,
    budget: crawl.budget,
    limitNotes: crawl.limitNotes.map((note) => LIMIT_NOTE_TEXT[note]),
    robotsTxtPresent: crawl.site.robotsTxtPresent,
    sitemapPresent: crawl.site.sitemapPresent,
    linksChecked: crawl.site.linksChecked,
    brokenLinkCount: crawl.site.brokenLinks.length,
    sampledPaths: analyzed.slice(0, MAX_SAMPLED_PATHS).map((page) => getPath(page.finalUrl ?? page.url)),
    fetchErrors,
  };
}

function categorySummary(score: CategoryScore, issues: number, pagesAnalyzed: number): string {
  if (score.score === null) {
    return "Not evaluated: no page could be analyzed.";
  }
  const pages = pagesAnalyzed === 1 ? "1 page" : `${pagesAnalyzed} pages`;
  const issueText = issues === 0 ? "no issues" : issues === 1 ? "1 issue" : `${issues} issues`;
  return `Scored ${score.score}/100 (${score.status}) across ${pages} with ${issueText} found.`;
}

function buildCategorySection(category: AuditCategory, findings: Finding[], scores: ScoreSheet, pagesAnalyzed: number): CategorySection {
  const meta = CATEGORY_META[category];
  const notEvaluated: CategoryScore = { category, score: null, status: "not-evaluated", findingCount: 0, evaluations: 0 };
  const score = scores.categories.find((c) => c.category === category) ?? notEvaluated;
  const groups = topGroups(findings.filter((f) => f.category === category && isPenalisingKind(f.kind)));
  const empty = groups.length === 0;

  return {
    id: meta.id,
    title: meta.title,
    category,
    score: score.score,
    status: score.status,
    summary: categorySummary(score, groups.length, pagesAnalyzed),
    measured: meta.measured,
    findings: groups,
    nextActions: nextActionsFor(groups),
    noSignificantFindings: empty,
    notice: empty ? NO_FINDINGS_NOTICE : null,
  };
}

function buildFindingList(id: FindingListSection["id"], title: string, kind: FindingKind, findings: Finding[]): FindingListSection {
  const groups = topGroups(findings.filter((f) => f.kind === kind));
  const empty = groups.length === 0;
  return { id, title, findings: groups, noSignificantFindings: empty, notice: empty ? NO_FINDINGS_NOTICE : null };
}

const HEADLINES: Record<CategoryStatus, string> = {
  ok: "The site is in good shape overall.",
  attention: "The site works, but several areas need attention.",
  critical: "The site has critical problems that should be fixed first.",
  "not-evaluated": "No page could be analyzed, so the site could not be scored.",
};

function buildDiagnosis(findings: Finding[], scores: ScoreSheet): ConsolidatedDiagnosisSection {
  const challenges = groupFindings(findings.filter((f) => isPenalisingKind(f.kind)))
    .slice(0, MAX_CHALLENGES)
    .map((group) => group.title);

  let weakest: CategoryScore | null = null;
  for (const category of scores.categories) {
    if (category.score === null) continue;
    if (!weakest || weakest.score === null || category.score < weakest.score) weakest = category;
  }

  let mainNeed: string;
  if (!weakest) {
    mainNeed = "Make the site reachable to the audit crawler and run the audit again.";
  } else if (weakest.status === "ok") {
    mainNeed = "Keep the current standard and re-audit after major releases.";
  } else {
    mainNeed = `Improve ${CATEGORY_META[weakest.category].label} first.`;
  }

  return {
    id: "consolidated-diagnosis",
    title: "Consolidated Diagnosis",
    score: scores.consolidatedScore,
    status: scores.status,
    categoryScores: scores.categories,
    headline: HEADLINES[scores.status],
    challenges,
    mainNeed,
  };
}

/**
 * Ranks pages by the weight of their weakness and bottleneck findings, then by
 * how many they have. Ties keep discovery order.
 */
export function rankWorstPages(crawl: CrawlResult, findings: Finding[]): WorstPage[] {
  const byPage = new Map<number, WorstPage>();

  for (const finding of findings) {
    if (!isPenalisingKind(finding.kind)) continue;
    const index = finding.evidence.pageIndex;
    let entry = byPage.get(index);
    if (!entry) {
      const page = crawl.pages[index];
      entry = {
        pageIndex: index,
        url: page?.url ?? finding.evidence.url,
        depth: page?.depth ?? 0,
        weaknessCount: 0,
        severityWeight: 0,
        byCategory: { performance: 0, seo: 0, ux: 0, accessibility: 0, conversion: 0 },
      };
      byPage.set(index, entry);
    }
    entry.weaknessCount++;
    entry.severityWeight += SEVERITY_WEIGHT[finding.severity];
    entry.byCategory[finding.category]++;
  }

  return Array.from(byPage.values())
    .sort(
      (a, b) => b.severityWeight - a.severityWeight || b.weaknessCount - a.weaknessCount || a.pageIndex - b.pageIndex
    )
    .slice(0, MAX_WORST_PAGES);
}

function buildWorstPages(crawl: CrawlResult, findings: Finding[]): WorstPagesSection {
  const pages = rankWorstPages(crawl, findings);
  const empty = pages.length === 0;
  return {
    id: "worst-pages",
    title: "Appendix: Worst Pages",
    pages,
    noSignificantFindings: empty,
    notice: empty ? NO_FINDINGS_NOTICE : null,
  };
}

/**
 * Builds the fixed-shape report. Deterministic for a given crawl: the
 * generation time is the crawl's end time. Crawl-level findings only feed the
 * critical bottlenecks and the diagnosis; category sections and worst pages
 * are built from page findings.
 */
export function assembleReport(
  crawl: CrawlResult,
  findings: Finding[],
  scores: ScoreSheet,
  crawlFindings: Finding[] = []
): AuditReport {
  const generatedAt = new Date(crawl.startedAt + crawl.runtimeMs).toISOString();
  const pagesAnalyzed = crawl.pages.filter((page) => page.outcome === "success").length;
  const category = (c: AuditCategory) => buildCategorySection(c, findings, scores, pagesAnalyzed);

  return {
    url: crawl.url,
    profile: crawl.profile,
    generatedAt,
    sections: [
      buildCover(crawl, scores, generatedAt),
      buildSiteOverview(crawl),
      category("performance"),
      category("seo"),
      category("ux"),
      category("accessibility"),
      category("conversion"),
      buildFindingList("strengths", "Strengths", "strength", findings),
      buildFindingList("critical-bottlenecks", "Critical Bottlenecks", "critical-bottleneck", [...findings, ...crawlFindings]),
      buildFindingList("strategic-opportunities", "Strategic Opportunities", "opportunity", findings),
      buildDiagnosis([...findings, ...crawlFindings], scores),
      buildWorstPages(crawl, findings),
    ],
  };
}

function renderGroups(groups: FindingGroup[]): string[] {
  const lines: string[] = [];
  for (const group of groups) {
    const pages = group.occurrences === 1 ? "1 occurrence" : `${group.occurrences} occurrences`;
    lines.push(`- [${group.severity.toUpperCase()}] ${group.title} (${pages})`);
    lines.push(`  ${group.description}`);
    lines.push(`  Recommendation: ${group.recommendation}`);
  }
  return lines;
}

function renderSection(section: AuditReport["sections"][number]): string[] {
  const lines = [section.title.toUpperCase()];

  switch (section.id) {
    case "cover":
      lines.push(`URL: ${section.url}`);
      lines.push(`Profile: ${section.profile}`);
      lines.push(`Generated: ${section.generatedAt}`);
      lines.push(`Score: ${scoreLabel(section.consolidatedScore, section.status)}`);
      break;

    case "site-overview":
      lines.push(`Pages recorded: ${section.pagesRecorded}`);
      lines.push(`Pages fetched: ${section.pagesFetched}`);
      lines.push(`Pages analyzed: ${section.pagesAnalyzed}`);
      lines.push(`Max depth reached: ${section.maxDepthReached}`);
      lines.push(`robots.txt: ${section.robotsTxtPresent ? "present" : "missing"}`);
      lines.push(`Sitemap: ${section.sitemapPresent ? "present" : "missing"}`);
      if (section.linksChecked > 0) {
        lines.push(`Internal links checked: ${section.linksChecked} (${section.brokenLinkCount} broken)`);
      }
      for (const note of section.limitNotes) lines.push(`Note: ${note}`);
      for (const error of section.fetchErrors) lines.push(`Fetch ${error.outcome}: ${error.url} (${error.message})`);
      break;

    case "technical-performance":
    case "on-page-seo":
    case "ux":
    case "accessibility":
    case "conversion":
      lines.push(`Score: ${scoreLabel(section.score, section.status)}`);
      lines.push(section.summary);
      lines.push(`Measured: ${section.measured.join("; ")}`);
      if (section.notice) {
        lines.push(section.notice);
      } else {
        lines.push(...renderGroups(section.findings));
        lines.push("Next actions:");
        section.nextActions.forEach((action, i) => lines.push(`${i + 1}. ${action}`));
      }
      break;

    case "strengths":
    case "critical-bottlenecks":
    case "strategic-opportunities":
      lines.push(...(section.notice ? [section.notice] : renderGroups(section.findings)));
      break;

    case "consolidated-diagnosis":
      lines.push(`Score: ${scoreLabel(section.score, section.status)}`);
      lines.push(section.headline);
      for (const score of section.categoryScores) {
        lines.push(`- ${CATEGORY_META[score.category].title}: ${scoreLabel(score.score, score.status)}`);
      }
      for (const challenge of section.challenges) lines.push(`Challenge: ${challenge}`);
      lines.push(`Main need: ${section.mainNeed}`);
      break;

    case "worst-pages":
      if (section.notice) {
        lines.push(section.notice);
      } else {
        section.pages.forEach((page, i) => {
          lines.push(`${i + 1}. ${page.url} (${page.weaknessCount} issues, weight ${page.severityWeight})`);
        });
      }
      break;
  }

  return lines;
}

/** Plain-text rendering: one uppercase heading per section, sections separated by a blank line. */
export function renderReportText(report: AuditReport): string {
  return report.sections.map((section) => renderSection(section).join("\n")).join("\n\n") + "\n";
}
