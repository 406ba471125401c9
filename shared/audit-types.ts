export const AUDIT_CATEGORIES = ["performance", "seo", "ux", "accessibility", "conversion"] as const;

export type AuditCategory = (typeof AUDIT_CATEGORIES)[number];

export type AuditProfile = "full" | "summary";

export type FindingKind = "strength" | "weakness" | "opportunity" | "critical-bottleneck";

export type FindingSeverity = "critical" | "high" | "medium" | "low";

export type CategoryStatus = "ok" | "attention" | "critical" | "not-evaluated";

export type PageOutcome =
  | "success"
  | "timeout"
  | "error"
  | "skipped-robots"
  | "skipped-scope"
  | "skipped-non-html";

export interface CrawlBudget {
  maxPages: number;
  maxDepth: number;
  maxRuntimeMs: number;
  perPageTimeoutMs: number;
}

export interface FindingEvidence {
  /** Position of the originating page in the crawl's page list. */
  pageIndex: number;
  url: string;
  selector?: string;
  metric?: number | string;
}

export interface Finding {
  ruleId: string;
  category: AuditCategory;
  kind: FindingKind;
  severity: FindingSeverity;
  title: string;
  description: string;
  recommendation: string;
  evidence: FindingEvidence;
}

/** Findings of one rule merged across every page it fired on. */
export interface FindingGroup {
  ruleId: string;
  category: AuditCategory;
  kind: FindingKind;
  severity: FindingSeverity;
  title: string;
  description: string;
  recommendation: string;
  occurrences: number;
  affectedUrls: string[];
  evidence: FindingEvidence;
}

export interface CategoryScore {
  category: AuditCategory;
  score: number | null;
  status: CategoryStatus;
  findingCount: number;
  evaluations: number;
}

export interface CoverSection {
  id: "cover";
  title: string;
  url: string;
  profile: AuditProfile;
  generatedAt: string;
  consolidatedScore: number | null;
  status: CategoryStatus;
}

export interface FetchErrorSummary {
  url: string;
  outcome: "timeout" | "error";
  message: string;
}

export interface SiteOverviewSection {
  id: "site-overview";
  title: string;
  pagesRecorded: number;
  pagesFetched: number;
  pagesAnalyzed: number;
  outcomes: Record<PageOutcome, number>;
  maxDepthReached: number;
  runtimeMs: number;
  budget: CrawlBudget;
  limitNotes: string[];
  robotsTxtPresent: boolean;
  sitemapPresent: boolean;
  linksChecked: number;
  brokenLinkCount: number;
  sampledPaths: string[];
  fetchErrors: FetchErrorSummary[];
}

export type CategorySectionId = "technical-performance" | "on-page-seo" | "ux" | "accessibility" | "conversion";

export interface CategorySection {
  id: CategorySectionId;
  title: string;
  category: AuditCategory;
  score: number | null;
  status: CategoryStatus;
  summary: string;
  measured: string[];
  findings: FindingGroup[];
  nextActions: string[];
  noSignificantFindings: boolean;
  notice: string | null;
}

export interface FindingListSection {
  id: "strengths" | "critical-bottlenecks" | "strategic-opportunities";
  title: string;
  findings: FindingGroup[];
  noSignificantFindings: boolean;
  notice: string | null;
}

export interface ConsolidatedDiagnosisSection {
  id: "consolidated-diagnosis";
  title: string;
  score: number | null;
  status: CategoryStatus;
  categoryScores: CategoryScore[];
  headline: string;
  challenges: string[];
  mainNeed: string;
}

export interface WorstPage {
  pageIndex: number;
  url: string;
  depth: number;
  weaknessCount: number;
  severityWeight: number;
  byCategory: Record<AuditCategory, number>;
}

export interface WorstPagesSection {
  id: "worst-pages";
  title: string;
  pages: WorstPage[];
  noSignificantFindings: boolean;
  notice: string | null;
}

export type ReportSections = [
  CoverSection,
  SiteOverviewSection,
  CategorySection,
  CategorySection,
  CategorySection,
  CategorySection,
  CategorySection,
  FindingListSection,
  FindingListSection,
  FindingListSection,
  ConsolidatedDiagnosisSection,
  WorstPagesSection,
];

export type ReportSection = ReportSections[number];

export interface AuditReport {
  url: string;
  profile: AuditProfile;
  generatedAt: string;
  sections: ReportSections;
}

export type SummaryKey = "overall" | AuditCategory;

export interface ExecutiveSummary {
  url: string;
  profile: AuditProfile;
  generatedAt: string;
  refined: boolean;
  sentences: Record<SummaryKey, string>;
  text: string;
}
