import { z } from "zod";
import type {
  AuditCategory,
  AuditProfile,
  CategoryScore,
  CategoryStatus,
  CrawlBudget,
  Finding,
  FindingKind,
  PageOutcome,
} from "@shared/audit-types";

export const AuditProfileSchema = z.enum(["full", "summary"]);

export const CrawlRequestSchema = z.object({
  url: z.string().min(1),
  profile: AuditProfileSchema.default("full"),
});

export type CrawlRequest = Readonly<z.infer<typeof CrawlRequestSchema>>;

export const CrawlBudgetSchema = z.object({
  maxPages: z.number().int().positive().finite(),
  maxDepth: z.number().int().positive().finite(),
  maxRuntimeMs: z.number().int().positive().finite(),
  perPageTimeoutMs: z.number().int().positive().finite(),
});

export interface PageHeading {
  level: number;
  text: string;
}

export interface PageSignals {
  title: string | null;
  metaDescription: string | null;
  canonical: string | null;
  robotsMeta: string | null;
  lang: string | null;
  headings: PageHeading[];
  h1Count: number;
  h2Count: number;
  imagesTotal: number;
  imagesMissingAlt: number;
  lazyImages: number;
  modernImages: number;
  legacyImages: number;
  inputsTotal: number;
  inputsMissingLabel: number;
  formCount: number;
  ctaTexts: string[];
  contactLinks: number;
  hasWhatsapp: boolean;
  hasViewport: boolean;
  hasStructuredData: boolean;
  hasOpenGraph: boolean;
  hasFaq: boolean;
  hasTestimonials: boolean;
  navItems: string[];
  resourceCount: number;
  renderBlockingCount: number;
  scriptCount: number;
  inlineScriptBytes: number;
  mixedContentCount: number;
  wordCount: number;
  htmlSizeBytes: number;
  /** Every navigable link on the page, resolved and normalized, in first-occurrence order. */
  links: string[];
  internalLinkCount: number;
  externalLinkCount: number;
}

export type FetchErrorKind = "timeout" | "network" | "http";

export interface FetchResponse {
  body: string;
  contentType: string;
  status: number;
  finalUrl: string;
  redirects: number;
}

export interface FetchFailure {
  error: FetchErrorKind;
  message: string;
  status?: number;
}

export type FetchResult = FetchResponse | FetchFailure;

/**
 * Rendering capability the crawler drives. Implementations must resolve,
 * never reject, and should honour `timeoutMs`; the crawler enforces the
 * timeout on its side as well.
 */
export interface FetchPort {
  fetch(url: string, timeoutMs: number): Promise<FetchResult>;
}

export interface PageRecord {
  index: number;
  url: string;
  depth: number;
  outcome: PageOutcome;
  elapsedMs: number;
  status?: number;
  contentType?: string;
  finalUrl?: string;
  redirects?: number;
  signals?: PageSignals;
  /** Set when the outcome is `timeout` or `error`. */
  error?: FetchErrorKind;
  /** Rejection reason or fetch error message. */
  reason?: string;
}

export type LimitNote = "max-pages" | "max-runtime" | "max-link-checks";

/** An internal link that answered 4xx/5xx; status 0 means it never answered. */
export interface BrokenLink {
  url: string;
  status: number;
}

export interface SiteSignals {
  robotsTxtPresent: boolean;
  sitemapPresent: boolean;
  linksChecked: number;
  brokenLinks: BrokenLink[];
}

export interface CrawlResult {
  url: string;
  profile: AuditProfile;
  budget: CrawlBudget;
  pages: PageRecord[];
  pagesFetched: number;
  startedAt: number;
  runtimeMs: number;
  limitNotes: LimitNote[];
  site: SiteSignals;
}

/** The subset of a page record a rule may look at besides its signals. */
export type RuleContext = Pick<PageRecord, "index" | "url" | "depth" | "elapsedMs" | "redirects" | "finalUrl">;

export interface AuditRule {
  id: string;
  category: AuditCategory;
  kind: FindingKind;
  evaluate(signals: PageSignals, page: RuleContext): Finding | null;
}

export interface SiteRule {
  id: string;
  category: AuditCategory;
  kind: FindingKind;
  evaluate(site: SiteSignals, seed: RuleContext): Finding | null;
  /** When present and false, the rule is neither run nor counted as an evaluation. */
  applies?(site: SiteSignals): boolean;
}

/** Checks on the crawl as a whole. Their findings are reported but never scored. */
export interface CrawlRule {
  id: string;
  category: AuditCategory;
  kind: FindingKind;
  evaluate(crawl: CrawlResult): Finding[];
}

export interface ClassifiedCrawl {
  findings: Finding[];
  crawlFindings: Finding[];
  evaluations: Record<AuditCategory, number>;
}

export interface ScoreSheet {
  categories: CategoryScore[];
  consolidatedScore: number | null;
  status: CategoryStatus;
}
