import type { CrawlResult, PageRecord, PageSignals, SiteSignals } from "../audit/types";

/** Signals of a page that trips no weakness rule. */
export function cleanSignals(overrides: Partial<PageSignals> = {}): PageSignals {
  return {
    title: "Acme Plumbing | Fast repairs",
    metaDescription:
      "Acme Plumbing fixes leaks, blocked drains and broken boilers across the city, seven days a week.",
    canonical: "https://example.com/",
    robotsMeta: null,
    lang: "en",
    headings: [{ level: 1, text: "Acme Plumbing" }],
    h1Count: 1,
    h2Count: 0,
    imagesTotal: 0,
    imagesMissingAlt: 0,
    lazyImages: 0,
    modernImages: 0,
    legacyImages: 0,
    inputsTotal: 0,
    inputsMissingLabel: 0,
    formCount: 1,
    ctaTexts: ["Get started"],
    contactLinks: 1,
    hasWhatsapp: false,
    hasViewport: true,
    hasStructuredData: true,
    hasOpenGraph: true,
    hasFaq: true,
    hasTestimonials: true,
    navItems: ["Home", "Services", "Contact"],
    resourceCount: 10,
    renderBlockingCount: 1,
    scriptCount: 2,
    inlineScriptBytes: 0,
    mixedContentCount: 0,
    wordCount: 500,
    htmlSizeBytes: 20_000,
    links: [],
    internalLinkCount: 0,
    externalLinkCount: 0,
    ...overrides,
  };
}

export function successPage(index: number, path: string, signals: PageSignals = cleanSignals(), depth = 1): PageRecord {
  return {
    index,
    url: `https://example.com${path}`,
    depth,
    outcome: "success",
    elapsedMs: 100,
    status: 200,
    contentType: "text/html",
    finalUrl: `https://example.com${path}`,
    redirects: 0,
    signals,
  };
}

export function siteSignals(overrides: Partial<SiteSignals> = {}): SiteSignals {
  return { robotsTxtPresent: true, sitemapPresent: true, linksChecked: 0, brokenLinks: [], ...overrides };
}

export function crawlResult(pages: PageRecord[], overrides: Partial<CrawlResult> = {}): CrawlResult {
  return {
    url: "https://example.com/",
    profile: "full",
    budget: { maxPages: 150, maxDepth: 6, maxRuntimeMs: 120_000, perPageTimeoutMs: 20_000 },
    pages,
    pagesFetched: pages.filter((p) => p.outcome !== "skipped-robots" && p.outcome !== "skipped-scope").length,
    startedAt: Date.UTC(2024, 0, 15, 12, 0, 0),
    runtimeMs: 1_500,
    limitNotes: [],
    site: siteSignals(),
    ...overrides,
  };
}
