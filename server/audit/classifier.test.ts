import { describe, expect, it } from "vitest";
import { cleanSignals, crawlResult, siteSignals, successPage } from "../test-utils/fixtures";
import { classifyCrawl, classifyPage } from "./classifier";
import type { RuleContext } from "./types";

const HOME: RuleContext = { index: 0, url: "https://example.com/", depth: 0, elapsedMs: 100, redirects: 0 };

const ruleIds = (signals = cleanSignals(), page = HOME) => classifyPage(signals, page).map((f) => f.ruleId);

describe("classifyPage", () => {
  it("reports only strengths for a clean page", () => {
    expect(ruleIds()).toEqual(["perf.lean-page", "seo.structured-data", "ux.navigation", "conv.cta"]);
  });

  it("evaluates rules in declared order", () => {
    const signals = cleanSignals({ title: null, hasViewport: false, lang: null, ctaTexts: [] });
    expect(ruleIds(signals)).toEqual([
      "perf.lean-page",
      "seo.title-missing",
      "seo.structured-data",
      "ux.viewport-missing",
      "ux.navigation",
      "a11y.lang-missing",
      "conv.no-cta",
    ]);
  });

  it("ties evidence to the originating page", () => {
    const [finding] = classifyPage(cleanSignals({ inputsMissingLabel: 2 }), { ...HOME, index: 4, url: "https://example.com/form" })
      .filter((f) => f.ruleId === "a11y.input-label");
    expect(finding).toMatchObject({
      category: "accessibility",
      kind: "weakness",
      severity: "high",
      evidence: { pageIndex: 4, url: "https://example.com/form", selector: "input", metric: 2 },
    });
  });

  it("grades noindex on the home page as critical", () => {
    const signals = cleanSignals({ robotsMeta: "noindex" });
    const home = classifyPage(signals, HOME).find((f) => f.ruleId === "seo.noindex");
    const inner = classifyPage(signals, { ...HOME, depth: 2 }).find((f) => f.ruleId === "seo.noindex");

    expect(home?.severity).toBe("critical");
    expect(home?.kind).toBe("critical-bottleneck");
    expect(inner?.severity).toBe("high");
  });

  it("reads timing and redirects from the page record", () => {
    const ids = ruleIds(cleanSignals(), { ...HOME, elapsedMs: 2_500, redirects: 3 });
    expect(ids).toContain("perf.slow-response");
    expect(ids).toContain("ux.redirect-chain");
  });

  it("flags a canonical that points at another site", () => {
    expect(ruleIds(cleanSignals({ canonical: "https://mirror.example.org/" }))).toContain("seo.canonical-cross-origin");
  });

  it("raises missing alt text to high when widespread", () => {
    const few = classifyPage(cleanSignals({ imagesTotal: 5, imagesMissingAlt: 3 }), HOME).find((f) => f.ruleId === "a11y.img-alt");
    const many = classifyPage(cleanSignals({ imagesTotal: 30, imagesMissingAlt: 25 }), HOME).find(
      (f) => f.ruleId === "a11y.img-alt"
    );
    expect(few?.severity).toBe("medium");
    expect(many?.severity).toBe("high");
  });
});

describe("classifyCrawl", () => {
  it("classifies analyzed pages in order and runs site rules once against the seed", () => {
    const crawl = crawlResult(
      [
        successPage(0, "/", cleanSignals(), 0),
        { index: 1, url: "https://example.com/slow", depth: 1, outcome: "timeout", elapsedMs: 20_000 },
        successPage(2, "/about", cleanSignals({ title: null, canonical: "https://example.com/about" })),
      ],
      { site: siteSignals({ robotsTxtPresent: false, sitemapPresent: true }) }
    );

    const { findings, evaluations } = classifyCrawl(crawl);

    expect(findings.map((f) => [f.ruleId, f.evidence.pageIndex])).toEqual([
      ["perf.lean-page", 0],
      ["seo.structured-data", 0],
      ["ux.navigation", 0],
      ["conv.cta", 0],
      ["seo.robots-missing", 0],
      ["perf.lean-page", 2],
      ["seo.title-missing", 2],
      ["seo.structured-data", 2],
      ["ux.navigation", 2],
      ["conv.cta", 2],
    ]);
    expect(evaluations).toEqual({ performance: 10, seo: 18, ux: 8, accessibility: 6, conversion: 4 });
  });

  it("produces nothing when no page was analyzed", () => {
    const crawl = crawlResult(
      [{ index: 0, url: "https://example.com/", depth: 0, outcome: "skipped-robots", elapsedMs: 0 }],
      { site: siteSignals({ robotsTxtPresent: true, sitemapPresent: false }) }
    );

    expect(classifyCrawl(crawl)).toEqual({
      findings: [],
      crawlFindings: [],
      evaluations: { performance: 0, seo: 0, ux: 0, accessibility: 0, conversion: 0 },
    });
  });

  it("judges the canonical URL against where a redirected seed landed", () => {
    const seed = {
      ...successPage(0, "/", cleanSignals({ canonical: "https://example.com/" }), 0),
      url: "http://example.com/",
      redirects: 1,
    };

    const { findings } = classifyCrawl(crawlResult([seed], { url: "http://example.com/" }));

    expect(findings.map((f) => f.ruleId)).not.toContain("seo.canonical-cross-origin");
  });

  it("reports broken internal links once they were checked", () => {
    const page = successPage(0, "/", cleanSignals(), 0);
    const broken = [
      { url: "https://example.com/gone", status: 404 },
      { url: "https://example.com/down", status: 0 },
    ];

    const { findings, evaluations } = classifyCrawl(
      crawlResult([page], { site: siteSignals({ linksChecked: 5, brokenLinks: broken }) })
    );
    const finding = findings.find((f) => f.ruleId === "seo.broken-internal-links");

    expect(finding).toMatchObject({
      severity: "high",
      description: "2 internal links answer with an error or not at all, such as https://example.com/gone.",
      evidence: { pageIndex: 0, url: "https://example.com/", metric: 2 },
    });
    expect(evaluations.seo).toBe(11);
  });

  it("escalates many broken links to critical", () => {
    const broken = Array.from({ length: 10 }, (_, i) => ({ url: `https://example.com/gone-${i}`, status: 404 }));
    const { findings } = classifyCrawl(
      crawlResult([successPage(0, "/", cleanSignals(), 0)], { site: siteSignals({ linksChecked: 10, brokenLinks: broken }) })
    );

    expect(findings.find((f) => f.ruleId === "seo.broken-internal-links")?.severity).toBe("critical");
  });

  it("skips the broken link rule when no link was checked", () => {
    const { findings, evaluations } = classifyCrawl(crawlResult([successPage(0, "/", cleanSignals(), 0)]));

    expect(findings.some((f) => f.ruleId === "seo.broken-internal-links")).toBe(false);
    expect(evaluations.seo).toBe(10);
  });
});

describe("crawl rules", () => {
  it("reports each page that failed to load, critical for server errors", () => {
    const crawl = crawlResult([
      successPage(0, "/", cleanSignals(), 0),
      { index: 1, url: "https://example.com/missing", depth: 1, outcome: "error", elapsedMs: 5, status: 404, error: "http" },
      { index: 2, url: "https://example.com/broken", depth: 1, outcome: "error", elapsedMs: 5, status: 503, error: "http" },
      { index: 3, url: "https://example.com/slow", depth: 1, outcome: "timeout", elapsedMs: 20_000, error: "timeout" },
    ]);

    const { findings, crawlFindings } = classifyCrawl(crawl);

    expect(crawlFindings.map((f) => [f.ruleId, f.severity, f.evidence.pageIndex, f.evidence.metric])).toEqual([
      ["crawl.http-errors", "high", 1, 404],
      ["crawl.http-errors", "critical", 2, 503],
      ["crawl.http-errors", "high", 3, "timeout"],
    ]);
    expect(findings.some((f) => f.ruleId.startsWith("crawl."))).toBe(false);
  });

  it("flags a truncated full crawl as partial", () => {
    const pages = [successPage(0, "/", cleanSignals(), 0)];

    const full = classifyCrawl(crawlResult(pages, { limitNotes: ["max-pages", "max-link-checks"] }));
    const summary = classifyCrawl(crawlResult(pages, { profile: "summary", limitNotes: ["max-pages"] }));

    expect(full.crawlFindings).toHaveLength(1);
    expect(full.crawlFindings[0]).toMatchObject({
      ruleId: "crawl.partial",
      kind: "critical-bottleneck",
      severity: "critical",
      evidence: { pageIndex: 0, url: "https://example.com/", metric: "max-pages, max-link-checks" },
    });
    expect(summary.crawlFindings).toEqual([]);
  });
});
