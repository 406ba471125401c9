import type { AuditCategory, Finding, FindingKind, FindingSeverity } from "@shared/audit-types";
import type { AuditRule, CrawlResult, CrawlRule, PageRecord, PageSignals, RuleContext, SiteRule, SiteSignals } from "./types";
import { getOrigin } from "./url-utils";

const SLOW_RESPONSE_MS = 1200;
const HEAVY_HTML_BYTES = 512_000;
const LEAN_HTML_BYTES = 100_000;
const MAX_RESOURCES = 80;
const MAX_RENDER_BLOCKING = 5;
const MAX_INLINE_SCRIPT_BYTES = 100_000;
const LAZY_IMAGE_THRESHOLD = 10;
const TITLE_MIN = 15;
const TITLE_MAX = 60;
const META_MIN = 70;
const META_MAX = 160;
const THIN_CONTENT_WORDS = 120;
const REDIRECT_CHAIN_HOPS = 3;
const MANY_MISSING_ALT = 20;
const MIN_NAV_ITEMS = 3;
const MANY_BROKEN_LINKS = 10;

interface FindingText {
  severity: FindingSeverity;
  title: string;
  description: string;
  recommendation: string;
  selector?: string;
  metric?: number | string;
}

type RuleHead = { id: string; category: AuditCategory; kind: FindingKind };

function createFinding(rule: RuleHead, page: RuleContext, text: FindingText): Finding {
  const { severity, title, description, recommendation, selector, metric } = text;
  return {
    ruleId: rule.id,
    category: rule.category,
    kind: rule.kind,
    severity,
    title,
    description,
    recommendation,
    evidence: {
      pageIndex: page.index,
      url: page.url,
      ...(selector !== undefined ? { selector } : {}),
      ...(metric !== undefined ? { metric } : {}),
    },
  };
}

function pageRule(
  head: RuleHead,
  check: (signals: PageSignals, page: RuleContext) => FindingText | null
): AuditRule {
  return {
    ...head,
    evaluate(signals, page) {
      const text = check(signals, page);
      return text ? createFinding(head, page, text) : null;
    },
  };
}

function siteRule(
  head: RuleHead,
  check: (site: SiteSignals, seed: RuleContext) => FindingText | null,
  applies?: (site: SiteSignals) => boolean
): SiteRule {
  return {
    ...head,
    evaluate(site, seed) {
      const text = check(site, seed);
      return text ? createFinding(head, seed, text) : null;
    },
    ...(applies ? { applies } : {}),
  };
}

function crawlRule(head: RuleHead, check: (crawl: CrawlResult) => Array<[RuleContext, FindingText]>): CrawlRule {
  return {
    ...head,
    evaluate(crawl) {
      return check(crawl).map(([page, text]) => createFinding(head, page, text));
    },
  };
}

const performanceRules: AuditRule[] = [
  pageRule({ id: "perf.slow-response", category: "performance", kind: "weakness" }, (_, page) =>
    page.elapsedMs > SLOW_RESPONSE_MS
      ? {
          severity: "high",
          title: "Slow server response",
          description: `The page took ${page.elapsedMs} ms to respond.`,
          recommendation: "Add caching or a CDN in front of the origin and review slow backend work.",
          metric: page.elapsedMs,
        }
      : null
  ),
  pageRule({ id: "perf.heavy-html", category: "performance", kind: "weakness" }, (s) =>
    s.htmlSizeBytes > HEAVY_HTML_BYTES
      ? {
          severity: "medium",
          title: "Heavy HTML document",
          description: `The HTML document weighs ${Math.round(s.htmlSizeBytes / 1024)} KB.`,
          recommendation: "Trim inlined data and markup, and paginate long listings.",
          metric: s.htmlSizeBytes,
        }
      : null
  ),
  pageRule({ id: "perf.many-resources", category: "performance", kind: "weakness" }, (s) =>
    s.resourceCount > MAX_RESOURCES
      ? {
          severity: "medium",
          title: "Too many referenced resources",
          description: `The page references ${s.resourceCount} scripts, styles, images and frames.`,
          recommendation: "Bundle scripts and styles and drop unused third-party tags.",
          metric: s.resourceCount,
        }
      : null
  ),
  pageRule({ id: "perf.render-blocking", category: "performance", kind: "weakness" }, (s) =>
    s.renderBlockingCount > MAX_RENDER_BLOCKING
      ? {
          severity: "medium",
          title: "Render-blocking resources",
          description: `${s.renderBlockingCount} scripts and stylesheets in the head block the first render.`,
          recommendation: "Mark scripts async or defer and inline only the critical CSS.",
          selector: "head script[src], head link[rel=stylesheet]",
          metric: s.renderBlockingCount,
        }
      : null
  ),
  pageRule({ id: "perf.inline-script", category: "performance", kind: "weakness" }, (s) =>
    s.inlineScriptBytes > MAX_INLINE_SCRIPT_BYTES
      ? {
          severity: "low",
          title: "Large inline scripts",
          description: `Inline scripts add ${Math.round(s.inlineScriptBytes / 1024)} KB to the document.`,
          recommendation: "Move large inline scripts into cacheable external files.",
          selector: "script:not([src])",
          metric: s.inlineScriptBytes,
        }
      : null
  ),
  pageRule({ id: "perf.lazy-images", category: "performance", kind: "opportunity" }, (s) =>
    s.imagesTotal >= LAZY_IMAGE_THRESHOLD && s.lazyImages === 0
      ? {
          severity: "medium",
          title: "Images are not lazy-loaded",
          description: `None of the ${s.imagesTotal} images on the page are lazy-loaded.`,
          recommendation: 'Add loading="lazy" to images below the fold.',
          selector: "img",
          metric: s.imagesTotal,
        }
      : null
  ),
  pageRule({ id: "perf.modern-images", category: "performance", kind: "opportunity" }, (s) =>
    s.legacyImages > 0 && s.modernImages === 0
      ? {
          severity: "low",
          title: "No modern image formats",
          description: `${s.legacyImages} images use JPEG, PNG or GIF and none use WebP or AVIF.`,
          recommendation: "Serve WebP or AVIF variants through <picture> or content negotiation.",
          selector: "img",
          metric: s.legacyImages,
        }
      : null
  ),
  pageRule({ id: "perf.lean-page", category: "performance", kind: "strength" }, (s) =>
    s.htmlSizeBytes < LEAN_HTML_BYTES && s.renderBlockingCount <= 2
      ? {
          severity: "low",
          title: "Lean page weight",
          description: "The document is light and has few render-blocking resources.",
          recommendation: "Keep new templates within the same weight budget.",
          metric: s.htmlSizeBytes,
        }
      : null
  ),
];

const seoRules: AuditRule[] = [
  pageRule({ id: "seo.title-missing", category: "seo", kind: "weakness" }, (s) =>
    !s.title
      ? {
          severity: "high",
          title: "Missing page title",
          description: "The page has no <title> element.",
          recommendation: "Give every page a unique, descriptive title.",
          selector: "title",
        }
      : null
  ),
  pageRule({ id: "seo.title-length", category: "seo", kind: "weakness" }, (s) =>
    s.title && (s.title.length < TITLE_MIN || s.title.length > TITLE_MAX)
      ? {
          severity: "medium",
          title: "Title length out of range",
          description: `The title is ${s.title.length} characters long.`,
          recommendation: `Keep titles between ${TITLE_MIN} and ${TITLE_MAX} characters.`,
          selector: "title",
          metric: s.title.length,
        }
      : null
  ),
  pageRule({ id: "seo.meta-missing", category: "seo", kind: "weakness" }, (s) =>
    !s.metaDescription
      ? {
          severity: "medium",
          title: "Missing meta description",
          description: "The page has no meta description.",
          recommendation: "Write a meta description that summarises the page for search results.",
          selector: 'meta[name="description"]',
        }
      : null
  ),
  pageRule({ id: "seo.meta-length", category: "seo", kind: "weakness" }, (s) =>
    s.metaDescription && (s.metaDescription.length < META_MIN || s.metaDescription.length > META_MAX)
      ? {
          severity: "low",
          title: "Meta description length out of range",
          description: `The meta description is ${s.metaDescription.length} characters long.`,
          recommendation: `Keep meta descriptions between ${META_MIN} and ${META_MAX} characters.`,
          selector: 'meta[name="description"]',
          metric: s.metaDescription.length,
        }
      : null
  ),
  pageRule({ id: "seo.canonical-missing", category: "seo", kind: "weakness" }, (s) =>
    !s.canonical
      ? {
          severity: "medium",
          title: "Missing canonical URL",
          description: "The page does not declare a canonical URL.",
          recommendation: 'Add <link rel="canonical"> pointing at the preferred URL.',
          selector: 'link[rel="canonical"]',
        }
      : null
  ),
  pageRule({ id: "seo.canonical-cross-origin", category: "seo", kind: "critical-bottleneck" }, (s, page) =>
    s.canonical && getOrigin(s.canonical) !== getOrigin(page.finalUrl ?? page.url)
      ? {
          severity: "high",
          title: "Canonical points to another site",
          description: `The canonical URL points at ${getOrigin(s.canonical) ?? s.canonical}.`,
          recommendation: "Point the canonical URL at this site unless the content is deliberately syndicated.",
          selector: 'link[rel="canonical"]',
        }
      : null
  ),
  pageRule({ id: "seo.h1-count", category: "seo", kind: "weakness" }, (s) =>
    s.h1Count !== 1
      ? {
          severity: "medium",
          title: s.h1Count === 0 ? "Missing H1 heading" : "Multiple H1 headings",
          description: `The page has ${s.h1Count} H1 headings.`,
          recommendation: "Use exactly one H1 that states the page topic.",
          selector: "h1",
          metric: s.h1Count,
        }
      : null
  ),
  pageRule({ id: "seo.noindex", category: "seo", kind: "critical-bottleneck" }, (s, page) =>
    s.robotsMeta?.includes("noindex")
      ? {
          severity: page.depth === 0 ? "critical" : "high",
          title: "Page excluded from search",
          description: "A robots meta tag tells search engines not to index this page.",
          recommendation: "Remove noindex from pages that should appear in search results.",
          selector: 'meta[name="robots"]',
        }
      : null
  ),
  pageRule({ id: "seo.structured-data-missing", category: "seo", kind: "opportunity" }, (s) =>
    !s.hasStructuredData
      ? {
          severity: "low",
          title: "No structured data",
          description: "The page carries no JSON-LD or microdata.",
          recommendation: "Describe the organisation, products or articles with schema.org markup.",
          selector: 'script[type="application/ld+json"]',
        }
      : null
  ),
  pageRule({ id: "seo.structured-data", category: "seo", kind: "strength" }, (s) =>
    s.hasStructuredData
      ? {
          severity: "low",
          title: "Structured data present",
          description: "The page describes itself with schema.org markup.",
          recommendation: "Validate the markup whenever templates change.",
        }
      : null
  ),
  pageRule({ id: "seo.open-graph", category: "seo", kind: "opportunity" }, (s) =>
    !s.hasOpenGraph
      ? {
          severity: "low",
          title: "No Open Graph tags",
          description: "Shared links to this page will render without a title card or image.",
          recommendation: "Add og:title, og:description and og:image.",
          selector: 'meta[property^="og:"]',
        }
      : null
  ),
];

const uxRules: AuditRule[] = [
  pageRule({ id: "ux.viewport-missing", category: "ux", kind: "weakness" }, (s) =>
    !s.hasViewport
      ? {
          severity: "high",
          title: "Missing viewport meta tag",
          description: "Mobile browsers will render the page at desktop width.",
          recommendation: 'Add <meta name="viewport" content="width=device-width, initial-scale=1">.',
          selector: 'meta[name="viewport"]',
        }
      : null
  ),
  pageRule({ id: "ux.thin-content", category: "ux", kind: "weakness" }, (s) =>
    s.wordCount < THIN_CONTENT_WORDS
      ? {
          severity: "medium",
          title: "Thin content",
          description: `The page has only ${s.wordCount} words of visible text.`,
          recommendation: "Expand the copy so visitors understand what the page offers.",
          metric: s.wordCount,
        }
      : null
  ),
  pageRule({ id: "ux.redirect-chain", category: "ux", kind: "critical-bottleneck" }, (_, page) =>
    (page.redirects ?? 0) >= REDIRECT_CHAIN_HOPS
      ? {
          severity: "high",
          title: "Redirect chain",
          description: `Reaching the page took ${page.redirects ?? 0} redirects.`,
          recommendation: "Link straight to the final URL and collapse chained redirects into one.",
          metric: page.redirects ?? 0,
        }
      : null
  ),
  pageRule({ id: "ux.mixed-content", category: "ux", kind: "critical-bottleneck" }, (s) =>
    s.mixedContentCount > 0
      ? {
          severity: "high",
          title: "Mixed content",
          description: `${s.mixedContentCount} resources are loaded over plain HTTP on a secure page.`,
          recommendation: "Serve every resource over HTTPS.",
          metric: s.mixedContentCount,
        }
      : null
  ),
  pageRule({ id: "ux.navigation", category: "ux", kind: "strength" }, (s) =>
    s.navItems.length >= MIN_NAV_ITEMS
      ? {
          severity: "low",
          title: "Clear navigation",
          description: `The main navigation offers ${s.navItems.length} entries.`,
          recommendation: "Keep navigation labels short and consistent across pages.",
          selector: "nav",
          metric: s.navItems.length,
        }
      : null
  ),
];

const accessibilityRules: AuditRule[] = [
  pageRule({ id: "a11y.img-alt", category: "accessibility", kind: "weakness" }, (s) =>
    s.imagesMissingAlt > 0
      ? {
          severity: s.imagesMissingAlt >= MANY_MISSING_ALT ? "high" : "medium",
          title: "Images without alt text",
          description: `${s.imagesMissingAlt} of ${s.imagesTotal} images have no alt text.`,
          recommendation: "Describe meaningful images in alt text and use an empty alt only for decoration.",
          selector: "img:not([alt])",
          metric: s.imagesMissingAlt,
        }
      : null
  ),
  pageRule({ id: "a11y.input-label", category: "accessibility", kind: "weakness" }, (s) =>
    s.inputsMissingLabel > 0
      ? {
          severity: "high",
          title: "Form fields without labels",
          description: `${s.inputsMissingLabel} form fields have no associated label.`,
          recommendation: "Associate every field with a <label> or an aria-label.",
          selector: "input",
          metric: s.inputsMissingLabel,
        }
      : null
  ),
  pageRule({ id: "a11y.lang-missing", category: "accessibility", kind: "weakness" }, (s) =>
    !s.lang
      ? {
          severity: "medium",
          title: "Missing document language",
          description: "The <html> element has no lang attribute.",
          recommendation: "Declare the page language so screen readers pronounce it correctly.",
          selector: "html",
        }
      : null
  ),
  pageRule({ id: "a11y.alt-coverage", category: "accessibility", kind: "strength" }, (s) =>
    s.imagesTotal > 0 && s.imagesMissingAlt === 0
      ? {
          severity: "low",
          title: "Full alt text coverage",
          description: `All ${s.imagesTotal} images carry alt text.`,
          recommendation: "Keep alt text in the publishing checklist.",
          metric: s.imagesTotal,
        }
      : null
  ),
];

const conversionRules: AuditRule[] = [
  pageRule({ id: "conv.no-cta", category: "conversion", kind: "weakness" }, (s) =>
    s.ctaTexts.length === 0
      ? {
          severity: "medium",
          title: "No call to action",
          description: "The page offers visitors no clear next step.",
          recommendation: "Add a visible call to action that matches the page intent.",
        }
      : null
  ),
  pageRule({ id: "conv.no-contact", category: "conversion", kind: "weakness" }, (s) =>
    s.formCount === 0 && !s.hasWhatsapp && s.contactLinks === 0
      ? {
          severity: "medium",
          title: "No contact channel",
          description: "The page has no form, phone, e-mail or WhatsApp link.",
          recommendation: "Give visitors at least one direct way to get in touch.",
        }
      : null
  ),
  pageRule({ id: "conv.cta", category: "conversion", kind: "strength" }, (s) =>
    s.ctaTexts.length > 0
      ? {
          severity: "low",
          title: "Calls to action present",
          description: `The page offers calls to action such as "${s.ctaTexts[0] ?? ""}".`,
          recommendation: "Test CTA wording and placement to lift click-through.",
          metric: s.ctaTexts.length,
        }
      : null
  ),
  pageRule({ id: "conv.faq", category: "conversion", kind: "opportunity" }, (s) =>
    !s.hasFaq
      ? {
          severity: "low",
          title: "No FAQ content",
          description: "The page does not answer common objections in an FAQ.",
          recommendation: "Add an FAQ block with FAQPage structured data.",
        }
      : null
  ),
  pageRule({ id: "conv.social-proof", category: "conversion", kind: "opportunity" }, (s) =>
    !s.hasTestimonials
      ? {
          severity: "low",
          title: "No social proof",
          description: "The page shows no testimonials, reviews or case studies.",
          recommendation: "Add customer quotes or case studies near the main call to action.",
        }
      : null
  ),
];

/** Page rules in evaluation order. Findings follow this order within a page. */
export const PAGE_RULES: readonly AuditRule[] = [
  ...performanceRules,
  ...seoRules,
  ...uxRules,
  ...accessibilityRules,
  ...conversionRules,
];

/** Run once per crawl against the seed page. */
export const SITE_RULES: readonly SiteRule[] = [
  siteRule({ id: "seo.robots-missing", category: "seo", kind: "weakness" }, (site) =>
    !site.robotsTxtPresent
      ? {
          severity: "high",
          title: "Missing robots.txt",
          description: "The site does not serve a robots.txt file.",
          recommendation: "Publish a robots.txt that states crawl rules and links the sitemap.",
          selector: "/robots.txt",
        }
      : null
  ),
  siteRule({ id: "seo.sitemap-missing", category: "seo", kind: "weakness" }, (site) =>
    !site.sitemapPresent
      ? {
          severity: "medium",
          title: "Missing XML sitemap",
          description: "No sitemap is declared in robots.txt or served at /sitemap.xml.",
          recommendation: "Publish an XML sitemap and reference it from robots.txt.",
          selector: "/sitemap.xml",
        }
      : null
  ),
  siteRule(
    { id: "seo.broken-internal-links", category: "seo", kind: "weakness" },
    (site) => {
      const [first] = site.brokenLinks;
      if (!first) return null;
      const count = site.brokenLinks.length;
      return {
        severity: count >= MANY_BROKEN_LINKS ? "critical" : "high",
        title: "Broken internal links",
        description: `${count} internal links answer with an error or not at all, such as ${first.url}.`,
        recommendation: "Fix or remove links to missing pages and update the navigation.",
        metric: count,
      };
    },
    (site) => site.linksChecked > 0
  ),
];

function isFailedPage(page: PageRecord): boolean {
  return page.outcome === "timeout" || page.outcome === "error";
}

/** Run once per crawl, whether or not any page was analyzed. */
export const CRAWL_RULES: readonly CrawlRule[] = [
  crawlRule({ id: "crawl.http-errors", category: "ux", kind: "critical-bottleneck" }, (crawl) =>
    crawl.pages.filter(isFailedPage).map((page): [RuleContext, FindingText] => [
      page,
      {
        severity: (page.status ?? 0) >= 500 ? "critical" : "high",
        title: "Pages failing to load",
        description: "Some pages answer with an HTTP error or do not respond in time.",
        recommendation: "Fix broken routes and server failures before anything else.",
        metric: page.status ?? page.outcome,
      },
    ])
  ),
  crawlRule({ id: "crawl.partial", category: "seo", kind: "critical-bottleneck" }, (crawl) => {
    if (crawl.profile !== "full" || crawl.limitNotes.length === 0) return [];
    const seed: RuleContext = crawl.pages[0] ?? { index: 0, url: crawl.url, depth: 0, elapsedMs: 0 };
    return [
      [
        seed,
        {
          severity: "critical",
          title: "Partial crawl",
          description: "The crawl hit a safety limit before covering the whole site, so the results describe a sample.",
          recommendation: "Re-run the audit after simplifying the site structure, or audit key sections separately.",
          metric: crawl.limitNotes.join(", "),
        },
      ],
    ];
  }),
];

export function isPenalisingKind(kind: FindingKind): boolean {
  return kind === "weakness" || kind === "critical-bottleneck";
}
