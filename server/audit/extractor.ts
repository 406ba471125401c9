import * as cheerio from "cheerio";
import type { PageHeading, PageSignals } from "./types";
import { isHttpUrl, isSameOrigin, normalizeUrl } from "./url-utils";

const CTA_KEYWORDS = [
  "contact",
  "get started",
  "sign up",
  "signup",
  "subscribe",
  "buy",
  "order",
  "book",
  "schedule",
  "request",
  "quote",
  "demo",
  "try",
  "call us",
  "talk to",
  "learn more",
  "whatsapp",
];

const FAQ_KEYWORDS = ["faq", "frequently asked", "common questions"];
const TESTIMONIAL_KEYWORDS = ["testimonial", "what our clients say", "what our customers say", "customer reviews", "case stud"];

const MODERN_IMAGE_EXTENSIONS = new Set(["webp", "avif"]);
const LEGACY_IMAGE_EXTENSIONS = new Set(["jpg", "jpeg", "png", "gif", "bmp"]);

const SKIPPED_LINK_PREFIXES = ["#", "mailto:", "tel:", "javascript:", "data:"];

const UNLABELED_INPUT_TYPES = new Set(["hidden", "submit", "button", "image", "reset"]);

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function nonEmpty(value: string | undefined): string | null {
  const collapsed = value ? collapse(value) : "";
  return collapsed ? collapsed : null;
}

function includesAny(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

function imageExtension(src: string): string | null {
  const clean = src.split("?", 1)[0]?.split("#", 1)[0]?.toLowerCase() ?? "";
  const dot = clean.lastIndexOf(".");
  if (dot === -1 || dot < clean.lastIndexOf("/")) return null;
  return clean.slice(dot + 1);
}

function extractLinks($: cheerio.CheerioAPI, url: string): string[] {
  const links: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") || "").trim();
    if (!href) return;
    const lower = href.toLowerCase();
    if (SKIPPED_LINK_PREFIXES.some((prefix) => lower.startsWith(prefix))) return;

    const normalized = normalizeUrl(href, url);
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      links.push(normalized);
    }
  });

  return links;
}

function extractHeadings($: cheerio.CheerioAPI): PageHeading[] {
  const headings: PageHeading[] = [];
  $("h1, h2, h3, h4, h5, h6").each((_, el) => {
    const tagName = $(el).prop("tagName");
    if (tagName) {
      const level = parseInt(tagName.charAt(1), 10);
      headings.push({ level, text: collapse($(el).text()) });
    }
  });
  return headings;
}

function countInputsWithoutLabel($: cheerio.CheerioAPI): number {
  const labelledIds = new Set<string>();
  $("label[for]").each((_, el) => {
    const target = ($(el).attr("for") || "").trim();
    if (target) labelledIds.add(target);
  });

  let missing = 0;
  $("input").each((_, el) => {
    const $input = $(el);
    const type = ($input.attr("type") || "text").trim().toLowerCase();
    if (UNLABELED_INPUT_TYPES.has(type)) return;

    const hasAria = Boolean(($input.attr("aria-label") || "").trim() || ($input.attr("aria-labelledby") || "").trim());
    const id = ($input.attr("id") || "").trim();
    const hasForLabel = id !== "" && labelledIds.has(id);
    const hasWrappingLabel = $input.closest("label").length > 0;

    if (!hasAria && !hasForLabel && !hasWrappingLabel) missing++;
  });
  return missing;
}

function extractCtaTexts($: cheerio.CheerioAPI): string[] {
  const texts: string[] = [];
  $("a, button, input[type='submit'], input[type='button']").each((_, el) => {
    const $el = $(el);
    const text =
      $el.prop("tagName") === "INPUT" ? collapse($el.attr("value") || $el.attr("aria-label") || "") : collapse($el.text());
    if (text && includesAny(text.toLowerCase(), CTA_KEYWORDS) && !texts.includes(text)) {
      texts.push(text);
    }
  });
  return texts;
}

function extractNavItems($: cheerio.CheerioAPI): string[] {
  const items: string[] = [];
  $("nav a, [role='navigation'] a").each((_, el) => {
    const label = collapse($(el).text());
    if (label.length >= 2 && label.length <= 40 && !items.includes(label)) {
      items.push(label);
    }
  });
  return items;
}

function collectResourceUrls($: cheerio.CheerioAPI, url: string): string[] {
  const resources: string[] = [];
  $("script, img, iframe, source").each((_, el) => {
    const src = ($(el).attr("src") || $(el).attr("data-src") || "").trim();
    if (src) resources.push(normalizeUrl(src, url) ?? src);
  });
  $("link[href]").each((_, el) => {
    const href = ($(el).attr("href") || "").trim();
    if (href) resources.push(normalizeUrl(href, url) ?? href);
  });
  return resources;
}

function countRenderBlocking($: cheerio.CheerioAPI): number {
  let count = 0;
  $("head script[src]").each((_, el) => {
    const $script = $(el);
    const isModule = ($script.attr("type") || "").toLowerCase() === "module";
    if ($script.attr("async") === undefined && $script.attr("defer") === undefined && !isModule) {
      count++;
    }
  });
  count += $("head link[rel~='stylesheet']").length;
  return count;
}

function hasFaqSchema($: cheerio.CheerioAPI): boolean {
  let found = false;
  $("script[type='application/ld+json']").each((_, el) => {
    if (/"@type"\s*:\s*"FAQPage"/i.test($(el).text())) {
      found = true;
      return false;
    }
  });
  return found;
}

/**
 * Turns one rendered page into the signals the classifier rules read.
 * Pure and total: missing markup yields null/zero signals, never an error.
 */
export function extractPageSignals(html: string, url: string): PageSignals {
  const $ = cheerio.load(html || "");

  const title = nonEmpty($("title").first().text());
  const metaDescription = nonEmpty($("meta[name='description' i]").first().attr("content"));
  const canonicalHref = $("link[rel~='canonical']").first().attr("href");
  const canonical = canonicalHref ? normalizeUrl(canonicalHref.trim(), url) : null;
  const robotsMeta = nonEmpty($("meta[name='robots' i]").first().attr("content"))?.toLowerCase() ?? null;
  const lang = nonEmpty($("html").attr("lang"))?.toLowerCase() ?? null;

  const headings = extractHeadings($);

  let imagesMissingAlt = 0;
  let lazyImages = 0;
  let modernImages = 0;
  let legacyImages = 0;
  const images = $("img");
  images.each((_, el) => {
    const $img = $(el);
    if (!($img.attr("alt") || "").trim()) imagesMissingAlt++;
    const className = ($img.attr("class") || "").toLowerCase();
    if ($img.attr("loading") === "lazy" || $img.attr("data-src") !== undefined || className.includes("lazy")) {
      lazyImages++;
    }
    const ext = imageExtension($img.attr("src") || $img.attr("data-src") || "");
    if (ext && MODERN_IMAGE_EXTENSIONS.has(ext)) modernImages++;
    else if (ext && LEGACY_IMAGE_EXTENSIONS.has(ext)) legacyImages++;
  });
  modernImages += $("picture source[type='image/webp'], picture source[type='image/avif']").length;

  const resources = collectResourceUrls($, url);
  const isHttps = url.startsWith("https://");
  const mixedContentCount = isHttps ? resources.filter((ref) => ref.toLowerCase().startsWith("http://")).length : 0;

  let inlineScriptBytes = 0;
  $("script:not([src])").each((_, el) => {
    const type = ($(el).attr("type") || "").toLowerCase();
    if (type === "application/ld+json") return;
    inlineScriptBytes += Buffer.byteLength($(el).text(), "utf8");
  });

  const rawHrefs = $("a[href]")
    .map((_, el) => ($(el).attr("href") || "").toLowerCase())
    .get();
  const contactLinks = rawHrefs.filter((href) => href.startsWith("tel:") || href.startsWith("mailto:")).length;

  const links = extractLinks($, url);
  const httpLinks = links.filter(isHttpUrl);
  const internalLinkCount = httpLinks.filter((link) => isSameOrigin(link, url)).length;

  // Counted before the body is stripped for text extraction.
  const scriptCount = $("script").length;
  const hasStructuredData = $("script[type='application/ld+json'], [itemtype]").length > 0;
  const faqSchema = hasFaqSchema($);

  const $body = $("body").clone();
  $body.find("script, style, noscript, template").remove();
  const text = collapse($body.text());
  const textLower = text.toLowerCase();
  const wordCount = text ? text.split(" ").length : 0;

  return {
    title,
    metaDescription,
    canonical,
    robotsMeta,
    lang,
    headings,
    h1Count: headings.filter((h) => h.level === 1).length,
    h2Count: headings.filter((h) => h.level === 2).length,
    imagesTotal: images.length,
    imagesMissingAlt,
    lazyImages,
    modernImages,
    legacyImages,
    inputsTotal: $("input").length,
    inputsMissingLabel: countInputsWithoutLabel($),
    formCount: $("form").length,
    ctaTexts: extractCtaTexts($),
    contactLinks,
    hasWhatsapp:
      textLower.includes("whatsapp") || rawHrefs.some((href) => href.includes("whatsapp") || href.includes("wa.me")),
    hasViewport: $("meta[name='viewport' i]").length > 0,
    hasStructuredData,
    hasOpenGraph: $("meta[property^='og:']").length > 0,
    hasFaq: faqSchema || includesAny(textLower, FAQ_KEYWORDS),
    hasTestimonials: includesAny(textLower, TESTIMONIAL_KEYWORDS),
    navItems: extractNavItems($),
    resourceCount: resources.length,
    renderBlockingCount: countRenderBlocking($),
    scriptCount,
    inlineScriptBytes,
    mixedContentCount,
    wordCount,
    htmlSizeBytes: Buffer.byteLength(html || "", "utf8"),
    links,
    internalLinkCount,
    externalLinkCount: httpLinks.length - internalLinkCount,
  };
}
