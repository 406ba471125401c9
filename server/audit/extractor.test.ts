import { describe, expect, it } from "vitest";
import { extractPageSignals } from "./extractor";

const PAGE = `<!doctype html>
<html lang="EN">
<head>
  <title>  Acme Plumbing | Fast repairs  </title>
  <meta name="description" content="Emergency plumbing repairs in town.">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <meta name="robots" content="NOINDEX, follow">
  <meta property="og:title" content="Acme">
  <link rel="canonical" href="/home/">
  <link rel="stylesheet" href="/main.css">
  <script src="/app.js"></script>
  <script src="/late.js" defer></script>
  <script type="application/ld+json">{"@type": "FAQPage"}</script>
</head>
<body>
  <nav><a href="/">Home</a><a href="/services">Services</a><a href="/contact">Contact us</a></nav>
  <h1>Acme Plumbing</h1>
  <h2>Services</h2>
  <h2>Reviews</h2>
  <img src="/hero.jpg" alt="Plumber at work">
  <img src="/team.webp">
  <img data-src="/lazy.png" alt="">
  <form>
    <label for="email">Email</label>
    <input id="email" type="email">
    <input type="text" name="phone">
    <label>Name <input type="text" name="name"></label>
    <input type="hidden" name="token">
    <button>Get started</button>
  </form>
  <a href="tel:+15550100">Call</a>
  <a href="mailto:hello@example.com">Mail</a>
  <a href="https://partner.example.org/deal?utm_source=acme#top">Partner</a>
  <a href="#section">Jump</a>
  <a href="/services">Services again</a>
  <p>What our customers say about us.</p>
  <script>var x = 1;</script>
</body>
</html>`;

describe("extractPageSignals", () => {
  const signals = extractPageSignals(PAGE, "https://example.com/");

  it("reads head metadata", () => {
    expect(signals.title).toBe("Acme Plumbing | Fast repairs");
    expect(signals.metaDescription).toBe("Emergency plumbing repairs in town.");
    expect(signals.canonical).toBe("https://example.com/home");
    expect(signals.robotsMeta).toBe("noindex, follow");
    expect(signals.lang).toBe("en");
    expect(signals.hasViewport).toBe(true);
    expect(signals.hasOpenGraph).toBe(true);
    expect(signals.hasStructuredData).toBe(true);
  });

  it("counts headings and images", () => {
    expect(signals.h1Count).toBe(1);
    expect(signals.h2Count).toBe(2);
    expect(signals.headings[0]).toEqual({ level: 1, text: "Acme Plumbing" });
    expect(signals.imagesTotal).toBe(3);
    expect(signals.imagesMissingAlt).toBe(2);
    expect(signals.lazyImages).toBe(1);
    expect(signals.modernImages).toBe(1);
    expect(signals.legacyImages).toBe(2);
  });

  it("finds unlabeled inputs, CTAs and contact channels", () => {
    expect(signals.inputsTotal).toBe(4);
    expect(signals.inputsMissingLabel).toBe(1);
    expect(signals.formCount).toBe(1);
    expect(signals.ctaTexts).toEqual(["Contact us", "Get started"]);
    expect(signals.contactLinks).toBe(2);
    expect(signals.hasWhatsapp).toBe(false);
    expect(signals.hasFaq).toBe(true);
    expect(signals.hasTestimonials).toBe(true);
    expect(signals.navItems).toEqual(["Home", "Services", "Contact us"]);
  });

  it("collects normalized links in first-occurrence order", () => {
    expect(signals.links).toEqual([
      "https://example.com/",
      "https://example.com/services",
      "https://example.com/contact",
      "https://partner.example.org/deal",
    ]);
    expect(signals.internalLinkCount).toBe(3);
    expect(signals.externalLinkCount).toBe(1);
  });

  it("measures render-blocking resources", () => {
    expect(signals.renderBlockingCount).toBe(2);
    expect(signals.scriptCount).toBe(4);
    expect(signals.inlineScriptBytes).toBe(10);
    expect(signals.mixedContentCount).toBe(0);
  });

  it("flags plain-http resources on a secure page", () => {
    const html = '<html><body><img src="http://cdn.example.com/a.png" alt="a"></body></html>';
    expect(extractPageSignals(html, "https://example.com/").mixedContentCount).toBe(1);
    expect(extractPageSignals(html, "http://example.com/").mixedContentCount).toBe(0);
  });

  it("degrades to empty signals on malformed input", () => {
    const broken = extractPageSignals("<html><head><title></title><body><div><p>unclosed", "https://example.com/x");
    expect(broken.title).toBeNull();
    expect(broken.metaDescription).toBeNull();
    expect(broken.h1Count).toBe(0);
    expect(broken.links).toEqual([]);
    expect(broken.wordCount).toBe(1);

    const empty = extractPageSignals("", "https://example.com/");
    expect(empty.wordCount).toBe(0);
    expect(empty.htmlSizeBytes).toBe(0);
  });
});
