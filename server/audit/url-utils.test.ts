import { describe, expect, it } from "vitest";
import { InvalidUrlError } from "./errors";
import { checkScope } from "./scope";
import { getPath, looksLikeHtml, normalizeUrl, validateUrl } from "./url-utils";

describe("validateUrl", () => {
  it("defaults the scheme to https and normalizes", () => {
    expect(validateUrl("example.com")).toBe("https://example.com/");
    expect(validateUrl("  http://Example.com/about/#team ")).toBe("http://example.com/about");
  });

  it("accepts localhost and IP literals", () => {
    expect(validateUrl("http://localhost:3000")).toBe("http://localhost:3000/");
    expect(validateUrl("http://127.0.0.1/")).toBe("http://127.0.0.1/");
  });

  it("rejects empty, non-http and dotless hosts", () => {
    expect(() => validateUrl("")).toThrow(InvalidUrlError);
    expect(() => validateUrl("ftp://example.com")).toThrow("url must start with http:// or https://");
    expect(() => validateUrl("https://intranet")).toThrow("invalid url host");
  });
});

describe("normalizeUrl", () => {
  it("drops fragments, tracking parameters and trailing slashes", () => {
    expect(normalizeUrl("https://example.com/a/?utm_source=x&id=2#top")).toBe("https://example.com/a?id=2");
    expect(normalizeUrl("/b/", "https://example.com/a")).toBe("https://example.com/b");
    expect(normalizeUrl("https://example.com")).toBe("https://example.com/");
  });

  it("returns null for unparseable input", () => {
    expect(normalizeUrl("not a url")).toBeNull();
  });
});

describe("helpers", () => {
  it("guesses HTML from the path extension", () => {
    expect(looksLikeHtml("https://example.com/about")).toBe(true);
    expect(looksLikeHtml("https://example.com/page.html")).toBe(true);
    expect(looksLikeHtml("https://example.com/report.PDF")).toBe(false);
  });

  it("keeps the query string in paths", () => {
    expect(getPath("https://example.com/search?q=1")).toBe("/search?q=1");
  });
});

describe("checkScope", () => {
  const origin = "https://example.com";

  it("accepts same-origin HTML", () => {
    expect(checkScope("https://example.com/about", origin)).toEqual({ inScope: true });
  });

  it("rejects with a reason", () => {
    expect(checkScope("https://blog.example.com/", origin)).toEqual({ inScope: false, reason: "cross-origin" });
    expect(checkScope("http://example.com/", origin)).toEqual({ inScope: false, reason: "protocol" });
    expect(checkScope("mailto:a@example.com", origin)).toEqual({ inScope: false, reason: "protocol" });
    expect(checkScope("https://example.com/logo.png", origin)).toEqual({ inScope: false, reason: "non-html" });
  });

  it("prefers the content type once it is known", () => {
    expect(checkScope("https://example.com/feed", origin, "application/json")).toEqual({
      inScope: false,
      reason: "non-html",
    });
    expect(checkScope("https://example.com/x.php", origin, "text/html; charset=utf-8")).toEqual({ inScope: true });
  });
});
