import * as net from "net";
import { InvalidUrlError } from "./errors";

const TRACKING_PARAMS = ["utm_source", "utm_medium", "utm_campaign", "utm_term", "utm_content"];

const NON_HTML_EXTENSIONS = new Set([
  ".pdf",
  ".zip",
  ".gz",
  ".rar",
  ".7z",
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".webp",
  ".avif",
  ".svg",
  ".ico",
  ".bmp",
  ".mp4",
  ".webm",
  ".mov",
  ".mp3",
  ".wav",
  ".css",
  ".js",
  ".mjs",
  ".json",
  ".xml",
  ".txt",
  ".csv",
  ".doc",
  ".docx",
  ".xls",
  ".xlsx",
  ".ppt",
  ".pptx",
  ".woff",
  ".woff2",
  ".ttf",
  ".eot",
]);

const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Accepts what a user would type into an audit form and returns the
 * normalized absolute URL, or throws InvalidUrlError.
 */
export function validateUrl(rawUrl: string): string {
  const value = (rawUrl || "").trim();
  if (!value) {
    throw new InvalidUrlError("url is required");
  }

  let parsed: URL;
  try {
    parsed = new URL(HAS_SCHEME.test(value) ? value : `https://${value}`);
  } catch {
    throw new InvalidUrlError("invalid url");
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidUrlError("url must start with http:// or https://");
  }
  if (!parsed.hostname) {
    throw new InvalidUrlError("invalid url");
  }

  const hostname = parsed.hostname.replace(/^\[|\]$/g, "");
  if (hostname !== "localhost" && !net.isIP(hostname) && !hostname.includes(".")) {
    throw new InvalidUrlError("invalid url host");
  }

  const normalized = normalizeUrl(parsed.toString());
  if (!normalized) {
    throw new InvalidUrlError("invalid url");
  }
  return normalized;
}

export function normalizeUrl(urlString: string, baseUrl?: string): string | null {
  try {
    const url = baseUrl ? new URL(urlString, baseUrl) : new URL(urlString);

    url.hash = "";
    TRACKING_PARAMS.forEach((param) => url.searchParams.delete(param));

    let pathname = url.pathname;
    if (pathname.length > 1 && pathname.endsWith("/")) {
      pathname = pathname.slice(0, -1);
    }
    url.pathname = pathname;

    return url.toString();
  } catch {
    return null;
  }
}

export function isHttpUrl(urlString: string): boolean {
  return urlString.startsWith("http://") || urlString.startsWith("https://");
}

export function isSameOrigin(url1: string, url2: string): boolean {
  try {
    const parsed1 = new URL(url1);
    const parsed2 = new URL(url2);
    return parsed1.origin === parsed2.origin;
  } catch {
    return false;
  }
}

/** Guesses from the path extension whether a link points at an HTML document. */
export function looksLikeHtml(urlString: string): boolean {
  try {
    const pathname = new URL(urlString).pathname.toLowerCase();
    const lastSegment = pathname.slice(pathname.lastIndexOf("/") + 1);
    const dot = lastSegment.lastIndexOf(".");
    if (dot === -1) return true;
    return !NON_HTML_EXTENSIONS.has(lastSegment.slice(dot));
  } catch {
    return false;
  }
}

export function isHtmlContentType(contentType: string): boolean {
  const lower = contentType.toLowerCase();
  return lower.includes("text/html") || lower.includes("application/xhtml");
}

export function getOrigin(urlString: string): string | null {
  try {
    return new URL(urlString).origin;
  } catch {
    return null;
  }
}

export function getRobotsUrl(rootUrl: string): string | null {
  const origin = getOrigin(rootUrl);
  return origin ? `${origin}/robots.txt` : null;
}

export function getSitemapUrl(rootUrl: string): string | null {
  const origin = getOrigin(rootUrl);
  return origin ? `${origin}/sitemap.xml` : null;
}

export function getPath(urlString: string): string {
  try {
    const parsed = new URL(urlString);
    return `${parsed.pathname || "/"}${parsed.search}`;
  } catch {
    return urlString;
  }
}
