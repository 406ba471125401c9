import type { FetchPort, FetchResult } from "../audit/types";

export interface FakePage {
  body?: string;
  status?: number;
  contentType?: string;
  delayMs?: number;
  finalUrl?: string;
  redirects?: number;
  networkError?: boolean;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * In-process stand-in for a website. Paths (with query string) map to canned
 * responses; anything else is a 404. Every call is recorded.
 */
export class FakeSite implements FetchPort {
  readonly requests: string[] = [];

  constructor(
    private readonly pages: Record<string, FakePage>,
    readonly origin: string = "https://example.com"
  ) {}

  async fetch(url: string, _timeoutMs: number): Promise<FetchResult> {
    this.requests.push(url);
    const parsed = new URL(url);
    const page = parsed.origin === this.origin ? this.pages[`${parsed.pathname}${parsed.search}`] : undefined;
    if (!page) {
      return { error: "http", message: "HTTP 404", status: 404 };
    }

    if (page.delayMs) await sleep(page.delayMs);
    if (page.networkError) {
      return { error: "network", message: "getaddrinfo ENOTFOUND" };
    }

    const status = page.status ?? 200;
    if (status >= 400) {
      return { error: "http", message: `HTTP ${status}`, status };
    }

    return {
      body: page.body ?? "",
      contentType: page.contentType ?? "text/html; charset=utf-8",
      status,
      finalUrl: page.finalUrl ?? url,
      redirects: page.redirects ?? 0,
    };
  }

  /** Requested paths, leaving out robots.txt and sitemap.xml. */
  pagePaths(): string[] {
    return this.requests
      .map((url) => new URL(url))
      .filter((url) => url.pathname !== "/robots.txt" && url.pathname !== "/sitemap.xml")
      .map((url) => `${url.pathname}${url.search}`);
  }
}

export function linkPage(links: string[], title = "Example page"): string {
  const anchors = links.map((href) => `<a href="${href}">${href}</a>`).join("\n");
  return `<!doctype html><html lang="en"><head><title>${title}</title></head><body>${anchors}</body></html>`;
}
