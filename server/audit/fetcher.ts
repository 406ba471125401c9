import type { FetchFailure, FetchPort, FetchResult } from "./types";

const MAX_REDIRECTS = 5;

/**
 * Plain HTTP implementation of the fetch port. Redirects are followed by hand
 * so the hop count can be reported.
 */
export class HttpFetchPort implements FetchPort {
  constructor(private readonly userAgent: string) {}

  async fetch(url: string, timeoutMs: number): Promise<FetchResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let currentUrl = url;
      let redirects = 0;

      while (redirects <= MAX_REDIRECTS) {
        const response = await fetch(currentUrl, {
          signal: controller.signal,
          headers: {
            "User-Agent": this.userAgent,
            Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8",
          },
          redirect: "manual",
        });

        if (response.status >= 300 && response.status < 400) {
          const location = response.headers.get("location");
          if (!location) {
            return { error: "http", message: "Redirect without location header", status: response.status };
          }
          currentUrl = new URL(location, currentUrl).toString();
          redirects++;
          continue;
        }

        const body = await response.text();
        if (!response.ok) {
          return { error: "http", message: `HTTP ${response.status}`, status: response.status };
        }

        return {
          body,
          contentType: response.headers.get("content-type") || "",
          status: response.status,
          finalUrl: currentUrl,
          redirects,
        };
      }

      return { error: "http", message: "Too many redirects" };
    } catch (e: unknown) {
      if (e instanceof Error && e.name === "AbortError") {
        return { error: "timeout", message: `Timed out after ${timeoutMs}ms` };
      }
      return { error: "network", message: e instanceof Error ? e.message : "Unknown fetch error" };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function isFetchFailure(result: FetchResult): result is FetchFailure {
  return "error" in result;
}

/**
 * Calls the port and settles no later than `timeoutMs`, whatever the port
 * does. A port that throws is reported as a network failure.
 */
export async function fetchWithDeadline(port: FetchPort, url: string, timeoutMs: number): Promise<FetchResult> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<FetchFailure>((resolve) => {
    timer = setTimeout(() => resolve({ error: "timeout", message: `Timed out after ${timeoutMs}ms` }), timeoutMs);
  });

  const attempt = port.fetch(url, timeoutMs).catch(
    (e: unknown): FetchFailure => ({
      error: "network",
      message: e instanceof Error ? e.message : "Unknown fetch error",
    })
  );

  try {
    return await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
