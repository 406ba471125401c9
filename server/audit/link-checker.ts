import pLimit from "p-limit";
import { WORKER_POOL_WIDTH } from "./budgets";
import { fetchWithDeadline, isFetchFailure } from "./fetcher";
import type { RobotsGate } from "./robots";
import type { BrokenLink, FetchPort, LimitNote } from "./types";

export interface LinkCheckOptions {
  fetcher: FetchPort;
  robots: RobotsGate;
  /** Statuses already known from the crawl, keyed by URL. Filled in as links are checked. */
  statuses: Map<string, number>;
  maxChecks: number;
  timeoutMs: number;
  outOfTime: () => boolean;
}

export interface LinkCheckResult {
  checked: number;
  broken: BrokenLink[];
  stoppedBy: LimitNote | null;
}

export function isBrokenStatus(status: number): boolean {
  return status === 0 || status >= 400;
}

/**
 * Verifies internal links in sorted order. Links robots.txt disallows are
 * skipped without counting; links the crawl already fetched reuse that status.
 */
export async function checkInternalLinks(links: Iterable<string>, options: LinkCheckOptions): Promise<LinkCheckResult> {
  const { fetcher, robots, statuses, maxChecks, timeoutMs, outOfTime } = options;
  const limit = pLimit(WORKER_POOL_WIDTH);
  const broken: BrokenLink[] = [];
  let checked = 0;
  let stoppedBy: LimitNote | null = null;
  let batch: string[] = [];

  const statusOf = async (url: string): Promise<number> => {
    const known = statuses.get(url);
    if (known !== undefined) return known;
    const result = await fetchWithDeadline(fetcher, url, timeoutMs);
    const status = isFetchFailure(result) ? (result.status ?? 0) : result.status;
    statuses.set(url, status);
    return status;
  };

  const flush = async () => {
    const results = await Promise.all(
      batch.map(async (url) => ({ url, status: await limit(() => statusOf(url)) }))
    );
    for (const result of results) {
      if (isBrokenStatus(result.status)) broken.push(result);
    }
    batch = [];
  };

  for (const url of Array.from(new Set(links)).sort()) {
    if (checked >= maxChecks) {
      stoppedBy = "max-link-checks";
      break;
    }
    if (outOfTime()) {
      stoppedBy = "max-runtime";
      break;
    }
    if (!(await robots.isAllowed(url))) continue;

    checked++;
    batch.push(url);
    if (batch.length >= WORKER_POOL_WIDTH) await flush();
  }
  await flush();

  return { checked, broken, stoppedBy };
}
