import type { AuditProfile, AuditReport, ExecutiveSummary } from "@shared/audit-types";
import { moduleLogger } from "../logger";

const log = moduleLogger("cache");

export interface CacheEntry<T> {
  key: string;
  value: T;
  createdAt: number;
  ttlMs: number;
}

export function cacheKey(profile: AuditProfile, normalizedUrl: string): string {
  return `${profile}|${normalizedUrl}`;
}

/**
 * In-memory TTL cache with request coalescing. Expiry is checked on lookup;
 * there is no background sweep. While a key is being computed every caller
 * shares the same computation, and a failed computation leaves no entry behind.
 * Values are held and handed out as structured clones, so a caller mutating
 * its copy never touches the cached one.
 */
export class AuditCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();
  private generation = 0;

  constructor(private readonly now: () => number = Date.now) {}

  private fresh(key: string): CacheEntry<T> | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.now() - entry.createdAt >= entry.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  /** A fresh value for `key`, without computing or joining a computation. */
  peek(key: string): T | null {
    const entry = this.fresh(key);
    return entry ? structuredClone(entry.value) : null;
  }

  getOrCompute(key: string, ttlMs: number, compute: () => Promise<T>): Promise<T> {
    const entry = this.fresh(key);
    if (entry) {
      log.debug("cache hit", { key });
      return Promise.resolve(structuredClone(entry.value));
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      log.debug("joining in-flight computation", { key });
      return pending.then((value) => structuredClone(value));
    }

    log.debug("cache miss", { key });
    const generation = this.generation;
    let computation: Promise<T> | undefined;
    computation = (async () => {
      try {
        // compute may throw synchronously; keep that inside the promise chain.
        const value = await Promise.resolve().then(compute);
        if (generation === this.generation) {
          this.entries.set(key, { key, value: structuredClone(value), createdAt: this.now(), ttlMs });
        }
        return value;
      } catch (error) {
        log.warn("computation failed, nothing cached", {
          key,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      } finally {
        if (this.inFlight.get(key) === computation) this.inFlight.delete(key);
      }
    })();

    this.inFlight.set(key, computation);
    return computation.then((value) => structuredClone(value));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Drops every entry. Computations still running finish for their callers but store nothing. */
  clear(): void {
    this.generation++;
    this.entries.clear();
    this.inFlight.clear();
  }
}

/** Process-wide report cache shared by the HTTP routes. */
export const auditCache = new AuditCache<AuditReport>();

/** Process-wide cache of finished executive summaries, refined or not. */
export const summaryCache = new AuditCache<ExecutiveSummary>();
