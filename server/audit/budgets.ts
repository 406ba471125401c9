import type { AuditCategory, AuditProfile, CrawlBudget } from "@shared/audit-types";
import { CrawlBudgetSchema } from "./types";

export const PROFILE_BUDGETS: Record<AuditProfile, CrawlBudget> = {
  full: {
    maxPages: 150,
    maxDepth: 6,
    maxRuntimeMs: 120_000,
    perPageTimeoutMs: 20_000,
  },
  summary: {
    maxPages: 12,
    maxDepth: 1,
    maxRuntimeMs: 8_000,
    perPageTimeoutMs: 5_000,
  },
};

export const CACHE_TTL_MS: Record<AuditProfile, number> = {
  full: 900_000,
  summary: 600_000,
};

/** Internal links whose status is verified after the crawl. */
export const LINK_CHECK_LIMITS: Record<AuditProfile, number> = {
  full: 400,
  summary: 0,
};

/** Parallel fetches per crawl. Fixed; callers cannot raise it. */
export const WORKER_POOL_WIDTH = 8;

export type CategoryWeights = Record<AuditCategory, number>;

export const CATEGORY_WEIGHTS: CategoryWeights = {
  performance: 0.2,
  seo: 0.25,
  ux: 0.2,
  accessibility: 0.15,
  conversion: 0.2,
};

export function getBudget(profile: AuditProfile): CrawlBudget {
  return CrawlBudgetSchema.parse(PROFILE_BUDGETS[profile]);
}
