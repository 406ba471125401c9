import {
  AUDIT_CATEGORIES,
  type AuditCategory,
  type CategoryScore,
  type CategoryStatus,
  type Finding,
  type FindingSeverity,
} from "@shared/audit-types";
import { CATEGORY_WEIGHTS, type CategoryWeights } from "./budgets";
import { isPenalisingKind } from "./rules";
import type { ClassifiedCrawl, ScoreSheet } from "./types";

export const SEVERITY_WEIGHT: Record<FindingSeverity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

const MAX_SEVERITY_WEIGHT = SEVERITY_WEIGHT.critical;

const CRITICAL_BELOW = 60;
const ATTENTION_BELOW = 85;

export function statusFor(score: number | null, hasCriticalFinding: boolean): CategoryStatus {
  if (score === null) return "not-evaluated";
  if (hasCriticalFinding || score < CRITICAL_BELOW) return "critical";
  if (score < ATTENTION_BELOW) return "attention";
  return "ok";
}

function clamp(value: number): number {
  return Math.min(100, Math.max(0, value));
}

export function scoreCategory(category: AuditCategory, findings: Finding[], evaluations: number): CategoryScore {
  const own = findings.filter((f) => f.category === category);
  const penalising = own.filter((f) => isPenalisingKind(f.kind));
  const penalty = penalising.reduce((sum, f) => sum + SEVERITY_WEIGHT[f.severity], 0);
  const capacity = evaluations * MAX_SEVERITY_WEIGHT;

  const score = capacity > 0 ? clamp(Math.round(100 * (1 - penalty / capacity))) : null;
  const hasCritical = own.some((f) => f.severity === "critical");

  return {
    category,
    score,
    status: statusFor(score, hasCritical),
    findingCount: own.length,
    evaluations,
  };
}

/**
 * Weighted mean of the categories that were evaluated. Weights of
 * not-evaluated categories drop out rather than counting as zero.
 */
export function consolidateScores(categories: CategoryScore[], weights: CategoryWeights = CATEGORY_WEIGHTS): number | null {
  let weighted = 0;
  let totalWeight = 0;
  for (const { category, score } of categories) {
    if (score === null) continue;
    const weight = weights[category];
    weighted += score * weight;
    totalWeight += weight;
  }
  if (totalWeight <= 0) return null;
  return clamp(Math.round(weighted / totalWeight));
}

export function scoreFindings(classified: ClassifiedCrawl, weights: CategoryWeights = CATEGORY_WEIGHTS): ScoreSheet {
  const categories = AUDIT_CATEGORIES.map((category) =>
    scoreCategory(category, classified.findings, classified.evaluations[category])
  );
  const consolidatedScore = consolidateScores(categories, weights);
  const hasCritical = classified.findings.some((f) => f.severity === "critical");

  return {
    categories,
    consolidatedScore,
    status: statusFor(consolidatedScore, hasCritical),
  };
}
