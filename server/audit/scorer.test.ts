import { describe, expect, it } from "vitest";
import type { CategoryScore, Finding, FindingKind, FindingSeverity } from "@shared/audit-types";
import { cleanSignals, crawlResult, siteSignals, successPage } from "../test-utils/fixtures";
import { classifyCrawl } from "./classifier";
import { consolidateScores, scoreCategory, scoreFindings, statusFor } from "./scorer";

function finding(severity: FindingSeverity, kind: FindingKind = "weakness", ruleId = "seo.test"): Finding {
  return {
    ruleId,
    category: "seo",
    kind,
    severity,
    title: "Test finding",
    description: "",
    recommendation: "",
    evidence: { pageIndex: 0, url: "https://example.com/" },
  };
}

function score(category: CategoryScore["category"], value: number | null): CategoryScore {
  return { category, score: value, status: statusFor(value, false), findingCount: 0, evaluations: 1 };
}

describe("scoreCategory", () => {
  it("is null and not evaluated without evaluations", () => {
    expect(scoreCategory("seo", [], 0)).toEqual({
      category: "seo",
      score: null,
      status: "not-evaluated",
      findingCount: 0,
      evaluations: 0,
    });
  });

  it("subtracts severity weight from the category capacity", () => {
    const result = scoreCategory("seo", [finding("high"), finding("medium")], 10);
    expect(result.score).toBe(88);
    expect(result.status).toBe("ok");
  });

  it("ignores strengths and opportunities", () => {
    const result = scoreCategory("seo", [finding("high", "strength"), finding("medium", "opportunity")], 2);
    expect(result.score).toBe(100);
    expect(result.findingCount).toBe(2);
  });

  it("clamps at zero", () => {
    const result = scoreCategory("seo", [finding("high"), finding("high")], 1);
    expect(result.score).toBe(0);
    expect(result.status).toBe("critical");
  });

  it("marks any critical finding as critical regardless of score", () => {
    const result = scoreCategory("seo", [finding("critical", "critical-bottleneck")], 20);
    expect(result.score).toBe(95);
    expect(result.status).toBe("critical");
  });

  it("keeps every score within 0 to 100", () => {
    const severities: FindingSeverity[] = ["critical", "high", "medium", "low"];
    for (let evaluations = 0; evaluations <= 6; evaluations++) {
      for (let count = 0; count <= 8; count++) {
        const findings = Array.from({ length: count }, (_, i) => finding(severities[i % 4] ?? "low"));
        const { score: value } = scoreCategory("seo", findings, evaluations);
        if (value !== null) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(100);
        }
      }
    }
  });
});

describe("statusFor", () => {
  it("maps score bands", () => {
    expect(statusFor(85, false)).toBe("ok");
    expect(statusFor(84, false)).toBe("attention");
    expect(statusFor(60, false)).toBe("attention");
    expect(statusFor(59, false)).toBe("critical");
    expect(statusFor(null, true)).toBe("not-evaluated");
  });
});

describe("consolidateScores", () => {
  it("averages evaluated categories by weight", () => {
    const categories = [
      score("performance", 80),
      score("seo", null),
      score("ux", 60),
      score("accessibility", null),
      score("conversion", null),
    ];
    expect(consolidateScores(categories)).toBe(70);
  });

  it("honours a supplied weights table", () => {
    const categories = [
      score("performance", 100),
      score("seo", 0),
      score("ux", null),
      score("accessibility", null),
      score("conversion", null),
    ];
    expect(consolidateScores(categories, { performance: 3, seo: 1, ux: 1, accessibility: 1, conversion: 1 })).toBe(75);
  });

  it("is null when nothing was evaluated", () => {
    expect(consolidateScores([score("performance", null), score("seo", null)])).toBeNull();
  });
});

describe("scoreFindings", () => {
  it("scores a classified crawl", () => {
    const crawl = crawlResult(
      [successPage(0, "/", cleanSignals(), 0), successPage(1, "/about", cleanSignals({ title: null, canonical: "https://example.com/about" }))],
      { site: siteSignals({ robotsTxtPresent: false, sitemapPresent: true }) }
    );

    const sheet = scoreFindings(classifyCrawl(crawl));

    expect(sheet.categories.map((c) => [c.category, c.score, c.status])).toEqual([
      ["performance", 100, "ok"],
      ["seo", 92, "ok"],
      ["ux", 100, "ok"],
      ["accessibility", 100, "ok"],
      ["conversion", 100, "ok"],
    ]);
    expect(sheet.consolidatedScore).toBe(98);
    expect(sheet.status).toBe("ok");
  });
});
