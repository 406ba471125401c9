import axios from "axios";
import type {
  AuditCategory,
  AuditReport,
  CategorySection,
  ConsolidatedDiagnosisSection,
  ExecutiveSummary,
  SummaryKey,
} from "@shared/audit-types";
import { moduleLogger } from "../logger";
import { CATEGORY_META } from "./report";

const log = moduleLogger("summary");

const SUMMARY_KEYS: SummaryKey[] = ["overall", "performance", "seo", "ux", "accessibility", "conversion"];

const STATUS_PHRASE = {
  ok: "is in good shape",
  attention: "needs attention",
  critical: "has critical problems",
  "not-evaluated": "could not be evaluated",
} as const;

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function categorySentence(section: CategorySection): string {
  const label = capitalize(CATEGORY_META[section.category].label);
  if (section.score === null) {
    return `${label} could not be evaluated.`;
  }
  const head = `${label} scores ${section.score}/100 and ${STATUS_PHRASE[section.status]}`;
  const top = section.findings[0];
  return top ? `${head}; the main issue is "${top.title}".` : `${head}.`;
}

function overallSentence(diagnosis: ConsolidatedDiagnosisSection): string {
  if (diagnosis.score === null) {
    return diagnosis.headline;
  }
  return `Overall the site scores ${diagnosis.score}/100 and ${STATUS_PHRASE[diagnosis.status]}. ${diagnosis.mainNeed}`;
}

function joinSentences(sentences: Record<SummaryKey, string>): string {
  return SUMMARY_KEYS.map((key) => sentences[key]).join("\n");
}

/** One sentence per category plus an overall one, derived only from the report. */
export function buildExecutiveSummary(report: AuditReport): ExecutiveSummary {
  const [, , performance, seo, ux, accessibility, conversion, , , , diagnosis] = report.sections;
  const byCategory: Record<AuditCategory, CategorySection> = { performance, seo, ux, accessibility, conversion };

  const sentences: Record<SummaryKey, string> = {
    overall: overallSentence(diagnosis),
    performance: categorySentence(byCategory.performance),
    seo: categorySentence(byCategory.seo),
    ux: categorySentence(byCategory.ux),
    accessibility: categorySentence(byCategory.accessibility),
    conversion: categorySentence(byCategory.conversion),
  };

  return {
    url: report.url,
    profile: report.profile,
    generatedAt: report.generatedAt,
    refined: false,
    sentences,
    text: joinSentences(sentences),
  };
}

export interface SummaryRefiner {
  refine(summary: ExecutiveSummary): Promise<Partial<Record<SummaryKey, string>>>;
}

const URL_PATTERN = /\b(?:https?:\/\/|www\.)\S+/gi;
const NUMBER_PATTERN = /\d+(?:[.,]\d+)*%?/g;

export function sanitizeRefinedText(text: string): string {
  return text
    .replace(URL_PATTERN, "")
    .replace(NUMBER_PATTERN, "")
    .replace(/\s+/g, " ")
    .replace(/\s+([.,;:!?])/g, "$1")
    .trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a model reply of the form `{ "overall": "...", "seo": "...", ... }`.
 * Unknown keys and non-string values are ignored; URLs and numbers are
 * removed from every sentence.
 */
export function parseRefinedSummary(reply: string): Partial<Record<SummaryKey, string>> {
  const jsonText = reply.replace(/```json\n?|\n?```/g, "").trim();
  const parsed: unknown = JSON.parse(jsonText);
  if (!isRecord(parsed)) {
    throw new Error("Refined summary is not a JSON object");
  }

  const refined: Partial<Record<SummaryKey, string>> = {};
  for (const key of SUMMARY_KEYS) {
    const value = parsed[key];
    if (typeof value !== "string") continue;
    const clean = sanitizeRefinedText(value);
    if (clean) refined[key] = clean;
  }
  return refined;
}

const SYSTEM_PROMPT =
  "You rewrite website audit summaries for business owners. Reply with a JSON object using the same keys " +
  "as the input. Keep one short sentence per key, in plain language. Do not add facts, URLs or numbers.";

const LLM_TIMEOUT_MS = 15_000;

/** Refines summary sentences through an OpenAI-compatible chat completions endpoint. */
export class LlmSummaryRefiner implements SummaryRefiner {
  constructor(
    private readonly apiKey: string,
    private readonly model: string = "gpt-4o-mini",
    private readonly baseUrl: string = "https://api.openai.com"
  ) {
    if (!apiKey) {
      throw new Error("LLM API key is required");
    }
  }

  async refine(summary: ExecutiveSummary): Promise<Partial<Record<SummaryKey, string>>> {
    const response = await axios.post<{ choices?: { message?: { content?: string | null } }[] }>(
      `${this.baseUrl.replace(/\/$/, "")}/v1/chat/completions`,
      {
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: JSON.stringify(summary.sentences) },
        ],
        temperature: 0.3,
        response_format: { type: "json_object" },
      },
      {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        timeout: LLM_TIMEOUT_MS,
      }
    );

    const content = response.data.choices?.[0]?.message?.content;
    if (!content) {
      throw new Error("LLM returned an empty reply");
    }
    return parseRefinedSummary(content);
  }
}

/**
 * Applies the refiner's sentences over the deterministic ones. Any refiner
 * failure leaves the summary unchanged.
 */
export async function refineSummary(summary: ExecutiveSummary, refiner: SummaryRefiner | null): Promise<ExecutiveSummary> {
  if (!refiner) return summary;

  let refined: Partial<Record<SummaryKey, string>>;
  try {
    refined = await refiner.refine(summary);
  } catch (error) {
    log.warn("summary refinement failed, keeping deterministic text", {
      url: summary.url,
      error: error instanceof Error ? error.message : String(error),
    });
    return summary;
  }

  const sentences = { ...summary.sentences };
  let changed = false;
  for (const key of SUMMARY_KEYS) {
    const sentence = refined[key];
    if (sentence) {
      sentences[key] = sentence;
      changed = true;
    }
  }
  if (!changed) return summary;

  return { ...summary, refined: true, sentences, text: joinSentences(sentences) };
}
