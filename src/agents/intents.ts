import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { SPECIALIST_INTENTS } from "./types.js";
import type { SpecialistIntent, WellnessIntent } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const keywordsFile = path.resolve(__dirname, "..", "..", "data", "intent_keywords.json");

const keywordTableSchema = z.object({
  symptom: z.array(z.string().min(1)),
  lifestyle: z.array(z.string().min(1)),
  diet: z.array(z.string().min(1)),
  fitness: z.array(z.string().min(1))
});

export type IntentKeywordTable = z.infer<typeof keywordTableSchema>;

export const INTENT_KEYWORDS: IntentKeywordTable = keywordTableSchema.parse(
  JSON.parse(fs.readFileSync(keywordsFile, "utf8"))
);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Keywords match at the start of a word, so "eating" counts for "eat" but "great" does not.
function toPatterns(keywords: string[]): RegExp[] {
  return keywords.map((keyword) => new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}`));
}

const KEYWORD_PATTERNS: Record<SpecialistIntent, RegExp[]> = {
  symptom: toPatterns(INTENT_KEYWORDS.symptom),
  lifestyle: toPatterns(INTENT_KEYWORDS.lifestyle),
  diet: toPatterns(INTENT_KEYWORDS.diet),
  fitness: toPatterns(INTENT_KEYWORDS.fitness)
};

export function scoreIntents(query: string): Record<SpecialistIntent, number> {
  const normalized = query.toLowerCase();
  const scores: Record<SpecialistIntent, number> = { symptom: 0, lifestyle: 0, diet: 0, fitness: 0 };
  for (const intent of SPECIALIST_INTENTS) {
    scores[intent] = KEYWORD_PATTERNS[intent].filter((pattern) => pattern.test(normalized)).length;
  }
  return scores;
}

/**
 * Keyword-based intent detection. The highest score wins, ties resolve in
 * {@link SPECIALIST_INTENTS} order and a query with no hits is "general".
 */
export function identifyIntent(query: string): WellnessIntent {
  const scores = scoreIntents(query);
  let best: WellnessIntent = "general";
  let bestScore = 0;
  for (const intent of SPECIALIST_INTENTS) {
    if (scores[intent] > bestScore) {
      best = intent;
      bestScore = scores[intent];
    }
  }
  return best;
}
