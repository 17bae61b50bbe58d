/**
 * Keyword Scorer
 *
 * Deterministic fallback used when the LLM path fails. A program's score is
 * the number of distinct keywords from its aggregate set that occur as a
 * substring of the lower-cased inquiry.
 */

import type { ClassificationOption, ClassificationResult } from "@shared/schema";
import { KEYWORD_FALLBACK } from "../config/constants";
import type { Registry } from "../registry";
import { unknownCategoryResult } from "./results";

export type ProgramScore = {
  program: string;
  score: number;
};

/**
 * Scores in descending order. Array.prototype.sort is stable, so ties keep
 * registry order.
 */
export function scorePrograms(text: string, registry: Registry): ProgramScore[] {
  const lowered = text.toLowerCase();

  return registry.programs()
    .map(program => ({
      program: program.name,
      score: program.keywords.filter(keyword => keyword && lowered.includes(keyword)).length,
    }))
    .sort((a, b) => b.score - a.score);
}

function toOption(registry: Registry, category: string, confidence: number, reasoning: string): ClassificationOption {
  return {
    category,
    confidence,
    reasoning,
    description: registry.get(category)?.description ?? null,
  };
}

export function keywordGuess(text: string, topK: number, registry: Registry): ClassificationResult {
  const first = registry.first();
  if (!first) {
    return unknownCategoryResult();
  }

  const scores = scorePrograms(text, registry);

  // No keyword hit anywhere: default to the first program, no alternatives.
  if (scores[0].score === 0) {
    return {
      best: toOption(registry, first.name, KEYWORD_FALLBACK.WEAK_MATCH_CONFIDENCE, KEYWORD_FALLBACK.WEAK_MATCH_REASONING),
      alternatives: [],
      used_fallback: true,
    };
  }

  const best = toOption(registry, scores[0].program, KEYWORD_FALLBACK.MATCH_CONFIDENCE, KEYWORD_FALLBACK.MATCH_REASONING);
  const alternatives = scores
    .slice(1, Math.max(1, topK))
    .filter(({ program }) => registry.has(program))
    .map(({ program }) =>
      toOption(registry, program, KEYWORD_FALLBACK.ALTERNATIVE_CONFIDENCE, KEYWORD_FALLBACK.ALTERNATIVE_REASONING),
    );

  return { best, alternatives, used_fallback: true };
}
