import type { ClassificationResult } from "@shared/schema";
import type { BackendError } from "../utils/errorHandler";
import { UNKNOWN_CATEGORY } from "../config/constants";

/**
 * Outcome of the LLM path. A failure carries the reason the orchestrator logs
 * before downgrading to keyword scoring.
 */
export type ClassificationAttempt =
  | { ok: true; result: ClassificationResult }
  | { ok: false; error: BackendError };

export function unknownCategoryResult(): ClassificationResult {
  return {
    best: {
      category: UNKNOWN_CATEGORY.CATEGORY,
      confidence: UNKNOWN_CATEGORY.CONFIDENCE,
      reasoning: UNKNOWN_CATEGORY.REASONING,
      description: null,
    },
    alternatives: [],
    used_fallback: true,
  };
}
