/**
 * Classification Orchestrator
 *
 * One inquiry -> one tenant -> one ClassificationResult.
 *
 * Strategy:
 * 1. Resolve the organization (unknown keys fall back to "default")
 * 2. Empty catalog: answer "Unknown" without calling the backend
 * 3. LLM classifier, constrained to the tenant's program names
 * 4. Keyword scoring when the LLM attempt comes back as a failure
 *
 * A failed LLM call is downgraded, never retried and never surfaced.
 */

import type { ClassificationResult } from "@shared/schema";
import type { TextGenerator } from "../llm/textGenerator";
import type { TenantDirectory } from "../registry";
import { keywordGuess } from "./keywordScorer";
import { classifyViaLLM } from "./llmClassifier";
import { unknownCategoryResult } from "./results";

export type ClassifierDeps = {
  tenants: TenantDirectory;
  generator: TextGenerator;
};

export interface Classifier {
  classify(text: string, topK: number, organization: string): Promise<ClassificationResult>;
  classifyBatch(items: string[], topK: number, organization: string): Promise<ClassificationResult[]>;
}

export function createClassifier({ tenants, generator }: ClassifierDeps): Classifier {
  async function classify(text: string, topK: number, organization: string): Promise<ClassificationResult> {
    const tenant = tenants.resolve(organization);
    if (tenant.aliased) {
      console.log(`[Classifier] Unknown organization "${organization}", using "${tenant.organization}"`);
    }

    if (tenant.registry.isEmpty) {
      console.warn(`[Classifier] No programs loaded for "${tenant.organization}", returning Unknown`);
      return unknownCategoryResult();
    }

    const attempt = await classifyViaLLM(text, topK, tenant.registry, generator);
    if (attempt.ok) {
      console.log(`[Classifier] LLM match: ${attempt.result.best.category} (confidence=${attempt.result.best.confidence})`);
      return attempt.result;
    }

    console.warn(`[Classifier] ${attempt.error.name}: ${attempt.error.message} - falling back to keyword scoring`);
    const result = keywordGuess(text, topK, tenant.registry);
    console.log(`[Classifier] Keyword fallback: ${result.best.category} (${result.best.reasoning})`);
    return result;
  }

  return {
    classify,

    // Independent inquiries; results keep input order.
    classifyBatch(items, topK, organization) {
      return Promise.all(items.map(text => classify(text, topK, organization)));
    },
  };
}
