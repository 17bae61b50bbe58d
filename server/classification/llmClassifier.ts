/**
 * LLM Classifier
 *
 * One non-streaming call that asks the model to pick a program from the
 * tenant's closed label set and reply with strict JSON. The reply is treated
 * as untrusted: required fields are validated, documented defaults applied,
 * and categories outside the registry are dropped from the alternatives.
 *
 * Never throws. Every failure comes back as { ok: false } so the orchestrator
 * can downgrade to keyword scoring.
 */

import { z } from "zod";
import type { ClassificationOption } from "@shared/schema";
import { LLM_CLASSIFICATION } from "../config/constants";
import {
  buildProgramClassificationPrompt,
  buildProgramClassificationUserPrompt,
  type CompactProgram,
} from "../config/prompts";
import type { TextGenerator } from "../llm/textGenerator";
import type { Registry } from "../registry";
import {
  BackendUnavailableError,
  MalformedBackendReplyError,
  getErrorMessage,
} from "../utils/errorHandler";
import type { ClassificationAttempt } from "./results";

const replyOptionSchema = z.object({
  category: z.string().trim().min(1),
  confidence: z.unknown().optional(),
  reasoning: z.unknown().optional(),
});

const classificationReplySchema = z.object({
  best: replyOptionSchema,
  alternatives: z.unknown().optional(),
});

type ReplyOption = z.infer<typeof replyOptionSchema>;

/**
 * Structural view of the catalog for the prompt: services with their phone
 * and whether contacts/keywords exist, never the keywords themselves.
 */
export function compactPrograms(registry: Registry): Record<string, CompactProgram> {
  const compact: Record<string, CompactProgram> = {};
  for (const program of registry.programs()) {
    compact[program.name] = {
      description: program.description,
      services: Array.from(program.services.values()).map(service => ({
        key: service.key,
        phone: service.phone,
        has_contacts: service.contacts.length > 0,
        has_keywords: service.keywords.length > 0,
      })),
    };
  }
  return compact;
}

export function buildClassificationPrompt(registry: Registry): string {
  return buildProgramClassificationPrompt(registry.names(), compactPrograms(registry));
}

/**
 * Models sometimes wrap JSON in a Markdown fence even when told not to.
 */
export function extractJsonText(raw: string): string {
  const trimmed = raw.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

/**
 * Accepts numbers and numeric strings; anything else takes the default.
 * Values outside [0, 1] are clamped.
 */
export function toConfidence(value: unknown, fallback: number): number {
  const numeric = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric)) {
    return fallback;
  }
  return Math.min(1, Math.max(0, numeric));
}

function toOption(option: ReplyOption, fallbackConfidence: number, registry: Registry): ClassificationOption {
  return {
    category: option.category,
    confidence: toConfidence(option.confidence, fallbackConfidence),
    reasoning: typeof option.reasoning === "string" ? option.reasoning : null,
    description: registry.get(option.category)?.description ?? null,
  };
}

export function parseClassificationReply(raw: string, topK: number, registry: Registry): ClassificationAttempt {
  let data: unknown;
  try {
    data = JSON.parse(extractJsonText(raw));
  } catch (error) {
    return { ok: false, error: new MalformedBackendReplyError(`reply is not JSON (${getErrorMessage(error)})`) };
  }

  const parsed = classificationReplySchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: new MalformedBackendReplyError(`reply does not match the schema (${getErrorMessage(parsed.error)})`) };
  }

  // An unknown best category is kept as returned, with no description.
  const best = toOption(parsed.data.best, LLM_CLASSIFICATION.DEFAULT_BEST_CONFIDENCE, registry);

  const rawAlternatives = Array.isArray(parsed.data.alternatives) ? parsed.data.alternatives : [];
  const seen = new Set<string>([best.category]);
  const alternatives: ClassificationOption[] = [];
  for (const entry of rawAlternatives) {
    const option = replyOptionSchema.safeParse(entry);
    if (!option.success) continue;
    const { category } = option.data;
    if (!registry.has(category) || seen.has(category)) continue;
    seen.add(category);
    alternatives.push(toOption(option.data, LLM_CLASSIFICATION.DEFAULT_ALTERNATIVE_CONFIDENCE, registry));
  }

  return {
    ok: true,
    result: {
      best,
      alternatives: alternatives.slice(0, Math.max(0, topK - 1)),
      used_fallback: false,
    },
  };
}

export async function classifyViaLLM(
  text: string,
  topK: number,
  registry: Registry,
  generator: TextGenerator,
): Promise<ClassificationAttempt> {
  let raw: string;
  try {
    raw = await generator.complete({
      systemPrompt: buildClassificationPrompt(registry),
      userPrompt: buildProgramClassificationUserPrompt(text, topK),
      temperature: LLM_CLASSIFICATION.TEMPERATURE,
      maxTokens: LLM_CLASSIFICATION.MAX_TOKENS,
      jsonMode: true,
    });
  } catch (error) {
    return { ok: false, error: new BackendUnavailableError(getErrorMessage(error)) };
  }

  return parseClassificationReply(raw, topK, registry);
}
