/**
 * Application Constants
 *
 * Centralized configuration values used across the router.
 * Consolidates magic numbers and hardcoded values for easier maintenance.
 */

import { DEFAULT_ORGANIZATION } from "@shared/schema";

/**
 * Tenant resolution
 */
export const TENANT_CONSTANTS = {
  /**
   * Organization key that always resolves. Unknown keys fall back to it.
   */
  DEFAULT_ORGANIZATION,

  /**
   * File extensions read from the organizations directory.
   */
  CONFIG_EXTENSIONS: [".yaml", ".yml"],
} as const;

/**
 * Keyword fallback scoring. These values are part of the response contract:
 * clients read them to tell a keyword hit from a weak default.
 */
export const KEYWORD_FALLBACK = {
  MATCH_CONFIDENCE: 0.6,
  MATCH_REASONING: "Keyword match",

  ALTERNATIVE_CONFIDENCE: 0.4,
  ALTERNATIVE_REASONING: "Partial keyword match",

  WEAK_MATCH_CONFIDENCE: 0.35,
  WEAK_MATCH_REASONING: "Weak match",
} as const;

/**
 * Result returned when the resolved tenant has no programs at all.
 */
export const UNKNOWN_CATEGORY = {
  CATEGORY: "Unknown",
  CONFIDENCE: 0,
  REASONING: "No programs loaded",
} as const;

/**
 * LLM classification request and reply handling
 */
export const LLM_CLASSIFICATION = {
  TEMPERATURE: 0,
  MAX_TOKENS: 300,

  /**
   * Applied when the model omits a confidence.
   */
  DEFAULT_BEST_CONFIDENCE: 0.5,
  DEFAULT_ALTERNATIVE_CONFIDENCE: 0.3,
} as const;

/**
 * Intake chat streaming
 */
export const CHAT_STREAMING = {
  TEMPERATURE: 0.3,
  MAX_TOKENS: 300,
} as const;

/**
 * Catalog rendering for the chat system prompt
 */
export const CATALOG_LIMITS = {
  MAX_SERVICES_PER_PROGRAM: 4,
  MAX_CONTACTS_PER_SERVICE: 2,
  MAX_DESCRIPTION_CHARS: 200,
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Classification call timeout (milliseconds). A timeout downgrades to keyword scoring.
   */
  CLASSIFICATION_TIMEOUT_MS: 15000, // 15 seconds

  /**
   * Upper bound on one streamed chat reply (milliseconds). A timeout ends the stream.
   */
  CHAT_STREAM_TIMEOUT_MS: 60000, // 1 minute
} as const;

export const BATCH_CONSTANTS = {
  /**
   * Maximum inquiries accepted by one batch classification request.
   */
  MAX_BATCH_SIZE: 100,
} as const;
