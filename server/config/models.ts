/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for the models the router talks to. Changing a model
 * here updates every usage; CLASSIFICATION_MODEL and CHAT_MODEL in the
 * environment override the assignments per deployment.
 *
 * MODEL TIERS:
 *
 * DEEPSEEK_MODELS.CHAT - deepseek-chat (OpenAI-compatible API)
 *   Cheap and fast enough for both routing and intake chat. Default.
 *
 * LLM_MODELS.FAST_CLASSIFICATION - gpt-4o-mini
 *   Drop-in alternative when the tenant runs on OpenAI.
 *
 * GEMINI_MODELS / CLAUDE_MODELS
 *   Supported by the client for tenants that already hold those keys.
 */

export const LLM_MODELS = {
  /**
   * Fast, cheap model for structured outputs such as program routing.
   */
  FAST_CLASSIFICATION: "gpt-4o-mini",

  /**
   * Balanced model for conversational replies.
   */
  STANDARD_REASONING: "gpt-4o",
} as const;

/**
 * DeepSeek models, served through the OpenAI-compatible chat completions API.
 */
export const DEEPSEEK_MODELS = {
  CHAT: "deepseek-chat",
} as const;

export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
} as const;

export const CLAUDE_MODELS = {
  HAIKU: "claude-3-5-haiku-latest",
  SONNET: "claude-sonnet-4-20250514",
} as const;

export type LLMModelType = typeof LLM_MODELS[keyof typeof LLM_MODELS];
export type DeepSeekModelType = typeof DEEPSEEK_MODELS[keyof typeof DEEPSEEK_MODELS];
export type GeminiModelType = typeof GEMINI_MODELS[keyof typeof GEMINI_MODELS];
export type ClaudeModelType = typeof CLAUDE_MODELS[keyof typeof CLAUDE_MODELS];

/**
 * Specific model assignments by task type.
 */
export const MODEL_ASSIGNMENTS = {
  // Program routing - one JSON reply per inquiry, temperature 0
  PROGRAM_CLASSIFICATION: DEEPSEEK_MODELS.CHAT,

  // Intake navigator chat - streamed, grounded in the tenant catalog
  INTAKE_CHAT_STREAMING: DEEPSEEK_MODELS.CHAT,
} as const;
