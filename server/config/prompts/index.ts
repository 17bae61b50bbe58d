/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts are maintained in this single location.
 *
 * Structure:
 * - classification.ts: Program routing (strict JSON reply)
 * - conversation.ts: Intake navigator chat (streamed free text)
 */

export * from "./classification";
export * from "./conversation";
