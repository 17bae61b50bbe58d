/**
 * Intake Chat Streaming
 *
 * Streams a conversational reply grounded in one tenant's catalog. The
 * catalog is rendered into the system instruction ahead of the caller's
 * history; nothing checks the generated text, so groundedness rests on the
 * prompt alone.
 *
 * The returned sequence is pull-based and single-use. A consumer cancels by
 * ceasing to pull (breaking out of for-await closes the backend stream).
 * Errors and timeouts end the sequence early instead of throwing: the
 * consumer sees a short reply, never a failure.
 */

import type { ChatMessage } from "@shared/schema";
import { CHAT_STREAMING } from "../config/constants";
import { buildIntakeConversationPrompt } from "../config/prompts";
import type { TextGenerator } from "../llm/textGenerator";
import type { Registry } from "../registry";
import { getErrorMessage } from "../utils/errorHandler";
import { renderCatalog } from "./catalog";

export function buildConversationPrompt(registry: Registry): string {
  return buildIntakeConversationPrompt(renderCatalog(registry));
}

export async function* streamReply(
  history: ChatMessage[],
  registry: Registry,
  generator: TextGenerator,
): AsyncGenerator<string, void, undefined> {
  const startTime = Date.now();
  let fragments = 0;
  let chars = 0;

  try {
    const stream = generator.completeStreaming({
      systemPrompt: buildConversationPrompt(registry),
      history,
      temperature: CHAT_STREAMING.TEMPERATURE,
      maxTokens: CHAT_STREAMING.MAX_TOKENS,
    });

    for await (const fragment of stream) {
      if (!fragment) continue;
      fragments++;
      chars += fragment.length;
      yield fragment;
    }
  } catch (error) {
    console.warn(`[Conversation] Stream ended early after ${chars} chars: ${getErrorMessage(error)}`);
    return;
  }

  console.log(`[Conversation] Streaming completed in ${Date.now() - startTime}ms (${fragments} fragments, ${chars} chars)`);
}
