/**
 * Text Generation Capability
 *
 * The narrow interface the classifier and the intake chat depend on. Keeping
 * it this small lets tests swap in a fake and lets a deployment switch
 * providers by model name alone.
 */

import type { ChatMessage } from "@shared/schema";
import { generateText, streamText, detectProvider } from "./client";

export type CompletionRequest = {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
  jsonMode?: boolean;
};

export type StreamingCompletionRequest = {
  systemPrompt: string;
  history: ChatMessage[];
  temperature: number;
  maxTokens: number;
};

export interface TextGenerator {
  /** Single round trip; resolves with the raw reply text. */
  complete(request: CompletionRequest): Promise<string>;
  /** Raw text deltas in generation order. Ends when the backend closes the stream. */
  completeStreaming(request: StreamingCompletionRequest): AsyncIterable<string>;
}

export type TextGeneratorOptions = {
  model: string;
  /** Upper bound for one call, including the whole stream when streaming. */
  timeoutMs: number;
};

export function createTextGenerator({ model, timeoutMs }: TextGeneratorOptions): TextGenerator {
  // Fail at start-up on a model name nothing can serve.
  detectProvider(model);

  return {
    async complete(request) {
      const response = await generateText({
        model,
        messages: [
          { role: "system", content: request.systemPrompt },
          { role: "user", content: request.userPrompt },
        ],
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        jsonMode: request.jsonMode,
        signal: AbortSignal.timeout(timeoutMs),
      });
      return response.text;
    },

    completeStreaming(request) {
      return streamText({
        model,
        messages: [
          { role: "system", content: request.systemPrompt },
          ...request.history,
        ],
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        signal: AbortSignal.timeout(timeoutMs),
      });
    },
  };
}
