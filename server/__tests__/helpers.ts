/**
 * Shared fixtures for the router tests: small registries and fake text
 * generators that never leave the process.
 */

import { vi, type Mock } from "vitest";
import type { TextGenerator, CompletionRequest, StreamingCompletionRequest } from "../llm/textGenerator";
import { loadRegistry, type Registry } from "../registry";

/** Housing (declared keywords) and Mobility (keywords derived from a service key only). */
export function housingAndMobility(): Registry {
  return loadRegistry({
    programs: [
      { name: "Housing", description: "Help with rent and housing.", keywords: ["rent", "housing"] },
      { name: "Mobility", description: "Wheelchairs and mobility devices.", services: [{ key: "Wheelchair Repair" }] },
    ],
  });
}

export type FakeGenerator = TextGenerator & {
  complete: Mock<(request: CompletionRequest) => Promise<string>>;
  streamRequests: StreamingCompletionRequest[];
};

function fakeGenerator(
  complete: (request: CompletionRequest) => Promise<string>,
  stream: () => AsyncIterable<string>,
): FakeGenerator {
  const streamRequests: StreamingCompletionRequest[] = [];
  return {
    complete: vi.fn(complete),
    streamRequests,
    completeStreaming(request) {
      streamRequests.push(request);
      return stream();
    },
  };
}

async function* noFragments(): AsyncGenerator<string> {
  // nothing to stream
}

/** Every classification call rejects, as with a missing API key. */
export function failingGenerator(message = "DEEPSEEK_API_KEY is not set"): FakeGenerator {
  return fakeGenerator(() => Promise.reject(new Error(message)), noFragments);
}

/** Classification calls resolve with a fixed raw reply. */
export function replyGenerator(reply: string): FakeGenerator {
  return fakeGenerator(() => Promise.resolve(reply), noFragments);
}

/** Streaming calls yield the given fragments, then optionally fail. */
export function streamingGenerator(fragments: string[], failAfter?: Error): FakeGenerator {
  return fakeGenerator(
    () => Promise.reject(new Error("not used")),
    async function* () {
      for (const fragment of fragments) {
        yield fragment;
      }
      if (failAfter) {
        throw failAfter;
      }
    },
  );
}
