import { describe, it, expect } from "vitest";
import {
  buildClassificationPrompt,
  classifyViaLLM,
  extractJsonText,
  parseClassificationReply,
  toConfidence,
  type ClassificationAttempt,
} from "../classification";
import { BackendUnavailableError, MalformedBackendReplyError } from "../utils/errorHandler";
import { failingGenerator, housingAndMobility, replyGenerator } from "./helpers";

function expectSuccess(attempt: ClassificationAttempt) {
  if (!attempt.ok) {
    throw new Error(`expected a parsed reply, got ${attempt.error.message}`);
  }
  return attempt.result;
}

function expectFailure(attempt: ClassificationAttempt) {
  if (attempt.ok) {
    throw new Error("expected the attempt to fail");
  }
  return attempt.error;
}

describe("buildClassificationPrompt", () => {
  const prompt = buildClassificationPrompt(housingAndMobility());

  it("lists program names as the closed label set", () => {
    expect(prompt).toContain('["Housing","Mobility"]');
  });

  it("describes services structurally without their keywords", () => {
    expect(prompt).toContain('"key": "Wheelchair Repair"');
    expect(prompt).toContain('"has_contacts": false');
    expect(prompt).toContain('"has_keywords": true');
    expect(prompt).not.toContain('"wheelchair"');
    expect(prompt).not.toContain('"rent"');
  });
});

describe("extractJsonText", () => {
  it("strips a Markdown code fence", () => {
    expect(extractJsonText('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(extractJsonText('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("leaves bare JSON alone apart from surrounding whitespace", () => {
    expect(extractJsonText('  {"a":1}\n')).toBe('{"a":1}');
  });
});

describe("toConfidence", () => {
  it("passes numbers through", () => {
    expect(toConfidence(0.7, 0.5)).toBe(0.7);
  });

  it("accepts numeric strings", () => {
    expect(toConfidence("0.8", 0.5)).toBe(0.8);
  });

  it("clamps to the unit interval", () => {
    expect(toConfidence(1.5, 0.5)).toBe(1);
    expect(toConfidence(-0.2, 0.5)).toBe(0);
  });

  it("uses the fallback for anything else", () => {
    expect(toConfidence(undefined, 0.5)).toBe(0.5);
    expect(toConfidence(null, 0.3)).toBe(0.3);
    expect(toConfidence("high", 0.5)).toBe(0.5);
    expect(toConfidence(" ", 0.5)).toBe(0.5);
    expect(toConfidence(Infinity, 0.5)).toBe(0.5);
  });
});

describe("parseClassificationReply", () => {
  const registry = housingAndMobility();

  it("returns the best category with registry descriptions", () => {
    const raw = JSON.stringify({
      best: { category: "Housing", confidence: 0.9, reasoning: "Mentions rent" },
      alternatives: [{ category: "Mobility", confidence: 0.2, reasoning: "Unlikely" }],
    });

    expect(expectSuccess(parseClassificationReply(raw, 2, registry))).toEqual({
      best: {
        category: "Housing",
        confidence: 0.9,
        reasoning: "Mentions rent",
        description: "Help with rent and housing.",
      },
      alternatives: [
        {
          category: "Mobility",
          confidence: 0.2,
          reasoning: "Unlikely",
          description: "Wheelchairs and mobility devices.",
        },
      ],
      used_fallback: false,
    });
  });

  it("applies default confidences and a null reasoning when fields are missing", () => {
    const raw = JSON.stringify({
      best: { category: "Mobility" },
      alternatives: [{ category: "Housing" }],
    });
    const result = expectSuccess(parseClassificationReply(raw, 2, registry));

    expect(result.best.confidence).toBe(0.5);
    expect(result.best.reasoning).toBeNull();
    expect(result.alternatives[0].confidence).toBe(0.3);
  });

  it("drops alternatives outside the registry, repeats of best and duplicates", () => {
    const raw = JSON.stringify({
      best: { category: "Housing", confidence: 0.9 },
      alternatives: [
        { category: "Space Program", confidence: 0.8 },
        { category: "Housing", confidence: 0.7 },
        { category: "Mobility", confidence: 0.4 },
        { category: "Mobility", confidence: 0.1 },
        { confidence: 0.5 },
        "Mobility",
      ],
    });
    const result = expectSuccess(parseClassificationReply(raw, 5, registry));

    expect(result.alternatives.map(option => [option.category, option.confidence])).toEqual([["Mobility", 0.4]]);
  });

  it("truncates alternatives to top_k - 1 after filtering", () => {
    const raw = JSON.stringify({
      best: { category: "Housing" },
      alternatives: [{ category: "Space Program" }, { category: "Mobility" }],
    });

    const result = expectSuccess(parseClassificationReply(raw, 2, registry));
    expect(result.alternatives.map(option => option.category)).toEqual(["Mobility"]);
    expect(expectSuccess(parseClassificationReply(raw, 1, registry)).alternatives).toEqual([]);
  });

  it("keeps an unknown best category with no description", () => {
    const raw = JSON.stringify({ best: { category: "Space Program", confidence: 0.6 } });
    const result = expectSuccess(parseClassificationReply(raw, 2, registry));

    expect(result.best.category).toBe("Space Program");
    expect(result.best.description).toBeNull();
    expect(result.alternatives).toEqual([]);
  });

  it("reads alternatives that are not a list as none", () => {
    const raw = JSON.stringify({ best: { category: "Housing" }, alternatives: "Mobility" });

    expect(expectSuccess(parseClassificationReply(raw, 3, registry)).alternatives).toEqual([]);
  });

  it("accepts a fenced reply", () => {
    const raw = '```json\n{"best": {"category": "Mobility", "confidence": "0.75"}}\n```';
    const result = expectSuccess(parseClassificationReply(raw, 2, registry));

    expect(result.best.category).toBe("Mobility");
    expect(result.best.confidence).toBe(0.75);
  });

  it("fails on a reply that is not JSON", () => {
    const error = expectFailure(parseClassificationReply("Housing, probably.", 2, registry));

    expect(error).toBeInstanceOf(MalformedBackendReplyError);
    expect(error.message).toMatch(/^Text generation error: reply is not JSON/);
  });

  it.each([
    ["no best", { alternatives: [] }],
    ["best without a category", { best: { confidence: 0.9 } }],
    ["a blank category", { best: { category: "   " } }],
    ["a non-object reply", ["Housing"]],
  ])("fails on %s", (_label, reply) => {
    const error = expectFailure(parseClassificationReply(JSON.stringify(reply), 2, registry));

    expect(error).toBeInstanceOf(MalformedBackendReplyError);
    expect(error.message).toMatch(/^Text generation error: reply does not match the schema/);
  });
});

describe("classifyViaLLM", () => {
  it("asks for a deterministic JSON reply about the inquiry", async () => {
    const generator = replyGenerator('{"best": {"category": "Housing"}}');

    await classifyViaLLM("help", 2, housingAndMobility(), generator);

    expect(generator.complete).toHaveBeenCalledTimes(1);
    const request = generator.complete.mock.calls[0][0];
    expect(request.userPrompt).toBe("Message:\nhelp\nTop-K: 2");
    expect(request.temperature).toBe(0);
    expect(request.maxTokens).toBe(300);
    expect(request.jsonMode).toBe(true);
    expect(request.systemPrompt).toContain('["Housing","Mobility"]');
  });

  it("returns the parsed reply", async () => {
    const attempt = await classifyViaLLM("help", 2, housingAndMobility(), replyGenerator('{"best": {"category": "Housing"}}'));

    expect(expectSuccess(attempt).best.category).toBe("Housing");
  });

  it("reports a backend failure instead of throwing", async () => {
    const attempt = await classifyViaLLM("help", 2, housingAndMobility(), failingGenerator());
    const error = expectFailure(attempt);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error.message).toBe("Text generation error: DEEPSEEK_API_KEY is not set");
    expect(error.code).toBe("backend_unavailable");
  });
});
