import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import { LLM_MODELS, DEEPSEEK_MODELS, GEMINI_MODELS, CLAUDE_MODELS } from "../config/models";

const DEEPSEEK_DEFAULT_BASE_URL = "https://api.deepseek.com";

let _openai: OpenAI | null = null;
function getOpenAI(): OpenAI {
  if (!_openai) {
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] OPENAI_API_KEY is not set");
    _openai = new OpenAI({
      apiKey,
      ...(process.env.OPENAI_BASE_URL ? { baseURL: process.env.OPENAI_BASE_URL } : {}),
    });
  }
  return _openai;
}

let _deepseek: OpenAI | null = null;
function getDeepSeek(): OpenAI {
  if (!_deepseek) {
    const apiKey = process.env.DEEPSEEK_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] DEEPSEEK_API_KEY is not set");
    _deepseek = new OpenAI({
      apiKey,
      baseURL: process.env.DEEPSEEK_BASE_URL || DEEPSEEK_DEFAULT_BASE_URL,
    });
  }
  return _deepseek;
}

let _gemini: GoogleGenAI | null = null;
function getGemini(): GoogleGenAI {
  if (!_gemini) {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] GEMINI_API_KEY is not set");
    _gemini = new GoogleGenAI({ apiKey });
  }
  return _gemini;
}

let _claude: InstanceType<typeof import("@anthropic-ai/sdk").default> | null = null;
async function getClaude() {
  if (!_claude) {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    if (!apiKey) throw new Error("[LLM Client] ANTHROPIC_API_KEY is not set");
    const Anthropic = (await import("@anthropic-ai/sdk")).default;
    _claude = new Anthropic({ apiKey });
  }
  return _claude;
}

/**
 * Drop cached clients so the next call re-reads API keys from the environment.
 */
export function resetLLMClients(): void {
  _openai = null;
  _deepseek = null;
  _gemini = null;
  _claude = null;
}

const OPENAI_MODELS = new Set<string>(Object.values(LLM_MODELS));
const DEEPSEEK_MODEL_SET = new Set<string>(Object.values(DEEPSEEK_MODELS));
const GEMINI_MODEL_SET = new Set<string>(Object.values(GEMINI_MODELS));
const CLAUDE_MODEL_SET = new Set<string>(Object.values(CLAUDE_MODELS));

export type Provider = "openai" | "deepseek" | "gemini" | "claude";

export function detectProvider(model: string): Provider {
  if (OPENAI_MODELS.has(model)) return "openai";
  if (DEEPSEEK_MODEL_SET.has(model)) return "deepseek";
  if (GEMINI_MODEL_SET.has(model)) return "gemini";
  if (CLAUDE_MODEL_SET.has(model)) return "claude";
  if (model.startsWith("gpt-") || model.startsWith("o1") || model.startsWith("o3")) return "openai";
  if (model.startsWith("deepseek-")) return "deepseek";
  if (model.startsWith("gemini-")) return "gemini";
  if (model.startsWith("claude-")) return "claude";
  throw new Error(`[LLM Client] Unknown model "${model}" - cannot determine provider. Add it to the model registry in server/config/models.ts`);
}

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type LLMRequestOptions = {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON object reply where it supports that. */
  jsonMode?: boolean;
  /** Aborts the request (and an open stream) once fired. */
  signal?: AbortSignal;
};

export type LLMResponse = {
  text: string;
  provider: Provider;
  model: string;
};

export async function generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
  const provider = detectProvider(opts.model);

  switch (provider) {
    case "openai":
      return callOpenAICompatible(getOpenAI(), "openai", opts);
    case "deepseek":
      return callOpenAICompatible(getDeepSeek(), "deepseek", opts);
    case "gemini":
      return callGemini(opts);
    case "claude":
      return callClaude(opts);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
    }
  }
}

/**
 * Stream a reply as raw text deltas in generation order. Deltas may be empty
 * strings; filtering is left to the caller.
 */
export async function* streamText(opts: LLMRequestOptions): AsyncGenerator<string> {
  const provider = detectProvider(opts.model);

  switch (provider) {
    case "openai":
      yield* streamOpenAICompatible(getOpenAI(), opts);
      return;
    case "deepseek":
      yield* streamOpenAICompatible(getDeepSeek(), opts);
      return;
    case "gemini":
      yield* streamGemini(opts);
      return;
    case "claude":
      yield* streamClaude(opts);
      return;
    default: {
      const _exhaustive: never = provider;
      throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
    }
  }
}

async function callOpenAICompatible(
  client: OpenAI,
  provider: "openai" | "deepseek",
  opts: LLMRequestOptions,
): Promise<LLMResponse> {
  const response = await client.chat.completions.create(
    {
      model: opts.model,
      messages: opts.messages,
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
      ...(opts.jsonMode && { response_format: { type: "json_object" as const } }),
    },
    { signal: opts.signal },
  );

  return {
    text: response.choices[0]?.message?.content || "",
    provider,
    model: opts.model,
  };
}

async function* streamOpenAICompatible(client: OpenAI, opts: LLMRequestOptions): AsyncGenerator<string> {
  const stream = await client.chat.completions.create(
    {
      model: opts.model,
      messages: opts.messages,
      stream: true,
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
    },
    { signal: opts.signal },
  );

  for await (const chunk of stream) {
    yield chunk.choices[0]?.delta?.content || "";
  }
}

function toGeminiRequest(opts: LLMRequestOptions) {
  const systemParts = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content);

  const nonSystemMessages = opts.messages.filter(m => m.role !== "system");

  const contents = nonSystemMessages.map(m => ({
    role: m.role === "assistant" ? "model" as const : "user" as const,
    parts: [{ text: m.content }],
  }));

  const systemInstruction = systemParts.length > 0
    ? systemParts.join("\n\n")
    : undefined;

  return {
    model: opts.model,
    config: {
      ...(systemInstruction ? { systemInstruction } : {}),
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { maxOutputTokens: opts.maxTokens }),
      ...(opts.jsonMode && { responseMimeType: "application/json" }),
      ...(opts.signal && { abortSignal: opts.signal }),
    },
    contents,
  };
}

async function callGemini(opts: LLMRequestOptions): Promise<LLMResponse> {
  const response = await getGemini().models.generateContent(toGeminiRequest(opts));

  return {
    text: response.text || "",
    provider: "gemini",
    model: opts.model,
  };
}

async function* streamGemini(opts: LLMRequestOptions): AsyncGenerator<string> {
  const stream = await getGemini().models.generateContentStream(toGeminiRequest(opts));

  for await (const chunk of stream) {
    yield chunk.text || "";
  }
}

function toClaudeRequest(opts: LLMRequestOptions) {
  const systemContent = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content)
    .join("\n\n");

  const nonSystemMessages = opts.messages
    .filter((m): m is LLMMessage & { role: "user" | "assistant" } => m.role !== "system")
    .map(m => ({
      role: m.role,
      content: m.content,
    }));

  return {
    model: opts.model,
    max_tokens: opts.maxTokens || 4096,
    ...(systemContent ? { system: systemContent } : {}),
    messages: nonSystemMessages,
    ...(opts.temperature !== undefined && { temperature: opts.temperature }),
  };
}

async function callClaude(opts: LLMRequestOptions): Promise<LLMResponse> {
  const client = await getClaude();

  const response = await client.messages.create(toClaudeRequest(opts), { signal: opts.signal });

  const textBlock = response.content.find(b => b.type === "text");

  return {
    text: textBlock?.type === "text" ? textBlock.text : "",
    provider: "claude",
    model: opts.model,
  };
}

async function* streamClaude(opts: LLMRequestOptions): AsyncGenerator<string> {
  const client = await getClaude();

  const stream = await client.messages.create(
    { ...toClaudeRequest(opts), stream: true },
    { signal: opts.signal },
  );

  for await (const event of stream) {
    if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
      yield event.delta.text;
    }
  }
}
