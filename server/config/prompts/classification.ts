/**
 * Program Classification Prompts
 *
 * Routing prompt for the LLM classifier. The model sees program names as the
 * only valid labels plus structural metadata per service; keyword lists are
 * never included.
 */

export type CompactService = {
  key: string;
  phone: string;
  has_contacts: boolean;
  has_keywords: boolean;
};

export type CompactProgram = {
  description: string;
  services: CompactService[];
};

export function buildProgramClassificationPrompt(
  categories: string[],
  programs: Record<string, CompactProgram>,
): string {
  return `You are a routing assistant for a community social-services organization.
Classify the user's message into ONE of these program categories (top-level programs):
${JSON.stringify(categories)}

Return STRICT JSON ONLY, with no Markdown and no extra text:
{
  "best": {"category": string, "confidence": number, "reasoning": string},
  "alternatives": [{"category": string, "confidence": number, "reasoning": string}]
}

Rules:
- "category" MUST be copied exactly from the list above. Never invent a category.
- "confidence" is a number between 0 and 1.
- List at most Top-K minus one alternatives, most likely first, never repeating the best category.

Program definitions (each program may contain multiple services):
${JSON.stringify(programs, null, 2)}`;
}

export function buildProgramClassificationUserPrompt(text: string, topK: number): string {
  return `Message:\n${text}\nTop-K: ${topK}`;
}
