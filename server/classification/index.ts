export { createClassifier, type Classifier, type ClassifierDeps } from "./orchestrator";
export { keywordGuess, scorePrograms, type ProgramScore } from "./keywordScorer";
export {
  classifyViaLLM,
  parseClassificationReply,
  buildClassificationPrompt,
  compactPrograms,
  extractJsonText,
  toConfidence,
} from "./llmClassifier";
export { unknownCategoryResult, type ClassificationAttempt } from "./results";
