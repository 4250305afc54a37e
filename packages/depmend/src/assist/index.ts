export { analyzeFile, buildAnalysisPrompt, type AnalyzeRequest, type FileAnalysis } from "./analyze.js";
export { OpenAIAssistant, type AssistantClient, type OpenAIAssistantOptions, type SubmitOptions } from "./client.js";
export {
  buildPrompt,
  parseLineRange,
  replacementOperation,
  stripCodeFences,
  suggestEdit,
  type LineRange,
  type Suggestion,
  type SuggestRequest,
} from "./suggest.js";
export {
  buildTranslationPrompt,
  translateFile,
  translationTarget,
  type TranslateRequest,
  type Translation,
} from "./translate.js";
