import { ASSISTANT } from "../constants.js";
import type { AssistantClient, SubmitOptions } from "./client.js";
import { stripCodeFences } from "./suggest.js";

export const ANALYSIS_INSTRUCTIONS =
  "You are a software architect reviewing a single source file. Explain what it does, " +
  "how it is structured and any problems you notice. Answer in plain prose. Do not rewrite the file.";

export interface AnalyzeRequest {
  path: string;
  text: string;
  /** Question or area to concentrate on */
  focus?: string;
}

export interface FileAnalysis {
  path: string;
  report: string;
  /** True when the file was cut to fit the analysis limit */
  truncated: boolean;
}

export function buildAnalysisPrompt(request: AnalyzeRequest, maxChars: number = ASSISTANT.analysisMaxChars): string {
  const body = request.text.slice(0, maxChars);
  return [
    `File: ${request.path}`,
    ...(request.focus === undefined ? [] : [`Focus: ${request.focus}`]),
    ...(request.text.length > maxChars ? [`(first ${maxChars} of ${request.text.length} characters)`] : []),
    "",
    "```",
    body.replace(/\r?\n$/, ""),
    "```",
  ].join("\n");
}

/** Ask the assistant to explain a file. Nothing is edited. */
export async function analyzeFile(
  request: AnalyzeRequest,
  client: AssistantClient,
  options: SubmitOptions,
  maxChars: number = ASSISTANT.analysisMaxChars
): Promise<FileAnalysis> {
  const answer = await client.submit(buildAnalysisPrompt(request, maxChars), {
    ...options,
    instructions: ANALYSIS_INSTRUCTIONS,
  });
  return {
    path: request.path,
    report: stripCodeFences(answer).trim(),
    truncated: request.text.length > maxChars,
  };
}
