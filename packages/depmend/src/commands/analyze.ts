import * as fs from "node:fs/promises";
import * as path from "node:path";

import { ExitCode, type ExitCodeType } from "@depmend/core";

import { analyzeFile, OpenAIAssistant, type AssistantClient } from "../assist/index.js";
import { getErrorMessage, IOFailureError } from "../core/errors.js";
import { loadConfig, withOverrides } from "../core/loader.js";
import { formatFileAnalysis, type OutputFormat } from "../output/index.js";
import { interruptSignal } from "./deps.js";
import { parseTimeout } from "./options.js";

export interface AnalyzeOptions {
  config?: string;
  focus?: string;
  format: OutputFormat;
  model?: string;
  timeout?: string;
}

/**
 * depmend analyze: ask the assistant to explain a file. Read-only.
 */
export async function runAnalyze(
  file: string,
  options: AnalyzeOptions,
  createClient: (model: string) => AssistantClient = (model) => new OpenAIAssistant({ model })
): Promise<ExitCodeType> {
  const filePath = path.resolve(file);
  const { config: baseConfig } = loadConfig(options.config, path.dirname(filePath));
  const config = withOverrides(baseConfig, { model: options.model, timeoutMs: parseTimeout(options.timeout) });

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new IOFailureError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  const { signal, dispose } = interruptSignal();
  try {
    const analysis = await analyzeFile(
      { path: path.relative(process.cwd(), filePath) || path.basename(filePath), text, focus: options.focus },
      createClient(config.assistant.model),
      { signal, timeoutMs: config.assistant.timeoutMs }
    );
    process.stdout.write(
      options.format === "json" ? `${JSON.stringify(analysis, null, 2)}\n` : formatFileAnalysis(analysis)
    );
    return ExitCode.SUCCESS;
  } finally {
    dispose();
  }
}
