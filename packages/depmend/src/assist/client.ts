import OpenAI from "openai";

import { AssistantError } from "../core/errors.js";
import { runBounded } from "../core/timeout.js";

export interface SubmitOptions {
  signal?: AbortSignal;
  timeoutMs: number;
  /** System instructions; defaults to the code-editing instructions */
  instructions?: string;
}

/** An external service that answers an editing prompt with replacement text */
export interface AssistantClient {
  submit(prompt: string, options: SubmitOptions): Promise<string>;
}

export const EDIT_INSTRUCTIONS =
  "You edit source code. Reply with only the complete replacement for the lines you are given, " +
  "without explanations. Keep lines you were not asked to change exactly as they are.";

export interface OpenAIAssistantOptions {
  model: string;
  /** Defaults to OPENAI_API_KEY */
  apiKey?: string;
  /** Preconfigured SDK client */
  client?: OpenAI;
}

/** AssistantClient backed by the OpenAI chat completions API */
export class OpenAIAssistant implements AssistantClient {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAIAssistantOptions) {
    this.model = options.model;
    if (options.client) {
      this.client = options.client;
      return;
    }
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new AssistantError("No API key configured (set OPENAI_API_KEY)");
    }
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async submit(prompt: string, options: SubmitOptions): Promise<string> {
    return runBounded("Assistant request", options, async (signal) => {
      let response: OpenAI.Chat.Completions.ChatCompletion;
      try {
        response = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: [
              { role: "system", content: options.instructions ?? EDIT_INSTRUCTIONS },
              { role: "user", content: prompt },
            ],
            temperature: 0.2,
          },
          { signal }
        );
      } catch (error) {
        if (error instanceof OpenAI.APIError && !signal.aborted) {
          throw new AssistantError(`Assistant request failed: ${error.message}`);
        }
        throw error;
      }
      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new AssistantError("Empty response from the assistant");
      }
      return content;
    });
  }
}
