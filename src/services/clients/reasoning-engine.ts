/**
 * Reasoning engine adapters.
 */

import OpenAI from "openai";
import type { ReasoningEngine, ReasoningOptions } from "../../types/capabilities.js";
import { CapabilityError } from "../errors.js";

export interface OpenAIReasoningEngineOptions {
  apiKey: string;
  model: string;
  /** Request timeout passed to the SDK */
  timeoutMs?: number;
  baseURL?: string | undefined;
}

/**
 * Hosted language model via the OpenAI chat completions API.
 */
export class OpenAIReasoningEngine implements ReasoningEngine {
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAIReasoningEngineOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs ?? 60_000,
      maxRetries: 0,
    });
    this.model = options.model;
  }

  async invoke(prompt: string, options: ReasoningOptions): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: options.maxTokens,
        temperature: options.temperature,
      },
      { signal: options.signal }
    );

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new CapabilityError("reasoning", "empty completion");
    }
    return content;
  }
}

/**
 * Stand-in used when no model credentials are configured. Every call fails,
 * so decisions fall back to ERROR instead of the pipeline halting.
 */
export class UnconfiguredReasoningEngine implements ReasoningEngine {
  async invoke(): Promise<string> {
    throw new CapabilityError("reasoning", "no reasoning engine credentials configured");
  }
}
