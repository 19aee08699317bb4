// Response Generator - turns a policy descriptor into spoken reply text via
// OpenAI chat completions.
//
// The engine only depends on the ResponseGenerator interface; any model
// backend that maps (policy, utterance) to a string can stand in.

import { GenerationFailure } from "./errors.js";
import type { PolicyDescriptor } from "./types.js";
import { errorMessage } from "./utils.js";

export interface ResponseGenerator {
  /**
   * Produce reply text for one chat turn. May be slow (model inference).
   * Rejects with GenerationFailure (or any error) when no reply is available.
   */
  generate(policy: PolicyDescriptor, utterance: string): Promise<string>;
}

// ─── OpenAI client interface (for testability / dependency injection) ───────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "user"; content: string }>;
        temperature?: number;
        max_tokens?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface OpenAIResponseGeneratorOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 150;

export class OpenAIResponseGenerator implements ResponseGenerator {
  private readonly client: OpenAIChatClient;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(client: OpenAIChatClient, options: OpenAIResponseGeneratorOptions = {}) {
    this.client = client;
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  // The utterance is already embedded in policy.prompt by the template.
  async generate(policy: PolicyDescriptor, _utterance: string): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: policy.prompt }],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      });
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw new GenerationFailure(`Chat completion failed: ${errorMessage(err)}`, { cause: err });
    }

    const text = content?.trim() ?? "";
    if (text.length === 0) {
      throw new GenerationFailure("LLM returned empty response");
    }
    return text;
  }
}
