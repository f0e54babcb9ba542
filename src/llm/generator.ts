// ============================================
// Generator — the single answer-producing LLM call
// ============================================

import { config } from "../config/env.js";
import { generationError } from "../lib/errors.js";
import type { ConversationMessage } from "../router/types.js";
import { generateCompletion, type CompletionFn } from "./client.js";

export type GenerationRequest = {
  systemInstructions: string;
  history: ConversationMessage[];
  userMessage: string;
};

/** Opaque text generator; the pipeline never inspects how it works. */
export interface Generator {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

export type ChatGeneratorOptions = {
  model?: string;
  temperature?: number;
  maxTokens?: number;
};

/**
 * Chat-completion generator.
 * Empty output is an error, not an answer.
 */
export class ChatCompletionGenerator implements Generator {
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly complete: CompletionFn = generateCompletion,
    options: ChatGeneratorOptions = {}
  ) {
    this.model = options.model ?? config.llm.chatModel;
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 2000;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const content = await this.complete(request.systemInstructions, request.userMessage, {
      model: this.model,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      history: request.history,
      signal,
    });

    if (!content.trim()) {
      throw generationError("Generator returned empty output");
    }
    return content;
  }
}
