// ============================================
// LLM Client — OpenAI-compatible API wrapper
// ============================================

import OpenAI from "openai";
import { config } from "../config/env.js";
import { logger } from "../lib/logger.js";
import type { ConversationMessage } from "../router/types.js";

export const openai = new OpenAI({
  apiKey: config.llm.apiKey,
  baseURL: config.llm.baseUrl,
});

export type CompletionOptions = {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  /** Prior turns inserted between the system prompt and the user message */
  history?: ConversationMessage[];
  signal?: AbortSignal;
};

/** Signature shared by the classifier backend and the generator. */
export type CompletionFn = (
  systemPrompt: string,
  userMessage: string,
  options?: CompletionOptions
) => Promise<string>;

/**
 * Generate a single chat completion.
 * Returns the first choice's content, or "" when the provider sends none.
 */
export const generateCompletion: CompletionFn = async (systemPrompt, userMessage, options = {}) => {
  const {
    model = config.llm.chatModel,
    temperature = 0.3,
    maxTokens = 1000,
    jsonMode = false,
    history = [],
    signal,
  } = options;

  try {
    const response = await openai.chat.completions.create(
      {
        model,
        messages: [
          { role: "system", content: systemPrompt },
          ...history.map((m) =>
            m.role === "user"
              ? { role: "user" as const, content: m.content }
              : { role: "assistant" as const, content: m.content }
          ),
          { role: "user", content: userMessage },
        ],
        temperature,
        max_tokens: maxTokens,
        ...(jsonMode && { response_format: { type: "json_object" as const } }),
      },
      { signal }
    );

    const usage = response.usage;
    if (usage) {
      logger.debug("LLM usage", {
        stage: "llm",
        model,
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
      });
    }

    return response.choices[0]?.message?.content ?? "";
  } catch (err) {
    logger.error("LLM completion failed", {
      stage: "llm",
      model,
      error: err,
    });
    throw err;
  }
};
