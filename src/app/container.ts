// ============================================
// Container — production wiring from config
// ============================================

import { config } from "../config/env.js";
import { InMemoryConversationStore } from "../conversation/store.js";
import { SupabaseStructuredStore } from "../db/partsCatalog.js";
import { createLLMClassifier } from "../llm/classifierLLM.js";
import { generateCompletion } from "../llm/client.js";
import { ChatCompletionGenerator } from "../llm/generator.js";
import { SupabaseVectorStore } from "../retrieval/vectorSearch.js";
import { PartsAssistant } from "./assistant.js";
import type { PipelineDeps } from "./types.js";

export function createPipelineDeps(): PipelineDeps {
  return {
    classifier: createLLMClassifier(generateCompletion, config.llm.classifierModel),
    structured: new SupabaseStructuredStore(),
    vector: new SupabaseVectorStore(),
    generator: new ChatCompletionGenerator(generateCompletion, { model: config.llm.chatModel }),
    timeouts: config.timeouts,
  };
}

export function createAssistant(): PartsAssistant {
  return new PartsAssistant({
    pipeline: createPipelineDeps(),
    conversations: new InMemoryConversationStore(),
  });
}
