// ============================================
// Embeddings — OpenAI query embeddings
// Must match the model the collections were indexed with.
// ============================================

import { config } from "../config/env.js";
import { logger } from "../lib/logger.js";
import { openai } from "../llm/client.js";

/** Inputs beyond this are truncated before embedding. */
const MAX_EMBED_CHARS = 8000;

/**
 * Generate the embedding for a query string.
 */
export async function embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
  try {
    const response = await openai.embeddings.create(
      {
        model: config.llm.embeddingModel,
        input: text.slice(0, MAX_EMBED_CHARS),
        dimensions: config.llm.embeddingDimensions,
      },
      { signal }
    );
    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error("No embedding returned from provider");
    }
    return embedding;
  } catch (err) {
    logger.error("Embedding generation failed", {
      stage: "vector",
      textPreview: text.slice(0, 50),
      error: err,
    });
    throw err;
  }
}
