// ============================================
// Vector Search — pgvector nearest-neighbour over Supabase
// ============================================

import { z } from "zod";
import { supabase } from "../db/supabase.js";
import { logger } from "../lib/logger.js";
import { fetchError, validationError } from "../lib/errors.js";
import { embedQuery } from "./embeddings.js";
import type { VectorCollection, VectorHit, VectorStore } from "./stores.js";
import type { VectorMetadata } from "../types/records.js";

const MATCH_FUNCTIONS: Record<VectorCollection, string> = {
  parts: "match_parts",
  repairs: "match_repairs",
  articles: "match_articles",
};

const matchRowSchema = z.object({
  content: z.string(),
  metadata: z.record(z.unknown()).nullable(),
  similarity: z.number(),
});

/** Keep scalar metadata values; nested JSON is dropped. */
function toVectorMetadata(raw: Record<string, unknown> | null): VectorMetadata {
  const metadata: VectorMetadata = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (
      value === null ||
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      metadata[key] = value;
    }
  }
  return metadata;
}

/**
 * Vector store backed by match_* RPCs.
 * Cosine similarity from pgvector is reported as distance = 1 - similarity.
 */
export class SupabaseVectorStore implements VectorStore {
  constructor(private readonly embed: typeof embedQuery = embedQuery) {}

  async queryNearest(
    collection: VectorCollection,
    queryText: string,
    k: number,
    signal?: AbortSignal
  ): Promise<VectorHit[]> {
    const queryEmbedding = await this.embed(queryText, signal);
    const fn = MATCH_FUNCTIONS[collection];

    const request = supabase.rpc(fn, {
      query_embedding: queryEmbedding,
      match_count: k,
    });
    const { data, error } = await (signal ? request.abortSignal(signal) : request);

    if (error) {
      logger.error("Vector search failed", { stage: "vector", collection, error: error.message });
      throw fetchError(`${fn} failed: ${error.message}`, { fn, collection });
    }

    const parsed = z.array(matchRowSchema).safeParse(data ?? []);
    if (!parsed.success) {
      throw validationError(`${fn} returned unexpected rows`, { fn, collection });
    }

    const hits = parsed.data
      .map((row) => ({
        document: row.content,
        metadata: toVectorMetadata(row.metadata),
        distance: 1 - row.similarity,
      }))
      .sort((a, b) => a.distance - b.distance);

    logger.debug("Vector search complete", {
      stage: "vector",
      collection,
      k,
      hits: hits.length,
    });

    return hits;
  }
}
