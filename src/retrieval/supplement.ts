// ============================================
// Supplementary Fetch — vector search when the catalog comes up short
// ============================================

import { logger } from "../lib/logger.js";
import type { QueryAnalysis, QueryIntent } from "../router/types.js";
import {
  bundleSize,
  emptySupplementaryBundle,
  type RetrievalBundle,
  type SupplementaryBundle,
  type VectorRecord,
} from "../types/records.js";
import { safeFetch, type FetchDeps } from "./strategy.js";
import type { VectorCollection, VectorStore } from "./stores.js";

/** Primary totals below this trigger a vector search. */
export const SUPPLEMENT_THRESHOLD = 3;

const SUPPLEMENT_TARGETS: Record<QueryIntent, { collection: VectorCollection; k: number }> = {
  part_search: { collection: "parts", k: 5 },
  specific_part: { collection: "parts", k: 5 },
  compatibility: { collection: "parts", k: 5 },
  troubleshooting: { collection: "repairs", k: 3 },
  educational: { collection: "repairs", k: 3 },
};

const COLLECTION_KIND: Record<VectorCollection, VectorRecord["kind"]> = {
  parts: "part",
  repairs: "repair",
  articles: "article",
};

export type SupplementDeps = Omit<FetchDeps, "structured"> & {
  vector: VectorStore;
};

export function needsSupplement(primary: RetrievalBundle): boolean {
  return bundleSize(primary) < SUPPLEMENT_THRESHOLD;
}

/**
 * Gated vector search.
 * Returns an empty bundle without touching the vector store when the
 * primary bundle is large enough, and on any vector-store failure.
 */
export async function supplement(
  analysis: QueryAnalysis,
  primary: RetrievalBundle,
  deps: SupplementDeps
): Promise<SupplementaryBundle> {
  const bundle = emptySupplementaryBundle();
  if (!needsSupplement(primary)) {
    return bundle;
  }

  const { collection, k } = SUPPLEMENT_TARGETS[analysis.intent];
  const hits = await safeFetch(
    `queryNearest:${collection}`,
    (signal) => deps.vector.queryNearest(collection, analysis.query, k, signal),
    [],
    deps
  );

  bundle[collection] = hits
    .map((hit) => ({
      kind: COLLECTION_KIND[collection],
      source: "vector" as const,
      content: hit.document,
      metadata: hit.metadata,
      distance: hit.distance,
    }))
    .sort((a, b) => a.distance - b.distance);

  (deps.log ?? logger).info("Supplementary fetch complete", {
    stage: "vector",
    collection,
    hits: hits.length,
  });

  return bundle;
}
