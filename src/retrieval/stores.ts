// ============================================
// Store contracts — what retrieval needs from its backends
// ============================================

import type { ApplianceType } from "../router/types.js";
import type {
  ArticleRecord,
  PartRecord,
  PartSearchFilters,
  RepairRecord,
  VectorMetadata,
} from "../types/records.js";

/**
 * Keyword-searchable catalog of parts, repair guides and articles.
 * "No results" resolves to [] or null, never rejects.
 */
export interface StructuredStore {
  searchParts(
    query: string,
    limit: number,
    filters: PartSearchFilters,
    signal?: AbortSignal
  ): Promise<PartRecord[]>;

  getPartByNumber(partNumber: string, signal?: AbortSignal): Promise<PartRecord | null>;

  searchCompatibleParts(
    modelNumber: string,
    applianceType: ApplianceType | null,
    signal?: AbortSignal
  ): Promise<PartRecord[]>;

  searchRepairs(
    symptomQuery: string,
    applianceType: ApplianceType | null,
    limit: number,
    signal?: AbortSignal
  ): Promise<RepairRecord[]>;

  searchArticles(query: string, limit: number, signal?: AbortSignal): Promise<ArticleRecord[]>;
}

export type VectorCollection = "parts" | "repairs" | "articles";

export type VectorHit = {
  document: string;
  metadata: VectorMetadata;
  /** Smaller is closer */
  distance: number;
};

/** Embedding index, one collection per entity kind. */
export interface VectorStore {
  queryNearest(
    collection: VectorCollection,
    queryText: string,
    k: number,
    signal?: AbortSignal
  ): Promise<VectorHit[]>;
}
