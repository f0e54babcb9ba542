// ============================================
// Retrieval records — tagged variants per entity kind
// ============================================

import type { ApplianceType } from "../router/types.js";

/** Catalog part from the structured store. */
export type PartRecord = {
  kind: "part";
  source: "structured";
  partNumber: string;
  name: string;
  brand?: string;
  price?: number;
  /** Appliance category: "refrigerator" | "dishwasher" */
  category?: string;
  inStock?: boolean;
  availability?: string;
  productUrl?: string;
  videoUrl?: string;
  installationDifficulty?: string;
  installationTime?: string;
  description?: string;
};

/** Troubleshooting guide from the structured store. */
export type RepairRecord = {
  kind: "repair";
  source: "structured";
  applianceType: string;
  symptom: string;
  description?: string;
  difficulty?: string;
  partsNeeded?: string;
  videoUrl?: string;
  detailUrl?: string;
};

/** Educational article from the structured store. */
export type ArticleRecord = {
  kind: "article";
  source: "structured";
  title: string;
  url: string;
  author?: string;
  excerpt?: string;
};

export type StructuredRecord = PartRecord | RepairRecord | ArticleRecord;

export type VectorMetadata = Record<string, string | number | boolean | null>;

/** Nearest-neighbour hit, kept as raw text plus metadata. */
export type VectorRecord = {
  kind: "part" | "repair" | "article";
  source: "vector";
  content: string;
  metadata: VectorMetadata;
  /** Cosine distance; smaller is closer */
  distance: number;
};

/**
 * Result of the primary fetch.
 * Each list keeps the order its source returned.
 */
export type RetrievalBundle = {
  parts: PartRecord[];
  repairs: RepairRecord[];
  articles: ArticleRecord[];
};

/** Result of the supplementary (vector) fetch, ascending distance. */
export type SupplementaryBundle = {
  parts: VectorRecord[];
  repairs: VectorRecord[];
  articles: VectorRecord[];
};

/**
 * Bounded context handed to generation.
 * `sources` is for logging and auditing, not for the generator.
 */
export type FusedContext = {
  primary: RetrievalBundle;
  supplementary: VectorRecord[];
  sources: string[];
};

/** Optional filters for part search. */
export type PartSearchFilters = {
  brand?: string;
  category?: ApplianceType;
  maxPrice?: number;
  inStock?: boolean;
};

export function emptyBundle(): RetrievalBundle {
  return { parts: [], repairs: [], articles: [] };
}

export function emptySupplementaryBundle(): SupplementaryBundle {
  return { parts: [], repairs: [], articles: [] };
}

export function bundleSize(bundle: RetrievalBundle | SupplementaryBundle): number {
  return bundle.parts.length + bundle.repairs.length + bundle.articles.length;
}
