// ============================================
// Application Types — pipeline and service contracts
// ============================================

import type { ClassifierBackend } from "../llm/classifierLLM.js";
import type { Generator } from "../llm/generator.js";
import type { StructuredStore, VectorStore } from "../retrieval/stores.js";
import type { ApplianceType, QueryIntent, SearchStrategy } from "../router/types.js";
import type { FusedContext } from "../types/records.js";

/** Linear request lifecycle; `failed` still yields a response. */
export type PipelineStage =
  | "received"
  | "classified"
  | "primary_fetched"
  | "supplementary_fetch_decided"
  | "fused"
  | "handed_to_generator"
  | "responded"
  | "failed";

/** Error indicator surfaced to the caller alongside the fallback text. */
export type PipelineErrorCode = "GENERATION_FAILED" | "CANCELLED";

export type PipelineTimeouts = {
  classifierMs: number;
  fetchMs: number;
  generationMs: number;
};

/**
 * Collaborators for one pipeline run.
 * All are injected; tests pass in-process fakes.
 */
export type PipelineDeps = {
  /** Omit to classify with rules only */
  classifier?: ClassifierBackend;
  structured: StructuredStore;
  vector: VectorStore;
  generator: Generator;
  timeouts: PipelineTimeouts;
};

export type ProcessQueryOptions = {
  requestId?: string;
  signal?: AbortSignal;
};

export type ProcessQueryResult = {
  response: string;
  intent: QueryIntent;
  sourceCounts: {
    /** Structured records fetched, before caps */
    primary: number;
    /** Vector records fetched, before caps */
    supplementary: number;
  };
  context: FusedContext;
  error?: PipelineErrorCode;
  metadata: {
    requestId: string;
    latencyMs: number;
    classifiedBy: "llm" | "rules";
    confidence: number;
    searchStrategy: SearchStrategy;
    applianceType: ApplianceType | null;
    keyTerms: string[];
    stages: PipelineStage[];
    pipelineVersion: string;
    classifierVersion: string;
  };
};
