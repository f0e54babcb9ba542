// ============================================
// Pipeline — Single orchestration flow
// ============================================

import crypto from "node:crypto";
import { classifyQuery } from "../router/classifyQuery.js";
import { selectAndFetch } from "../retrieval/strategy.js";
import { needsSupplement, supplement } from "../retrieval/supplement.js";
import { buildContextString, fuse } from "../evidence/fuse.js";
import { buildUserMessage, FALLBACK_RESPONSE, SYSTEM_PROMPT } from "../llm/prompts.js";
import { cancelledError, generationError, isAssistantError } from "../lib/errors.js";
import { createRequestLogger } from "../lib/logger.js";
import { withTimeout } from "../lib/timeout.js";
import { CLASSIFIER_VERSION, type ConversationMessage, type QueryAnalysis } from "../router/types.js";
import {
  bundleSize,
  emptyBundle,
  emptySupplementaryBundle,
  type FusedContext,
} from "../types/records.js";
import type {
  PipelineDeps,
  PipelineErrorCode,
  PipelineStage,
  ProcessQueryOptions,
  ProcessQueryResult,
} from "./types.js";

export const PIPELINE_VERSION = "pipeline.v1.0";

function throwIfCancelled(signal: AbortSignal | undefined, label: string): void {
  if (signal?.aborted) {
    throw cancelledError(label, signal.reason);
  }
}

/**
 * Execute the full pipeline for one query.
 *
 * Flow:
 * 1. Classify (LLM, falling back to rules)
 * 2. Primary fetch (structured store, per-intent program)
 * 3. Supplementary fetch (vector store, only when primary is thin)
 * 4. Fuse (per-kind caps)
 * 5. Generate (one LLM call)
 *
 * Never rejects. Generation failure and cancellation return the fixed
 * fallback text with an error indicator.
 */
export async function processQuery(
  query: string,
  history: ConversationMessage[],
  deps: PipelineDeps,
  options: ProcessQueryOptions = {}
): Promise<ProcessQueryResult> {
  const requestId = options.requestId ?? crypto.randomUUID().slice(0, 8);
  const { signal } = options;
  const log = createRequestLogger(requestId, "pipeline");
  const startTime = Date.now();
  const stages: PipelineStage[] = ["received"];

  log.info("Pipeline started", {
    queryPreview: query.slice(0, 80),
    historyLength: history.length,
  });

  // Step 1: Classify
  const analysis = await classifyQuery(query, {
    backend: deps.classifier,
    timeoutMs: deps.timeouts.classifierMs,
    signal,
    requestId,
  });
  stages.push("classified");

  let primaryCount = 0;
  let supplementaryCount = 0;
  let fused: FusedContext = fuse(emptyBundle(), emptySupplementaryBundle());

  const finish = (response: string, error?: PipelineErrorCode): ProcessQueryResult => {
    const latencyMs = Date.now() - startTime;
    log.info("Pipeline complete", {
      latencyMs,
      intent: analysis.intent,
      primary: primaryCount,
      supplementary: supplementaryCount,
      ...(error && { error }),
    });
    return buildResult(requestId, latencyMs, analysis, stages, response, fused, primaryCount, supplementaryCount, error);
  };

  try {
    throwIfCancelled(signal, "pipeline");

    // Step 2: Primary fetch
    const fetchDeps = {
      fetchTimeoutMs: deps.timeouts.fetchMs,
      signal,
      log: log.withStage("retrieval"),
    };
    const primary = await selectAndFetch(analysis, { ...fetchDeps, structured: deps.structured });
    primaryCount = bundleSize(primary);
    stages.push("primary_fetched");

    // Step 3: Supplementary fetch (gated)
    log.debug("Supplementary fetch decision", {
      primaryTotal: primaryCount,
      supplement: needsSupplement(primary),
    });
    const extra = await supplement(analysis, primary, { ...fetchDeps, vector: deps.vector });
    supplementaryCount = bundleSize(extra);
    stages.push("supplementary_fetch_decided");

    // Step 4: Fuse
    fused = fuse(primary, extra);
    stages.push("fused");
    log.withStage("fusion").info("Context fused", { sources: fused.sources });

    // Step 5: Generate
    const userMessage = buildUserMessage(query, buildContextString(fused));
    stages.push("handed_to_generator");
    const response = await withTimeout(
      "generation",
      deps.timeouts.generationMs,
      (childSignal) =>
        deps.generator.generate({ systemInstructions: SYSTEM_PROMPT, history, userMessage }, childSignal),
      signal
    );

    if (!response.trim()) {
      throw generationError("Generator returned empty output", requestId);
    }

    stages.push("responded");
    return finish(response);
  } catch (err) {
    const error: PipelineErrorCode = isAssistantError(err, "CANCELLED") ? "CANCELLED" : "GENERATION_FAILED";
    log.error("Pipeline failed, returning fallback response", { errorCode: error, error: err });
    stages.push("failed");
    return finish(FALLBACK_RESPONSE, error);
  }
}

function buildResult(
  requestId: string,
  latencyMs: number,
  analysis: QueryAnalysis,
  stages: PipelineStage[],
  response: string,
  context: FusedContext,
  primary: number,
  supplementary: number,
  error?: PipelineErrorCode
): ProcessQueryResult {
  return {
    response,
    intent: analysis.intent,
    sourceCounts: { primary, supplementary },
    context,
    ...(error && { error }),
    metadata: {
      requestId,
      latencyMs,
      classifiedBy: analysis.classifiedBy,
      confidence: analysis.confidence,
      searchStrategy: analysis.searchStrategy,
      applianceType: analysis.applianceType,
      keyTerms: [...analysis.keyTerms],
      stages: [...stages],
      pipelineVersion: PIPELINE_VERSION,
      classifierVersion: CLASSIFIER_VERSION,
    },
  };
}
