// ============================================
// Query Classifier — LLM first, rules as the floor
// ============================================

import { config } from "../config/env.js";
import { logger } from "../lib/logger.js";
import { withTimeout } from "../lib/timeout.js";
import type { ClassifierBackend } from "../llm/classifierLLM.js";
import { classifyWithRules } from "./heuristics.js";
import type { QueryAnalysis } from "./types.js";

export type ClassifyOptions = {
  /** External classifier; omitted means rules only */
  backend?: ClassifierBackend;
  timeoutMs?: number;
  signal?: AbortSignal;
  requestId?: string;
};

/**
 * Classify a query.
 *
 * The classifier is a POLICY SELECTOR:
 * - It picks the retrieval program to run
 * - It NEVER answers the question
 * - It never rejects: any backend failure yields the rule-based result
 */
export async function classifyQuery(query: string, options: ClassifyOptions = {}): Promise<QueryAnalysis> {
  const { backend, timeoutMs = config.timeouts.classifierMs, signal, requestId } = options;

  if (!backend) {
    return classifyWithRules(query);
  }

  try {
    const analysis = await withTimeout(
      "classifier",
      timeoutMs,
      (childSignal) => backend(query, childSignal),
      signal
    );

    logger.info("LLM classification result", {
      stage: "classifier",
      requestId,
      intent: analysis.intent,
      applianceType: analysis.applianceType,
      confidence: analysis.confidence.toFixed(2),
      keyTerms: [...analysis.keyTerms],
    });

    return analysis;
  } catch (err) {
    logger.warn("LLM classification failed, using rules", {
      stage: "classifier",
      requestId,
      error: err,
    });

    return classifyWithRules(query);
  }
}
