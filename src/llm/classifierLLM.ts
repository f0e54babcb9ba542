// ============================================
// LLM-based Query Classification
// Primary tier; the rule-based tier covers every failure
// ============================================

import { z } from "zod";
import { config } from "../config/env.js";
import { classificationError } from "../lib/errors.js";
import { generateCompletion, type CompletionFn } from "./client.js";
import {
  type QueryAnalysis,
  DEFAULT_INTENT,
  INTENT_STRATEGY,
  QUERY_INTENTS,
  SEARCH_STRATEGIES,
  isApplianceType,
} from "../router/types.js";

/** Backend signature consumed by classifyQuery. */
export type ClassifierBackend = (query: string, signal: AbortSignal) => Promise<QueryAnalysis>;

/** Self-reported confidence when the model omits it. */
const DEFAULT_LLM_CONFIDENCE = 0.5;

/**
 * Shape the model must return.
 * Missing or null fields get defaults; present-but-wrong fields fail the parse.
 */
const classificationSchema = z.object({
  type: z
    .enum(QUERY_INTENTS)
    .nullish()
    .transform((value) => value ?? DEFAULT_INTENT),
  appliance_type: z
    .string()
    .nullish()
    .transform((value) => (isApplianceType(value) ? value : null)),
  key_terms: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
  confidence: z
    .number()
    .nullish()
    .transform((value) => value ?? DEFAULT_LLM_CONFIDENCE),
  search_strategy: z.enum(SEARCH_STRATEGIES).nullish(),
});

/**
 * Build the classification system prompt.
 */
export function buildClassificationPrompt(): string {
  return `You classify questions sent to an appliance parts assistant that covers refrigerators and dishwashers.

Return a JSON object with exactly these fields:
{
  "type": "<query type>",
  "appliance_type": "refrigerator" | "dishwasher" | null,
  "key_terms": ["<extracted term>", ...],
  "confidence": <number between 0 and 1>,
  "search_strategy": "<strategy>"
}

Query types:
- "specific_part": asks about one part by its part number (PS11752778, W10295370)
- "compatibility": asks whether parts fit a model or appliance
- "troubleshooting": describes a symptom or asks for a repair
- "educational": how-to, installation, maintenance or cleaning
- "part_search": looks for a part by description or function

appliance_type is "refrigerator" for fridges, freezers and ice makers, "dishwasher" for dishwashers, otherwise null.

key_terms: part numbers, model numbers, brand names, part types and component names, copied as written.

search_strategy: "exact_match" for part numbers, "compatibility_search" for model fit, "symptom_based" for troubleshooting, "educational_content" for how-to, "semantic_search" otherwise.

Classify only. Do not answer the question.`;
}

/**
 * Validate a raw model reply into a QueryAnalysis.
 * Throws CLASSIFICATION_FAILED on malformed JSON or wrong field types.
 */
export function parseClassification(content: string, query: string): QueryAnalysis {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw classificationError("Classifier returned malformed JSON", err);
  }

  const result = classificationSchema.safeParse(raw);
  if (!result.success) {
    throw classificationError(
      `Classifier reply failed validation: ${result.error.issues.map((i) => i.path.join(".")).join(", ")}`,
      result.error
    );
  }

  const parsed = result.data;
  const keyTerms = new Set(parsed.key_terms.map((t) => t.trim()).filter(Boolean));

  return {
    intent: parsed.type,
    applianceType: parsed.appliance_type,
    keyTerms,
    confidence: Math.min(1, Math.max(0, parsed.confidence)),
    searchStrategy: parsed.search_strategy ?? INTENT_STRATEGY[parsed.type],
    query,
    classifiedBy: "llm",
  };
}

/**
 * Create an LLM classifier backend.
 * The LLM is ONLY used for classification; it never answers.
 */
export function createLLMClassifier(
  complete: CompletionFn = generateCompletion,
  model: string = config.llm.classifierModel
): ClassifierBackend {
  const systemPrompt = buildClassificationPrompt();

  return async (query, signal) => {
    const content = await complete(systemPrompt, `Analyze this query: ${query}`, {
      model,
      temperature: 0.1,
      maxTokens: 500,
      jsonMode: true,
      signal,
    });

    return parseClassification(content, query);
  };
}
