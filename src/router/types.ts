// ============================================
// Classifier Types — Query intent contracts
// ============================================

/**
 * Current classifier version.
 * Bump when rule ordering or vocabularies change.
 */
export const CLASSIFIER_VERSION = "classifier.v1.1";

export const QUERY_INTENTS = [
  "specific_part",
  "compatibility",
  "troubleshooting",
  "educational",
  "part_search",
] as const;

/**
 * Classified purpose of a user query.
 * Each intent selects exactly one retrieval program.
 */
export type QueryIntent = (typeof QUERY_INTENTS)[number];

export const APPLIANCE_TYPES = ["refrigerator", "dishwasher"] as const;

export type ApplianceType = (typeof APPLIANCE_TYPES)[number];

export const SEARCH_STRATEGIES = [
  "exact_match",
  "compatibility_search",
  "symptom_based",
  "semantic_search",
  "educational_content",
] as const;

/** Advisory tag describing the fetch plan. */
export type SearchStrategy = (typeof SEARCH_STRATEGIES)[number];

/**
 * Output of classification.
 * Built fresh per request; never shared.
 */
export type QueryAnalysis = {
  intent: QueryIntent;

  /** null when unspecified or another appliance */
  applianceType: ApplianceType | null;

  /**
   * Part numbers, model numbers, brands and component names.
   * Always present, possibly empty. Insertion order is kept so joined
   * search strings are stable across runs.
   */
  keyTerms: Set<string>;

  /** 0..1 */
  confidence: number;

  searchStrategy: SearchStrategy;

  /** Original query text */
  query: string;

  /** Which tier produced the result */
  classifiedBy: "llm" | "rules";
};

/** A message in conversation history. */
export type ConversationMessage = {
  role: "user" | "assistant";
  content: string;
};

// ============================================
// Constants
// ============================================

/** Default intent when classification is ambiguous or invalid. */
export const DEFAULT_INTENT: QueryIntent = "part_search";

/** Fixed confidence reported by the rule-based tier. */
export const RULE_BASED_CONFIDENCE = 0.8;

/** Fetch plan implied by each intent. */
export const INTENT_STRATEGY: Record<QueryIntent, SearchStrategy> = {
  specific_part: "exact_match",
  compatibility: "compatibility_search",
  troubleshooting: "symptom_based",
  educational: "educational_content",
  part_search: "semantic_search",
};

export function isApplianceType(value: unknown): value is ApplianceType {
  return APPLIANCE_TYPES.some((member) => member === value);
}
