// ============================================
// Classifier Heuristics — Deterministic fallback tier
// ============================================

import {
  type ApplianceType,
  type QueryAnalysis,
  type QueryIntent,
  INTENT_STRATEGY,
  RULE_BASED_CONFIDENCE,
} from "./types.js";
import {
  extractModelNumbers,
  extractPartNumbers,
  hasPartNumberSignal,
  matchBrands,
  matchPartTypes,
} from "./patterns.js";

/**
 * Keyword signals per intent, checked in priority order.
 * Matching is substring-based on the lower-cased query.
 */
export const INTENT_SIGNALS = {
  specific_part: ["part number", "ps", "model"],
  compatibility: ["compatible", "compatibility", "model", "work with"],
  troubleshooting: [
    "not working",
    "not making",
    "broken",
    "leaking",
    "problem",
    "issue",
    "troubleshoot",
    "repair",
    "fix",
    "won't work",
    "doesn't work",
    "stopped working",
  ],
  educational: ["how to", "install", "replace", "maintenance", "clean"],
} as const satisfies Partial<Record<QueryIntent, readonly string[]>>;

const APPLIANCE_SIGNALS: Array<{ applianceType: ApplianceType; signals: string[] }> = [
  { applianceType: "refrigerator", signals: ["refrigerator", "fridge"] },
  { applianceType: "dishwasher", signals: ["dishwasher"] },
];

function containsAny(text: string, signals: readonly string[]): boolean {
  return signals.some((signal) => text.includes(signal));
}

/**
 * Pick the intent for a query.
 *
 * Priority order:
 * 1. specific_part (part-number token AND a lookup keyword)
 * 2. compatibility
 * 3. troubleshooting
 * 4. educational
 * 5. part_search
 */
export function detectIntent(query: string): QueryIntent {
  const normalized = query.toLowerCase();

  if (hasPartNumberSignal(query) && containsAny(normalized, INTENT_SIGNALS.specific_part)) {
    return "specific_part";
  }
  if (containsAny(normalized, INTENT_SIGNALS.compatibility)) {
    return "compatibility";
  }
  if (containsAny(normalized, INTENT_SIGNALS.troubleshooting)) {
    return "troubleshooting";
  }
  if (containsAny(normalized, INTENT_SIGNALS.educational)) {
    return "educational";
  }
  return "part_search";
}

export function detectApplianceType(query: string): ApplianceType | null {
  const normalized = query.toLowerCase();

  for (const { applianceType, signals } of APPLIANCE_SIGNALS) {
    if (containsAny(normalized, signals)) {
      return applianceType;
    }
  }
  return null;
}

/**
 * Extract key terms, independent of intent.
 * Part and model numbers keep their casing; vocabulary hits are lower-case.
 */
export function extractKeyTerms(query: string): Set<string> {
  const normalized = query.toLowerCase();

  return new Set([
    ...extractPartNumbers(query),
    ...extractModelNumbers(query),
    ...matchPartTypes(normalized),
    ...matchBrands(normalized),
  ]);
}

/**
 * Classify a query with rules only.
 * Total and deterministic: same text, same analysis.
 */
export function classifyWithRules(query: string): QueryAnalysis {
  const intent = detectIntent(query);

  return {
    intent,
    applianceType: detectApplianceType(query),
    keyTerms: extractKeyTerms(query),
    confidence: RULE_BASED_CONFIDENCE,
    searchStrategy: INTENT_STRATEGY[intent],
    query,
    classifiedBy: "rules",
  };
}
