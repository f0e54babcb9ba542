// ============================================
// Retrieval Strategy — one deterministic fetch program per intent
// ============================================

import { isAssistantError } from "../lib/errors.js";
import { logger, type RequestLogger } from "../lib/logger.js";
import { withTimeout } from "../lib/timeout.js";
import { brandDisplayName, isBrand, isLookupPartNumber, isModelNumber } from "../router/patterns.js";
import type { QueryAnalysis, QueryIntent } from "../router/types.js";
import type { PartRecord, RetrievalBundle } from "../types/records.js";
import type { StructuredStore } from "./stores.js";

/** Result limits per sub-query. */
export const FETCH_LIMITS = {
  troubleshootingRepairs: 5,
  troubleshootingParts: 5,
  educationalArticles: 3,
  partSearch: 10,
} as const;

export type FetchDeps = {
  structured: StructuredStore;
  fetchTimeoutMs: number;
  signal?: AbortSignal;
  log?: RequestLogger;
};

/**
 * Run one sub-query under the fetch timeout.
 * A failure or timeout yields `empty` for this sub-query only; caller
 * cancellation propagates.
 */
export async function safeFetch<T>(
  label: string,
  run: (signal: AbortSignal) => Promise<T>,
  empty: T,
  deps: Pick<FetchDeps, "fetchTimeoutMs" | "signal" | "log">
): Promise<T> {
  try {
    return await withTimeout(label, deps.fetchTimeoutMs, run, deps.signal);
  } catch (err) {
    if (isAssistantError(err, "CANCELLED")) {
      throw err;
    }
    (deps.log ?? logger).warn("Sub-query failed, continuing without it", {
      stage: "retrieval",
      subQuery: label,
      error: err,
    });
    return empty;
  }
}

// ============================================
// Search string construction
// ============================================

/** Key terms minus brands; falls back to the appliance, then "appliance". */
export function buildSymptomQuery(analysis: QueryAnalysis): string {
  const terms = [...analysis.keyTerms].filter((term) => !isBrand(term));
  if (terms.length > 0) return terms.join(" ");
  return analysis.applianceType ?? "appliance";
}

/** All key terms joined; falls back to the original query. */
export function buildTermsQuery(analysis: QueryAnalysis): string {
  return analysis.keyTerms.size > 0 ? [...analysis.keyTerms].join(" ") : analysis.query;
}

/** Catalog spelling of the first brand among the key terms. */
export function firstBrand(analysis: QueryAnalysis): string | undefined {
  for (const term of analysis.keyTerms) {
    const brand = brandDisplayName(term);
    if (brand) return brand;
  }
  return undefined;
}

// ============================================
// Fetch programs
// ============================================

type FetchProgram = (analysis: QueryAnalysis, deps: FetchDeps) => Promise<RetrievalBundle>;

async function lookupParts(terms: string[], deps: FetchDeps): Promise<PartRecord[]> {
  const hits = await Promise.all(
    terms.map((term) =>
      safeFetch(`getPartByNumber:${term}`, (signal) => deps.structured.getPartByNumber(term, signal), null, deps)
    )
  );
  return hits.filter((part): part is PartRecord => part !== null);
}

const fetchSpecificPart: FetchProgram = async (analysis, deps) => {
  const terms = [...analysis.keyTerms].filter(isLookupPartNumber);
  return { parts: await lookupParts(terms, deps), repairs: [], articles: [] };
};

const fetchCompatibility: FetchProgram = async (analysis, deps) => {
  const models = [...analysis.keyTerms].filter(isModelNumber);
  const perModel = await Promise.all(
    models.map((model) =>
      safeFetch(
        `searchCompatibleParts:${model}`,
        (signal) => deps.structured.searchCompatibleParts(model, analysis.applianceType, signal),
        [],
        deps
      )
    )
  );
  return { parts: perModel.flat(), repairs: [], articles: [] };
};

const fetchTroubleshooting: FetchProgram = async (analysis, deps) => {
  const query = buildSymptomQuery(analysis);
  const category = analysis.applianceType ?? undefined;

  const [repairs, parts] = await Promise.all([
    safeFetch(
      "searchRepairs",
      (signal) =>
        deps.structured.searchRepairs(query, analysis.applianceType, FETCH_LIMITS.troubleshootingRepairs, signal),
      [],
      deps
    ),
    safeFetch(
      "searchParts",
      (signal) => deps.structured.searchParts(query, FETCH_LIMITS.troubleshootingParts, { category }, signal),
      [],
      deps
    ),
  ]);
  return { parts, repairs, articles: [] };
};

const fetchEducational: FetchProgram = async (analysis, deps) => {
  const query = buildTermsQuery(analysis);
  const lookups = [...analysis.keyTerms].filter(isLookupPartNumber);

  const [articles, parts] = await Promise.all([
    safeFetch(
      "searchArticles",
      (signal) => deps.structured.searchArticles(query, FETCH_LIMITS.educationalArticles, signal),
      [],
      deps
    ),
    lookupParts(lookups, deps),
  ]);
  return { parts, repairs: [], articles };
};

const fetchPartSearch: FetchProgram = async (analysis, deps) => {
  const query = buildTermsQuery(analysis);
  const filters = {
    brand: firstBrand(analysis),
    category: analysis.applianceType ?? undefined,
  };

  const parts = await safeFetch(
    "searchParts",
    (signal) => deps.structured.searchParts(query, FETCH_LIMITS.partSearch, filters, signal),
    [],
    deps
  );
  return { parts, repairs: [], articles: [] };
};

const PROGRAMS: Record<QueryIntent, FetchProgram> = {
  specific_part: fetchSpecificPart,
  compatibility: fetchCompatibility,
  troubleshooting: fetchTroubleshooting,
  educational: fetchEducational,
  part_search: fetchPartSearch,
};

/**
 * Run the primary (structured) fetch for a classified query.
 * Never rejects except on caller cancellation.
 */
export async function selectAndFetch(analysis: QueryAnalysis, deps: FetchDeps): Promise<RetrievalBundle> {
  const bundle = await PROGRAMS[analysis.intent](analysis, deps);

  (deps.log ?? logger).info("Primary fetch complete", {
    stage: "retrieval",
    intent: analysis.intent,
    parts: bundle.parts.length,
    repairs: bundle.repairs.length,
    articles: bundle.articles.length,
  });

  return bundle;
}
