// ============================================
// Test fakes — in-process stores, generator and fixtures
// ============================================

import { vi } from "vitest";
import type { Generator } from "../src/llm/generator.js";
import type { StructuredStore, VectorStore, VectorHit } from "../src/retrieval/stores.js";
import type { ApplianceType, QueryAnalysis, QueryIntent } from "../src/router/types.js";
import { INTENT_STRATEGY } from "../src/router/types.js";
import type { ArticleRecord, PartRecord, RepairRecord } from "../src/types/records.js";
import type { PipelineDeps } from "../src/app/types.js";
import type { ClassifierBackend } from "../src/llm/classifierLLM.js";

export function makePart(overrides: Partial<PartRecord> = {}): PartRecord {
  return {
    kind: "part",
    source: "structured",
    partNumber: "PS11752778",
    name: "Refrigerator Door Shelf Bin",
    brand: "Whirlpool",
    price: 44.95,
    category: "refrigerator",
    inStock: true,
    ...overrides,
  };
}

export function makeRepair(overrides: Partial<RepairRecord> = {}): RepairRecord {
  return {
    kind: "repair",
    source: "structured",
    applianceType: "dishwasher",
    symptom: "leaking",
    difficulty: "easy",
    ...overrides,
  };
}

export function makeArticle(overrides: Partial<ArticleRecord> = {}): ArticleRecord {
  return {
    kind: "article",
    source: "structured",
    title: "How to Clean a Dishwasher Filter",
    url: "https://example.com/articles/clean-filter",
    ...overrides,
  };
}

export function makeHit(overrides: Partial<VectorHit> = {}): VectorHit {
  return {
    document: "Water inlet valve for dishwashers",
    metadata: { name: "Water Inlet Valve", part_number: "PS100", price: 59.5 },
    distance: 0.2,
    ...overrides,
  };
}

export function makeAnalysis(
  intent: QueryIntent,
  terms: string[] = [],
  applianceType: ApplianceType | null = null,
  query = "test query"
): QueryAnalysis {
  return {
    intent,
    applianceType,
    keyTerms: new Set(terms),
    confidence: 0.8,
    searchStrategy: INTENT_STRATEGY[intent],
    query,
    classifiedBy: "rules",
  };
}

/** Structured store whose every method resolves empty until overridden. */
export function createStructuredStore() {
  return {
    searchParts: vi.fn<StructuredStore["searchParts"]>().mockResolvedValue([]),
    getPartByNumber: vi.fn<StructuredStore["getPartByNumber"]>().mockResolvedValue(null),
    searchCompatibleParts: vi.fn<StructuredStore["searchCompatibleParts"]>().mockResolvedValue([]),
    searchRepairs: vi.fn<StructuredStore["searchRepairs"]>().mockResolvedValue([]),
    searchArticles: vi.fn<StructuredStore["searchArticles"]>().mockResolvedValue([]),
  };
}

export function createVectorStore() {
  return {
    queryNearest: vi.fn<VectorStore["queryNearest"]>().mockResolvedValue([]),
  };
}

export function createGenerator(output = "Here is what I found.") {
  return {
    generate: vi.fn<Generator["generate"]>().mockResolvedValue(output),
  };
}

/** Pipeline collaborators as fakes; rules-only unless a classifier is given. */
export function createPipelineDeps(classifier?: ClassifierBackend) {
  return {
    classifier,
    structured: createStructuredStore(),
    vector: createVectorStore(),
    generator: createGenerator(),
    timeouts: { classifierMs: 200, fetchMs: 200, generationMs: 200 },
  } satisfies PipelineDeps;
}

/** A promise that settles only when the signal aborts. */
export function untilAborted<T>(signal: AbortSignal | undefined): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}
