// ============================================
// Classifier Golden Tests
// Canonical query → expected analysis
// ============================================

import { describe, it, expect, vi } from "vitest";
import { classifyWithRules, detectIntent } from "../src/router/heuristics.js";
import { classifyQuery } from "../src/router/classifyQuery.js";
import { createLLMClassifier, parseClassification } from "../src/llm/classifierLLM.js";
import type { CompletionFn } from "../src/llm/client.js";
import { timeoutError } from "../src/lib/errors.js";
import type { ApplianceType, QueryIntent } from "../src/router/types.js";
import { QUERY_INTENTS } from "../src/router/types.js";
import { makeAnalysis, untilAborted } from "./fakes.js";

// ============================================
// Golden Cases (rule-based tier)
// ============================================

interface GoldenCase {
  query: string;
  intent: QueryIntent;
  applianceType: ApplianceType | null;
  keyTerms: string[];
  description: string;
}

const GOLDEN_CASES: GoldenCase[] = [
  {
    query: "PS11752778",
    intent: "specific_part",
    applianceType: null,
    keyTerms: ["PS11752778"],
    description: "bare PS number",
  },
  {
    query: "Does WDT780SAEM1 use PS11752778?",
    intent: "specific_part",
    applianceType: null,
    keyTerms: ["PS11752778", "WDT780SAEM1"],
    description: "part number with model number",
  },
  {
    query: "What parts are compatible with model GE GSS25GSHSS?",
    intent: "compatibility",
    applianceType: null,
    keyTerms: ["GSS25GSHSS", "ge"],
    description: "compatibility with brand and model",
  },
  {
    query: "Will this pump work with my Whirlpool dishwasher?",
    intent: "compatibility",
    applianceType: "dishwasher",
    keyTerms: ["pump", "whirlpool"],
    description: "'work with' phrasing",
  },
  {
    query: "My dishwasher is leaking water",
    intent: "troubleshooting",
    applianceType: "dishwasher",
    keyTerms: [],
    description: "symptom with no entities",
  },
  {
    query: "The ice maker stopped working",
    intent: "troubleshooting",
    applianceType: null,
    keyTerms: ["ice maker"],
    description: "multi-word part type",
  },
  {
    query: "How do I clean my dishwasher filter?",
    intent: "educational",
    applianceType: "dishwasher",
    keyTerms: ["filter"],
    description: "maintenance question",
  },
  {
    query: "Looking for a door gasket",
    intent: "part_search",
    applianceType: null,
    keyTerms: ["door", "gasket"],
    description: "plain part search",
  },
  {
    query: "Samsung fridge water dispenser",
    intent: "part_search",
    applianceType: "refrigerator",
    keyTerms: ["dispenser", "samsung", "ge"],
    description: "named brand ahead of the 'ge' inside 'fridge'",
  },
];

describe("Rule-based classifier golden tests", () => {
  it.each(GOLDEN_CASES)("$description: $query", ({ query, intent, applianceType, keyTerms }) => {
    const analysis = classifyWithRules(query);

    expect(analysis.intent).toBe(intent);
    expect(analysis.applianceType).toBe(applianceType);
    expect([...analysis.keyTerms]).toEqual(keyTerms);
    expect(analysis.confidence).toBe(0.8);
    expect(analysis.classifiedBy).toBe("rules");
    expect(analysis.query).toBe(query);
  });

  it("always returns one known intent and a key-term set", () => {
    for (const query of ["", "   ", "???", "hello there", "PS", "model"]) {
      const analysis = classifyWithRules(query);
      expect(QUERY_INTENTS).toContain(analysis.intent);
      expect(analysis.keyTerms).toBeInstanceOf(Set);
    }
  });

  it("classifies part-number queries mentioning 'model' as specific_part", () => {
    expect(detectIntent("Which model uses AB1234?")).toBe("specific_part");
    expect(detectIntent("Is PS123 the right part for my model")).toBe("specific_part");
  });

  it("needs a part-number token for specific_part", () => {
    expect(detectIntent("what model do I have")).toBe("compatibility");
  });

  it("derives the strategy from the intent", () => {
    expect(classifyWithRules("My fridge is not working").searchStrategy).toBe("symptom_based");
    expect(classifyWithRules("PS11752778").searchStrategy).toBe("exact_match");
  });
});

// ============================================
// LLM reply validation
// ============================================

describe("parseClassification", () => {
  it("maps a complete reply", () => {
    const analysis = parseClassification(
      JSON.stringify({
        type: "troubleshooting",
        appliance_type: "refrigerator",
        key_terms: ["ice maker", " Whirlpool "],
        confidence: 0.92,
        search_strategy: "symptom_based",
      }),
      "ice maker broken"
    );

    expect(analysis).toEqual({
      intent: "troubleshooting",
      applianceType: "refrigerator",
      keyTerms: new Set(["ice maker", "Whirlpool"]),
      confidence: 0.92,
      searchStrategy: "symptom_based",
      query: "ice maker broken",
      classifiedBy: "llm",
    });
  });

  it("fills defaults for missing fields", () => {
    const analysis = parseClassification("{}", "anything");

    expect(analysis.intent).toBe("part_search");
    expect(analysis.applianceType).toBeNull();
    expect(analysis.keyTerms.size).toBe(0);
    expect(analysis.confidence).toBe(0.5);
    expect(analysis.searchStrategy).toBe("semantic_search");
  });

  it("clamps confidence into [0, 1]", () => {
    expect(parseClassification('{"confidence": 1.7}', "q").confidence).toBe(1);
    expect(parseClassification('{"confidence": -0.2}', "q").confidence).toBe(0);
  });

  it("treats null fields like missing ones", () => {
    const analysis = parseClassification(
      '{"type": null, "appliance_type": null, "key_terms": null, "confidence": null, "search_strategy": null}',
      "q"
    );

    expect(analysis.intent).toBe("part_search");
    expect(analysis.applianceType).toBeNull();
    expect(analysis.keyTerms.size).toBe(0);
    expect(analysis.confidence).toBe(0.5);
    expect(analysis.searchStrategy).toBe("semantic_search");
    expect(analysis.classifiedBy).toBe("llm");
  });

  it("treats other appliances as unspecified", () => {
    expect(parseClassification('{"appliance_type": "oven"}', "q").applianceType).toBeNull();
  });

  it.each([
    ["malformed JSON", "not json"],
    ["unknown type", '{"type": "warranty"}'],
    ["key_terms of the wrong type", '{"key_terms": "filter"}'],
    ["confidence of the wrong type", '{"confidence": "high"}'],
  ])("rejects %s", (_label, content) => {
    expect(() => parseClassification(content, "q")).toThrow(
      expect.objectContaining({ code: "CLASSIFICATION_FAILED" })
    );
  });
});

describe("createLLMClassifier", () => {
  it("requests JSON output from the classifier model", async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue('{"type": "educational"}');
    const classify = createLLMClassifier(complete, "classifier-model");
    const signal = new AbortController().signal;

    const analysis = await classify("how to install a filter", signal);

    expect(analysis.intent).toBe("educational");
    expect(complete).toHaveBeenCalledWith(
      expect.stringContaining('"type"'),
      "Analyze this query: how to install a filter",
      expect.objectContaining({ model: "classifier-model", jsonMode: true, signal })
    );
  });
});

// ============================================
// Orchestration: LLM first, rules as fallback
// ============================================

describe("classifyQuery", () => {
  it("uses rules when no backend is configured", async () => {
    const analysis = await classifyQuery("My dishwasher is leaking water");
    expect(analysis.classifiedBy).toBe("rules");
    expect(analysis.intent).toBe("troubleshooting");
  });

  it("returns the backend result when it succeeds", async () => {
    const backend = vi.fn().mockResolvedValue({
      ...makeAnalysis("compatibility", ["GSS25GSHSS"]),
      classifiedBy: "llm",
    });

    const analysis = await classifyQuery("does it fit", { backend });

    expect(analysis.classifiedBy).toBe("llm");
    expect(analysis.intent).toBe("compatibility");
  });

  it("falls back to rules when the backend throws a timeout", async () => {
    const backend = vi.fn().mockRejectedValue(timeoutError("classifier", 10));

    const analysis = await classifyQuery("PS11752778", { backend });

    expect(analysis.classifiedBy).toBe("rules");
    expect(analysis.intent).toBe("specific_part");
  });

  it("falls back to rules when the backend exceeds its timeout", async () => {
    const backend = vi.fn((_query: string, signal: AbortSignal) => untilAborted<never>(signal));

    const analysis = await classifyQuery("Looking for a door gasket", { backend, timeoutMs: 20 });

    expect(analysis.classifiedBy).toBe("rules");
    expect(analysis.intent).toBe("part_search");
    expect(backend.mock.calls[0]?.[1].aborted).toBe(true);
  });
});
