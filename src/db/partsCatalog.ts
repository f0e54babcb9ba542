// ============================================
// Parts Catalog — Supabase-backed structured store
// Full-text search runs in Postgres RPCs (sql/schema.sql)
// ============================================

import { z } from "zod";
import { supabase } from "./supabase.js";
import { logger } from "../lib/logger.js";
import { fetchError, validationError } from "../lib/errors.js";
import type { StructuredStore } from "../retrieval/stores.js";
import type { ApplianceType } from "../router/types.js";
import type {
  ArticleRecord,
  PartRecord,
  PartSearchFilters,
  RepairRecord,
} from "../types/records.js";

// ============================================
// Row schemas
// ============================================

/** Postgres numeric may arrive as a string */
const numeric = z.union([z.number(), z.string().transform(Number)]).pipe(z.number().finite());

const partRowSchema = z.object({
  part_number: z.string(),
  name: z.string(),
  brand: z.string().nullish(),
  price: numeric.nullish(),
  category: z.string().nullish(),
  in_stock: z.boolean().nullish(),
  availability: z.string().nullish(),
  product_url: z.string().nullish(),
  video_url: z.string().nullish(),
  installation_difficulty: z.string().nullish(),
  installation_time: z.string().nullish(),
  description: z.string().nullish(),
});

const repairRowSchema = z.object({
  appliance_type: z.string(),
  symptom: z.string(),
  description: z.string().nullish(),
  difficulty: z.string().nullish(),
  parts_needed: z.string().nullish(),
  repair_video_url: z.string().nullish(),
  symptom_detail_url: z.string().nullish(),
});

const articleRowSchema = z.object({
  title: z.string(),
  url: z.string(),
  author: z.string().nullish(),
  excerpt: z.string().nullish(),
});

type PartRow = z.infer<typeof partRowSchema>;
type RepairRow = z.infer<typeof repairRowSchema>;
type ArticleRow = z.infer<typeof articleRowSchema>;

// ============================================
// Row → record mapping
// ============================================

function orUndefined<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

export function toPartRecord(row: PartRow): PartRecord {
  return {
    kind: "part",
    source: "structured",
    partNumber: row.part_number,
    name: row.name,
    brand: orUndefined(row.brand),
    price: orUndefined(row.price),
    category: orUndefined(row.category),
    inStock: orUndefined(row.in_stock),
    availability: orUndefined(row.availability),
    productUrl: orUndefined(row.product_url),
    videoUrl: orUndefined(row.video_url),
    installationDifficulty: orUndefined(row.installation_difficulty),
    installationTime: orUndefined(row.installation_time),
    description: orUndefined(row.description),
  };
}

export function toRepairRecord(row: RepairRow): RepairRecord {
  return {
    kind: "repair",
    source: "structured",
    applianceType: row.appliance_type,
    symptom: row.symptom,
    description: orUndefined(row.description),
    difficulty: orUndefined(row.difficulty),
    partsNeeded: orUndefined(row.parts_needed),
    videoUrl: orUndefined(row.repair_video_url),
    detailUrl: orUndefined(row.symptom_detail_url),
  };
}

export function toArticleRecord(row: ArticleRow): ArticleRecord {
  return {
    kind: "article",
    source: "structured",
    title: row.title,
    url: row.url,
    author: orUndefined(row.author),
    excerpt: orUndefined(row.excerpt),
  };
}

// ============================================
// RPC plumbing
// ============================================

type RpcArgs = Record<string, string | number | boolean | null>;

/**
 * Call a Postgres function and validate every returned row.
 * Supabase errors become FETCH_FAILED; bad rows become VALIDATION_ERROR.
 */
async function callRpc<T extends z.ZodTypeAny>(
  fn: string,
  args: RpcArgs,
  rowSchema: T,
  signal?: AbortSignal
): Promise<z.infer<T>[]> {
  const request = supabase.rpc(fn, args);
  const { data, error } = await (signal ? request.abortSignal(signal) : request);

  if (error) {
    logger.error("Catalog query failed", { stage: "db", fn, error: error.message });
    throw fetchError(`${fn} failed: ${error.message}`, { fn, code: error.code });
  }

  const parsed = z.array(rowSchema).safeParse(data ?? []);
  if (!parsed.success) {
    throw validationError(`${fn} returned unexpected rows`, {
      fn,
      issues: parsed.error.issues.slice(0, 3).map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  return parsed.data;
}

// ============================================
// Store
// ============================================

/**
 * Structured store over the parts, part_compatibility, repairs and
 * articles tables.
 */
export class SupabaseStructuredStore implements StructuredStore {
  async searchParts(
    query: string,
    limit: number,
    filters: PartSearchFilters,
    signal?: AbortSignal
  ): Promise<PartRecord[]> {
    const rows = await callRpc(
      "search_parts",
      {
        search_query: query,
        match_limit: limit,
        filter_brand: filters.brand ?? null,
        filter_category: filters.category ?? null,
        filter_max_price: filters.maxPrice ?? null,
        filter_in_stock: filters.inStock ?? null,
      },
      partRowSchema,
      signal
    );

    logger.debug("Parts search complete", { stage: "db", query, results: rows.length });
    return rows.map(toPartRecord);
  }

  async getPartByNumber(partNumber: string, signal?: AbortSignal): Promise<PartRecord | null> {
    const rows = await callRpc("get_part_by_number", { lookup_part_number: partNumber }, partRowSchema, signal);
    const row = rows[0];
    return row ? toPartRecord(row) : null;
  }

  async searchCompatibleParts(
    modelNumber: string,
    applianceType: ApplianceType | null,
    signal?: AbortSignal
  ): Promise<PartRecord[]> {
    const rows = await callRpc(
      "search_compatible_parts",
      { lookup_model_number: modelNumber, filter_appliance_type: applianceType },
      partRowSchema,
      signal
    );

    logger.debug("Compatibility search complete", { stage: "db", modelNumber, results: rows.length });
    return rows.map(toPartRecord);
  }

  async searchRepairs(
    symptomQuery: string,
    applianceType: ApplianceType | null,
    limit: number,
    signal?: AbortSignal
  ): Promise<RepairRecord[]> {
    const rows = await callRpc(
      "search_repairs",
      { search_query: symptomQuery, filter_appliance_type: applianceType, match_limit: limit },
      repairRowSchema,
      signal
    );

    logger.debug("Repair search complete", { stage: "db", symptomQuery, results: rows.length });
    return rows.map(toRepairRecord);
  }

  async searchArticles(query: string, limit: number, signal?: AbortSignal): Promise<ArticleRecord[]> {
    const rows = await callRpc(
      "search_articles",
      { search_query: query, match_limit: limit },
      articleRowSchema,
      signal
    );

    logger.debug("Article search complete", { stage: "db", query, results: rows.length });
    return rows.map(toArticleRecord);
  }
}
