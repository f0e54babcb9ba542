// ============================================
// Fusion — bound the retrieved evidence before generation
// ============================================

import type {
  ArticleRecord,
  FusedContext,
  PartRecord,
  RepairRecord,
  RetrievalBundle,
  SupplementaryBundle,
  VectorMetadata,
  VectorRecord,
} from "../types/records.js";

/** Per-kind caps on primary evidence. */
export const PRIMARY_CAPS = { parts: 5, repairs: 3, articles: 2 } as const;

/** Supplementary records are only admitted below this primary total. */
export const SUPPLEMENTARY_ADMIT_BELOW = 2;

export const SUPPLEMENTARY_CAP = 2;

export const EMPTY_CONTEXT = "No relevant data found in database.";

const DESCRIPTION_PREVIEW = 200;
const EXCERPT_PREVIEW = 150;
const SUPPLEMENTARY_PREVIEW = 200;

/**
 * Fuse primary and supplementary evidence into a bounded context.
 * Truncation keeps source order; nothing is reordered or deduplicated.
 */
export function fuse(primary: RetrievalBundle, supplementary: SupplementaryBundle): FusedContext {
  const bounded: RetrievalBundle = {
    parts: primary.parts.slice(0, PRIMARY_CAPS.parts),
    repairs: primary.repairs.slice(0, PRIMARY_CAPS.repairs),
    articles: primary.articles.slice(0, PRIMARY_CAPS.articles),
  };

  const primaryTotal = bounded.parts.length + bounded.repairs.length + bounded.articles.length;
  const extra =
    primaryTotal < SUPPLEMENTARY_ADMIT_BELOW
      ? [...supplementary.parts, ...supplementary.repairs, ...supplementary.articles].slice(0, SUPPLEMENTARY_CAP)
      : [];

  return {
    primary: bounded,
    supplementary: extra,
    sources: [
      ...bounded.parts.map(partSource),
      ...bounded.repairs.map(repairSource),
      ...bounded.articles.map(articleSource),
      ...extra.map(vectorSource),
    ],
  };
}

// ============================================
// Source lines
// ============================================

function priceText(price: unknown): string {
  return typeof price === "number" || typeof price === "string" ? String(price) : "N/A";
}

export function partSource(part: PartRecord): string {
  return `Part: ${part.name} (${part.partNumber}) - $${priceText(part.price)}`;
}

export function repairSource(repair: RepairRecord): string {
  return `Repair: ${repair.symptom} - ${repair.applianceType}`;
}

export function articleSource(article: ArticleRecord): string {
  return `Article: ${article.title}`;
}

function field(metadata: VectorMetadata, key: string, fallback: string): string {
  const value = metadata[key];
  return value === null || value === undefined || value === "" ? fallback : String(value);
}

/** Same line shapes as structured records, read from vector metadata. */
export function vectorSource(record: VectorRecord): string {
  const { metadata } = record;
  switch (record.kind) {
    case "part":
      return `Part: ${field(metadata, "name", "Unknown")} (${field(metadata, "part_number", "N/A")}) - $${priceText(metadata["price"])}`;
    case "repair":
      return `Repair: ${field(metadata, "symptom", "Unknown")} - ${field(metadata, "appliance_type", "Unknown")}`;
    case "article":
      return `Article: ${field(metadata, "title", "Unknown")}`;
  }
}

// ============================================
// Generator payload
// ============================================

function preview(text: string | undefined, max: number, fallback: string): string {
  return `${(text || fallback).slice(0, max)}...`;
}

function formatPart(part: PartRecord): string {
  return [
    `Part Number: ${part.partNumber}`,
    `Name: ${part.name}`,
    `Price: $${priceText(part.price)}`,
    `Brand: ${part.brand ?? "Unknown"}`,
    `Category: ${part.category ?? "Unknown"}`,
    `In Stock: ${part.inStock === undefined ? "Unknown" : part.inStock ? "Yes" : "No"}`,
    `Availability: ${part.availability ?? "Unknown"}`,
    `Product URL: ${part.productUrl ?? "Not available"}`,
    `Installation Video: ${part.videoUrl ?? "Not available"}`,
    `Installation Difficulty: ${part.installationDifficulty ?? "Not specified"}`,
    `Installation Time: ${part.installationTime ?? "Not specified"}`,
    `Description: ${preview(part.description, DESCRIPTION_PREVIEW, "No description")}`,
  ].join("\n");
}

function formatRepair(repair: RepairRecord): string {
  return [
    `Appliance: ${repair.applianceType}`,
    `Symptom: ${repair.symptom}`,
    `Description: ${preview(repair.description, DESCRIPTION_PREVIEW, "No description")}`,
    `Difficulty: ${repair.difficulty ?? "Unknown"}`,
    `Parts Needed: ${repair.partsNeeded ?? "Not specified"}`,
    `Repair Video: ${repair.videoUrl ?? "Not available"}`,
    `Detail URL: ${repair.detailUrl ?? "Not available"}`,
  ].join("\n");
}

function formatArticle(article: ArticleRecord): string {
  return [
    `Title: ${article.title}`,
    `URL: ${article.url}`,
    `Author: ${article.author ?? "Unknown"}`,
    `Excerpt: ${preview(article.excerpt, EXCERPT_PREVIEW, "No excerpt")}`,
  ].join("\n");
}

/**
 * Render the full-detail context handed to the generator.
 * Sections appear only when they have records.
 */
export function buildContextString(fused: FusedContext): string {
  const sections: string[] = [];
  const { parts, repairs, articles } = fused.primary;

  if (parts.length > 0) {
    sections.push(["=== PARTS FROM DATABASE ===", ...parts.map(formatPart)].join("\n\n"));
  }
  if (repairs.length > 0) {
    sections.push(["=== REPAIR GUIDES ===", ...repairs.map(formatRepair)].join("\n\n"));
  }
  if (articles.length > 0) {
    sections.push(["=== EDUCATIONAL ARTICLES ===", ...articles.map(formatArticle)].join("\n\n"));
  }
  if (fused.supplementary.length > 0) {
    sections.push(
      [
        "=== ADDITIONAL CONTEXT ===",
        ...fused.supplementary.map(
          (record) => `Additional Info: ${preview(record.content, SUPPLEMENTARY_PREVIEW, "")}`
        ),
      ].join("\n")
    );
  }

  return sections.length > 0 ? sections.join("\n\n") : EMPTY_CONTEXT;
}
