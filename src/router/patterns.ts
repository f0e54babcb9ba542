// ============================================
// Entity patterns — named, pure matchers
// ============================================

/** PS numbers, two-letter prefixes, W-series and letter/digit/letter codes. */
const PART_NUMBER_RE = /\b(?:PS\d+|[A-Z]{2}\d+|W\d+|[A-Z]\d+[A-Z]+\d*)\b/g;

/** Two or more capitals, digits, optional trailing letters and digits. */
const MODEL_NUMBER_RE = /\b[A-Z]{2,}\d+[A-Z]*\d*\b/g;

/** Token shape that, with a lookup keyword, marks a specific-part query. */
const PART_NUMBER_SIGNAL_RE = /\b[A-Z]{2}\d+\b|\bPS\d+\b/;

/** Terms eligible for a direct catalog lookup. */
const LOOKUP_PART_NUMBER_RE = /^PS\d+/;

/** Terms eligible for a compatibility lookup. */
const MODEL_PREFIX_RE = /^[A-Z]{2,}\d+/;

export const PART_TYPES = [
  "filter",
  "seal",
  "door",
  "pump",
  "motor",
  "valve",
  "hose",
  "gasket",
  "dispenser",
  "ice maker",
] as const;

/** Brand vocabulary, lower-cased, mapped to catalog spelling. */
export const BRANDS: Record<string, string> = {
  whirlpool: "Whirlpool",
  ge: "GE",
  frigidaire: "Frigidaire",
  kenmore: "Kenmore",
  samsung: "Samsung",
  lg: "LG",
  maytag: "Maytag",
  bosch: "Bosch",
};

/** Case-sensitive: part numbers are written in capitals. */
export function extractPartNumbers(text: string): string[] {
  return text.match(PART_NUMBER_RE) ?? [];
}

export function extractModelNumbers(text: string): string[] {
  return text.match(MODEL_NUMBER_RE) ?? [];
}

export function hasPartNumberSignal(text: string): boolean {
  return PART_NUMBER_SIGNAL_RE.test(text);
}

/** Substring match against the part-type vocabulary. */
export function matchPartTypes(lowerText: string): string[] {
  return PART_TYPES.filter((partType) => lowerText.includes(partType));
}

/**
 * Position used to order brand hits: whole-word mentions first, then
 * substring-only hits ("ge" inside "fridge"), each by first occurrence.
 */
function brandPosition(lowerText: string, brand: string): number {
  const wholeWord = new RegExp(`\\b${brand}\\b`).exec(lowerText);
  return wholeWord ? wholeWord.index : lowerText.length + lowerText.indexOf(brand);
}

/** Substring match against the brand vocabulary, in the order the query names them. */
export function matchBrands(lowerText: string): string[] {
  return Object.keys(BRANDS)
    .filter((brand) => lowerText.includes(brand))
    .sort((a, b) => brandPosition(lowerText, a) - brandPosition(lowerText, b));
}

export function isBrand(term: string): boolean {
  return Object.hasOwn(BRANDS, term.toLowerCase());
}

/** Catalog spelling for a brand term, or undefined if it is not a brand. */
export function brandDisplayName(term: string): string | undefined {
  const key = term.toLowerCase();
  return Object.hasOwn(BRANDS, key) ? BRANDS[key] : undefined;
}

export function isLookupPartNumber(term: string): boolean {
  return LOOKUP_PART_NUMBER_RE.test(term);
}

export function isModelNumber(term: string): boolean {
  return MODEL_PREFIX_RE.test(term);
}
