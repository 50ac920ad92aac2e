import { FieldDefaulted } from "./errors";
import { identityKey } from "./dedup";
import { CompiledLexicon } from "./lexicon";
import { slugifyText } from "./slugify";
import { CanonicalProductRecord, Packaging, PackagingUnit, ProductType, RawListing } from "../types";

export const UNKNOWN_NAME = "Unknown";
export const UNKNOWN_BRAND = "Unknown";

const CURRENCY_MARKERS = /(?:rs\.?|pkr|inr|usd|eur|gbp|₨|\$|€|£)/gi;
const DECIMAL = /\d+(?:\.\d+)?/;
const PACKAGING =
  /(?<![\d.])(\d+(?:\.\d+)?)\s?(kgs|kg|grams|gram|gms|gm|g|ml|litres|litre|liters|liter|ltr|l)(?![a-z])/i;

const UNIT_ALIASES: Record<string, PackagingUnit> = {
  kgs: "kg",
  kg: "kg",
  grams: "g",
  gram: "g",
  gms: "g",
  gm: "g",
  g: "g",
  ml: "ml",
  litres: "l",
  litre: "l",
  liters: "l",
  liter: "l",
  ltr: "l",
  l: "l"
};

function asString(value: string | undefined): string | undefined {
  const trimmed = value?.replace(/\s+/g, " ").trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

/** Lowercased, hyphens and underscores read as spaces, so "3-in-1" matches "3 in 1". */
function matchText(name: string): string {
  return name.toLowerCase().replace(/[-_]+/g, " ").replace(/\s+/g, " ");
}

function parseDecimal(text: string | undefined): number | undefined {
  if (!text) {
    return undefined;
  }
  const match = DECIMAL.exec(text);
  if (!match) {
    return undefined;
  }
  const parsed = Number.parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parsePriceText(text: string | undefined): number | undefined {
  if (!text) {
    return undefined;
  }
  return parseDecimal(text.replace(CURRENCY_MARKERS, " ").replace(/,/g, ""));
}

/** First decimal number after currency markers and group separators are removed; 0 otherwise. */
export function parsePrice(text: string | undefined): number {
  return parsePriceText(text) ?? 0;
}

export function parseRating(text: string | undefined): number {
  return parseDecimal(text) ?? 0;
}

export function parseReviewsCount(text: string | undefined): number {
  const digits = text?.replace(/\D/g, "") ?? "";
  return digits.length > 0 ? Number.parseInt(digits, 10) : 0;
}

export function extractBrand(name: string, lexicon: CompiledLexicon): string {
  const haystack = name.toLowerCase();
  return lexicon.brands.find((brand) => haystack.includes(brand.needle))?.display ?? UNKNOWN_BRAND;
}

export function classifyType(name: string, lexicon: CompiledLexicon): ProductType {
  const haystack = matchText(name);
  const rule = lexicon.typeRules.find((candidate) => candidate.keywords.some((keyword) => haystack.includes(keyword)));
  return rule?.type ?? "other";
}

export function extractPackaging(name: string): Packaging | undefined {
  const match = PACKAGING.exec(name);
  if (!match) {
    return undefined;
  }
  const value = Number.parseFloat(match[1]);
  const unit = UNIT_ALIASES[match[2].toLowerCase()];
  if (!Number.isFinite(value) || unit === undefined) {
    return undefined;
  }
  return { value, unit, display: `${value}${unit}` };
}

export function priceTier(price: number, lexicon: CompiledLexicon): string {
  const tiers = lexicon.priceTiers;
  const matched = tiers.find((entry) => price < entry.below);
  return (matched ?? tiers[tiers.length - 1]).tier;
}

/**
 * Relevance check for sources that opt in: the name must mention a category keyword and
 * must not pair one with an excluded word ("coffee mug").
 */
export function isRelevant(name: string | undefined, lexicon: CompiledLexicon): boolean {
  const cleaned = asString(name);
  if (!cleaned || cleaned === UNKNOWN_NAME) {
    return true;
  }
  const haystack = matchText(cleaned);
  const keywords = lexicon.categoryKeywords.filter((keyword) => haystack.includes(keyword));
  if (keywords.length === 0) {
    return false;
  }
  return !keywords.some((keyword) =>
    lexicon.categoryExclusions.some((exclusion) => haystack.includes(`${keyword} ${exclusion}`))
  );
}

function listingPrice(raw: RawListing): number | undefined {
  if (raw.price !== undefined && Number.isFinite(raw.price)) {
    return Math.max(0, raw.price);
  }
  return parsePriceText(raw.price_text);
}

/** Identity used for dedup; derived from the raw listing so it can be checked before normalization. */
export function listingIdentity(raw: RawListing): string {
  return identityKey(asString(raw.name) ?? UNKNOWN_NAME, listingPrice(raw) ?? 0, asString(raw.product_url));
}

export interface NormalizeContext {
  source: string;
  lexicon: CompiledLexicon;
  scrapedAt: string;
}

export interface NormalizedListing {
  record: CanonicalProductRecord;
  defaulted: FieldDefaulted[];
}

/** Total: every raw listing yields a frozen record plus the list of fields that fell back. */
export function normalizeListing(raw: RawListing, context: NormalizeContext): NormalizedListing {
  const defaulted: FieldDefaulted[] = [];
  const { lexicon } = context;

  const parsedName = asString(raw.name);
  const name = parsedName ?? UNKNOWN_NAME;
  if (!parsedName) {
    defaulted.push({ field: "name", fallback: UNKNOWN_NAME });
  }

  const parsedPrice = listingPrice(raw);
  const price = parsedPrice ?? 0;
  if (parsedPrice === undefined) {
    defaulted.push({ field: "price", fallback: 0 });
  }

  const brand = extractBrand(name, lexicon);
  if (brand === UNKNOWN_BRAND) {
    defaulted.push({ field: "brand", fallback: UNKNOWN_BRAND });
  }

  const type = classifyType(name, lexicon);
  if (type === "other") {
    defaulted.push({ field: "type", fallback: "other" });
  }

  const ratingText = asString(raw.rating_text);
  const rating = parseRating(ratingText);
  if (ratingText && parseDecimal(ratingText) === undefined) {
    defaulted.push({ field: "rating", fallback: 0 });
  }

  const reviewsText = asString(raw.reviews_text);
  const reviewsCount = parseReviewsCount(reviewsText);
  if (reviewsText && !/\d/.test(reviewsText)) {
    defaulted.push({ field: "reviews_count", fallback: 0 });
  }

  const productUrl = asString(raw.product_url);
  const imageUrl = asString(raw.image_url);
  const packaging = extractPackaging(name);
  const sourceSlug = slugifyText(context.source) || "source";
  const externalId = asString(raw.external_id);
  const id = externalId
    ? `${sourceSlug}-${slugifyText(externalId) || externalId}`
    : `${sourceSlug}-${identityKey(name, price, productUrl).slice(0, 12)}`;

  const record: CanonicalProductRecord = Object.freeze({
    id,
    name,
    price,
    ...(imageUrl ? { image_url: imageUrl } : {}),
    ...(productUrl ? { product_url: productUrl } : {}),
    source: context.source,
    brand,
    type,
    ...(packaging ? { packaging: Object.freeze(packaging) } : {}),
    price_tier: priceTier(price, lexicon),
    rating,
    reviews_count: reviewsCount,
    scraped_at: context.scrapedAt
  });

  return { record, defaulted };
}
