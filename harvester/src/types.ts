import { z } from "zod";

export const ProductTypeSchema = z.enum(["instant", "ground", "beans", "capsule", "mix", "other"]);

export const PackagingUnitSchema = z.enum(["g", "kg", "ml", "l"]);

export const PackagingSchema = z.object({
  value: z.number().nonnegative(),
  unit: PackagingUnitSchema,
  display: z.string().min(1)
});

export const CanonicalProductRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  price: z.number().nonnegative(),
  image_url: z.string().optional(),
  product_url: z.string().optional(),
  source: z.string().min(1),
  brand: z.string().min(1),
  type: ProductTypeSchema,
  packaging: PackagingSchema.optional(),
  price_tier: z.string().min(1),
  rating: z.number().nonnegative(),
  reviews_count: z.number().int().nonnegative(),
  scraped_at: z.string().datetime()
});

/**
 * Untyped text pulled out of one card or one API listing, before normalization.
 * HTML adapters fill the `*_text` fields; the query API fills `price` directly.
 */
export const RawListingSchema = z.object({
  external_id: z.string().optional(),
  name: z.string().optional(),
  price_text: z.string().optional(),
  price: z.number().optional(),
  image_url: z.string().optional(),
  product_url: z.string().optional(),
  rating_text: z.string().optional(),
  reviews_text: z.string().optional()
});

export const SelectorChainSchema = z.object({
  primary: z.string().min(1),
  alternatives: z.array(z.string().min(1)).default([])
});

export const CardFieldSchema = z.enum(["name", "price", "url", "image", "rating", "reviews"]);

export const FieldSelectorsSchema = z.object({
  card: SelectorChainSchema,
  name: SelectorChainSchema,
  price: SelectorChainSchema,
  url: SelectorChainSchema.optional(),
  image: SelectorChainSchema.optional(),
  rating: SelectorChainSchema.optional(),
  reviews: SelectorChainSchema.optional(),
  url_attribute: z.string().min(1).default("href"),
  image_attribute: z.string().min(1).default("src")
});

export const PaginationStyleSchema = z.enum(["page_param", "p_param", "path_segment"]);

const SourceBaseSchema = z.object({
  id: z.string().min(1).regex(/^[a-z0-9-]+$/),
  source_label: z.string().min(1),
  enabled: z.boolean().default(true),
  relevance_filter: z.boolean().default(false)
});

export const PaginatedSourceSchema = SourceBaseSchema.extend({
  kind: z.literal("paginated_html"),
  search_url: z.string().url(),
  max_pages: z.number().int().positive().default(5),
  pagination: PaginationStyleSchema.default("page_param"),
  render: z.enum(["http", "browser"]).default("http"),
  selectors: FieldSelectorsSchema,
  required_fields: z.array(CardFieldSchema).default([])
});

export const InfiniteScrollSourceSchema = SourceBaseSchema.extend({
  kind: z.literal("infinite_scroll"),
  search_url: z.string().url(),
  max_scroll_iterations: z.number().int().positive().default(10),
  stable_cycles: z.number().int().positive().default(2),
  settle_ms: z.number().int().nonnegative().default(3000),
  selectors: FieldSelectorsSchema,
  required_fields: z.array(CardFieldSchema).default([])
});

/** Number of capture groups in `pattern`, or undefined when it does not compile. */
function captureGroupCount(pattern: string): number | undefined {
  let compiled: RegExp;
  try {
    compiled = new RegExp(`(?:${pattern})|`, "i");
  } catch {
    return undefined;
  }
  const match = compiled.exec("");
  return match ? match.length - 1 : undefined;
}

export const QueryApiSourceSchema = SourceBaseSchema.extend({
  kind: z.literal("query_api"),
  endpoint: z.string().url(),
  search_term: z.string().min(1),
  targets: z.array(z.string().min(1)).min(1),
  discovery_url_template: z.string().min(1).refine((value) => value.includes("{target}"), {
    message: "discovery_url_template must contain {target}"
  }),
  vendor_link: SelectorChainSchema,
  vendor_id_pattern: z
    .string()
    .min(1)
    .superRefine((value, ctx) => {
      const groups = captureGroupCount(value);
      if (groups === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "vendor_id_pattern is not a valid regular expression" });
      } else if (groups === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "vendor_id_pattern needs a capture group for the vendor id" });
      }
    }),
  product_url_template: z.string().min(1),
  discovery_ttl_hours: z.number().positive().default(24 * 7),
  listing_ttl_hours: z.number().positive().default(24),
  client_name: z.string().min(1).default("web")
});

export const SourceConfigSchema = z.discriminatedUnion("kind", [
  PaginatedSourceSchema,
  InfiniteScrollSourceSchema,
  QueryApiSourceSchema
]);

export const SourcesFileSchema = z.object({
  sources: z.array(SourceConfigSchema).min(1)
});

export type ProductType = z.infer<typeof ProductTypeSchema>;
export type PackagingUnit = z.infer<typeof PackagingUnitSchema>;
export type Packaging = z.infer<typeof PackagingSchema>;
export type CanonicalProductRecord = z.infer<typeof CanonicalProductRecordSchema>;
export type RawListing = z.infer<typeof RawListingSchema>;
export type SelectorChain = z.infer<typeof SelectorChainSchema>;
export type CardField = z.infer<typeof CardFieldSchema>;
export type FieldSelectors = z.infer<typeof FieldSelectorsSchema>;
export type PaginationStyle = z.infer<typeof PaginationStyleSchema>;
export type PaginatedSourceConfig = z.infer<typeof PaginatedSourceSchema>;
export type InfiniteScrollSourceConfig = z.infer<typeof InfiniteScrollSourceSchema>;
export type QueryApiSourceConfig = z.infer<typeof QueryApiSourceSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type SourceKind = SourceConfig["kind"];
