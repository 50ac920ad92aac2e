import { readFileSync } from "node:fs";
import { z } from "zod";
import { ProductType, ProductTypeSchema } from "../types";

const TypeRuleSchema = z.object({
  type: ProductTypeSchema,
  keywords: z.array(z.string().min(1)).min(1)
});

const PriceTierEntrySchema = z.object({
  tier: z.string().min(1),
  /** Exclusive upper bound; null marks the open-ended top tier. */
  below: z.number().positive().nullable()
});

export const LexiconSchema = z
  .object({
    brands: z.array(z.string().min(1)).min(1),
    type_rules: z.array(TypeRuleSchema).min(1),
    price_tiers: z.array(PriceTierEntrySchema).min(1),
    category_keywords: z.array(z.string().min(1)).default([]),
    category_exclusions: z.array(z.string().min(1)).default([])
  })
  .superRefine((lexicon, context) => {
    const tiers = lexicon.price_tiers;
    tiers.forEach((entry, index) => {
      const isLast = index === tiers.length - 1;
      if (isLast && entry.below !== null) {
        context.addIssue({ code: z.ZodIssueCode.custom, path: ["price_tiers", index, "below"], message: "last tier must be open-ended (null)" });
      }
      if (!isLast && entry.below === null) {
        context.addIssue({ code: z.ZodIssueCode.custom, path: ["price_tiers", index, "below"], message: "only the last tier may be open-ended" });
      }
      const previous = index > 0 ? tiers[index - 1].below : null;
      if (entry.below !== null && previous !== null && entry.below <= previous) {
        context.addIssue({ code: z.ZodIssueCode.custom, path: ["price_tiers", index, "below"], message: "thresholds must be strictly ascending" });
      }
    });
    const labels = new Set(tiers.map((entry) => entry.tier));
    if (labels.size !== tiers.length) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ["price_tiers"], message: "tier labels must be unique" });
    }
  });

export type Lexicon = z.infer<typeof LexiconSchema>;

export interface TypeRule {
  type: ProductType;
  keywords: readonly string[];
}

export interface PriceTierThreshold {
  tier: string;
  below: number;
}

/**
 * Business vocabulary, pre-lowercased for matching. Order in every list is significant:
 * the first brand, type rule or threshold that matches wins.
 */
export interface CompiledLexicon {
  brands: ReadonlyArray<{ display: string; needle: string }>;
  typeRules: readonly TypeRule[];
  priceTiers: readonly PriceTierThreshold[];
  categoryKeywords: readonly string[];
  categoryExclusions: readonly string[];
}

export function compileLexicon(input: unknown): CompiledLexicon {
  const lexicon = LexiconSchema.parse(input);
  return Object.freeze({
    brands: Object.freeze(lexicon.brands.map((display) => Object.freeze({ display, needle: display.toLowerCase() }))),
    typeRules: Object.freeze(
      lexicon.type_rules.map((rule) =>
        Object.freeze({ type: rule.type, keywords: Object.freeze(rule.keywords.map((keyword) => keyword.toLowerCase())) })
      )
    ),
    priceTiers: Object.freeze(
      lexicon.price_tiers.map((entry) => Object.freeze({ tier: entry.tier, below: entry.below ?? Number.POSITIVE_INFINITY }))
    ),
    categoryKeywords: Object.freeze(lexicon.category_keywords.map((keyword) => keyword.toLowerCase())),
    categoryExclusions: Object.freeze(lexicon.category_exclusions.map((keyword) => keyword.toLowerCase()))
  });
}

export function loadLexicon(path: string): CompiledLexicon {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return compileLexicon(raw);
}

/** Position of a tier label in the ascending table; -1 for labels the table does not know. */
export function tierRank(lexicon: CompiledLexicon, tier: string): number {
  return lexicon.priceTiers.findIndex((entry) => entry.tier === tier);
}
