import { compileLexicon } from "../lib/lexicon";
import { silentLogger } from "../lib/logger";
import { CanonicalProductRecord } from "../types";
import { AdapterContext } from "./types";

export const testLexicon = compileLexicon({
  brands: ["Nescafe", "Lavazza", "Tapal"],
  type_rules: [
    { type: "capsule", keywords: ["capsule", "pod"] },
    { type: "mix", keywords: ["3 in 1", "mix"] },
    { type: "beans", keywords: ["bean"] },
    { type: "ground", keywords: ["ground"] },
    { type: "instant", keywords: ["instant", "classic", "gold"] }
  ],
  price_tiers: [
    { tier: "economy", below: 1000 },
    { tier: "mid-range", below: 2500 },
    { tier: "premium", below: null }
  ],
  category_keywords: ["coffee", "nescafe"],
  category_exclusions: ["mug"]
});

export interface TestHarness {
  context: AdapterContext;
  paces: () => number;
  sleeps: number[];
  observed: CanonicalProductRecord[];
  snapshots: Array<{ sourceId: string; html: string }>;
}

/** Adapter context with no real waiting and a fixed clock. */
export function createHarness(): TestHarness {
  let paceCount = 0;
  const sleeps: number[] = [];
  const observed: CanonicalProductRecord[] = [];
  const snapshots: Array<{ sourceId: string; html: string }> = [];
  const context: AdapterContext = {
    lexicon: testLexicon,
    logger: silentLogger(),
    pace: async () => {
      paceCount += 1;
    },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    now: () => new Date("2026-03-01T10:00:00.000Z"),
    onRecord: (record) => {
      observed.push(record);
    },
    diagnostics: async (sourceId, html) => {
      snapshots.push({ sourceId, html });
    }
  };
  return { context, paces: () => paceCount, sleeps, observed, snapshots };
}

export function productCard(name: string, price: string, href: string): string {
  return `<div class="product"><a class="link" href="${href}"><span class="name">${name}</span></a><span class="price">${price}</span></div>`;
}

export function listingPage(cards: string[]): string {
  return `<html><body><div class="results">${cards.join("")}</div></body></html>`;
}
