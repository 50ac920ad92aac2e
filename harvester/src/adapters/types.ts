import { CompiledLexicon } from "../lib/lexicon";
import { Logger } from "../lib/logger";
import { Sleep } from "../lib/retry";
import { CanonicalProductRecord, SourceKind } from "../types";

/** Why an adapter stopped. Every reason still returns whatever was collected. */
export type Termination = "completed" | "end_of_results" | "iteration_cap" | "exhausted" | "fetch_failed";

export interface AdapterMetrics {
  pages_fetched: number;
  cards_seen: number;
  records_emitted: number;
  duplicates_skipped: number;
  cards_skipped: number;
  filtered: number;
  fields_defaulted: number;
  fetch_failures: number;
  scroll_cycles: number;
  vendors_discovered: number;
  cache_hits: number;
  cache_misses: number;
}

export const zeroMetrics = (): AdapterMetrics => ({
  pages_fetched: 0,
  cards_seen: 0,
  records_emitted: 0,
  duplicates_skipped: 0,
  cards_skipped: 0,
  filtered: 0,
  fields_defaulted: 0,
  fetch_failures: 0,
  scroll_cycles: 0,
  vendors_discovered: 0,
  cache_hits: 0,
  cache_misses: 0
});

export interface AdapterResult {
  source_id: string;
  records: CanonicalProductRecord[];
  metrics: AdapterMetrics;
  termination: Termination;
}

export interface SourceAdapter {
  readonly sourceId: string;
  readonly kind: SourceKind;
  run(): Promise<AdapterResult>;
}

/** Writes the raw first page of a source somewhere a human can inspect it. */
export type DiagnosticsWriter = (sourceId: string, html: string) => Promise<void>;

/** Shared collaborators handed to every adapter for one run. */
export interface AdapterContext {
  lexicon: CompiledLexicon;
  logger: Logger;
  /** Randomized pause between consecutive requests to the same source. */
  pace: () => Promise<void>;
  sleep: Sleep;
  now: () => Date;
  onRecord?: (record: CanonicalProductRecord) => void;
  diagnostics?: DiagnosticsWriter;
}
