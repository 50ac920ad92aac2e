import { SeenSet } from "../lib/dedup";
import { isRelevant, listingIdentity, normalizeListing } from "../lib/normalize";
import { CanonicalProductRecord, RawListing } from "../types";
import { AdapterContext, AdapterMetrics } from "./types";

export type OfferOutcome = "emitted" | "duplicate" | "filtered";

export interface CollectorSource {
  id: string;
  source_label: string;
  relevance_filter: boolean;
}

/**
 * The path every raw listing takes inside an adapter: identity check against the run's
 * seen-set, optional relevance filter, normalization, then hand-off to the observer.
 * A repeat identity is never normalized a second time.
 */
export class RecordCollector {
  readonly records: CanonicalProductRecord[] = [];
  private readonly seen = new SeenSet();

  constructor(
    private readonly source: CollectorSource,
    private readonly context: AdapterContext,
    private readonly metrics: AdapterMetrics
  ) {}

  offer(raw: RawListing, sourceLabel: string = this.source.source_label): OfferOutcome {
    if (!this.seen.admit(listingIdentity(raw))) {
      this.metrics.duplicates_skipped += 1;
      return "duplicate";
    }

    if (this.source.relevance_filter && !isRelevant(raw.name, this.context.lexicon)) {
      this.metrics.filtered += 1;
      this.context.logger.debug("listing_filtered", { source_id: this.source.id, name: raw.name });
      return "filtered";
    }

    const { record, defaulted } = normalizeListing(raw, {
      source: sourceLabel,
      lexicon: this.context.lexicon,
      scrapedAt: this.context.now().toISOString()
    });

    if (defaulted.length > 0) {
      this.metrics.fields_defaulted += defaulted.length;
      this.context.logger.debug("fields_defaulted", {
        source_id: this.source.id,
        record_id: record.id,
        fields: defaulted.map((entry) => entry.field)
      });
    }

    this.records.push(record);
    this.metrics.records_emitted += 1;
    this.context.onRecord?.(record);
    return "emitted";
  }
}
