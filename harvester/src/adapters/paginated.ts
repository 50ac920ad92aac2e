import { FetchError, errorMessage } from "../lib/errors";
import { withRetry } from "../lib/retry";
import { paginationUrl } from "../lib/url";
import { PaginatedSourceConfig } from "../types";
import { extractCards } from "./cards";
import { RecordCollector } from "./collector";
import { AdapterContext, AdapterResult, SourceAdapter, Termination, zeroMetrics } from "./types";

export type PageFetcher = (url: string) => Promise<string>;

/**
 * Provides a page fetcher for the duration of `work` and releases whatever backs it
 * (nothing for plain HTTP, a browser session for rendered sources) when `work` settles.
 */
export type PageFetchScope = <T>(work: (fetchPage: PageFetcher) => Promise<T>) => Promise<T>;

export class PaginatedHtmlAdapter implements SourceAdapter {
  readonly kind = "paginated_html";

  constructor(
    private readonly source: PaginatedSourceConfig,
    private readonly fetchScope: PageFetchScope,
    private readonly context: AdapterContext
  ) {}

  get sourceId(): string {
    return this.source.id;
  }

  async run(): Promise<AdapterResult> {
    const { source, context } = this;
    const logger = context.logger;
    const metrics = zeroMetrics();
    const collector = new RecordCollector(source, context, metrics);
    let termination: Termination = "completed";

    logger.info("source_started", { source_id: source.id, search_url: source.search_url, max_pages: source.max_pages });

    await this.fetchScope(async (fetchPage) => {
      for (let page = 1; page <= source.max_pages; page += 1) {
        if (page > 1) {
          await context.pace();
        }

        const url = paginationUrl(source.search_url, page, source.pagination);
        let html: string;
        try {
          html = await withRetry(`${source.id} page ${page}`, () => fetchPage(url), { logger });
        } catch (error) {
          if (!(error instanceof FetchError)) {
            throw error;
          }
          metrics.fetch_failures += 1;
          termination = "fetch_failed";
          logger.warn("page_fetch_failed", { source_id: source.id, page, url, status: error.status, error: errorMessage(error) });
          return;
        }
        metrics.pages_fetched += 1;

        if (page === 1 && context.diagnostics) {
          await context.diagnostics(source.id, html);
        }

        const extraction = extractCards(html, url, source.selectors, source.required_fields);
        if (extraction.invalidSelectors.length > 0) {
          logger.warn("selectors_invalid", { source_id: source.id, page, selectors: extraction.invalidSelectors });
        }
        if (extraction.cardsFound === 0) {
          termination = "end_of_results";
          logger.info("pagination_exhausted", { source_id: source.id, page });
          return;
        }

        metrics.cards_seen += extraction.cardsFound;
        metrics.cards_skipped += extraction.malformed.length;
        for (const failure of extraction.malformed) {
          logger.warn("card_skipped", {
            source_id: source.id,
            page,
            field: failure.field,
            tried_selectors: failure.triedSelectors
          });
        }

        const before = metrics.records_emitted;
        for (const listing of extraction.listings) {
          collector.offer(listing);
        }

        logger.info("page_processed", {
          source_id: source.id,
          page,
          card_selector: extraction.cardSelector,
          invalid_selectors: extraction.invalidSelectors,
          cards: extraction.cardsFound,
          records: metrics.records_emitted - before
        });
      }
    });

    logger.info("source_completed", { source_id: source.id, termination, records: collector.records.length, metrics });
    return { source_id: source.id, records: collector.records, metrics, termination };
  }
}
