import { BrowserLauncher, BrowserSession, withBrowserSession } from "../lib/browser";
import { FetchError, errorMessage } from "../lib/errors";
import { withRetry } from "../lib/retry";
import { InfiniteScrollSourceConfig } from "../types";
import { extractCards } from "./cards";
import { RecordCollector } from "./collector";
import { AdapterContext, AdapterMetrics, AdapterResult, SourceAdapter, Termination, zeroMetrics } from "./types";

/**
 * Scrolling: about to trigger a scroll-to-bottom.
 * Settling: scrolled, waiting for new content before comparing heights.
 * Exhausted: terminal, with the reason the loop stopped.
 */
export type ScrollState =
  | { phase: "scrolling"; cycle: number; stableCycles: number }
  | { phase: "settling"; cycle: number; stableCycles: number; heightBefore: number }
  | { phase: "exhausted"; reason: Extract<Termination, "exhausted" | "iteration_cap"> };

export class InfiniteScrollAdapter implements SourceAdapter {
  readonly kind = "infinite_scroll";

  constructor(
    private readonly source: InfiniteScrollSourceConfig,
    private readonly launchBrowser: BrowserLauncher,
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

    logger.info("source_started", {
      source_id: source.id,
      search_url: source.search_url,
      max_scroll_iterations: source.max_scroll_iterations,
      stable_cycles: source.stable_cycles
    });

    let termination: Termination;
    try {
      termination = await withBrowserSession(this.launchBrowser, logger, (session) => this.scrollUntilExhausted(session, collector, metrics));
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      metrics.fetch_failures += 1;
      logger.warn("browser_unavailable", { source_id: source.id, error: errorMessage(error) });
      termination = "fetch_failed";
    }

    logger.info("source_completed", { source_id: source.id, termination, records: collector.records.length, metrics });
    return { source_id: source.id, records: collector.records, metrics, termination };
  }

  private async scrollUntilExhausted(session: BrowserSession, collector: RecordCollector, metrics: AdapterMetrics): Promise<Termination> {
    const { source, context } = this;
    const logger = context.logger;

    let initialHtml: string;
    try {
      initialHtml = await withRetry(
        `${source.id} initial load`,
        async () => {
          await session.goto(source.search_url);
          return session.content();
        },
        { logger }
      );
    } catch (error) {
      return this.fetchFailed(error, metrics, 0);
    }
    metrics.pages_fetched += 1;
    if (context.diagnostics) {
      await context.diagnostics(source.id, initialHtml);
    }
    this.harvest(initialHtml, collector, metrics, 0);

    let state: ScrollState = { phase: "scrolling", cycle: 0, stableCycles: 0 };
    while (state.phase !== "exhausted") {
      try {
        state = await this.step(state, session, collector, metrics);
      } catch (error) {
        return this.fetchFailed(error, metrics, metrics.scroll_cycles);
      }
    }

    logger.info("scroll_exhausted", { source_id: source.id, reason: state.reason, cycles: metrics.scroll_cycles });
    return state.reason;
  }

  private async step(
    state: Exclude<ScrollState, { phase: "exhausted" }>,
    session: BrowserSession,
    collector: RecordCollector,
    metrics: AdapterMetrics
  ): Promise<ScrollState> {
    const { source, context } = this;

    if (state.phase === "scrolling") {
      if (state.cycle >= source.max_scroll_iterations) {
        return { phase: "exhausted", reason: "iteration_cap" };
      }
      const heightBefore = await withRetry(
        `${source.id} scroll ${state.cycle + 1}`,
        async () => {
          const height = await session.pageHeight();
          await session.scrollToBottom();
          return height;
        },
        { logger: context.logger }
      );
      metrics.scroll_cycles += 1;
      return { phase: "settling", cycle: state.cycle + 1, stableCycles: state.stableCycles, heightBefore };
    }

    await context.sleep(source.settle_ms);
    const { heightAfter, html } = await withRetry(
      `${source.id} settle ${state.cycle}`,
      async () => ({ heightAfter: await session.pageHeight(), html: await session.content() }),
      { logger: context.logger }
    );
    const emitted = this.harvest(html, collector, metrics, state.cycle);
    const stableCycles = heightAfter === state.heightBefore ? state.stableCycles + 1 : 0;

    context.logger.debug("scroll_cycle", {
      source_id: source.id,
      cycle: state.cycle,
      height_before: state.heightBefore,
      height_after: heightAfter,
      new_records: emitted,
      stable_cycles: stableCycles
    });

    if (stableCycles >= source.stable_cycles) {
      return { phase: "exhausted", reason: "exhausted" };
    }
    return { phase: "scrolling", cycle: state.cycle, stableCycles };
  }

  /** Normalizes cards not seen earlier in the run; returns how many records it emitted. */
  private harvest(html: string, collector: RecordCollector, metrics: AdapterMetrics, cycle: number): number {
    const { source, context } = this;
    const extraction = extractCards(html, source.search_url, source.selectors, source.required_fields);
    if (extraction.invalidSelectors.length > 0) {
      context.logger.warn("selectors_invalid", { source_id: source.id, cycle, selectors: extraction.invalidSelectors });
    }
    metrics.cards_seen += extraction.cardsFound;
    metrics.cards_skipped += extraction.malformed.length;
    for (const failure of extraction.malformed) {
      context.logger.warn("card_skipped", { source_id: source.id, cycle, field: failure.field, tried_selectors: failure.triedSelectors });
    }

    let emitted = 0;
    for (const listing of extraction.listings) {
      if (collector.offer(listing) === "emitted") {
        emitted += 1;
      }
    }
    return emitted;
  }

  private fetchFailed(error: unknown, metrics: AdapterMetrics, cycle: number): Termination {
    if (!(error instanceof FetchError)) {
      throw error;
    }
    metrics.fetch_failures += 1;
    this.context.logger.warn("scroll_fetch_failed", { source_id: this.source.id, cycle, url: error.url, error: errorMessage(error) });
    return "fetch_failed";
  }
}
