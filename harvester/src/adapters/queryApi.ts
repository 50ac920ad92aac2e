import { z } from "zod";
import { BrowserLauncher, LazyBrowserSession } from "../lib/browser";
import { TtlCache, hours } from "../lib/cache";
import { FetchError, errorMessage } from "../lib/errors";
import { withRetry } from "../lib/retry";
import { parseHtml } from "../lib/selector";
import { fillTemplate, resolveListingUrl } from "../lib/url";
import { QueryApiSourceConfig, RawListing, RawListingSchema } from "../types";
import { RecordCollector } from "./collector";
import { AdapterContext, AdapterMetrics, AdapterResult, SourceAdapter, Termination, zeroMetrics } from "./types";

export interface GraphQLRequest {
  operationName: string;
  query: string;
  variables: Record<string, string>;
}

/** Sends one GraphQL request and returns the decoded JSON body. */
export type GraphQLTransport = (endpoint: string, request: GraphQLRequest) => Promise<unknown>;

export const VendorRefSchema = z.object({
  vendor_id: z.string().min(1),
  target: z.string().min(1)
});

export type VendorRef = z.infer<typeof VendorRefSchema>;

const VendorRefListSchema = z.array(VendorRefSchema);
const ListingListSchema = z.array(RawListingSchema);

const MoneySchema = z.object({ value: z.number() }).nullish();

const VendorSearchResponseSchema = z.object({
  data: z.object({
    vendor: z
      .object({
        searchProducts: z
          .array(
            z.object({
              id: z.union([z.string(), z.number()]),
              name: z.string().nullish(),
              imageUrl: z.string().nullish(),
              price: MoneySchema,
              discountedPrice: MoneySchema
            })
          )
          .nullish()
      })
      .nullish()
  })
});

export interface QueryApiDependencies {
  cache: TtlCache;
  transport: GraphQLTransport;
  launchBrowser: BrowserLauncher;
  /** GraphQL document sent for every vendor search. */
  query: string;
}

/**
 * Two phases: discover vendor ids per target (cached under `discovery:`), then search each
 * vendor's catalog (cached under `listings:`). A cache hit never touches the network.
 */
export class QueryApiAdapter implements SourceAdapter {
  readonly kind = "query_api";

  constructor(
    private readonly source: QueryApiSourceConfig,
    private readonly deps: QueryApiDependencies,
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
    const browser = new LazyBrowserSession(this.deps.launchBrowser, logger);
    let termination: Termination = "completed";
    // Discovery navigations and vendor searches share one pace; the first live call waits for nothing.
    let liveCalls = 0;
    const beforeLiveCall = async (): Promise<void> => {
      if (liveCalls > 0) {
        await context.pace();
      }
      liveCalls += 1;
    };

    logger.info("source_started", { source_id: source.id, endpoint: source.endpoint, targets: source.targets.length });

    try {
      const vendors = await this.discover(source.targets, browser, metrics, beforeLiveCall);
      metrics.vendors_discovered = vendors.length;
      if (vendors.length === 0 && metrics.fetch_failures > 0) {
        termination = "fetch_failed";
      }

      for (const vendor of vendors) {
        const listings = await this.fetchVendor(vendor, metrics, beforeLiveCall);
        if (!listings) {
          continue;
        }
        const label = `${source.source_label} (${vendor.target})`;
        metrics.cards_seen += listings.length;
        for (const listing of listings) {
          collector.offer(listing, label);
        }
      }
    } finally {
      await browser.close();
    }

    logger.info("source_completed", { source_id: source.id, termination, records: collector.records.length, metrics });
    return { source_id: source.id, records: collector.records, metrics, termination };
  }

  /**
   * Looks up vendor ids for every target. Once the browser has failed to launch, targets
   * missing from the cache fail straight away instead of waiting out a pace.
   * An empty discovery is not cached, so the next run looks again.
   */
  async discover(
    targets: readonly string[],
    browser: LazyBrowserSession,
    metrics: AdapterMetrics,
    beforeLiveCall: () => Promise<void>
  ): Promise<VendorRef[]> {
    const { source, context } = this;
    const vendors: VendorRef[] = [];
    const seen = new Set<string>();

    for (const target of targets) {
      const key = `discovery:${source.id}:${target.toLowerCase()}`;
      let found: VendorRef[];
      try {
        const lookup = await this.deps.cache.getOrLoad(key, VendorRefListSchema, hours(source.discovery_ttl_hours), async () => {
          if (!browser.unavailable) {
            await beforeLiveCall();
          }
          return this.discoverTarget(target, browser);
        });
        this.countLookup(lookup.hit, metrics);
        found = lookup.value;
        if (!lookup.hit && found.length === 0) {
          await this.deps.cache.evict(key);
        }
      } catch (error) {
        if (!(error instanceof FetchError)) {
          throw error;
        }
        metrics.fetch_failures += 1;
        context.logger.warn("vendor_discovery_failed", { source_id: source.id, target, error: errorMessage(error) });
        continue;
      }

      if (found.length === 0) {
        context.logger.warn("vendor_not_found", { source_id: source.id, target });
      }
      for (const vendor of found) {
        if (!seen.has(vendor.vendor_id)) {
          seen.add(vendor.vendor_id);
          vendors.push(vendor);
        }
      }
    }

    context.logger.info("vendor_discovery_completed", { source_id: source.id, vendors: vendors.length });
    return vendors;
  }

  private async discoverTarget(target: string, browser: LazyBrowserSession): Promise<VendorRef[]> {
    const { source, context } = this;
    const url = fillTemplate(source.discovery_url_template, { target });
    const pattern = new RegExp(source.vendor_id_pattern, "i");

    const html = await withRetry(
      `${source.id} discover ${target}`,
      async () => {
        const session = await browser.acquire();
        await session.goto(url);
        return session.content();
      },
      { logger: context.logger }
    );

    const { tree, resolver, root } = parseHtml(html);
    const resolution = resolver.resolveChain(root, source.vendor_link);
    if (resolution.invalidSelectors.length > 0) {
      context.logger.warn("selectors_invalid", { source_id: source.id, target, selectors: resolution.invalidSelectors });
    }
    const links = resolution.fragments;
    const ids: string[] = [];
    for (const link of links) {
      const href = resolveListingUrl(tree.attr(link, "href"), url);
      const match = href ? pattern.exec(new URL(href).pathname) : null;
      const vendorId = match?.[1];
      if (vendorId && !ids.includes(vendorId)) {
        ids.push(vendorId);
      }
    }

    context.logger.info("vendor_discovered", { source_id: source.id, target, vendor_ids: ids });
    return ids.map((vendorId) => ({ vendor_id: vendorId, target }));
  }

  /** Returns undefined when the vendor could not be fetched after one retry. */
  private async fetchVendor(vendor: VendorRef, metrics: AdapterMetrics, beforeLiveCall: () => Promise<void>): Promise<RawListing[] | undefined> {
    const { source, context } = this;
    try {
      const lookup = await this.deps.cache.getOrLoad(
        `listings:${source.id}:${vendor.vendor_id}`,
        ListingListSchema,
        hours(source.listing_ttl_hours),
        async () => {
          await beforeLiveCall();
          return withRetry(`${source.id} vendor ${vendor.vendor_id}`, () => this.searchVendor(vendor), { logger: context.logger });
        }
      );
      this.countLookup(lookup.hit, metrics);
      if (!lookup.hit) {
        metrics.pages_fetched += 1;
      }
      return lookup.value;
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      metrics.fetch_failures += 1;
      context.logger.warn("vendor_fetch_failed", {
        source_id: source.id,
        vendor_id: vendor.vendor_id,
        target: vendor.target,
        status: error.status,
        error: errorMessage(error)
      });
      return undefined;
    }
  }

  private async searchVendor(vendor: VendorRef): Promise<RawListing[]> {
    const { source } = this;
    const body = await this.deps.transport(source.endpoint, {
      operationName: "vendorSearchProduct",
      query: this.deps.query,
      variables: {
        clientName: source.client_name,
        vendorId: vendor.vendor_id,
        sortOrder: "PRICE_ASC",
        query: source.search_term
      }
    });

    const parsed = VendorSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(source.endpoint, `unexpected response shape for vendor ${vendor.vendor_id}`);
    }

    const products = parsed.data.data.vendor?.searchProducts ?? [];
    return products.map((product) => {
      const id = String(product.id);
      const regular = product.price?.value;
      const discounted = product.discountedPrice?.value;
      const price = discounted !== undefined && discounted > 0 ? discounted : regular;
      const name = product.name?.trim();
      const imageUrl = product.imageUrl?.trim();
      return {
        external_id: id,
        ...(name ? { name } : {}),
        ...(price !== undefined ? { price } : {}),
        ...(imageUrl ? { image_url: imageUrl } : {}),
        product_url: fillTemplate(source.product_url_template, { vendor: vendor.vendor_id, id })
      };
    });
  }

  private countLookup(hit: boolean, metrics: AdapterMetrics): void {
    if (hit) {
      metrics.cache_hits += 1;
    } else {
      metrics.cache_misses += 1;
    }
  }
}
