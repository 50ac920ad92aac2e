import { BrowserLauncher, withBrowserSession } from "../lib/browser";
import { TtlCache } from "../lib/cache";
import { FetchRuntimeConfig, fetchText, postJson } from "../lib/http";
import { PaginatedSourceConfig, SourceConfig } from "../types";
import { InfiniteScrollAdapter } from "./infiniteScroll";
import { PageFetchScope, PaginatedHtmlAdapter } from "./paginated";
import { GraphQLTransport, QueryApiAdapter } from "./queryApi";
import { AdapterContext, SourceAdapter } from "./types";

export interface AdapterDependencies {
  fetchRuntime: FetchRuntimeConfig;
  launchBrowser: BrowserLauncher;
  cache: TtlCache;
  vendorQuery: string;
  transport?: GraphQLTransport;
}

export function pageFetchScope(source: PaginatedSourceConfig, deps: AdapterDependencies, context: AdapterContext): PageFetchScope {
  if (source.render === "browser") {
    return (work) =>
      withBrowserSession(deps.launchBrowser, context.logger, (session) =>
        work(async (url) => {
          await session.goto(url);
          return session.content();
        })
      );
  }
  return (work) => work((url) => fetchText(url, deps.fetchRuntime));
}

export function createAdapter(source: SourceConfig, deps: AdapterDependencies, context: AdapterContext): SourceAdapter {
  switch (source.kind) {
    case "paginated_html":
      return new PaginatedHtmlAdapter(source, pageFetchScope(source, deps, context), context);
    case "infinite_scroll":
      return new InfiniteScrollAdapter(source, deps.launchBrowser, context);
    case "query_api":
      return new QueryApiAdapter(
        source,
        {
          cache: deps.cache,
          transport: deps.transport ?? ((endpoint, request) => postJson(endpoint, request, deps.fetchRuntime)),
          launchBrowser: deps.launchBrowser,
          query: deps.vendorQuery
        },
        context
      );
    default: {
      const exhaustive: never = source;
      throw new Error(`unsupported source kind: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export type { AdapterContext, AdapterMetrics, AdapterResult, SourceAdapter, Termination } from "./types";
