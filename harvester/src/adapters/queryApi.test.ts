import assert from "node:assert/strict";
import test from "node:test";
import { z } from "zod";
import { BrowserLauncher, BrowserSession } from "../lib/browser";
import { TtlCache, hours } from "../lib/cache";
import { FetchError } from "../lib/errors";
import { silentLogger } from "../lib/logger";
import { QueryApiSourceConfig } from "../types";
import { GraphQLRequest, GraphQLTransport, QueryApiAdapter } from "./queryApi";
import { createHarness } from "./testSupport";

const source: QueryApiSourceConfig = {
  id: "panda",
  kind: "query_api",
  source_label: "panda.example.com",
  enabled: true,
  relevance_filter: false,
  endpoint: "https://api.example.com/gql",
  search_term: "coffee",
  targets: ["lahore", "karachi"],
  discovery_url_template: "https://panda.example.com/city/{target}",
  vendor_link: { primary: 'a[href*="/darkstore/"]', alternatives: [] },
  vendor_id_pattern: "/darkstore/([a-z0-9]{4})",
  product_url_template: "https://panda.example.com/darkstore/{vendor}/product/{id}",
  discovery_ttl_hours: 168,
  listing_ttl_hours: 24,
  client_name: "web"
};

const cityPages: Record<string, string> = {
  "https://panda.example.com/city/lahore":
    '<html><body><a href="/darkstore/ab12/pandamart-lahore">Mart</a><a href="/darkstore/ab12/other">Mart again</a><a href="/restaurant/zz99">Food</a></body></html>',
  "https://panda.example.com/city/karachi": '<html><body><a href="/darkstore/cd34/pandamart-karachi">Mart</a></body></html>'
};

const searchResponses: Record<string, unknown> = {
  ab12: {
    data: {
      vendor: {
        searchProducts: [
          {
            id: 98765,
            name: "Nescafe Classic 100g",
            imageUrl: "https://img.example.com/1.jpg",
            price: { value: 650 },
            discountedPrice: { value: 590 }
          },
          { id: "555", name: "Lavazza Oro 250g", price: { value: 2150 }, discountedPrice: { value: 0 } }
        ]
      }
    }
  },
  cd34: {
    data: {
      vendor: {
        searchProducts: [{ id: "777", name: "Tapal Instant Coffee 50g", price: { value: 480 }, discountedPrice: null }]
      }
    }
  }
};

interface FakeBrowser {
  launch: BrowserLauncher;
  launches: () => number;
  closed: () => number;
}

function fakeBrowser(pages: Record<string, string>, launchError?: Error): FakeBrowser {
  let launches = 0;
  let closed = 0;
  const launch: BrowserLauncher = async () => {
    launches += 1;
    if (launchError) {
      throw launchError;
    }
    let current = "";
    const session: BrowserSession = {
      goto: async (url) => {
        current = url;
      },
      content: async () => pages[current] ?? "<html><body></body></html>",
      scrollToBottom: async () => undefined,
      pageHeight: async () => 0,
      close: async () => {
        closed += 1;
      }
    };
    return session;
  };
  return { launch, launches: () => launches, closed: () => closed };
}

interface FakeApi {
  transport: GraphQLTransport;
  requests: GraphQLRequest[];
}

function fakeApi(responses: Record<string, unknown | Error>): FakeApi {
  const requests: GraphQLRequest[] = [];
  const transport: GraphQLTransport = async (_endpoint, request) => {
    requests.push(request);
    const response = responses[request.variables.vendorId];
    if (response instanceof Error) {
      throw response;
    }
    return response;
  };
  return { transport, requests };
}

function memoryCache(): TtlCache {
  return new TtlCache(null, silentLogger(), () => Date.parse("2026-03-01T10:00:00.000Z"));
}

test("vendors are discovered per target and each vendor is searched once", async () => {
  const browser = fakeBrowser(cityPages);
  const api = fakeApi(searchResponses);
  const harness = createHarness();

  const adapter = new QueryApiAdapter(
    source,
    { cache: memoryCache(), transport: api.transport, launchBrowser: browser.launch, query: "query vendorSearchProduct { id }" },
    harness.context
  );
  const result = await adapter.run();

  assert.equal(result.termination, "completed");
  assert.deepEqual(
    result.records.map((record) => [record.name, record.price, record.source]),
    [
      ["Nescafe Classic 100g", 590, "panda.example.com (lahore)"],
      ["Lavazza Oro 250g", 2150, "panda.example.com (lahore)"],
      ["Tapal Instant Coffee 50g", 480, "panda.example.com (karachi)"]
    ]
  );
  assert.equal(result.records[0].id, "panda-example-com-lahore-98765");
  assert.equal(result.records[0].product_url, "https://panda.example.com/darkstore/ab12/product/98765");
  assert.equal(result.records[0].image_url, "https://img.example.com/1.jpg");
  assert.deepEqual(api.requests[0], {
    operationName: "vendorSearchProduct",
    query: "query vendorSearchProduct { id }",
    variables: { clientName: "web", vendorId: "ab12", sortOrder: "PRICE_ASC", query: "coffee" }
  });
  assert.equal(api.requests.length, 2);
  assert.equal(result.metrics.vendors_discovered, 2);
  assert.equal(result.metrics.cache_misses, 4);
  assert.equal(result.metrics.cache_hits, 0);
  assert.equal(result.metrics.pages_fetched, 2);
  assert.equal(browser.launches(), 1);
  assert.equal(browser.closed(), 1);
  // karachi discovery and both vendor searches wait; the first navigation does not.
  assert.equal(harness.paces(), 3);
});

test("a fully cached run starts no browser and makes no api call", async () => {
  const cache = memoryCache();
  await cache.put("discovery:panda:lahore", [{ vendor_id: "ab12", target: "lahore" }], hours(1));
  await cache.put(
    "listings:panda:ab12",
    [{ external_id: "1", name: "Nescafe Gold 95g", price: 1100, product_url: "https://panda.example.com/darkstore/ab12/product/1" }],
    hours(1)
  );
  const browser = fakeBrowser({}, new FetchError("browser://launch", "should not launch"));
  const api = fakeApi({});
  const harness = createHarness();

  const result = await new QueryApiAdapter(
    { ...source, targets: ["lahore"] },
    { cache, transport: api.transport, launchBrowser: browser.launch, query: "q" },
    harness.context
  ).run();

  assert.equal(browser.launches(), 0);
  assert.equal(api.requests.length, 0);
  assert.equal(result.metrics.cache_hits, 2);
  assert.equal(result.metrics.cache_misses, 0);
  assert.equal(result.metrics.pages_fetched, 0);
  assert.deepEqual(
    result.records.map((record) => record.name),
    ["Nescafe Gold 95g"]
  );
});

test("a vendor that fails after one retry is skipped and not cached", async () => {
  const cache = memoryCache();
  const api = fakeApi({ ...searchResponses, ab12: new FetchError("https://api.example.com/gql", "HTTP 503", 503) });
  const harness = createHarness();

  const result = await new QueryApiAdapter(
    source,
    { cache, transport: api.transport, launchBrowser: fakeBrowser(cityPages).launch, query: "q" },
    harness.context
  ).run();

  assert.equal(result.termination, "completed");
  assert.equal(result.metrics.fetch_failures, 1);
  assert.deepEqual(
    api.requests.map((request) => request.variables.vendorId),
    ["ab12", "ab12", "cd34"]
  );
  assert.deepEqual(
    result.records.map((record) => record.name),
    ["Tapal Instant Coffee 50g"]
  );
  assert.equal(await cache.get("listings:panda:ab12", z.array(z.unknown())), undefined);
});

test("a response without the expected shape counts as a failed fetch", async () => {
  const api = fakeApi({ ab12: { errors: [{ message: "vendor not available" }] } });
  const harness = createHarness();

  const result = await new QueryApiAdapter(
    { ...source, targets: ["lahore"] },
    { cache: memoryCache(), transport: api.transport, launchBrowser: fakeBrowser(cityPages).launch, query: "q" },
    harness.context
  ).run();

  assert.equal(result.records.length, 0);
  assert.equal(result.metrics.fetch_failures, 1);
  assert.equal(api.requests.length, 2);
});

test("discovery failing for every target ends the source as fetch_failed", async () => {
  const browser = fakeBrowser({}, new FetchError("browser://launch", "browser launch failed"));
  const api = fakeApi({});
  const harness = createHarness();

  const result = await new QueryApiAdapter(
    { ...source, targets: ["lahore"] },
    { cache: memoryCache(), transport: api.transport, launchBrowser: browser.launch, query: "q" },
    harness.context
  ).run();

  assert.equal(result.termination, "fetch_failed");
  assert.equal(result.metrics.fetch_failures, 1);
  assert.equal(result.metrics.vendors_discovered, 0);
  assert.equal(browser.launches(), 1);
  assert.equal(api.requests.length, 0);
});

test("a browser that fails to launch is not relaunched for later targets", async () => {
  const browser = fakeBrowser({}, new FetchError("browser://launch", "browser launch failed"));
  const api = fakeApi({});
  const harness = createHarness();

  const result = await new QueryApiAdapter(
    source,
    { cache: memoryCache(), transport: api.transport, launchBrowser: browser.launch, query: "q" },
    harness.context
  ).run();

  assert.equal(result.termination, "fetch_failed");
  assert.equal(result.metrics.fetch_failures, 2);
  assert.equal(browser.launches(), 1);
  assert.equal(browser.closed(), 0);
  assert.equal(harness.paces(), 0);
});

test("a target page with no vendor links is not cached", async () => {
  const cache = memoryCache();
  const harness = createHarness();

  const result = await new QueryApiAdapter(
    { ...source, targets: ["lahore"] },
    { cache, transport: fakeApi({}).transport, launchBrowser: fakeBrowser({}).launch, query: "q" },
    harness.context
  ).run();

  assert.equal(result.termination, "completed");
  assert.equal(result.metrics.vendors_discovered, 0);
  assert.equal(result.metrics.cache_misses, 1);
  assert.equal(await cache.get("discovery:panda:lahore", z.array(z.unknown())), undefined);
  assert.equal(await cache.size(), 0);
});
