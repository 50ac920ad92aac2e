import assert from "node:assert/strict";
import test from "node:test";
import { z } from "zod";
import { FetchError } from "../lib/errors";
import { Logger } from "../lib/logger";
import { PaginatedSourceConfig } from "../types";
import { PageFetchScope, PaginatedHtmlAdapter } from "./paginated";
import { createHarness, listingPage, productCard } from "./testSupport";

const source: PaginatedSourceConfig = {
  id: "grocer",
  kind: "paginated_html",
  source_label: "grocer.example.com",
  enabled: true,
  relevance_filter: false,
  search_url: "https://grocer.example.com/search?q=coffee",
  max_pages: 5,
  pagination: "page_param",
  render: "http",
  selectors: {
    card: { primary: ".product", alternatives: [] },
    name: { primary: ".name", alternatives: [] },
    price: { primary: ".price", alternatives: [] },
    url: { primary: "a.link", alternatives: [] },
    url_attribute: "href",
    image_attribute: "src"
  },
  required_fields: []
};

interface FakeSite {
  scope: PageFetchScope;
  requested: string[];
  released: () => boolean;
}

function fakeSite(pages: Record<string, string | Error>): FakeSite {
  const requested: string[] = [];
  let released = false;
  const scope: PageFetchScope = async (work) => {
    try {
      return await work(async (url) => {
        requested.push(url);
        const page = pages[url];
        if (page === undefined) {
          return listingPage([]);
        }
        if (page instanceof Error) {
          throw page;
        }
        return page;
      });
    } finally {
      released = true;
    }
  };
  return { scope, requested, released: () => released };
}

test("a first page with zero cards stops pagination with no records", async () => {
  const site = fakeSite({ "https://grocer.example.com/search?q=coffee": "<html><body><p>No results</p></body></html>" });
  const harness = createHarness();

  const result = await new PaginatedHtmlAdapter(source, site.scope, harness.context).run();

  assert.equal(result.records.length, 0);
  assert.equal(result.termination, "end_of_results");
  assert.deepEqual(site.requested, ["https://grocer.example.com/search?q=coffee"]);
  assert.equal(harness.paces(), 0);
  assert.equal(site.released(), true);
});

test("pages are walked in order until one comes back empty", async () => {
  const site = fakeSite({
    "https://grocer.example.com/search?q=coffee": listingPage([
      productCard("Nescafe Classic 100g", "Rs. 650", "/p/1"),
      productCard("Lavazza Oro 250g", "Rs. 2,150", "/p/2")
    ]),
    "https://grocer.example.com/search?q=coffee&page=2": listingPage([
      productCard("Lavazza Oro 250g", "Rs. 2,150", "/p/2"),
      productCard("Tapal Instant Coffee 50g", "Rs. 480", "/p/3")
    ])
  });
  const harness = createHarness();

  const result = await new PaginatedHtmlAdapter(source, site.scope, harness.context).run();

  assert.deepEqual(
    result.records.map((record) => record.name),
    ["Nescafe Classic 100g", "Lavazza Oro 250g", "Tapal Instant Coffee 50g"]
  );
  assert.equal(result.termination, "end_of_results");
  assert.deepEqual(site.requested, [
    "https://grocer.example.com/search?q=coffee",
    "https://grocer.example.com/search?q=coffee&page=2",
    "https://grocer.example.com/search?q=coffee&page=3"
  ]);
  assert.equal(harness.paces(), 2);
  assert.equal(result.metrics.pages_fetched, 3);
  assert.equal(result.metrics.cards_seen, 4);
  assert.equal(result.metrics.duplicates_skipped, 1);
  assert.equal(result.metrics.records_emitted, 3);
  assert.equal(harness.observed.length, 3);
  assert.equal(result.records[0].product_url, "https://grocer.example.com/p/1");
  assert.equal(result.records[2].source, "grocer.example.com");
});

test("a page that fails twice ends the source with the records collected so far", async () => {
  const site = fakeSite({
    "https://grocer.example.com/search?q=coffee": listingPage([productCard("Nescafe Classic 100g", "Rs. 650", "/p/1")]),
    "https://grocer.example.com/search?q=coffee&page=2": new FetchError("https://grocer.example.com/search?q=coffee&page=2", "timed out")
  });
  const harness = createHarness();

  const result = await new PaginatedHtmlAdapter(source, site.scope, harness.context).run();

  assert.equal(result.termination, "fetch_failed");
  assert.equal(result.records.length, 1);
  assert.equal(result.metrics.fetch_failures, 1);
  assert.deepEqual(site.requested, [
    "https://grocer.example.com/search?q=coffee",
    "https://grocer.example.com/search?q=coffee&page=2",
    "https://grocer.example.com/search?q=coffee&page=2"
  ]);
  assert.equal(site.released(), true);
});

test("max_pages caps the walk and only the first page is snapshotted", async () => {
  const cards = listingPage([productCard("Nescafe Gold 95g", "Rs. 1,100", "/p/9")]);
  const site = fakeSite({
    "https://grocer.example.com/search?q=coffee": cards,
    "https://grocer.example.com/search?q=coffee&page=2": cards
  });
  const harness = createHarness();

  const result = await new PaginatedHtmlAdapter({ ...source, max_pages: 2 }, site.scope, harness.context).run();

  assert.equal(result.termination, "completed");
  assert.equal(result.records.length, 1);
  assert.deepEqual(harness.snapshots, [{ sourceId: "grocer", html: cards }]);
});

test("malformed cards are skipped without stopping the page", async () => {
  const site = fakeSite({
    "https://grocer.example.com/search?q=coffee": listingPage([
      '<div class="product"><span class="badge">Sale</span></div>',
      productCard("Tapal Instant Coffee 50g", "Rs. 480", "/p/3")
    ])
  });
  const harness = createHarness();

  const result = await new PaginatedHtmlAdapter(source, site.scope, harness.context).run();

  assert.equal(result.metrics.cards_skipped, 1);
  assert.deepEqual(
    result.records.map((record) => record.name),
    ["Tapal Instant Coffee 50g"]
  );
});

test("the relevance filter drops accessories when enabled", async () => {
  const site = fakeSite({
    "https://grocer.example.com/search?q=coffee": listingPage([
      productCard("Ceramic Coffee Mug", "Rs. 900", "/p/mug"),
      productCard("Nescafe Classic 100g", "Rs. 650", "/p/1")
    ])
  });
  const harness = createHarness();

  const result = await new PaginatedHtmlAdapter({ ...source, relevance_filter: true }, site.scope, harness.context).run();

  assert.equal(result.metrics.filtered, 1);
  assert.deepEqual(
    result.records.map((record) => record.name),
    ["Nescafe Classic 100g"]
  );
});

test("selectors that fail to parse are logged as a warning", async () => {
  const site = fakeSite({
    "https://grocer.example.com/search?q=coffee": listingPage([productCard("Nescafe Classic 100g", "Rs. 650", "/p/1")])
  });
  const harness = createHarness();
  const lines: string[] = [];
  const context = { ...harness.context, logger: new Logger("test", "warn", (_level, line) => lines.push(line)) };
  const broken: PaginatedSourceConfig = {
    ...source,
    max_pages: 1,
    selectors: { ...source.selectors, card: { primary: "div[", alternatives: [".product"] } }
  };

  const result = await new PaginatedHtmlAdapter(broken, site.scope, context).run();

  assert.equal(result.records.length, 1);
  const LogLine = z.object({ message: z.string(), metadata: z.record(z.unknown()) });
  const warnings = lines.map((line) => LogLine.parse(JSON.parse(line)));
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0].message, "selectors_invalid");
  assert.deepEqual(warnings[0].metadata, { source_id: "grocer", page: 1, selectors: ["div["] });
});
