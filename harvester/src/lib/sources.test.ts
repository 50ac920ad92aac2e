import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import { loadSources, parseSources } from "./sources";

const paginated = {
  id: "grocer",
  kind: "paginated_html",
  source_label: "grocer.example.com",
  search_url: "https://grocer.example.com/search?q=coffee",
  selectors: {
    card: { primary: ".product" },
    name: { primary: ".name", alternatives: ["h3"] },
    price: { primary: ".price" }
  }
};

test("parseSources fills defaults and freezes the result", () => {
  const [source] = parseSources({ sources: [paginated] });
  assert.equal(source.kind, "paginated_html");
  if (source.kind !== "paginated_html") {
    return;
  }
  assert.equal(source.max_pages, 5);
  assert.equal(source.pagination, "page_param");
  assert.equal(source.render, "http");
  assert.equal(source.enabled, true);
  assert.deepEqual(source.selectors.card.alternatives, []);
  assert.equal(source.selectors.url_attribute, "href");
  assert.equal(Object.isFrozen(source), true);
  assert.equal(Object.isFrozen(source.selectors.name.alternatives), true);
});

test("parseSources rejects unknown kinds and duplicate ids", () => {
  assert.throws(() => parseSources({ sources: [{ ...paginated, kind: "rss" }] }));
  assert.throws(() => parseSources({ sources: [paginated, paginated] }), /duplicate source id: grocer/);
});

const queryApi = {
  id: "api",
  kind: "query_api",
  source_label: "api.example.com",
  endpoint: "https://api.example.com/graphql",
  search_term: "coffee",
  targets: ["north"],
  discovery_url_template: "https://api.example.com/city/{target}",
  vendor_link: { primary: "a.vendor" },
  vendor_id_pattern: "/v/([a-z0-9]+)",
  product_url_template: "https://api.example.com/v/{vendor}/p/{id}"
};

test("parseSources requires the target placeholder in discovery templates", () => {
  assert.equal(parseSources({ sources: [queryApi] }).length, 1);
  assert.throws(
    () => parseSources({ sources: [{ ...queryApi, discovery_url_template: "https://api.example.com/city" }] }),
    /discovery_url_template must contain \{target\}/
  );
});

test("parseSources rejects vendor id patterns that do not compile or capture nothing", () => {
  assert.throws(
    () => parseSources({ sources: [{ ...queryApi, vendor_id_pattern: "([a-z" }] }),
    /vendor_id_pattern is not a valid regular expression/
  );
  assert.throws(
    () => parseSources({ sources: [{ ...queryApi, vendor_id_pattern: "/v/[a-z0-9]+" }] }),
    /vendor_id_pattern needs a capture group/
  );
  assert.throws(
    () => parseSources({ sources: [{ ...queryApi, vendor_id_pattern: "/v/(?:[a-z0-9]+)" }] }),
    /vendor_id_pattern needs a capture group/
  );
});

test("the shipped sources file is valid", () => {
  const sources = loadSources(path.resolve(__dirname, "../../config/sources.json"));
  assert.deepEqual(
    sources.map((source) => source.kind),
    ["paginated_html", "paginated_html", "infinite_scroll", "query_api"]
  );
});
