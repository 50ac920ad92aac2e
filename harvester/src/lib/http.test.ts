import assert from "node:assert/strict";
import http from "node:http";
import test from "node:test";
import { FetchError } from "./errors";
import { fetchText, postJson } from "./http";

const runtime = { timeoutMs: 200, userAgent: "catalog-harvester-test" };

async function withServer(handler: http.RequestListener, work: (baseUrl: string) => Promise<void>): Promise<void> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server did not bind a port");
  }
  try {
    await work(`http://127.0.0.1:${address.port}`);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

test("fetchText returns the body and sends the configured user agent", async () => {
  let userAgent: string | undefined;
  await withServer(
    (request, response) => {
      userAgent = request.headers["user-agent"];
      response.writeHead(200, { "content-type": "text/html" });
      response.end("<html><body>ok</body></html>");
    },
    async (baseUrl) => {
      assert.equal(await fetchText(`${baseUrl}/search`, runtime), "<html><body>ok</body></html>");
    }
  );
  assert.equal(userAgent, "catalog-harvester-test");
});

test("a body that stalls after the headers times out", async () => {
  await withServer(
    (_request, response) => {
      response.writeHead(200, { "content-type": "text/html" });
      response.write("<html><body>");
    },
    async (baseUrl) => {
      await assert.rejects(
        fetchText(`${baseUrl}/slow`, runtime),
        (error: unknown) =>
          error instanceof FetchError && error.status === 200 && error.message === "body read failed: timed out after 200ms"
      );
    }
  );
});

test("a server that never answers times out", async () => {
  await withServer(
    () => undefined,
    async (baseUrl) => {
      await assert.rejects(
        fetchText(`${baseUrl}/silent`, runtime),
        (error: unknown) => error instanceof FetchError && error.status === undefined && error.message === "timed out after 200ms"
      );
    }
  );
});

test("non-ok statuses and invalid JSON become fetch errors", async () => {
  await withServer(
    (request, response) => {
      if (request.url === "/down") {
        response.writeHead(503);
        response.end("busy");
        return;
      }
      response.writeHead(200, { "content-type": "application/json" });
      response.end("{not json");
    },
    async (baseUrl) => {
      await assert.rejects(
        fetchText(`${baseUrl}/down`, runtime),
        (error: unknown) => error instanceof FetchError && error.status === 503
      );
      await assert.rejects(
        postJson(`${baseUrl}/gql`, { query: "{ id }" }, runtime),
        (error: unknown) => error instanceof FetchError && error.message === "response is not valid JSON"
      );
    }
  );
});
