import { readFileSync } from "node:fs";
import path from "node:path";
import express, { NextFunction, Request, Response } from "express";
import { createAdapter } from "./adapters";
import { config } from "./config";
import { createBrowserLauncher } from "./lib/browser";
import { TtlCache } from "./lib/cache";
import { loadLexicon } from "./lib/lexicon";
import { Logger } from "./lib/logger";
import { createPacer, sleep } from "./lib/retry";
import { loadSources } from "./lib/sources";
import { StatusRegistry } from "./lib/status";
import { createDiagnosticsWriter } from "./pipeline/output";
import { HarvestService } from "./pipeline/harvester";
import { createHarvestRouter } from "./routes/harvestRoutes";

const app = express();
app.use(express.json({ limit: "256kb" }));
const rootLogger = new Logger("harvester", config.LOG_LEVEL);
const logger = rootLogger.child("server");

const sources = loadSources(path.resolve(config.SOURCES_FILE));
const lexicon = loadLexicon(path.resolve(config.LEXICON_FILE));
const vendorQuery = readFileSync(path.resolve(config.VENDOR_QUERY_FILE), "utf8");
const cache = new TtlCache(path.resolve(config.CACHE_FILE), rootLogger.child("cache"));
const fetchRuntime = { timeoutMs: config.REQUEST_TIMEOUT_MS, userAgent: config.USER_AGENT };
const launchBrowser = createBrowserLauncher({
  headless: config.BROWSER_HEADLESS,
  ...(config.BROWSER_EXECUTABLE_PATH ? { executablePath: config.BROWSER_EXECUTABLE_PATH } : {}),
  userAgent: config.USER_AGENT,
  timeoutMs: config.REQUEST_TIMEOUT_MS
});

const harvest = new HarvestService(
  {
    sources,
    lexicon,
    cache,
    createAdapter: (source, context) => createAdapter(source, { fetchRuntime, launchBrowser, cache, vendorQuery }, context),
    logger: rootLogger,
    pace: createPacer({ minMs: config.REQUEST_DELAY_MIN_MS, maxMs: config.REQUEST_DELAY_MAX_MS }),
    sleep,
    outputFile: path.resolve(config.OUTPUT_FILE),
    ...(config.DIAGNOSTICS_DIR
      ? { diagnostics: createDiagnosticsWriter(path.resolve(config.DIAGNOSTICS_DIR), rootLogger.child("diagnostics")) }
      : {})
  },
  new StatusRegistry()
);

app.use((request: Request, response: Response, next: NextFunction) => {
  const started = Date.now();
  response.on("finish", () => {
    logger.info("http_request", {
      method: request.method,
      path: request.path,
      status_code: response.statusCode,
      duration_ms: Date.now() - started
    });
  });
  next();
});

app.use("/", createHarvestRouter(harvest, rootLogger.child("routes")));

app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
  const message = error instanceof Error ? error.message : "internal server error";
  logger.error("unhandled_error", { error });
  response.status(500).json({ error: message });
});

const server = app.listen(config.PORT, () => {
  logger.info("server_started", {
    port: config.PORT,
    log_level: config.LOG_LEVEL,
    sources: sources.map((source) => `${source.id}:${source.kind}${source.enabled ? "" : " (disabled)"}`),
    cache_file: config.CACHE_FILE,
    output_file: config.OUTPUT_FILE,
    diagnostics: config.DIAGNOSTICS_DIR ? "enabled" : "disabled",
    request_delay_ms: [config.REQUEST_DELAY_MIN_MS, config.REQUEST_DELAY_MAX_MS],
    browser_headless: config.BROWSER_HEADLESS
  });
});

const shutdown = async (): Promise<void> => {
  logger.info("shutdown_started");
  server.close();
  await harvest.whenIdle();
  logger.info("shutdown_completed");
};

process.on("SIGINT", () => {
  void shutdown();
});

process.on("SIGTERM", () => {
  void shutdown();
});
