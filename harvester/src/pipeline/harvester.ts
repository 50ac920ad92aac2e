import { AdapterContext, DiagnosticsWriter, SourceAdapter } from "../adapters/types";
import { AggregateSnapshot, Aggregator } from "../lib/aggregate";
import { TtlCache } from "../lib/cache";
import { errorMessage } from "../lib/errors";
import { CompiledLexicon } from "../lib/lexicon";
import { Logger } from "../lib/logger";
import { UNKNOWN_BRAND } from "../lib/normalize";
import { Sleep } from "../lib/retry";
import { SourceStatus, StatusRegistry } from "../lib/status";
import { CanonicalProductRecord, SourceConfig } from "../types";
import { writeRecordDocument } from "./output";

export type RunRejection = "run_active" | "unknown_source" | "no_sources";

export class RunRejectedError extends Error {
  constructor(
    readonly reason: RunRejection,
    message: string
  ) {
    super(message);
    this.name = "RunRejectedError";
  }
}

export type AdapterFactory = (source: SourceConfig, context: AdapterContext) => SourceAdapter;

export interface HarvestDependencies {
  sources: readonly SourceConfig[];
  lexicon: CompiledLexicon;
  cache: TtlCache;
  createAdapter: AdapterFactory;
  logger: Logger;
  pace: () => Promise<void>;
  sleep: Sleep;
  now?: () => Date;
  /** Where the record document goes after each run; null keeps it in memory only. */
  outputFile: string | null;
  diagnostics?: DiagnosticsWriter;
}

export interface RunMetadata {
  successful_sources: string[];
  failed_sources: string[];
  total_records: number;
  total_brands: number;
  collected_at: string;
}

export interface RunSummary {
  run_id: number;
  state: "running" | "completed";
  source_ids: string[];
  started_at: string;
  finished_at?: string;
  metadata?: RunMetadata;
}

interface CompletedRun {
  records: CanonicalProductRecord[];
  bySource: Map<string, CanonicalProductRecord[]>;
  stats: AggregateSnapshot;
  metadata: RunMetadata;
}

/**
 * Runs the configured sources one after another and keeps the result of the last run.
 * A source that throws is marked failed; the remaining sources still run.
 */
export class HarvestService {
  private activeRun: Promise<void> | null = null;
  private runCounter = 0;
  private currentRun: RunSummary | null = null;
  private lastRun: CompletedRun | null = null;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly deps: HarvestDependencies,
    private readonly statuses: StatusRegistry
  ) {
    this.logger = deps.logger.child("pipeline");
    this.now = deps.now ?? (() => new Date());
  }

  async health(): Promise<{ ok: boolean; sources: number; cache_entries: number }> {
    return { ok: true, sources: this.deps.sources.length, cache_entries: await this.deps.cache.size() };
  }

  startHarvest(sourceIds?: readonly string[]): { run: RunSummary; sources: SourceStatus[] } {
    if (this.activeRun) {
      this.logger.warn("run_rejected_active", { run_id: this.currentRun?.run_id });
      throw new RunRejectedError("run_active", "a harvest run is already in progress");
    }

    const selected = this.selectSources(sourceIds);
    this.runCounter += 1;
    const run: RunSummary = {
      run_id: this.runCounter,
      state: "running",
      source_ids: selected.map((source) => source.id),
      started_at: this.now().toISOString()
    };
    this.currentRun = run;

    const queued = selected.map((source) => this.statuses.markQueued(source.id, source.kind, source.source_label));
    this.logger.info("run_queued", { run_id: run.run_id, sources: run.source_ids });

    const runPromise = this.runHarvest(run, selected)
      .catch((error: unknown) => {
        this.currentRun = { ...run, state: "completed", finished_at: this.now().toISOString() };
        this.logger.error("run_failed", { run_id: run.run_id, error });
      })
      .finally(() => {
        this.activeRun = null;
      });
    this.activeRun = runPromise;
    void runPromise;

    return { run, sources: queued };
  }

  /** Resolves once no run is active. */
  async whenIdle(): Promise<void> {
    while (this.activeRun) {
      await this.activeRun;
    }
  }

  getStatus(): { run: RunSummary | null; sources: SourceStatus[] } {
    return { run: this.currentRun, sources: this.statuses.list() };
  }

  getRecords(limit: number, offset: number, sourceId?: string): { total: number; records: CanonicalProductRecord[] } {
    if (!this.lastRun) {
      return { total: 0, records: [] };
    }
    const pool = sourceId ? (this.lastRun.bySource.get(sourceId) ?? []) : this.lastRun.records;
    return { total: pool.length, records: pool.slice(offset, offset + limit) };
  }

  getStats(): (AggregateSnapshot & { metadata: RunMetadata }) | undefined {
    if (!this.lastRun) {
      return undefined;
    }
    return { ...this.lastRun.stats, metadata: this.lastRun.metadata };
  }

  private selectSources(sourceIds?: readonly string[]): SourceConfig[] {
    if (!sourceIds || sourceIds.length === 0) {
      const enabled = this.deps.sources.filter((source) => source.enabled);
      if (enabled.length === 0) {
        throw new RunRejectedError("no_sources", "no enabled sources configured");
      }
      return enabled;
    }

    const unknown = sourceIds.filter((id) => !this.deps.sources.some((source) => source.id === id));
    if (unknown.length > 0) {
      this.logger.warn("run_rejected_unknown_source", { unknown });
      throw new RunRejectedError("unknown_source", `unknown source id(s): ${unknown.join(", ")}`);
    }
    const wanted = new Set(sourceIds);
    return this.deps.sources.filter((source) => wanted.has(source.id));
  }

  private async runHarvest(run: RunSummary, sources: readonly SourceConfig[]): Promise<void> {
    const startedAt = Date.now();
    const aggregator = new Aggregator();
    const records: CanonicalProductRecord[] = [];
    const bySource = new Map<string, CanonicalProductRecord[]>();
    const successful: string[] = [];
    const failed: string[] = [];

    this.logger.info("run_started", { run_id: run.run_id, sources: run.source_ids });

    for (const source of sources) {
      this.statuses.markRunning(source.id);
      // Per-source totals join the run only once the adapter has returned.
      const sourceStats = new Aggregator();
      const context: AdapterContext = {
        lexicon: this.deps.lexicon,
        logger: this.deps.logger.child(`adapter.${source.kind}`),
        pace: this.deps.pace,
        sleep: this.deps.sleep,
        now: this.now,
        onRecord: (record) => sourceStats.observe(record),
        ...(this.deps.diagnostics ? { diagnostics: this.deps.diagnostics } : {})
      };

      try {
        const result = await this.deps.createAdapter(source, context).run();
        records.push(...result.records);
        aggregator.merge(sourceStats);
        bySource.set(source.id, result.records);
        this.statuses.markCompleted(source.id, result.metrics, result.records.length, result.termination);
        if (result.records.length > 0) {
          successful.push(source.id);
        } else {
          failed.push(source.id);
        }
      } catch (error) {
        failed.push(source.id);
        bySource.set(source.id, []);
        this.statuses.markFailed(source.id, errorMessage(error));
        this.logger.error("source_failed", { run_id: run.run_id, source_id: source.id, error });
      }
    }

    const brands = new Set(records.map((record) => record.brand).filter((brand) => brand !== UNKNOWN_BRAND));
    const metadata: RunMetadata = {
      successful_sources: successful,
      failed_sources: failed,
      total_records: records.length,
      total_brands: brands.size,
      collected_at: this.now().toISOString()
    };
    this.lastRun = { records, bySource, stats: aggregator.snapshot(), metadata };

    if (this.deps.outputFile) {
      try {
        await writeRecordDocument(this.deps.outputFile, records);
        this.logger.info("records_written", { path: this.deps.outputFile, records: records.length });
      } catch (error) {
        this.logger.error("records_write_failed", { path: this.deps.outputFile, error });
      }
    }

    this.currentRun = { ...run, state: "completed", finished_at: metadata.collected_at, metadata };
    this.logger.info("run_completed", { run_id: run.run_id, duration_ms: Date.now() - startedAt, ...metadata });
  }
}
