import { AdapterMetrics, Termination, zeroMetrics } from "../adapters/types";
import { SourceKind } from "../types";

export type SourceState = "queued" | "running" | "completed" | "failed";

export interface SourceStatus {
  id: string;
  kind: SourceKind;
  source_label: string;
  state: SourceState;
  metrics: AdapterMetrics;
  records: number;
  termination?: Termination;
  started_at?: string;
  finished_at?: string;
  error?: string;
}

export class StatusRegistry {
  private readonly statuses = new Map<string, SourceStatus>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  markQueued(id: string, kind: SourceKind, sourceLabel: string): SourceStatus {
    const status: SourceStatus = {
      id,
      kind,
      source_label: sourceLabel,
      state: "queued",
      metrics: zeroMetrics(),
      records: 0
    };

    this.statuses.set(id, status);
    return status;
  }

  markRunning(id: string): SourceStatus | undefined {
    const current = this.statuses.get(id);
    if (!current) {
      return undefined;
    }

    const next: SourceStatus = {
      ...current,
      state: "running",
      error: undefined,
      termination: undefined,
      metrics: zeroMetrics(),
      records: 0,
      started_at: this.now().toISOString(),
      finished_at: undefined
    };

    this.statuses.set(id, next);
    return next;
  }

  markCompleted(id: string, metrics: AdapterMetrics, records: number, termination: Termination): void {
    const current = this.statuses.get(id);
    if (!current) {
      return;
    }

    this.statuses.set(id, {
      ...current,
      state: "completed",
      metrics: { ...metrics },
      records,
      termination,
      error: undefined,
      finished_at: this.now().toISOString()
    });
  }

  markFailed(id: string, error: string): void {
    const current = this.statuses.get(id);
    if (!current) {
      return;
    }

    this.statuses.set(id, {
      ...current,
      state: "failed",
      error,
      finished_at: this.now().toISOString()
    });
  }

  get(id: string): SourceStatus | undefined {
    return this.statuses.get(id);
  }

  list(): SourceStatus[] {
    return [...this.statuses.values()];
  }
}
