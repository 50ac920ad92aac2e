import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CacheCorruptError } from "./errors";
import { Logger } from "./logger";

const CacheEntrySchema = z.object({
  value: z.unknown(),
  /** Epoch milliseconds. */
  cached_at: z.number().nonnegative(),
  /** Milliseconds. */
  ttl: z.number().nonnegative()
});

const CacheFileSchema = z.record(CacheEntrySchema);

type CacheEntry = z.infer<typeof CacheEntrySchema>;

/** Output type is what callers get back; input is whatever JSON held. */
export type ValueSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const HOUR_MS = 60 * 60 * 1000;

export function hours(count: number): number {
  return count * HOUR_MS;
}

export interface CacheLookup<T> {
  value: T;
  hit: boolean;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Keyed TTL store persisted as one JSON document (`key -> {value, cached_at, ttl}`).
 * Expired entries read as missing. Reads and read-modify-write cycles on the same key
 * are serialized; file writes go through a temp file and a rename.
 */
export class TtlCache {
  private entries: Map<string, CacheEntry> | null = null;
  private loading: Promise<Map<string, CacheEntry>> | null = null;
  private readonly keyLocks = new Map<string, Promise<void>>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string | null,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async get<T>(key: string, schema: ValueSchema<T>): Promise<T | undefined> {
    const entries = await this.load();
    return this.readLive(entries, key, schema);
  }

  async put(key: string, value: unknown, ttlMs: number): Promise<void> {
    await this.withKeyLock(key, async () => {
      await this.store(key, value, ttlMs);
    });
  }

  /**
   * Returns the cached value when live, otherwise runs `loader`, stores its result and
   * returns it. The whole cycle holds the key's lock.
   */
  async getOrLoad<T>(key: string, schema: ValueSchema<T>, ttlMs: number, loader: () => Promise<T>): Promise<CacheLookup<T>> {
    return this.withKeyLock(key, async () => {
      const entries = await this.load();
      const cached = this.readLive(entries, key, schema);
      if (cached !== undefined) {
        this.logger.debug("cache_hit", { key });
        return { value: cached, hit: true };
      }
      this.logger.debug("cache_miss", { key });
      const value = await loader();
      await this.store(key, value, ttlMs);
      return { value, hit: false };
    });
  }

  async evict(key: string): Promise<boolean> {
    return this.withKeyLock(key, async () => {
      const entries = await this.load();
      const removed = entries.delete(key);
      if (removed) {
        await this.persist();
      }
      return removed;
    });
  }

  async purgeExpired(): Promise<number> {
    const entries = await this.load();
    const current = this.now();
    let purged = 0;
    for (const [key, entry] of entries) {
      if (this.isExpired(entry, current)) {
        entries.delete(key);
        purged += 1;
      }
    }
    if (purged > 0) {
      await this.persist();
      this.logger.info("cache_purged", { purged, remaining: entries.size });
    }
    return purged;
  }

  /** Count of live entries. */
  async size(): Promise<number> {
    const entries = await this.load();
    const current = this.now();
    let live = 0;
    for (const entry of entries.values()) {
      if (!this.isExpired(entry, current)) {
        live += 1;
      }
    }
    return live;
  }

  private isExpired(entry: CacheEntry, current: number): boolean {
    return current >= entry.cached_at + entry.ttl;
  }

  private readLive<T>(entries: Map<string, CacheEntry>, key: string, schema: ValueSchema<T>): T | undefined {
    const entry = entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry, this.now())) {
      entries.delete(key);
      return undefined;
    }
    const parsed = schema.safeParse(entry.value);
    if (!parsed.success) {
      this.logger.warn("cache_entry_invalid", { key, issues: parsed.error.issues.length });
      entries.delete(key);
      return undefined;
    }
    return parsed.data;
  }

  private async store(key: string, value: unknown, ttlMs: number): Promise<void> {
    const entries = await this.load();
    entries.set(key, { value, cached_at: this.now(), ttl: ttlMs });
    await this.persist();
  }

  private async withKeyLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.keyLocks.get(key) ?? Promise.resolve();
    const run = previous.then(work);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.keyLocks.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.keyLocks.get(key) === tail) {
        this.keyLocks.delete(key);
      }
    }
  }

  private async load(): Promise<Map<string, CacheEntry>> {
    if (this.entries) {
      return this.entries;
    }
    if (!this.loading) {
      this.loading = this.readFromDisk().then((entries) => {
        this.entries = entries;
        return entries;
      });
    }
    return this.loading;
  }

  private async readFromDisk(): Promise<Map<string, CacheEntry>> {
    if (!this.filePath) {
      return new Map();
    }

    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return new Map();
      }
      this.logger.warn("cache_unreadable", { error: new CacheCorruptError(this.filePath, { cause: error }) });
      return new Map();
    }

    try {
      const parsed = CacheFileSchema.parse(JSON.parse(text));
      const entries = new Map(Object.entries(parsed));
      this.logger.debug("cache_loaded", { path: this.filePath, entries: entries.size });
      return entries;
    } catch (error) {
      this.logger.warn("cache_corrupt", { error: new CacheCorruptError(this.filePath, { cause: error }) });
      return new Map();
    }
  }

  private persist(): Promise<void> {
    const next = this.writeChain.then(() => this.writeToDisk());
    this.writeChain = next;
    return next;
  }

  private async writeToDisk(): Promise<void> {
    if (!this.filePath || !this.entries) {
      return;
    }
    const document = Object.fromEntries(this.entries);
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
      await rename(tempPath, this.filePath);
    } catch (error) {
      this.logger.warn("cache_write_failed", { path: this.filePath, error });
    }
  }
}
