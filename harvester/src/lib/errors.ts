export type HarvestErrorCode = "fetch_failed" | "extraction_failed" | "cache_corrupt";

export class HarvestError extends Error {
  constructor(
    readonly code: HarvestErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network or browser failure reaching a page, a scroll batch or an API endpoint. */
export class FetchError extends HarvestError {
  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super("fetch_failed", message, options);
  }
}

/** Every selector strategy for a field came back empty. */
export class ExtractionError extends HarvestError {
  constructor(
    readonly field: string,
    readonly triedSelectors: readonly string[]
  ) {
    super("extraction_failed", `no match for ${field} after ${triedSelectors.length} selector(s)`);
  }
}

export class CacheCorruptError extends HarvestError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super("cache_corrupt", `cache file ${path} is unreadable`, options);
  }
}

/**
 * A field that fell back to its default. Never thrown: the normalizer returns these
 * next to the record and callers log them.
 */
export interface FieldDefaulted {
  field: string;
  fallback: string | number | null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
