import { readFileSync } from "node:fs";
import { SourceConfig, SourcesFileSchema } from "../types";

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/** Parses a sources document; throws the zod error on anything invalid. */
export function parseSources(input: unknown): readonly SourceConfig[] {
  const parsed = SourcesFileSchema.parse(input);
  const ids = new Set<string>();
  for (const source of parsed.sources) {
    if (ids.has(source.id)) {
      throw new Error(`duplicate source id: ${source.id}`);
    }
    ids.add(source.id);
  }
  return deepFreeze(parsed.sources);
}

export function loadSources(path: string): readonly SourceConfig[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parseSources(raw);
}
