import { CanonicalProductRecord } from "../types";

export const AGGREGATE_GROUPS = ["brand", "type", "packaging_unit", "price_tier", "source"] as const;

export type AggregateGroup = (typeof AGGREGATE_GROUPS)[number];

interface RunningTotal {
  count: number;
  price_sum: number;
}

export interface GroupEntry {
  key: string;
  count: number;
  price_sum: number;
  mean_price: number;
  /** Fraction of all observed records. */
  share: number;
}

export interface AggregateSnapshot {
  total_records: number;
  groups: Record<AggregateGroup, GroupEntry[]>;
  /** Sorted types seen per brand. */
  brand_types: Record<string, string[]>;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function groupKey(record: CanonicalProductRecord, group: AggregateGroup): string | undefined {
  switch (group) {
    case "brand":
      return record.brand;
    case "type":
      return record.type;
    case "packaging_unit":
      return record.packaging?.unit;
    case "price_tier":
      return record.price_tier;
    case "source":
      return record.source;
  }
}

/**
 * Running `{count, price_sum}` per group key. `observe` is O(1) per record; means and
 * shares are only computed by `snapshot`.
 */
export class Aggregator {
  private total = 0;
  private readonly totals = new Map<AggregateGroup, Map<string, RunningTotal>>(
    AGGREGATE_GROUPS.map((group) => [group, new Map<string, RunningTotal>()])
  );
  private readonly brandTypes = new Map<string, Set<string>>();

  observe(record: CanonicalProductRecord): void {
    this.total += 1;
    for (const [group, entries] of this.totals) {
      const key = groupKey(record, group);
      if (key === undefined) {
        continue;
      }
      const current = entries.get(key);
      if (current) {
        current.count += 1;
        current.price_sum += record.price;
      } else {
        entries.set(key, { count: 1, price_sum: record.price });
      }
    }

    const types = this.brandTypes.get(record.brand);
    if (types) {
      types.add(record.type);
    } else {
      this.brandTypes.set(record.brand, new Set([record.type]));
    }
  }

  /** Adds another aggregator's totals into this one. */
  merge(other: Aggregator): void {
    this.total += other.total;
    for (const [group, entries] of other.totals) {
      const target = this.totals.get(group);
      if (!target) {
        continue;
      }
      for (const [key, running] of entries) {
        const current = target.get(key);
        if (current) {
          current.count += running.count;
          current.price_sum += running.price_sum;
        } else {
          target.set(key, { ...running });
        }
      }
    }
    for (const [brand, types] of other.brandTypes) {
      const current = this.brandTypes.get(brand);
      if (current) {
        for (const type of types) {
          current.add(type);
        }
      } else {
        this.brandTypes.set(brand, new Set(types));
      }
    }
  }

  get totalRecords(): number {
    return this.total;
  }

  snapshot(): AggregateSnapshot {
    const groups: Record<AggregateGroup, GroupEntry[]> = {
      brand: [],
      type: [],
      packaging_unit: [],
      price_tier: [],
      source: []
    };

    for (const [group, entries] of this.totals) {
      groups[group] = [...entries.entries()]
        .map(([key, running]) => ({
          key,
          count: running.count,
          price_sum: round(running.price_sum, 2),
          mean_price: round(running.price_sum / running.count, 2),
          share: this.total > 0 ? round(running.count / this.total, 4) : 0
        }))
        .sort((a, b) => b.count - a.count || a.key.localeCompare(b.key));
    }

    const brandTypes: Record<string, string[]> = {};
    for (const brand of [...this.brandTypes.keys()].sort((a, b) => a.localeCompare(b))) {
      brandTypes[brand] = [...(this.brandTypes.get(brand) ?? [])].sort();
    }

    return { total_records: this.total, groups, brand_types: brandTypes };
  }
}
