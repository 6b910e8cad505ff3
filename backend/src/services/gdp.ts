import type { TableCache } from "../lib/cache.js";
import { fingerprint } from "../lib/fingerprint.js";
import { parseWideCsv, type LoaderOptions } from "./loader.js";
import { reshape, type LongRecord, type YearRange } from "./reshape.js";
import type { DatasetSource } from "./sources.js";

export type EntitySummary = {
  code: string;
  name: string;
};

export type Dataset = {
  fingerprint: string;
  range: YearRange;
  entities: EntitySummary[];
  rows: LongRecord[];
};

export type GdpServiceOptions = {
  source: DatasetSource;
  cache: TableCache<Dataset>;
  loader: LoaderOptions;
  missingSentinels?: readonly string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isLongRecord(value: unknown): value is LongRecord {
  return (
    isRecord(value) &&
    typeof value.entityName === "string" &&
    typeof value.entityCode === "string" &&
    typeof value.year === "number" &&
    (value.value === null || typeof value.value === "number")
  );
}

/**
 * Shape check for datasets coming back from an out-of-process cache.
 */
export function isDataset(value: unknown): value is Dataset {
  if (!isRecord(value)) return false;
  const { range, entities, rows } = value;
  return (
    typeof value.fingerprint === "string" &&
    isRecord(range) &&
    typeof range.minYear === "number" &&
    typeof range.maxYear === "number" &&
    Array.isArray(entities) &&
    entities.every(
      (entity) =>
        isRecord(entity) &&
        typeof entity.code === "string" &&
        typeof entity.name === "string"
    ) &&
    Array.isArray(rows) &&
    rows.every(isLongRecord)
  );
}

export function summarizeEntities(rows: readonly LongRecord[]): EntitySummary[] {
  const seen = new Map<string, string>();
  for (const row of rows) {
    if (!seen.has(row.entityCode)) seen.set(row.entityCode, row.entityName);
  }
  return Array.from(seen, ([code, name]) => ({ code, name }));
}

export class GdpService {
  private lastKey: string | undefined;

  constructor(private readonly options: GdpServiceOptions) {}

  cacheKey(contentFingerprint: string): string {
    const { minYear, maxYear } = this.options.loader.range;
    return `gdp:${contentFingerprint}:${minYear}-${maxYear}`;
  }

  async getDataset(): Promise<Dataset> {
    const { source, cache, loader } = this.options;
    const text = await source.read();
    const contentFingerprint = fingerprint(text);
    const key = this.cacheKey(contentFingerprint);
    const previousKey = this.lastKey;
    this.lastKey = key;
    if (previousKey !== undefined && previousKey !== key) {
      // The source changed; the old table is unreachable.
      await cache.invalidate(previousKey);
      console.log(`[gdpService] Source changed, dropped ${previousKey}`);
    }

    const cached = await cache.get(key);
    if (cached) {
      return cached;
    }
    console.log(
      `[gdpService] Cache miss for ${key}, reshaping ${source.describe()}`
    );

    const table = parseWideCsv(text, loader);
    const rows = reshape(table.records, table.range, {
      missingSentinels: this.options.missingSentinels,
    });
    const dataset: Dataset = {
      fingerprint: contentFingerprint,
      range: table.range,
      entities: summarizeEntities(rows),
      rows,
    };

    await cache.set(key, dataset);
    console.log(
      `[gdpService] Cached ${dataset.entities.length} entities (${rows.length} rows) under ${key}`
    );
    return dataset;
  }

  /** Drops the cached dataset for the most recently read source content. */
  async invalidate(): Promise<boolean> {
    const key = this.lastKey;
    if (!key) return false;
    await this.options.cache.invalidate(key);
    this.lastKey = undefined;
    console.log(`[gdpService] Invalidated ${key}`);
    return true;
  }
}
