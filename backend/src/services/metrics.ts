import { DataIntegrityError } from "../lib/errors.js";
import type { LongRecord } from "./reshape.js";

export type MetricResult = {
  entityCode: string;
  startValue: number | null;
  endValue: number | null;
  growthRatio: number | null;
};

export type LongTableIndex = ReadonlyMap<string, LongRecord>;

function indexKey(entityCode: string, year: number): string {
  return `${entityCode}:${year}`;
}

/**
 * Key the long table by (entityCode, year). A repeated pair means the table
 * was not produced by `reshape` and fails with DataIntegrityError.
 */
export function indexLongTable(rows: readonly LongRecord[]): LongTableIndex {
  const index = new Map<string, LongRecord>();
  for (const row of rows) {
    const key = indexKey(row.entityCode, row.year);
    if (index.has(key)) {
      throw new DataIntegrityError(row.entityCode, row.year);
    }
    index.set(key, row);
  }
  return index;
}

export function lookupValue(
  index: LongTableIndex,
  entityCode: string,
  year: number
): number | null {
  return index.get(indexKey(entityCode, year))?.value ?? null;
}

export function growthRatio(
  startValue: number | null,
  endValue: number | null
): number | null {
  if (startValue === null || endValue === null || startValue === 0) {
    return null;
  }
  const ratio = endValue / startValue;
  return Number.isFinite(ratio) ? ratio : null;
}

/**
 * Start value, end value and growth multiple per requested entity, in the
 * caller's order with duplicates collapsed. Missing data yields nulls.
 */
export function computeMetrics(
  rows: readonly LongRecord[],
  entityCodes: Iterable<string>,
  startYear: number,
  endYear: number
): MetricResult[] {
  const index = indexLongTable(rows);

  return Array.from(new Set(entityCodes), (entityCode) => {
    const startValue = lookupValue(index, entityCode, startYear);
    const endValue = lookupValue(index, entityCode, endYear);
    return {
      entityCode,
      startValue,
      endValue,
      growthRatio: growthRatio(startValue, endValue),
    };
  });
}
