import { SchemaError } from "../lib/errors.js";

export type CellValue = string | number | null | undefined;

/**
 * One entity per row, as read from a source. Year keys keep their source
 * spelling ("1960", "1960.0") until `reshape` normalizes them.
 */
export type WideRecord = {
  entityName?: string;
  entityCode?: string;
  valueByYear: Readonly<Record<string, CellValue>>;
};

export type LongRecord = {
  entityName: string;
  entityCode: string;
  year: number;
  value: number | null;
};

export type YearRange = {
  minYear: number;
  maxYear: number;
};

export type ReshapeOptions = {
  missingSentinels?: readonly string[];
};

export const DEFAULT_MISSING_SENTINELS: readonly string[] = [".."];

const YEAR_LABEL = /^[+-]?\d+(\.0*)?$/;
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Normalize a year label to an integer. Only plain decimal labels count
 * ("2020", "2020.0"); anything else returns undefined.
 */
export function coerceYear(raw: string | number): number | undefined {
  if (typeof raw === "number") return Number.isInteger(raw) ? raw : undefined;
  const text = raw.trim();
  return YEAR_LABEL.test(text) ? Number(text) : undefined;
}

export function coerceValue(
  raw: CellValue,
  missingSentinels: readonly string[] = DEFAULT_MISSING_SENTINELS
): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  const text = raw.trim();
  if (missingSentinels.includes(text) || !DECIMAL_NUMBER.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function yearColumns(
  record: WideRecord,
  range: YearRange,
  row: number
): Map<number, CellValue> {
  const byYear = new Map<number, CellValue>();
  for (const [key, raw] of Object.entries(record.valueByYear)) {
    const year = coerceYear(key);
    if (year === undefined || year < range.minYear || year > range.maxYear) {
      continue;
    }
    if (byYear.has(year)) {
      throw new SchemaError(`Duplicate year column: ${year}`, { row, year });
    }
    byYear.set(year, raw);
  }
  return byYear;
}

/**
 * Pivot a wide table (one column per year) into one row per entity and year.
 * Rows are grouped by entity, years ascending.
 */
export function reshape(
  wide: readonly WideRecord[],
  range: YearRange,
  options: ReshapeOptions = {}
): LongRecord[] {
  const sentinels = options.missingSentinels ?? DEFAULT_MISSING_SENTINELS;
  const rows: LongRecord[] = [];
  const seenCodes = new Set<string>();

  wide.forEach((record, index) => {
    const { entityName, entityCode } = record;
    if (entityName === undefined) {
      throw new SchemaError("Missing required column: entityName", { row: index });
    }
    if (entityCode === undefined) {
      throw new SchemaError("Missing required column: entityCode", { row: index });
    }
    if (seenCodes.has(entityCode)) {
      throw new SchemaError(`Duplicate entity code: ${entityCode}`, {
        row: index,
        entityCode,
      });
    }
    seenCodes.add(entityCode);

    const byYear = yearColumns(record, range, index);
    for (let year = range.minYear; year <= range.maxYear; year++) {
      if (!byYear.has(year)) {
        throw new SchemaError(`Missing required year column: ${year}`, {
          row: index,
          entityCode,
          year,
        });
      }
      rows.push({
        entityName,
        entityCode,
        year,
        value: coerceValue(byYear.get(year), sentinels),
      });
    }
  });

  return rows;
}
