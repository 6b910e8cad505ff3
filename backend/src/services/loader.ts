import { parse } from "csv-parse/sync";
import { SchemaError, SourceError } from "../lib/errors.js";
import type { WideRecord, YearRange } from "./reshape.js";

export type LoaderOptions = {
  range: YearRange;
  headerSkipRows?: number;
  nameColumn?: string;
  codeColumn?: string;
};

export type WideTable = {
  records: WideRecord[];
  range: YearRange;
  columns: string[];
};

export const DEFAULT_HEADER_SKIP_ROWS = 4;
export const DEFAULT_NAME_COLUMN = "Country Name";
export const DEFAULT_CODE_COLUMN = "Country Code";

function toStringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (typeof value !== "object" || value === null) return out;
  for (const [key, cell] of Object.entries(value)) {
    if (typeof cell === "string") out[key] = cell;
  }
  return out;
}

/**
 * Parse a World Bank style export: a preamble of `headerSkipRows` lines, a
 * header naming the country columns and one column per year, then one row
 * per country. Cells stay raw strings; `reshape` coerces them.
 */
export function parseWideCsv(text: string, options: LoaderOptions): WideTable {
  const skip = options.headerSkipRows ?? DEFAULT_HEADER_SKIP_ROWS;
  const nameColumn = options.nameColumn ?? DEFAULT_NAME_COLUMN;
  const codeColumn = options.codeColumn ?? DEFAULT_CODE_COLUMN;

  const body = text.split(/\r?\n/).slice(skip).join("\n");

  let header: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(body, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      columns: (first: string[]) => {
        header = first.map((name) => name.trim());
        // Unnamed columns (the export's trailing comma) are dropped.
        return header.map((name) => (name === "" ? undefined : name));
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceError(`Unable to parse CSV: ${message}`);
  }

  for (const required of [nameColumn, codeColumn]) {
    if (!header.includes(required)) {
      throw new SchemaError(`Missing required column: ${required}`, {
        column: required,
      });
    }
  }

  const rows = Array.isArray(parsed) ? parsed.map(toStringRecord) : [];
  const records = rows.map((row): WideRecord => {
    const { [nameColumn]: entityName, [codeColumn]: entityCode, ...rest } = row;
    return { entityName, entityCode, valueByYear: rest };
  });

  return {
    records,
    range: options.range,
    columns: header.filter((name) => name !== ""),
  };
}
