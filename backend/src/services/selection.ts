import type { Dataset } from "./gdp.js";
import type { LongRecord } from "./reshape.js";

export type SelectionBounds = {
  minYear: number;
  maxYear: number;
  entityCodes: string[];
};

export type Selection = {
  entityCodes: string[];
  fromYear: number;
  toYear: number;
};

export function selectionBounds(dataset: Pick<Dataset, "range" | "rows">): SelectionBounds {
  return {
    minYear: dataset.range.minYear,
    maxYear: dataset.range.maxYear,
    entityCodes: Array.from(new Set(dataset.rows.map((row) => row.entityCode))),
  };
}

/**
 * Full year span and whichever preferred codes the table has. Falls back to
 * the first code so a non-empty table never yields an empty selection.
 */
export function defaultSelection(
  bounds: SelectionBounds,
  preferred: readonly string[]
): Selection {
  const known = new Set(bounds.entityCodes);
  let entityCodes = Array.from(new Set(preferred)).filter((code) => known.has(code));
  if (entityCodes.length === 0 && bounds.entityCodes.length > 0) {
    entityCodes = [bounds.entityCodes[0]];
  }
  return {
    entityCodes,
    fromYear: bounds.minYear,
    toYear: bounds.maxYear,
  };
}

export function filterLongTable(
  rows: readonly LongRecord[],
  selection: Selection
): LongRecord[] {
  const codes = new Set(selection.entityCodes);
  return rows.filter(
    (row) =>
      codes.has(row.entityCode) &&
      row.year >= selection.fromYear &&
      row.year <= selection.toYear
  );
}
