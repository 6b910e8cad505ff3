import type { MetricResult } from "./metrics.js";
import type { LongRecord } from "./reshape.js";

export type ChartPoint = {
  year: number;
  value: number | null;
  tooltip: { entityName: string; year: number; value: number | null };
};

export type ChartSeries = {
  entityCode: string;
  entityName: string;
  points: ChartPoint[];
};

export type MetricTile = {
  label: string;
  value: string;
  delta: string;
  deltaColor: "normal" | "off";
};

export const NOT_AVAILABLE = "n/a";

const wholeNumber = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

const twoDecimals = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatBillions(value: number | null): string {
  if (value === null) return NOT_AVAILABLE;
  return `${wholeNumber.format(value / 1e9)}B`;
}

export function formatGrowth(ratio: number | null): string {
  if (ratio === null) return NOT_AVAILABLE;
  return `${twoDecimals.format(ratio)}x`;
}

/** One line per entity, x = year, y = value. */
export function toChartSeries(rows: readonly LongRecord[]): ChartSeries[] {
  const byEntity = new Map<string, ChartSeries>();
  for (const row of rows) {
    let series = byEntity.get(row.entityCode);
    if (!series) {
      series = { entityCode: row.entityCode, entityName: row.entityName, points: [] };
      byEntity.set(row.entityCode, series);
    }
    series.points.push({
      year: row.year,
      value: row.value,
      tooltip: { entityName: row.entityName, year: row.year, value: row.value },
    });
  }
  return Array.from(byEntity.values());
}

export function toMetricTile(metric: MetricResult): MetricTile {
  return {
    label: `${metric.entityCode} GDP`,
    value: formatBillions(metric.endValue),
    delta: formatGrowth(metric.growthRatio),
    deltaColor: metric.growthRatio === null ? "off" : "normal",
  };
}
