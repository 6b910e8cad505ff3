import { Router, NextFunction, Request, Response } from "express";
import { parseCountryList } from "../lib/config.js";
import { ValidationError } from "../lib/errors.js";
import type { GdpService } from "../services/gdp.js";
import { computeMetrics } from "../services/metrics.js";
import { toChartSeries, toMetricTile } from "../services/presentation.js";
import {
  defaultSelection,
  filterLongTable,
  selectionBounds,
  type Selection,
  type SelectionBounds,
} from "../services/selection.js";

export type GdpRouterOptions = {
  service: GdpService;
  defaultCountries: readonly string[];
};

type QueryValue = Request["query"][string];

/** A parameter that may appear once. */
function querySingle(name: string, value: QueryValue): string | undefined {
  if (value === undefined || typeof value === "string") return value;
  throw new ValidationError(`${name} must be given once`, { [name]: value });
}

/** `countries=FRA,JPN` and `countries=FRA&countries=JPN` read the same. */
function queryList(name: string, value: QueryValue): string | undefined {
  if (value === undefined || typeof value === "string") return value;
  if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
    return value.join(",");
  }
  throw new ValidationError(`${name} must be a comma-separated list`, { [name]: value });
}

function parseYear(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const text = raw.trim();
  if (!/^-?\d+$/.test(text)) {
    throw new ValidationError(`${name} must be an integer year`, { [name]: raw });
  }
  return Number(text);
}

/**
 * Read `countries`, `from` and `to` from the query, falling back to the
 * default selection. An explicitly empty `countries` is an empty selection.
 */
export function parseSelection(
  query: Request["query"],
  bounds: SelectionBounds,
  fallback: Selection
): Selection {
  const countries = queryList("countries", query.countries);
  const fromYear = parseYear("from", querySingle("from", query.from), fallback.fromYear);
  const toYear = parseYear("to", querySingle("to", query.to), fallback.toYear);

  if (fromYear > toYear) {
    throw new ValidationError("from must not be after to", { from: fromYear, to: toYear });
  }
  if (fromYear < bounds.minYear || toYear > bounds.maxYear) {
    throw new ValidationError(
      `Years must be within ${bounds.minYear}-${bounds.maxYear}`,
      { from: fromYear, to: toYear }
    );
  }

  return {
    entityCodes:
      countries === undefined ? fallback.entityCodes : parseCountryList(countries),
    fromYear,
    toYear,
  };
}

export function createGdpRouter({ service, defaultCountries }: GdpRouterOptions): Router {
  const router = Router();

  async function resolve(req: Request) {
    const dataset = await service.getDataset();
    const bounds = selectionBounds(dataset);
    const fallback = defaultSelection(bounds, defaultCountries);
    const selection = parseSelection(req.query, bounds, fallback);
    return { dataset, bounds, fallback, selection };
  }

  router.get("/meta", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const dataset = await service.getDataset();
      const bounds = selectionBounds(dataset);
      res.json({
        fingerprint: dataset.fingerprint,
        minYear: bounds.minYear,
        maxYear: bounds.maxYear,
        entities: dataset.entities,
        defaultSelection: defaultSelection(bounds, defaultCountries),
      });
    } catch (e) {
      next(e);
    }
  });

  router.get("/series", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { dataset, selection } = await resolve(req);
      const rows = filterLongTable(dataset.rows, selection);
      console.log(
        `[Route] series countries=${selection.entityCodes.join(",")} from=${selection.fromYear} to=${selection.toYear} rows=${rows.length}`
      );
      res.json({
        selection,
        empty: rows.length === 0,
        rows,
        series: toChartSeries(rows),
      });
    } catch (e) {
      next(e);
    }
  });

  router.get("/metrics", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { dataset, selection } = await resolve(req);
      const metrics = computeMetrics(
        dataset.rows,
        selection.entityCodes,
        selection.fromYear,
        selection.toYear
      );
      res.json({
        title: `GDP in ${selection.toYear}`,
        selection,
        metrics,
        tiles: metrics.map(toMetricTile),
      });
    } catch (e) {
      next(e);
    }
  });

  router.post("/cache/invalidate", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ invalidated: await service.invalidate() });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
