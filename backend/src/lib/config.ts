import { ConfigError } from "./errors.js";

export type DataSourceKind = "file" | "worldbank";
export type CacheDriver = "memory" | "redis";

export type AppConfig = {
  PORT: number;
  FRONTEND_ORIGIN: string;
  DATA_SOURCE: DataSourceKind;
  DATA_FILE: string;
  GDP_INDICATOR: string;
  MIN_YEAR: number;
  MAX_YEAR: number;
  HEADER_SKIP_ROWS: number;
  MISSING_SENTINEL: string;
  DEFAULT_COUNTRIES: string[];
  CACHE_DRIVER: CacheDriver;
  REDIS_URL: string;
  CACHE_TTL_SECONDS: number;
};

type Env = Record<string, string | undefined>;

function intFrom(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(
  env: Env,
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = allowed.find((option) => option === raw);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${allowed.join(", ")}, got "${raw}"`);
  }
  return match;
}

export function parseCountryList(raw: string): string[] {
  return Array.from(
    new Set(
      raw
        .split(",")
        .map((code) => code.trim().toUpperCase())
        .filter(Boolean)
    )
  );
}

export function getConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    PORT: intFrom(env, "PORT", 4000),
    FRONTEND_ORIGIN: env.FRONTEND_ORIGIN || "*",
    DATA_SOURCE: oneOf(env, "DATA_SOURCE", ["file", "worldbank"], "file"),
    DATA_FILE: env.DATA_FILE || "data/world_gdp.csv",
    GDP_INDICATOR: env.GDP_INDICATOR || "NY.GDP.MKTP.CD",
    MIN_YEAR: intFrom(env, "MIN_YEAR", 1960),
    MAX_YEAR: intFrom(env, "MAX_YEAR", 2024),
    HEADER_SKIP_ROWS: intFrom(env, "HEADER_SKIP_ROWS", 4),
    MISSING_SENTINEL: env.MISSING_SENTINEL ?? "..",
    DEFAULT_COUNTRIES: parseCountryList(
      env.DEFAULT_COUNTRIES || "DEU,FRA,GBR,BRA,MEX,JPN"
    ),
    CACHE_DRIVER: oneOf(env, "CACHE_DRIVER", ["memory", "redis"], "memory"),
    REDIS_URL: env.REDIS_URL || "redis://localhost:6379",
    CACHE_TTL_SECONDS: intFrom(env, "CACHE_TTL_SECONDS", 3600),
  };

  if (config.MIN_YEAR > config.MAX_YEAR) {
    throw new ConfigError(
      `MIN_YEAR (${config.MIN_YEAR}) must not exceed MAX_YEAR (${config.MAX_YEAR})`
    );
  }
  return config;
}
