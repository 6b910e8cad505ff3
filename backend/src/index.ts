import "dotenv/config";
import { createApp } from "./app.js";
import {
  createRedisStore,
  MemoryTableCache,
  RedisTableCache,
  type TableCache,
} from "./lib/cache.js";
import { getConfig, type AppConfig } from "./lib/config.js";
import { GdpService, isDataset, type Dataset } from "./services/gdp.js";
import {
  FileDatasetSource,
  WorldBankBulkSource,
  type DatasetSource,
} from "./services/sources.js";

function createSource(config: AppConfig): DatasetSource {
  return config.DATA_SOURCE === "worldbank"
    ? new WorldBankBulkSource({
        indicator: config.GDP_INDICATOR,
        cacheTtlSeconds: config.CACHE_TTL_SECONDS,
      })
    : new FileDatasetSource(config.DATA_FILE);
}

function createCache(config: AppConfig): TableCache<Dataset> {
  return config.CACHE_DRIVER === "redis"
    ? new RedisTableCache(
        createRedisStore(config.REDIS_URL),
        config.CACHE_TTL_SECONDS,
        isDataset
      )
    : new MemoryTableCache<Dataset>(config.CACHE_TTL_SECONDS);
}

const config = getConfig();
const service = new GdpService({
  source: createSource(config),
  cache: createCache(config),
  loader: {
    range: { minYear: config.MIN_YEAR, maxYear: config.MAX_YEAR },
    headerSkipRows: config.HEADER_SKIP_ROWS,
  },
  missingSentinels: [config.MISSING_SENTINEL],
});

const app = createApp({
  service,
  defaultCountries: config.DEFAULT_COUNTRIES,
  frontendOrigin: config.FRONTEND_ORIGIN,
});

service
  .getDataset()
  .then((dataset) => {
    app.listen(config.PORT, "0.0.0.0", () => {
      // eslint-disable-next-line no-console
      console.log(
        `Backend listening on port ${config.PORT} (${dataset.entities.length} entities, ${dataset.range.minYear}-${dataset.range.maxYear})`
      );
    });
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("Dataset load failed", err);
    process.exit(1);
  });
