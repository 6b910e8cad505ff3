import { readFile } from "node:fs/promises";
import axios from "axios";
import AdmZip from "adm-zip";
import type { IZipEntry } from "adm-zip";
import { SourceError } from "../lib/errors.js";

export interface DatasetSource {
  describe(): string;
  read(): Promise<string>;
}

export class FileDatasetSource implements DatasetSource {
  constructor(private readonly path: string) {}

  describe(): string {
    return `file:${this.path}`;
  }

  async read(): Promise<string> {
    try {
      return await readFile(this.path, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SourceError(`Unable to read dataset file ${this.path}`, {
        cause: message,
      });
    }
  }
}

export type ArchiveFetcher = (url: string) => Promise<Buffer>;

export type WorldBankBulkOptions = {
  indicator: string;
  retries?: number;
  initialDelayMs?: number;
  minIntervalMs?: number;
  /** How long a downloaded CSV is reused; 0 keeps it for the process lifetime. */
  cacheTtlSeconds?: number;
  fetchArchive?: ArchiveFetcher;
  now?: () => number;
};

type DownloadedCsv = { text: string; fetchedAt: number };

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function axiosArchiveFetcher(url: string): Promise<Buffer> {
  const response = await axios.get<ArrayBuffer>(url, {
    responseType: "arraybuffer",
    headers: { Accept: "application/zip,application/octet-stream" },
    timeout: 60000,
  });
  return Buffer.from(response.data);
}

function isRetryableStatus(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  const status = error.response?.status;
  return status !== undefined && (status === 429 || status >= 500);
}

/**
 * Pull the CSV for one indicator out of a World Bank bulk download archive.
 */
export function extractIndicatorCsv(archive: Buffer, indicator: string): string {
  const zip = new AdmZip(archive);
  const csvEntry = zip
    .getEntries()
    .find(
      (entry: IZipEntry) =>
        /^API_.*\.csv$/i.test(entry.name) && entry.name.includes(indicator)
    );

  if (!csvEntry) {
    throw new SourceError(
      `Bulk download did not contain expected CSV for indicator ${indicator}`,
      { indicator }
    );
  }
  return csvEntry.getData().toString("utf8");
}

export class WorldBankBulkSource implements DatasetSource {
  private readonly retries: number;
  private readonly initialDelayMs: number;
  private readonly minIntervalMs: number;
  private readonly cacheTtlMs: number;
  private readonly fetchArchive: ArchiveFetcher;
  private readonly now: () => number;
  private downloaded: DownloadedCsv | undefined;
  private pending: Promise<string> | undefined;
  private queue: Promise<void> = Promise.resolve();
  private lastFetchTime = 0;

  constructor(private readonly options: WorldBankBulkOptions) {
    this.retries = options.retries ?? 3;
    this.initialDelayMs = options.initialDelayMs ?? 500;
    this.minIntervalMs = options.minIntervalMs ?? 1500;
    this.cacheTtlMs = (options.cacheTtlSeconds ?? 3600) * 1000;
    this.fetchArchive = options.fetchArchive ?? axiosArchiveFetcher;
    this.now = options.now ?? Date.now;
  }

  get url(): string {
    return `https://api.worldbank.org/v2/en/indicator/${this.options.indicator}?downloadformat=csv`;
  }

  describe(): string {
    return `worldbank:${this.options.indicator}`;
  }

  async read(): Promise<string> {
    const downloaded = this.downloaded;
    if (
      downloaded &&
      (this.cacheTtlMs === 0 || this.now() - downloaded.fetchedAt < this.cacheTtlMs)
    ) {
      return downloaded.text;
    }
    if (!this.pending) {
      this.pending = this.download().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private async download(): Promise<string> {
    console.log(`[worldBankSource] Downloading ${this.url}`);
    const archive = await this.fetchWithRetry();
    const text = extractIndicatorCsv(archive, this.options.indicator);
    this.downloaded = { text, fetchedAt: this.now() };
    return text;
  }

  private schedule<T>(task: () => Promise<T>): Promise<T> {
    const chained = this.queue.then(async () => {
      const waitFor = Math.max(
        0,
        this.minIntervalMs - (Date.now() - this.lastFetchTime)
      );
      if (waitFor > 0) {
        await sleep(waitFor);
      }
      try {
        return await task();
      } finally {
        this.lastFetchTime = Date.now();
      }
    });

    this.queue = chained.then(
      () => undefined,
      () => undefined
    );
    return chained;
  }

  private async fetchWithRetry(): Promise<Buffer> {
    let attempt = 0;
    let delayMs = this.initialDelayMs;

    for (;;) {
      try {
        return await this.schedule(() => this.fetchArchive(this.url));
      } catch (error) {
        if (attempt >= this.retries || !isRetryableStatus(error)) {
          const message = error instanceof Error ? error.message : String(error);
          throw new SourceError(
            `World Bank bulk download failed for ${this.options.indicator}`,
            { cause: message, attempts: attempt + 1 }
          );
        }
        console.warn(
          `[worldBankSource] Bulk download failed. Retrying in ${delayMs}ms (attempt ${
            attempt + 1
          }/${this.retries})`
        );
        await sleep(delayMs);
        delayMs *= 2;
        attempt += 1;
      }
    }
  }
}
