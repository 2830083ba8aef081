import { readFileSync } from "fs";
import { z } from "zod";

export interface ScanRange {
  readonly makes: readonly string[]; // decoded names, e.g. "Land Rover"
  readonly yearStart: number;
  readonly yearEnd: number; // inclusive
}

export interface CrawlerConfig {
  readonly baseUrl: string;
  readonly outputPath: string;
  readonly dbPath: string;
  readonly throttleMs: number;
  readonly probeTimeoutMs: number;
  readonly listingTimeoutMs: number;
  readonly userAgent: string;
  readonly probeRetries: number;
  readonly scanRange: ScanRange;
}

export type CrawlerConfigOverrides = Partial<Omit<CrawlerConfig, "scanRange">> & {
  scanRange?: Partial<ScanRange>;
};

const makesSchema = z.array(z.string().trim().min(1)).min(1);

export function loadMakes(): string[] {
  const raw = readFileSync(new URL("./data/makes.json", import.meta.url), "utf-8");
  return makesSchema.parse(JSON.parse(raw));
}

export const config = {
  baseUrl: process.env.MANIFEST_BASE_URL || "https://charm.li",
  outputPath: process.env.MANIFEST_OUTPUT_PATH || "charm_manifest.csv",
  dbPath: process.env.DB_PATH || "data/manuals.db",
  scrapeDelayMs: parseInt(process.env.SCRAPE_DELAY_MS || "300", 10),
  yearStart: parseInt(process.env.MANIFEST_YEAR_START || "1980", 10),
  yearEnd: parseInt(process.env.MANIFEST_YEAR_END || "2024", 10),
  probeRetries: parseInt(process.env.MANIFEST_PROBE_RETRIES || "0", 10),
  userAgent: process.env.MANIFEST_USER_AGENT || "Mozilla/5.0",
};

function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: ${value} (expected an integer >= ${min})`);
  }
}

/**
 * Builds the frozen configuration a crawl runs with. Anything not overridden
 * comes from the environment-backed `config` above.
 */
export function createCrawlerConfig(overrides: CrawlerConfigOverrides = {}): CrawlerConfig {
  const { scanRange: rangeOverrides, ...rest } = overrides;

  const scanRange: ScanRange = {
    makes: rangeOverrides?.makes ?? loadMakes(),
    yearStart: rangeOverrides?.yearStart ?? config.yearStart,
    yearEnd: rangeOverrides?.yearEnd ?? config.yearEnd,
  };

  const merged: CrawlerConfig = {
    baseUrl: config.baseUrl,
    outputPath: config.outputPath,
    dbPath: config.dbPath,
    throttleMs: config.scrapeDelayMs,
    probeTimeoutMs: 10_000,
    listingTimeoutMs: 15_000,
    userAgent: config.userAgent,
    probeRetries: config.probeRetries,
    ...rest,
    scanRange,
  };

  // Bundle URLs are built as base + "/bundle" + href
  const baseUrl = merged.baseUrl.replace(/\/+$/, "");
  try {
    new URL(baseUrl);
  } catch {
    throw new Error(`Invalid base URL: ${merged.baseUrl}`);
  }

  assertInteger("yearStart", scanRange.yearStart, 0);
  assertInteger("yearEnd", scanRange.yearEnd, 0);
  if (scanRange.yearStart > scanRange.yearEnd) {
    throw new Error(`Invalid year range: ${scanRange.yearStart} > ${scanRange.yearEnd}`);
  }
  if (scanRange.makes.length === 0) {
    throw new Error("Scan range has no makes");
  }
  assertInteger("throttleMs", merged.throttleMs, 0);
  assertInteger("probeTimeoutMs", merged.probeTimeoutMs, 1);
  assertInteger("listingTimeoutMs", merged.listingTimeoutMs, 1);
  assertInteger("probeRetries", merged.probeRetries, 0);

  return Object.freeze({
    ...merged,
    baseUrl,
    scanRange: Object.freeze({ ...scanRange, makes: Object.freeze([...scanRange.makes]) }),
  });
}

export function yearsOf(range: ScanRange): number[] {
  const years: number[] = [];
  for (let year = range.yearStart; year <= range.yearEnd; year++) years.push(year);
  return years;
}
