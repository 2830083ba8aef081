import { pathToFileURL } from "url";
import { createCrawlerConfig, loadMakes, type CrawlerConfigOverrides } from "../lib/config";
import { closeDb, getDb } from "../lib/db";
import { CrawlCheckpoint } from "../lib/crawler/checkpoint";
import { ManifestBuilder } from "../lib/crawler/manifest-builder";
import { readManifestCsv } from "../lib/manifest/csv";
import { importManifest } from "../lib/manifest/store";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface BuildArgs {
  makes: string[]; // resolved to their canonical spelling; empty means all
  yearStart?: number;
  yearEnd?: number;
  outputPath?: string;
  resume: boolean;
  importAfter: boolean;
}

function parseYear(flag: string, value: string | undefined): number {
  const year = Number(value);
  if (!value || !/^\d{4}$/.test(value) || !Number.isInteger(year)) {
    throw new UsageError(`${flag} expects a year, got ${value ?? "nothing"}`);
  }
  return year;
}

export function parseBuildArgs(argv: string[], available: readonly string[] = loadMakes()): BuildArgs {
  const requested: string[] = [];
  const parsed: BuildArgs = { makes: [], resume: false, importAfter: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--make") {
      const value = argv[++i];
      if (!value) throw new UsageError("--make expects a make name");
      requested.push(value);
    } else if (arg === "--from") {
      parsed.yearStart = parseYear(arg, argv[++i]);
    } else if (arg === "--to") {
      parsed.yearEnd = parseYear(arg, argv[++i]);
    } else if (arg === "--output") {
      const value = argv[++i];
      if (!value) throw new UsageError("--output expects a path");
      parsed.outputPath = value;
    } else if (arg === "--resume") {
      parsed.resume = true;
    } else if (arg === "--import") {
      parsed.importAfter = true;
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (parsed.yearStart !== undefined && parsed.yearEnd !== undefined && parsed.yearStart > parsed.yearEnd) {
    throw new UsageError(`--from ${parsed.yearStart} is after --to ${parsed.yearEnd}`);
  }

  const byLower = new Map(available.map((m) => [m.toLowerCase(), m]));
  const unknown = requested.filter((m) => !byLower.has(m.toLowerCase()));
  if (unknown.length > 0) {
    throw new UsageError(`Unknown make(s): ${unknown.join(", ")}. Available: ${available.join(", ")}`);
  }
  parsed.makes = requested.map((m) => byLower.get(m.toLowerCase()) ?? m);

  return parsed;
}

async function main() {
  const args = parseBuildArgs(process.argv.slice(2));

  const overrides: CrawlerConfigOverrides = {
    ...(args.outputPath ? { outputPath: args.outputPath } : {}),
    scanRange: {
      yearStart: args.yearStart,
      yearEnd: args.yearEnd,
      ...(args.makes.length > 0 ? { makes: args.makes } : {}),
    },
  };

  const config = createCrawlerConfig(overrides);
  const range = config.scanRange;
  console.log(
    `Scanning ${range.makes.length} makes, ${range.yearStart}-${range.yearEnd}, against ${config.baseUrl}`
  );

  const db = args.resume || args.importAfter ? getDb(config.dbPath) : null;
  const checkpoint = args.resume && db ? new CrawlCheckpoint(db, config.baseUrl) : undefined;

  const builder = new ManifestBuilder(config, { checkpoint });
  const writtenPath = await builder.build();

  const stats = builder.stats;
  console.log(`\n=== Summary ===`);
  console.log(`Probes: ${stats.probes}`);
  console.log(`Listings found: ${stats.listingsFound}`);
  console.log(`Listing failures: ${stats.listingFailures}`);
  console.log(`Indeterminate probes: ${stats.indeterminateProbes}`);
  if (args.resume) console.log(`Resumed pairs: ${stats.resumedPairs}`);
  console.log(`Entries: ${stats.entries}`);

  if (args.importAfter && db) {
    const count = importManifest(db, readManifestCsv(writtenPath));
    console.log(`Imported ${count} rows into ${config.dbPath}`);
  }

  closeDb();
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    if (err instanceof UsageError) {
      console.error(err.message);
    } else {
      console.error("Fatal error:", err);
    }
    closeDb();
    process.exit(1);
  });
}
