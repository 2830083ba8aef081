import { existsSync } from "fs";
import { pathToFileURL } from "url";
import { createCrawlerConfig } from "../lib/config";
import { closeDb, getDb } from "../lib/db";
import { readManifestCsv } from "../lib/manifest/csv";
import { countManifestRows, findBundleUrl, importManifest } from "../lib/manifest/store";
import type { ManifestQuery } from "../lib/types";
import { UsageError } from "./build-manifest";

const USAGE = "Usage: query-manifest --make <make> --model <model> --year <year>";

export function parseQueryArgs(argv: string[]): ManifestQuery {
  const values: Partial<ManifestQuery> = {};

  for (let i = 0; i < argv.length; i++) {
    const match = /^--(make|model|year)$/.exec(argv[i]);
    const value = argv[i + 1];
    if (!match || !value) throw new UsageError(USAGE);
    const key = match[1];
    if (key === "make") values.make = value;
    else if (key === "model") values.model = value;
    else values.year = value;
    i++;
  }

  const { make, model, year } = values;
  if (!make || !model || !year) throw new UsageError(USAGE);
  return { make, model, year };
}

function main() {
  const query = parseQueryArgs(process.argv.slice(2));
  const config = createCrawlerConfig();
  const db = getDb(config.dbPath);

  if (countManifestRows(db) === 0) {
    if (!existsSync(config.outputPath)) {
      console.error(`No manifest imported and ${config.outputPath} not found. Run build-manifest first.`);
      closeDb();
      process.exit(1);
    }
    const count = importManifest(db, readManifestCsv(config.outputPath));
    console.log(`[manifest] Imported ${count} rows from ${config.outputPath}`);
  }

  const url = findBundleUrl(db, query);
  closeDb();

  if (!url) {
    console.error(`No manual found for ${query.make} ${query.model} ${query.year}`);
    process.exit(1);
  }
  console.log(url);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    main();
  } catch (err) {
    console.error(err instanceof UsageError ? err.message : `Fatal error: ${String(err)}`);
    closeDb();
    process.exit(1);
  }
}
