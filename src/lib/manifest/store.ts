import type Database from "better-sqlite3";
import type { ManifestEntry, ManifestQuery } from "../types";

/** Replaces the contents of the manifest table. Returns the row count. */
export function importManifest(db: Database.Database, entries: ManifestEntry[]): number {
  const insert = db.prepare(
    "INSERT INTO manifest (make, model, year, bundle_url) VALUES (@make, @model, @year, @bundle_url)"
  );

  db.transaction(() => {
    db.prepare("DELETE FROM manifest").run();
    for (const entry of entries) insert.run(entry);
  })();

  return entries.length;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/**
 * First bundle URL whose make and year match exactly and whose model
 * contains `query.model`, ignoring case.
 */
export function findBundleUrl(db: Database.Database, query: ManifestQuery): string | null {
  const row = db
    .prepare(
      `SELECT bundle_url FROM manifest
       WHERE make = ? AND year = ? AND model LIKE ? ESCAPE '\\'
       ORDER BY id
       LIMIT 1`
    )
    .get(query.make, query.year, `%${escapeLike(query.model.trim())}%`) as
    | { bundle_url: string }
    | undefined;

  return row?.bundle_url ?? null;
}

export function countManifestRows(db: Database.Database): number {
  const row = db.prepare("SELECT COUNT(*) AS n FROM manifest").get() as { n: number };
  return row.n;
}
