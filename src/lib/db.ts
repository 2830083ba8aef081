import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import path from "path";
import { config } from "./config";

const open = new Map<string, Database.Database>();

/** One connection per resolved path, opened on first use. */
export function getDb(dbPath: string = config.dbPath): Database.Database {
  const resolved = path.resolve(process.cwd(), dbPath);
  const existing = open.get(resolved);
  if (existing) return existing;

  const dir = path.dirname(resolved);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const db = new Database(resolved);
  db.pragma("journal_mode = WAL");

  initSchema(db);
  open.set(resolved, db);
  return db;
}

export function closeDb(): void {
  for (const db of open.values()) db.close();
  open.clear();
}

export function initSchema(db: Database.Database): void {
  // Checkpoint tables predating per-origin scoping hold nothing worth keeping
  const progressCols = db.pragma("table_info(crawl_progress)") as { name: string }[];
  if (progressCols.length > 0 && !progressCols.some((c) => c.name === "origin")) {
    db.exec("DROP TABLE crawl_progress; DROP TABLE IF EXISTS crawl_entries;");
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS manifest (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      make TEXT NOT NULL,
      model TEXT NOT NULL,
      year TEXT NOT NULL,
      bundle_url TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_manifest_make_year ON manifest(make, year);

    CREATE TABLE IF NOT EXISTS crawl_progress (
      origin TEXT NOT NULL,
      make TEXT NOT NULL,
      year INTEGER NOT NULL,
      completed_at TEXT NOT NULL,
      PRIMARY KEY (origin, make, year)
    );

    CREATE TABLE IF NOT EXISTS crawl_entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      origin TEXT NOT NULL,
      make TEXT NOT NULL,
      year INTEGER NOT NULL,
      model TEXT NOT NULL,
      bundle_url TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_crawl_entries_pair ON crawl_entries(origin, make, year);
  `);
}
