import type Database from "better-sqlite3";
import type { ListingLink } from "./types";

/**
 * Resume cursor over (make, year) pairs of one origin. A pair is either
 * complete, with the links it produced stored alongside, or not recorded
 * at all.
 */
export class CrawlCheckpoint {
  constructor(
    private readonly db: Database.Database,
    readonly origin: string
  ) {}

  isComplete(make: string, year: number): boolean {
    const row = this.db
      .prepare("SELECT 1 FROM crawl_progress WHERE origin = ? AND make = ? AND year = ?")
      .get(this.origin, make, year);
    return row !== undefined;
  }

  entriesFor(make: string, year: number): ListingLink[] {
    const rows = this.db
      .prepare(
        "SELECT model, bundle_url FROM crawl_entries WHERE origin = ? AND make = ? AND year = ? ORDER BY id"
      )
      .all(this.origin, make, year) as { model: string; bundle_url: string }[];
    return rows.map((r) => ({ model: r.model, bundleUrl: r.bundle_url }));
  }

  markComplete(make: string, year: number, links: ListingLink[]): void {
    const insertEntry = this.db.prepare(
      "INSERT INTO crawl_entries (origin, make, year, model, bundle_url) VALUES (?, ?, ?, ?, ?)"
    );
    const insertProgress = this.db.prepare(
      "INSERT OR REPLACE INTO crawl_progress (origin, make, year, completed_at) VALUES (?, ?, ?, ?)"
    );

    this.db.transaction(() => {
      this.db
        .prepare("DELETE FROM crawl_entries WHERE origin = ? AND make = ? AND year = ?")
        .run(this.origin, make, year);
      for (const link of links) {
        insertEntry.run(this.origin, make, year, link.model, link.bundleUrl);
      }
      insertProgress.run(this.origin, make, year, new Date().toISOString());
    })();
  }

  completedCount(): number {
    const row = this.db
      .prepare("SELECT COUNT(*) AS n FROM crawl_progress WHERE origin = ?")
      .get(this.origin) as { n: number };
    return row.n;
  }

  clear(): void {
    this.db.transaction(() => {
      this.db.prepare("DELETE FROM crawl_entries WHERE origin = ?").run(this.origin);
      this.db.prepare("DELETE FROM crawl_progress WHERE origin = ?").run(this.origin);
    })();
  }
}
