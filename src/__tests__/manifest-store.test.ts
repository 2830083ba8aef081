import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { initSchema } from "../lib/db";
import { countManifestRows, findBundleUrl, importManifest } from "../lib/manifest/store";
import type { ManifestEntry } from "../lib/types";

const ENTRIES: ManifestEntry[] = [
  { make: "Toyota", model: "Camry LE", year: "2006", bundle_url: "https://charm.li/bundle/Toyota/2006/camry-le/" },
  { make: "Toyota", model: "Camry XLE", year: "2006", bundle_url: "https://charm.li/bundle/Toyota/2006/camry-xle/" },
  { make: "Toyota", model: "RAV4 4WD", year: "2006", bundle_url: "https://charm.li/bundle/Toyota/2006/rav4-4wd/" },
  { make: "Toyota", model: "Camry", year: "2007", bundle_url: "https://charm.li/bundle/Toyota/2007/camry/" },
  { make: "Land Rover", model: "Discovery", year: "1998", bundle_url: "https://charm.li/bundle/Land%20Rover/1998/discovery/" },
];

describe("manifest store", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
    initSchema(db);
    importManifest(db, ENTRIES);
  });

  afterEach(() => {
    db.close();
  });

  it("returns the first match for a model substring", () => {
    expect(findBundleUrl(db, { make: "Toyota", model: "Camry", year: "2006" })).toBe(
      "https://charm.li/bundle/Toyota/2006/camry-le/"
    );
  });

  it("ignores case when matching the model", () => {
    expect(findBundleUrl(db, { make: "Toyota", model: "rav4", year: "2006" })).toBe(
      "https://charm.li/bundle/Toyota/2006/rav4-4wd/"
    );
    expect(findBundleUrl(db, { make: "Toyota", model: "xle", year: "2006" })).toBe(
      "https://charm.li/bundle/Toyota/2006/camry-xle/"
    );
  });

  it("requires an exact make and year", () => {
    expect(findBundleUrl(db, { make: "Toyota", model: "Camry", year: "2007" })).toBe(
      "https://charm.li/bundle/Toyota/2007/camry/"
    );
    expect(findBundleUrl(db, { make: "Toyota", model: "Camry", year: "2008" })).toBeNull();
    expect(findBundleUrl(db, { make: "Land Rover", model: "disco", year: "1998" })).toBe(
      "https://charm.li/bundle/Land%20Rover/1998/discovery/"
    );
  });

  it("treats LIKE wildcards in the query literally", () => {
    expect(findBundleUrl(db, { make: "Toyota", model: "C_mry", year: "2006" })).toBeNull();
    expect(findBundleUrl(db, { make: "Toyota", model: "%", year: "2006" })).toBeNull();
  });

  it("replaces the table on re-import", () => {
    expect(countManifestRows(db)).toBe(5);

    const count = importManifest(db, ENTRIES.slice(0, 2));

    expect(count).toBe(2);
    expect(countManifestRows(db)).toBe(2);
    expect(findBundleUrl(db, { make: "Toyota", model: "Camry", year: "2007" })).toBeNull();
  });
});
