import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { formatManifestCsv, parseManifestCsv, readManifestCsv, writeManifestCsv } from "../lib/manifest/csv";
import type { ManifestEntry } from "../lib/types";

function makeEntry(overrides: Partial<ManifestEntry> = {}): ManifestEntry {
  return {
    make: "Toyota",
    model: "Camry LE",
    year: "2006",
    bundle_url: "https://charm.li/bundle/Toyota/2006/camry-le/",
    ...overrides,
  };
}

describe("formatManifestCsv", () => {
  it("writes the header in the fixed column order", () => {
    expect(formatManifestCsv([makeEntry()])).toBe(
      "make,model,year,bundle_url\nToyota,Camry LE,2006,https://charm.li/bundle/Toyota/2006/camry-le/\n"
    );
  });

  it("quotes embedded commas and quotes", () => {
    const csv = formatManifestCsv([
      makeEntry({ model: "Camry, LE" }),
      makeEntry({ make: "Saab", model: '9-3 "Viggen"', year: "1999", bundle_url: "https://charm.li/bundle/Saab/1999/9-3/" }),
    ]);

    expect(csv.split("\n")).toEqual([
      "make,model,year,bundle_url",
      'Toyota,"Camry, LE",2006,https://charm.li/bundle/Toyota/2006/camry-le/',
      'Saab,"9-3 ""Viggen""",1999,https://charm.li/bundle/Saab/1999/9-3/',
      "",
    ]);
  });

  it("leaves an empty model empty", () => {
    expect(formatManifestCsv([makeEntry({ model: "" })])).toBe(
      "make,model,year,bundle_url\nToyota,,2006,https://charm.li/bundle/Toyota/2006/camry-le/\n"
    );
  });
});

describe("parseManifestCsv", () => {
  it("reads back what was written", () => {
    const entries = [makeEntry({ model: "Camry, LE" }), makeEntry({ model: "" })];
    expect(parseManifestCsv(formatManifestCsv(entries))).toEqual(entries);
  });

  it("rejects a row with a malformed year", () => {
    const csv = "make,model,year,bundle_url\nToyota,Camry,06,https://charm.li/bundle/Toyota/2006/camry/\n";
    expect(() => parseManifestCsv(csv)).toThrow();
  });

  it("rejects a row whose bundle URL is not a URL", () => {
    const csv = "make,model,year,bundle_url\nToyota,Camry,2006,/bundle/Toyota/2006/camry/\n";
    expect(() => parseManifestCsv(csv)).toThrow();
  });
});

describe("writeManifestCsv", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("creates missing directories and can be read back", () => {
    dir = mkdtempSync(path.join(tmpdir(), "manifest-csv-"));
    const filePath = path.join(dir, "nested", "manifest.csv");

    writeManifestCsv(filePath, [makeEntry()]);

    expect(readFileSync(filePath, "utf-8").split("\n")[0]).toBe("make,model,year,bundle_url");
    expect(readManifestCsv(filePath)).toEqual([makeEntry()]);
  });
});
