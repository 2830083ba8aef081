import { mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { MANIFEST_COLUMNS, type ManifestEntry } from "../types";

const manifestRowSchema = z.object({
  make: z.string(),
  model: z.string(),
  year: z.string().regex(/^\d{4}$/),
  bundle_url: z.string().url(),
});

export function formatManifestCsv(entries: ManifestEntry[]): string {
  return stringify(entries, {
    header: true,
    columns: [...MANIFEST_COLUMNS],
  });
}

/**
 * Replaces the artifact at `filePath`. The old file is removed first, so a
 * failed write leaves no manifest behind.
 */
export function writeManifestCsv(filePath: string, entries: ManifestEntry[]): void {
  rmSync(filePath, { force: true });
  mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  writeFileSync(filePath, formatManifestCsv(entries), "utf-8");
}

export function parseManifestCsv(content: string): ManifestEntry[] {
  const records: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
  });
  return z.array(manifestRowSchema).parse(records);
}

export function readManifestCsv(filePath: string): ManifestEntry[] {
  return parseManifestCsv(readFileSync(filePath, "utf-8"));
}
