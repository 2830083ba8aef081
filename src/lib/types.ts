/** One row of the manifest artifact. Field names are the CSV column names. */
export interface ManifestEntry {
  make: string;
  model: string;
  year: string;
  bundle_url: string;
}

export const MANIFEST_COLUMNS = ["make", "model", "year", "bundle_url"] as const;

export interface ManifestQuery {
  make: string;
  model: string;
  year: string;
}
