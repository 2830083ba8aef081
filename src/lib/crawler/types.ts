export interface ListingLink {
  model: string;
  bundleUrl: string;
}

export type ProbeOutcome =
  | { kind: "present"; url: string }
  | { kind: "absent"; url: string; status: number }
  | { kind: "indeterminate"; url: string; cause: string };

export interface ListingScrape {
  links: ListingLink[];
  error: string | null; // set when the page could not be fetched; links is then empty
}
