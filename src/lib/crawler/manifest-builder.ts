import { yearsOf, type CrawlerConfig } from "../config";
import { writeManifestCsv } from "../manifest/csv";
import { Throttle } from "../scraping/throttle";
import type { ManifestEntry } from "../types";
import type { CrawlCheckpoint } from "./checkpoint";
import { scrapeListing } from "./listing";
import { probeListing } from "./prober";
import type { ListingLink, ProbeOutcome } from "./types";
import { encodeMake } from "./urls";

export interface ManifestBuilderDeps {
  throttle?: Throttle;
  checkpoint?: CrawlCheckpoint;
}

export interface BuildStats {
  probes: number;
  listingsFound: number;
  listingFailures: number;
  indeterminateProbes: number;
  resumedPairs: number;
  entries: number;
}

function emptyStats(): BuildStats {
  return {
    probes: 0,
    listingsFound: 0,
    listingFailures: 0,
    indeterminateProbes: 0,
    resumedPairs: 0,
    entries: 0,
  };
}

/**
 * Walks every (make, year) pair of the scan range in order, collects the
 * bundle links of each existing listing page and writes them out once at
 * the end.
 */
export class ManifestBuilder {
  private readonly throttle: Throttle;
  private readonly checkpoint: CrawlCheckpoint | null;
  private lastStats: BuildStats = emptyStats();

  constructor(
    private readonly config: CrawlerConfig,
    deps: ManifestBuilderDeps = {}
  ) {
    this.throttle = deps.throttle ?? new Throttle(config.throttleMs);
    this.checkpoint = deps.checkpoint ?? null;
  }

  get stats(): BuildStats {
    return { ...this.lastStats };
  }

  async build(): Promise<string> {
    const stats = emptyStats();
    this.lastStats = stats;
    const manifest: ManifestEntry[] = [];
    const years = yearsOf(this.config.scanRange);

    if (this.checkpoint) {
      console.log(`[checkpoint] Resuming with ${this.checkpoint.completedCount()} completed pairs`);
    }

    for (const make of this.config.scanRange.makes) {
      const encoded = encodeMake(make);
      console.log(`[manifest] Checking ${make}`);

      for (const year of years) {
        const links = await this.collectYear(make, encoded, year, stats);
        for (const link of links) {
          manifest.push({
            make,
            model: link.model,
            year: String(year),
            bundle_url: link.bundleUrl,
          });
        }
      }
    }

    writeManifestCsv(this.config.outputPath, manifest);
    stats.entries = manifest.length;
    console.log(`[manifest] Wrote ${manifest.length} entries to ${this.config.outputPath}`);

    this.checkpoint?.clear();
    return this.config.outputPath;
  }

  private async collectYear(
    make: string,
    encodedMake: string,
    year: number,
    stats: BuildStats
  ): Promise<ListingLink[]> {
    if (this.checkpoint?.isComplete(make, year)) {
      stats.resumedPairs++;
      return this.checkpoint.entriesFor(make, year);
    }

    const outcome = await this.probe(encodedMake, year, stats);
    if (outcome.kind !== "present") {
      if (outcome.kind === "indeterminate") {
        stats.indeterminateProbes++;
      } else {
        this.checkpoint?.markComplete(make, year, []);
      }
      return [];
    }

    console.log(`[manifest] Found ${make} ${year}`);
    stats.listingsFound++;
    const scrape = await scrapeListing(this.config, encodedMake, year, outcome.url);
    await this.throttle.throttle();

    if (scrape.error !== null) {
      stats.listingFailures++;
      return [];
    }

    this.checkpoint?.markComplete(make, year, scrape.links);
    return scrape.links;
  }

  private async probe(encodedMake: string, year: number, stats: BuildStats): Promise<ProbeOutcome> {
    const attempt = async () => {
      await this.throttle.throttle();
      stats.probes++;
      return probeListing(this.config, encodedMake, year);
    };

    let outcome = await attempt();
    let retriesLeft = this.config.probeRetries;
    while (outcome.kind === "indeterminate" && retriesLeft > 0) {
      console.warn(`[probe] ${outcome.url} indeterminate (${outcome.cause}), retrying`);
      retriesLeft--;
      outcome = await attempt();
    }

    return outcome;
  }
}
