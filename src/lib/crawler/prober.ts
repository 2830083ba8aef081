import type { CrawlerConfig } from "../config";
import { errorMessage, fetchStatus } from "../scraping/utils";
import type { ProbeOutcome } from "./types";
import { listingUrl } from "./urls";

const ABSENT_STATUSES = new Set([404, 410]);

/**
 * Checks whether the listing page for an (encoded make, year) exists.
 * Only the status is looked at. Never throws.
 */
export async function probeListing(
  config: CrawlerConfig,
  encodedMake: string,
  year: number
): Promise<ProbeOutcome> {
  const url = listingUrl(config.baseUrl, encodedMake, year);

  try {
    const status = await fetchStatus(url, {
      timeoutMs: config.probeTimeoutMs,
      userAgent: config.userAgent,
    });
    if (status === 200) return { kind: "present", url };
    if (ABSENT_STATUSES.has(status)) return { kind: "absent", url, status };
    return { kind: "indeterminate", url, cause: `HTTP ${status}` };
  } catch (err) {
    return { kind: "indeterminate", url, cause: errorMessage(err) };
  }
}

export function listingUrlOf(outcome: ProbeOutcome): string | null {
  return outcome.kind === "present" ? outcome.url : null;
}
