import * as cheerio from "cheerio";
import type { CrawlerConfig } from "../config";
import { errorMessage, fetchPage } from "../scraping/utils";
import type { ListingLink, ListingScrape } from "./types";
import { bundleUrl, listingPath } from "./urls";

export interface ListingContext {
  baseUrl: string;
  encodedMake: string;
  year: number;
}

/**
 * Extracts per-model detail links from a listing page and maps each to its
 * bundle URL. Links outside `/{make}/{year}/`, and the page's own
 * `.../bundle/` links, are dropped. Document order, duplicates kept.
 */
export function parseListingLinks(html: string, ctx: ListingContext): ListingLink[] {
  const $ = cheerio.load(html);
  const prefix = listingPath(ctx.encodedMake, ctx.year);
  const links: ListingLink[] = [];

  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") ?? "").trim();
    if (!href.startsWith(prefix) || href.endsWith("/bundle/")) return;

    links.push({
      model: $(el).text().trim(),
      bundleUrl: bundleUrl(ctx.baseUrl, href),
    });
  });

  return links;
}

export async function scrapeListing(
  config: CrawlerConfig,
  encodedMake: string,
  year: number,
  url: string
): Promise<ListingScrape> {
  let html: string;
  try {
    html = await fetchPage(url, {
      timeoutMs: config.listingTimeoutMs,
      userAgent: config.userAgent,
    });
  } catch (err) {
    const message = errorMessage(err);
    console.warn(`[listing] Couldn't fetch ${url}: ${message}`);
    return { links: [], error: message };
  }

  return {
    links: parseListingLinks(html, { baseUrl: config.baseUrl, encodedMake, year }),
    error: null,
  };
}
