/**
 * Page through one shelf of a user's books
 */

import * as fs from "node:fs/promises";
import type { CheerioAPI } from "cheerio";
import { loadHtml, type ShelfPageSource } from "./client.js";
import { FetchError } from "./errors.js";
import { extractBook } from "./extract.js";
import { findBookLinks, locateEntries } from "./locate.js";
import type { BookRecord, ExtractedBook, Shelf, ShelfScrapeOptions } from "./types.js";
import { delay } from "./utils.js";

/** Page caps per shelf; currently-reading lists are short */
export const DEFAULT_MAX_PAGES: Record<Shelf, number> = {
  read: 50,
  "currently-reading": 10,
};

/** Pause between page requests (ms) */
export const DEFAULT_PAGE_DELAY = 1000;

const SHELF_LABELS: Record<Shelf, string> = {
  read: "read",
  "currently-reading": "currently reading",
};

const DEBUG_DUMP_PREFIXES: Record<Shelf, string> = {
  read: "debug_page",
  "currently-reading": "debug_currently_reading",
};

/** Marker Goodreads puts on the pagination "next" link */
const NEXT_PAGE_SELECTOR = "a.next_page";

/**
 * Name of the raw markup dump written for a shelf's first page.
 *
 * @example
 * debugDumpFilename('jane', 'read') // 'debug_page_jane.html'
 */
export function debugDumpFilename(username: string, shelf: Shelf): string {
  return `${DEBUG_DUMP_PREFIXES[shelf]}_${username}.html`;
}

async function writeDebugDump($: CheerioAPI, filename: string): Promise<void> {
  try {
    await fs.writeFile(filename, $.html(), "utf-8");
    console.log(`Saved debug HTML to ${filename}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Warning: could not save debug HTML to ${filename}: ${message}`);
  }
}

/** Print the book links that were present when no entries matched */
function logBookLinks($: CheerioAPI): void {
  const links = findBookLinks($);
  console.log(`Found ${links.length} book links on page`);
  if (links.length > 0) {
    console.log("First few book links:");
    links.slice(0, 3).forEach((link, i) => {
      console.log(`  ${i + 1}. ${link.href} - ${link.text}`);
    });
  }
}

/**
 * Scrape every page of a shelf until the listing runs out.
 *
 * Stops on the first page with no entries, no extracted books or no next
 * link, at the page cap, or when a request fails. A failed request ends
 * this shelf only; books from earlier pages are still returned.
 *
 * @param source - Client used to build URLs and fetch pages
 * @param username - Goodreads user name or id
 * @param shelf - Shelf to page through; every returned book is tagged with it
 * @param options - Page cap and delay overrides
 */
export async function scrapeShelf(
  source: ShelfPageSource,
  username: string,
  shelf: Shelf,
  options: Partial<ShelfScrapeOptions> = {},
): Promise<BookRecord[]> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES[shelf];
  const pageDelay = options.pageDelay ?? DEFAULT_PAGE_DELAY;
  const label = SHELF_LABELS[shelf];
  const books: BookRecord[] = [];
  let page = 1;

  console.log(`Scraping ${label} books for user: ${username}`);

  while (page <= maxPages) {
    console.log(`Scraping ${label} page ${page}...`);

    let html: string;
    try {
      html = await source.fetchHtml(source.shelfUrl(username, shelf, page));
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      console.error(`Error scraping ${label} page ${page}: ${error.message}`);
      break;
    }

    const $ = loadHtml(html);

    if (page === 1) {
      await writeDebugDump($, debugDumpFilename(username, shelf));
    }

    const { entries, strategy } = locateEntries($);
    if (entries.length === 0) {
      console.log(`No ${label} book entries found on page ${page}`);
      logBookLinks($);
      break;
    }
    console.log(`Found ${entries.length} potential ${label} book entries (${strategy})`);

    const pageBooks = entries
      .map((entry) => extractBook($, entry))
      .filter((book): book is ExtractedBook => book !== null)
      .map((book): BookRecord => ({ ...book, shelf }));

    if (pageBooks.length === 0) {
      console.log(`No ${label} books extracted from page ${page}`);
      console.log("First entry HTML structure:");
      console.log($.html(entries[0]).slice(0, 500));
      break;
    }

    books.push(...pageBooks);
    console.log(`Found ${pageBooks.length} ${label} books on page ${page}`);

    if ($(NEXT_PAGE_SELECTOR).length === 0) {
      console.log("No next page found");
      break;
    }

    page++;
    if (page <= maxPages) {
      await delay(pageDelay);
    }
  }

  console.log(`Total ${label} books scraped: ${books.length}`);
  return books;
}
