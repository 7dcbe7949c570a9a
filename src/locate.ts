/**
 * Locate the elements of a shelf page that each hold one book.
 *
 * Strategies run in order and the first one that finds anything wins,
 * so the broader scans only run on layouts the narrow ones miss.
 */

import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

/** Links to a book detail page */
export const BOOK_LINK_PATTERN = /\/book\/show\//;

/** Loose class match for div-based listings */
const ENTRY_CLASS_PATTERN = /book|item|entry/;

export interface EntryStrategy {
  name: string;
  find: ($: CheerioAPI) => Element[];
}

export interface LocateResult {
  entries: Element[];
  /** Name of the strategy that matched, null when none did */
  strategy: string | null;
}

/**
 * Check whether an element contains at least one book detail link.
 */
export function hasBookLink($: CheerioAPI, element: Element): boolean {
  return $(element)
    .find("a[href]")
    .toArray()
    .some((link) => BOOK_LINK_PATTERN.test($(link).attr("href") ?? ""));
}

/**
 * Find every book detail link on the page, for diagnostics.
 */
export function findBookLinks($: CheerioAPI): Array<{ href: string; text: string }> {
  return $("a[href]")
    .toArray()
    .map((link) => ({ href: $(link).attr("href") ?? "", text: $(link).text().trim() }))
    .filter((link) => BOOK_LINK_PATTERN.test(link.href));
}

export const ENTRY_STRATEGIES: readonly EntryStrategy[] = [
  {
    name: "bookalike rows",
    find: ($) => $("tr.bookalike").toArray(),
  },
  {
    name: "table rows with book links",
    find: ($) => $("tr").toArray().filter((row) => hasBookLink($, row)),
  },
  {
    name: "book-like containers",
    find: ($) =>
      $("div[class]")
        .toArray()
        .filter((div) => ENTRY_CLASS_PATTERN.test($(div).attr("class") ?? "") && hasBookLink($, div)),
  },
];

/**
 * Run the strategies in order and return the first non-empty match.
 *
 * @param $ - Parsed shelf page
 * @param strategies - Ordered strategies to try
 */
export function locateEntries($: CheerioAPI, strategies: readonly EntryStrategy[] = ENTRY_STRATEGIES): LocateResult {
  for (const strategy of strategies) {
    const entries = strategy.find($);
    if (entries.length > 0) {
      return { entries, strategy: strategy.name };
    }
  }
  return { entries: [], strategy: null };
}
