/**
 * Pull book fields out of a single shelf listing row.
 *
 * Goodreads renders each column as `td.field.<name>` with the visible
 * value in a `div.value` child. Every field is optional except the title.
 */

import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { GOODREADS_BASE_URL } from "./client.js";
import type { ExtractedBook } from "./types.js";
import { cleanText, resolveUrl } from "./utils.js";

/** Placeholder Goodreads prints for an empty column */
const EMPTY_VALUE = "None";

/**
 * Reduce a publication date to its year.
 *
 * @returns The first four-digit run, the trimmed text when there is none,
 * or undefined for an empty or placeholder value
 *
 * @example
 * parsePublishDate('Mar 26, 1920') // '1920'
 * parsePublishDate('Unknown') // 'Unknown'
 */
export function parsePublishDate(text: string): string | undefined {
  const trimmed = text.trim();
  if (!trimmed || trimmed === EMPTY_VALUE) return undefined;
  const year = trimmed.match(/\d{4}/);
  return year ? year[0] : trimmed;
}

/**
 * Parse an average rating such as '4.27'.
 */
export function parseAverageRating(text: string): number | undefined {
  const trimmed = text.trim();
  if (!trimmed || trimmed === EMPTY_VALUE) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Take the first run of digits from a page count such as '352 pp'.
 */
export function parsePageCount(text: string): number | undefined {
  const digits = text.match(/\d+/);
  return digits ? parseInt(digits[0], 10) : undefined;
}

function fieldCell(entry: Cheerio<Element>, field: string): Cheerio<Element> {
  return entry.find(`td.field.${field}`).first();
}

/** Cleaned text of a field's value element, undefined when the element is missing */
function fieldValue(entry: Cheerio<Element>, field: string): string | undefined {
  const value = fieldCell(entry, field).find("div.value").first();
  return value.length > 0 ? cleanText(value.text()) : undefined;
}

/** Text and absolute href of the first link in a field cell */
function fieldLink(entry: Cheerio<Element>, field: string, baseUrl: string): { text: string; url?: string } | undefined {
  const link = fieldCell(entry, field).find("a").first();
  if (link.length === 0) return undefined;
  return {
    text: cleanText(link.text()),
    url: resolveUrl(baseUrl, link.attr("href")) ?? undefined,
  };
}

function countFilledStars(entry: Cheerio<Element>): number {
  return fieldCell(entry, "rating").find("div.value").first().find("span.staticStar").filter(".p10").length;
}

/**
 * Extract one book from a located row.
 *
 * @param $ - Document the row belongs to
 * @param row - Row element from the entry locator
 * @param baseUrl - Base for resolving relative links
 * @returns The book, or null when the row has no title or could not be read
 */
export function extractBook($: CheerioAPI, row: Element, baseUrl: string = GOODREADS_BASE_URL): ExtractedBook | null {
  try {
    const entry = $(row);

    const title = fieldLink(entry, "title", baseUrl);
    if (!title?.text) return null;

    const author = fieldLink(entry, "author", baseUrl);
    const isbn = fieldValue(entry, "isbn");
    const publishDate = fieldValue(entry, "date_pub");
    const avgRating = fieldValue(entry, "avg_rating");
    const pages = fieldValue(entry, "num_pages");
    const filledStars = countFilledStars(entry);

    return {
      title: title.text,
      bookUrl: title.url,
      author: author?.text || undefined,
      authorUrl: author?.url,
      isbn: isbn && isbn !== EMPTY_VALUE ? isbn : undefined,
      publishDate: publishDate === undefined ? undefined : parsePublishDate(publishDate),
      rating: filledStars > 0 ? filledStars : undefined,
      avgRating: avgRating === undefined ? undefined : parseAverageRating(avgRating),
      pages: pages === undefined || pages === EMPTY_VALUE ? undefined : parsePageCount(pages),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error extracting book info: ${message}`);
    return null;
  }
}
