/**
 * Console summaries of scraped books
 */

import type { BookRecord } from "./types.js";

const RULE = "=".repeat(80);
const PREVIEW_COUNT = 5;

/**
 * Count books per publication decade, ascending.
 * Books whose publish date is not a plain year are skipped.
 *
 * @example
 * countByDecade(books) // [[1920, 1], [2010, 3]]
 */
export function countByDecade(books: BookRecord[]): Array<[number, number]> {
  const decades = new Map<number, number>();
  for (const book of books) {
    if (!book.publishDate || !/^-?\d+$/.test(book.publishDate)) continue;
    const decade = Math.floor(parseInt(book.publishDate, 10) / 10) * 10;
    decades.set(decade, (decades.get(decade) ?? 0) + 1);
  }
  return [...decades.entries()].sort((a, b) => a[0] - b[0]);
}

/**
 * Rank authors by number of books. Ties keep the order authors were first seen.
 *
 * @param limit - Maximum number of authors to return
 */
export function topAuthors(books: BookRecord[], limit = 10): Array<[string, number]> {
  const authors = new Map<string, number>();
  for (const book of books) {
    if (!book.author) continue;
    authors.set(book.author, (authors.get(book.author) ?? 0) + 1);
  }
  // Array.prototype.sort is stable, and Map iterates in insertion order
  return [...authors.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

/** Heading block used between report sections */
export function banner(title: string): string[] {
  return ["", RULE, title, RULE];
}

/** Title line plus the optional published/rating lines used in listings */
function describeBook(index: number, book: BookRecord, withShelf = false): string[] {
  const shelfInfo = withShelf ? ` [${book.shelf}]` : "";
  const lines = [`${index}. ${book.title} by ${book.author ?? "Unknown"}${shelfInfo}`];
  if (book.publishDate) lines.push(`   Published: ${book.publishDate}`);
  if (book.rating) lines.push(`   Rating: ${book.rating}`);
  lines.push("");
  return lines;
}

/**
 * Total, decade histogram and top authors for a set of books.
 */
export function formatBooksSummary(books: BookRecord[]): string[] {
  if (books.length === 0) {
    return ["No books found"];
  }

  const lines = [...banner("BOOKS SUMMARY"), `Total books: ${books.length}`];

  const decades = countByDecade(books);
  if (decades.length > 0) {
    lines.push("", "Books by decade:");
    for (const [decade, count] of decades) {
      lines.push(`  ${decade}s: ${count} books`);
    }
  }

  const authors = topAuthors(books);
  if (authors.length > 0) {
    lines.push("", "Top authors:");
    for (const [author, count] of authors) {
      lines.push(`  ${author}: ${count} books`);
    }
  }

  lines.push("", RULE);
  return lines;
}

/**
 * Numbered listing of the currently-reading shelf.
 */
export function formatCurrentlyReading(books: BookRecord[]): string[] {
  const lines = [
    ...banner("CURRENTLY READING SUMMARY"),
    `Total currently reading books: ${books.length}`,
    "",
    "Currently reading books:",
  ];
  books.forEach((book, i) => lines.push(...describeBook(i + 1, book)));
  return lines;
}

/**
 * Shelf totals and a short preview of the first few books.
 */
export function formatCombinedSummary(readBooks: BookRecord[], currentBooks: BookRecord[]): string[] {
  const all = [...readBooks, ...currentBooks];
  const lines = [
    ...banner("COMBINED SUMMARY"),
    `Total books: ${all.length} (${readBooks.length} read, ${currentBooks.length} currently reading)`,
    "",
    `First ${PREVIEW_COUNT} books preview:`,
    "-".repeat(50),
  ];
  all.slice(0, PREVIEW_COUNT).forEach((book, i) => lines.push(...describeBook(i + 1, book, true)));
  if (all.length > PREVIEW_COUNT) {
    lines.push(`... and ${all.length - PREVIEW_COUNT} more books`);
  }
  return lines;
}

/**
 * Troubleshooting hints printed when neither shelf produced any books.
 */
export function formatNoBooksHelp(username: string): string[] {
  return [
    "No books found. Please check:",
    "1. The username is correct",
    "2. The profile is public",
    "3. The user has marked books as read or currently reading",
    "",
    `Debug information has been saved to debug_page_${username}.html`,
  ];
}

/** Write report lines to stdout */
export function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}
