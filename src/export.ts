/**
 * CSV export of scraped books
 */

import * as fs from "node:fs/promises";
import { stringify } from "csv-stringify/sync";
import { ExportError } from "./errors.js";
import type { BookRecord } from "./types.js";

/** Column order of the exported file */
export const CSV_COLUMNS = [
  "title",
  "author",
  "publish_date",
  "isbn",
  "rating",
  "avg_rating",
  "pages",
  "book_url",
  "author_url",
  "shelf",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

/**
 * Output filename for a user's export.
 *
 * @example
 * exportFilename('jane') // 'jane_goodreads_books.csv'
 */
export function exportFilename(username: string): string {
  return `${username}_goodreads_books.csv`;
}

/**
 * Flatten a book into CSV cells. Unset fields become empty strings.
 */
export function toCsvRow(book: BookRecord): Record<CsvColumn, string> {
  const cell = (value: string | number | undefined) => (value === undefined ? "" : String(value));
  return {
    title: book.title,
    author: cell(book.author),
    publish_date: cell(book.publishDate),
    isbn: cell(book.isbn),
    rating: cell(book.rating),
    avg_rating: cell(book.avgRating),
    pages: cell(book.pages),
    book_url: cell(book.bookUrl),
    author_url: cell(book.authorUrl),
    shelf: book.shelf,
  };
}

/**
 * Render books as CSV text with a header row.
 */
export function renderCsv(books: BookRecord[]): string {
  return stringify(books.map(toCsvRow), {
    header: true,
    columns: [...CSV_COLUMNS],
  });
}

/**
 * Write books to a CSV file.
 * An empty list writes nothing; a write failure is logged, not thrown.
 *
 * @returns True when the file was written
 */
export async function exportToCsv(books: BookRecord[], filename: string): Promise<boolean> {
  if (books.length === 0) {
    console.log("No books to save");
    return false;
  }

  try {
    await fs.writeFile(filename, renderCsv(books), "utf-8");
  } catch (cause) {
    const error = new ExportError(filename, cause);
    console.error(`Error saving to CSV: ${error.message}`);
    return false;
  }

  console.log(`Books saved to ${filename}`);
  return true;
}
