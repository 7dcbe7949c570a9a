/**
 * Markup builders for tests, shaped like Goodreads shelf and profile pages
 */

import type { BookRecord } from "../types.js";

export interface RowFields {
  title?: string;
  bookHref?: string;
  author?: string;
  authorHref?: string;
  isbn?: string;
  datePub?: string;
  avgRating?: string;
  numPages?: string;
  /** Number of filled stars out of five */
  filledStars?: number;
}

function valueCell(field: string, inner: string): string {
  return `<td class="field ${field}"><label>${field}</label><div class="value">${inner}</div></td>`;
}

function linkCell(field: string, text: string | undefined, href: string): string {
  const inner = text === undefined ? "" : `<a href="${href}" title="${text}">\n        ${text}\n      </a>`;
  return valueCell(field, inner);
}

function starsCell(filled: number): string {
  const stars = Array.from({ length: 5 }, (_, i) => `<span class="staticStar ${i < filled ? "p10" : "p0"}">star</span>`);
  return valueCell("rating", `<div class="stars">${stars.join("")}</div>`);
}

/**
 * One shelf table row. Cells for unset fields are rendered empty.
 *
 * @param className - Row class; Goodreads uses "bookalike review"
 */
export function bookRow(fields: RowFields, className = "bookalike review"): string {
  return [
    `<tr class="${className}">`,
    linkCell("title", fields.title, fields.bookHref ?? "/book/show/1"),
    linkCell("author", fields.author, fields.authorHref ?? "/author/show/1"),
    valueCell("isbn", fields.isbn ?? ""),
    valueCell("num_pages", fields.numPages === undefined ? "" : `<nobr>\n  ${fields.numPages}\n</nobr>`),
    valueCell("avg_rating", fields.avgRating ?? ""),
    valueCell("date_pub", fields.datePub ?? ""),
    starsCell(fields.filledStars ?? 0),
    "</tr>",
  ].join("\n");
}

/**
 * A full shelf page wrapping the given rows in the books table.
 */
export function shelfPage(rows: string[], options: { nextPage?: boolean } = {}): string {
  const pagination = options.nextPage
    ? '<a class="next_page" rel="next" href="?page=2">next »</a>'
    : '<span class="next_page disabled">next »</span>';
  return [
    "<!DOCTYPE html>",
    "<html><head><title>Books on shelf</title></head><body>",
    '<table id="books"><tbody id="booksBody">',
    ...rows,
    "</tbody></table>",
    `<div id="reviewPagination">${pagination}</div>`,
    "</body></html>",
  ].join("\n");
}

/**
 * A profile page with the given details.
 */
export function profilePage(details: { name: string; location: string; joined: string }): string {
  return [
    "<html><body>",
    `<h1 class="userProfileName">\n  ${details.name}\n</h1>`,
    `<div class="infoBoxRowItem"><span class="userLocation">${details.location}</span></div>`,
    `<div class="infoBoxRowItem"><span class="greyText">Member since ${details.joined}</span></div>`,
    "</body></html>",
  ].join("\n");
}

/**
 * A book record with placeholder values for required fields.
 */
export function makeBook(overrides: Partial<BookRecord> = {}): BookRecord {
  return { title: "Untitled", shelf: "read", ...overrides };
}
