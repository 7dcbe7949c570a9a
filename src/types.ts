/**
 * Shared type definitions for the shelf exporter
 */

/** Goodreads shelves this tool knows how to page through */
export type Shelf = "read" | "currently-reading";

/**
 * A single book parsed from a shelf listing row.
 * Optional fields are left undefined when the row has no usable value.
 * Date read is not part of the listing markup and is never populated.
 */
export interface BookRecord {
  title: string;
  author?: string;
  /** Absolute URL of the book page */
  bookUrl?: string;
  /** Absolute URL of the author page */
  authorUrl?: string;
  isbn?: string;
  /** Four-digit year when one could be found, otherwise the raw text */
  publishDate?: string;
  /** Personal rating, 1-5 filled stars */
  rating?: number;
  avgRating?: number;
  pages?: number;
  shelf: Shelf;
}

/** Book fields as read from a row, before the pager tags the shelf */
export type ExtractedBook = Omit<BookRecord, "shelf">;

/** Basic public profile details */
export interface ProfileInfo {
  displayName?: string;
  location?: string;
  /** Join date text with the "Member since" prefix removed */
  memberSince?: string;
}

/** Options for paging through a shelf */
export interface ShelfScrapeOptions {
  /** Last page number to request */
  maxPages: number;
  /** Pause between page requests (ms) */
  pageDelay: number;
}
