import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { loadHtml } from "./client.js";
import { extractBook, parseAverageRating, parsePageCount, parsePublishDate } from "./extract.js";
import { bookRow, type RowFields, shelfPage } from "./testing/fixtures.js";

/** Parse a single-row shelf page and return the document and its row */
function loadRow(fields: RowFields): { $: CheerioAPI; row: Element } {
  const $ = loadHtml(shelfPage([bookRow(fields)]));
  const row = $("tr").get(0);
  if (!row) throw new Error("fixture has no row");
  return { $, row };
}

describe("parsePublishDate", () => {
  it("keeps only the year from a full date", () => {
    expect(parsePublishDate("Mar 26, 1920")).toBe("1920");
  });

  it("keeps the trimmed text when there is no four-digit run", () => {
    expect(parsePublishDate("  Unknown ")).toBe("Unknown");
  });

  it("takes the first four-digit run", () => {
    expect(parsePublishDate("1984 (first published 1949)")).toBe("1984");
  });

  it("treats empty and placeholder values as absent", () => {
    expect(parsePublishDate("")).toBeUndefined();
    expect(parsePublishDate("None")).toBeUndefined();
  });
});

describe("parseAverageRating", () => {
  it("parses decimal ratings", () => {
    expect(parseAverageRating("4.28")).toBe(4.28);
  });

  it("returns undefined for text that is not a number", () => {
    expect(parseAverageRating("n/a")).toBeUndefined();
    expect(parseAverageRating("")).toBeUndefined();
    expect(parseAverageRating("None")).toBeUndefined();
  });
});

describe("parsePageCount", () => {
  it("takes the first run of digits", () => {
    expect(parsePageCount("366 pp")).toBe(366);
    expect(parsePageCount("1,024 pages")).toBe(1);
  });

  it("returns undefined without digits", () => {
    expect(parsePageCount("unknown")).toBeUndefined();
  });
});

describe("extractBook", () => {
  let mockConsoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    mockConsoleError = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    mockConsoleError.mockRestore();
  });

  it("extracts every field from a complete row", () => {
    const { $, row } = loadRow({
      title: "The Hobbit",
      bookHref: "/book/show/5907.The_Hobbit",
      author: "Tolkien, J.R.R.",
      authorHref: "/author/show/656983.J_R_R_Tolkien",
      isbn: "\n  0618260307\n",
      datePub: "Sep 21, 1937",
      avgRating: "4.28",
      numPages: "366 pp",
      filledStars: 4,
    });

    expect(extractBook($, row)).toEqual({
      title: "The Hobbit",
      bookUrl: "https://www.goodreads.com/book/show/5907.The_Hobbit",
      author: "Tolkien, J.R.R.",
      authorUrl: "https://www.goodreads.com/author/show/656983.J_R_R_Tolkien",
      isbn: "0618260307",
      publishDate: "1937",
      rating: 4,
      avgRating: 4.28,
      pages: 366,
    });
  });

  it("returns null for a row without a title link", () => {
    const { $, row } = loadRow({ author: "Ursula K. Le Guin", datePub: "1969" });
    expect(extractBook($, row)).toBeNull();
  });

  it("omits fields that are missing", () => {
    const { $, row } = loadRow({ title: "Piranesi" });
    const book = extractBook($, row);

    expect(book).toEqual({ title: "Piranesi", bookUrl: "https://www.goodreads.com/book/show/1" });
    expect(book?.isbn).toBeUndefined();
    expect(book?.rating).toBeUndefined();
  });

  it("treats a placeholder ISBN as absent", () => {
    const { $, row } = loadRow({ title: "Piranesi", isbn: "None" });
    expect(extractBook($, row)?.isbn).toBeUndefined();
  });

  it("keeps an undated publish value as text", () => {
    const { $, row } = loadRow({ title: "Beowulf", datePub: "Unknown" });
    expect(extractBook($, row)?.publishDate).toBe("Unknown");
  });

  it("counts filled stars as the personal rating", () => {
    const { $, row } = loadRow({ title: "Beloved", filledStars: 3 });
    expect(extractBook($, row)?.rating).toBe(3);
  });

  it("leaves the rating unset when no star is filled", () => {
    const { $, row } = loadRow({ title: "Beloved", filledStars: 0 });
    expect(extractBook($, row)?.rating).toBeUndefined();
  });

  it("drops an average rating that does not parse", () => {
    const { $, row } = loadRow({ title: "Beloved", avgRating: "not rated" });
    expect(extractBook($, row)?.avgRating).toBeUndefined();
  });

  it("keeps absolute links as they are", () => {
    const { $, row } = loadRow({ title: "Emma", bookHref: "https://example.com/book/show/6969" });
    expect(extractBook($, row)?.bookUrl).toBe("https://example.com/book/show/6969");
  });

  it("resolves links against a custom base URL", () => {
    const { $, row } = loadRow({ title: "Emma", bookHref: "/book/show/6969" });
    expect(extractBook($, row, "http://localhost:8080")?.bookUrl).toBe("http://localhost:8080/book/show/6969");
  });

  it("returns null and logs when the row cannot be read", () => {
    const { row } = loadRow({ title: "Emma" });
    const broken = (() => {
      throw new Error("unexpected markup");
    }) as unknown as CheerioAPI;

    expect(extractBook(broken, row)).toBeNull();
    expect(mockConsoleError).toHaveBeenCalledWith("Error extracting book info: unexpected markup");
  });
});
