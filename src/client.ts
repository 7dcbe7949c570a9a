/**
 * HTTP client for Goodreads profile and shelf pages
 *
 * One instance is created per run and passed to everything that fetches.
 */

import * as cheerio from "cheerio";
import { FetchError } from "./errors.js";
import type { Shelf } from "./types.js";

export const GOODREADS_BASE_URL = "https://www.goodreads.com";

/**
 * Realistic Chrome user agent sent with every request.
 * Matches a recent stable Chrome version on macOS.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface ClientOptions {
  baseUrl?: string;
  userAgent?: string;
  /** Defaults to the global fetch, looked up on each request */
  fetchImpl?: FetchImpl;
}

/** The slice of the client the shelf pager depends on */
export interface ShelfPageSource {
  shelfUrl(username: string, shelf: Shelf, page?: number): string;
  fetchHtml(url: string): Promise<string>;
}

export class GoodreadsClient implements ShelfPageSource {
  readonly baseUrl: string;
  readonly userAgent: string;
  private readonly fetchImpl: FetchImpl;

  constructor(options: ClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? GOODREADS_BASE_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  profileUrl(username: string): string {
    return `${this.baseUrl}/user/show/${encodeURIComponent(username)}`;
  }

  shelfUrl(username: string, shelf: Shelf, page = 1): string {
    return `${this.baseUrl}/review/list/${encodeURIComponent(username)}?shelf=${shelf}&page=${page}`;
  }

  /**
   * GET a page and return its body.
   *
   * @throws {FetchError} On connection failure or a non-2xx status
   */
  async fetchHtml(url: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { "User-Agent": this.userAgent },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(url, `Request to ${url} failed: ${reason}`, { cause: error });
    }

    if (!response.ok) {
      const statusLine = [response.status, response.statusText].filter(Boolean).join(" ");
      throw new FetchError(url, `HTTP ${statusLine} for ${url}`, { status: response.status });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new FetchError(url, `Could not read response body from ${url}`, { cause: error });
    }
  }
}

/**
 * Parse an HTML payload into a queryable document.
 */
export function loadHtml(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}
