#!/usr/bin/env node
/**
 * Export a Goodreads user's read and currently-reading shelves to CSV
 *
 * Usage: npm start -- <username> [options]
 * Example: npm start -- 12345-jane --delay 2000
 *
 * Options:
 *   --delay ms                Delay between shelf pages (default: 1000)
 *   --max-read-pages n        Page cap for the read shelf (default: 50)
 *   --max-current-pages n     Page cap for the currently-reading shelf (default: 10)
 */

import { GoodreadsClient } from "./client.js";
import { exportFilename, exportToCsv } from "./export.js";
import { formatProfile, scrapeProfile } from "./profile.js";
import {
  banner,
  formatBooksSummary,
  formatCombinedSummary,
  formatCurrentlyReading,
  formatNoBooksHelp,
  printLines,
} from "./report.js";
import { DEFAULT_MAX_PAGES, DEFAULT_PAGE_DELAY, scrapeShelf } from "./shelf.js";
import { getNumberArg, getPositionalArgs, hasHelpFlag, isMainModule, setupSignalHandlers } from "./utils.js";

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = ["--delay", "--max-read-pages", "--max-current-pages"];

export interface CliOptions {
  /** Every positional argument; exactly one (the username) is valid */
  positionals: string[];
  pageDelay: number;
  maxReadPages: number;
  maxCurrentPages: number;
  showHelp: boolean;
}

/**
 * Parse command line arguments.
 *
 * @param args - Command line arguments (defaults to process.argv)
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    positionals: getPositionalArgs(args, VALUE_FLAGS),
    pageDelay: getNumberArg(args, "--delay", DEFAULT_PAGE_DELAY),
    maxReadPages: getNumberArg(args, "--max-read-pages", DEFAULT_MAX_PAGES.read),
    maxCurrentPages: getNumberArg(args, "--max-current-pages", DEFAULT_MAX_PAGES["currently-reading"]),
    showHelp: hasHelpFlag(args),
  };
}

function showUsage(log: (line: string) => void): void {
  log("Usage: npm start -- <goodreads_username> [options]");
  log("Example: npm start -- johndoe");
  log("Options:");
  log("  --delay <ms>               Delay between shelf pages (default: 1000)");
  log("  --max-read-pages <n>       Page cap for the read shelf (default: 50)");
  log("  --max-current-pages <n>    Page cap for the currently-reading shelf (default: 10)");
  log("  --help, -h                 Show this help message");
}

/**
 * Main entry point.
 * Scrapes the profile and both shelves, prints summaries and writes the CSV.
 *
 * @param client - Client to fetch pages with (a fresh one by default)
 * @throws Exits with code 1 unless exactly one username is given
 */
export async function main(client: GoodreadsClient = new GoodreadsClient()): Promise<void> {
  const { positionals, pageDelay, maxReadPages, maxCurrentPages, showHelp } = parseArgs();

  if (showHelp) {
    showUsage(console.log);
    process.exit(0);
  }

  if (positionals.length !== 1) {
    showUsage(console.error);
    process.exit(1);
  }

  const [username] = positionals;

  console.log(`Starting Goodreads scraper for user: ${username}`);
  console.log("-".repeat(50));

  const profileLines = formatProfile(await scrapeProfile(client, username));
  if (profileLines.length > 0) {
    printLines(["Profile information:", ...profileLines, ""]);
  }

  const readBooks = await scrapeShelf(client, username, "read", { maxPages: maxReadPages, pageDelay });
  const currentBooks = await scrapeShelf(client, username, "currently-reading", {
    maxPages: maxCurrentPages,
    pageDelay,
  });
  const allBooks = [...readBooks, ...currentBooks];

  if (allBooks.length === 0) {
    printLines(formatNoBooksHelp(username));
    return;
  }

  if (readBooks.length > 0) {
    printLines([...banner("READ BOOKS SUMMARY"), ...formatBooksSummary(readBooks)]);
  }

  if (currentBooks.length > 0) {
    printLines(formatCurrentlyReading(currentBooks));
  }

  await exportToCsv(allBooks, exportFilename(username));

  printLines(formatCombinedSummary(readBooks, currentBooks));
}

// Only run main when executed directly (not when imported for testing)
if (isMainModule(import.meta.url)) {
  setupSignalHandlers("Scraping");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
