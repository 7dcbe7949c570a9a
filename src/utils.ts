/**
 * Utility functions for the exporter
 * Extracted for testability
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

/** Flag to prevent multiple signal handlers from running */
let isExiting = false;

/**
 * Exit code for a terminating signal (128 + signal number).
 * SIGINT = 2, SIGTERM = 15
 */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  return signal === "SIGINT" ? 130 : 143;
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Scraping")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = (signal: NodeJS.Signals) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);
    process.exit(exitCodeForSignal(signal));
  };

  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
}

/**
 * Check whether a module is the script Node was started with.
 * Resolves symlinks so an npm bin shim still counts as a direct run.
 *
 * @param moduleUrl - The caller's `import.meta.url`
 */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return pathToFileURL(realpathSync(entry)).href === moduleUrl;
  } catch {
    return false;
  }
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Collapse runs of whitespace (including newlines) and trim the ends.
 *
 * @example
 * cleanText('  The\n   Hobbit ') // 'The Hobbit'
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Resolve a possibly relative href against a base URL.
 * A missing href resolves to the base itself.
 *
 * @returns Absolute URL, or null if the href cannot be parsed
 *
 * @example
 * resolveUrl('https://www.goodreads.com', '/book/show/1') // 'https://www.goodreads.com/book/show/1'
 */
export function resolveUrl(baseUrl: string, href: string | undefined): string | null {
  try {
    return new URL(href ?? "", baseUrl).href;
  } catch {
    return null;
  }
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--delay')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1]) {
      const parsed = parseInt(args[i + 1], 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get every positional (non-flag) argument, in order.
 * Skips values that follow flags (e.g., in '--delay 1000', skips '1000').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 */
export function getPositionalArgs(args: string[], knownFlags: string[] = []): string[] {
  const positionals: string[] = [];
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      positionals.push(arg);
    }
  }
  return positionals;
}
