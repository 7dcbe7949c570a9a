/**
 * Error types raised by the fetcher and the exporter
 */

/** A page request failed at the transport level or returned a non-2xx status */
export class FetchError extends Error {
  readonly url: string;
  /** HTTP status, when the server answered */
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.url = url;
    this.status = options.status;
  }
}

/** Writing the CSV export failed */
export class ExportError extends Error {
  readonly filename: string;

  constructor(filename: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not write ${filename}: ${reason}`, { cause });
    this.name = "ExportError";
    this.filename = filename;
  }
}
