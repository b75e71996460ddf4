/**
 * Errors raised past a component boundary.
 *
 * Per-listing and per-region failures are never thrown; they come back as
 * rejected extractions and failed region results instead.
 */

export class PriceFinderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad query, region list or limit. Raised before any request goes out. */
export class InvalidSearchError extends PriceFinderError {}

/** Nothing to export, or the workbook could not be written. */
export class ExportError extends PriceFinderError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
