// Error types shared by the lookup client, the document reader and the CLI.
// The parsing core never throws these: malformed slip content is reported as
// unparsed-line diagnostics instead.

/**
 * Base application error with structured data
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.context = options.context;
  }
}

/**
 * The card lookup API answered with something other than a hit or a 404,
 * or could not be reached at all.
 */
export class LookupApiError extends AppError {
  public readonly status: number | null;

  constructor(message: string, options: { status?: number; url?: string; cause?: unknown } = {}) {
    super(`Lookup API error: ${message}`, {
      code: 'LOOKUP_API_ERROR',
      context: { status: options.status, url: options.url },
      cause: options.cause,
    });
    this.status = options.status ?? null;
  }
}

/**
 * The packing slip file is missing or cannot be turned into text lines.
 */
export class DocumentReadError extends AppError {
  constructor(path: string, message: string, cause?: unknown) {
    super(`Cannot read ${path}: ${message}`, {
      code: 'DOCUMENT_READ_ERROR',
      context: { path },
      cause,
    });
  }
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}
