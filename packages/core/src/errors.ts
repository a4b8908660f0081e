/**
 * Error kinds surfaced by the fusion pipeline.
 *
 * Every error carries a `context` record (station code, year, status, line...)
 * so a failed run can be diagnosed from the message and the log line alone.
 */

export type ErrorContext = Record<string, string | number | undefined>;

export class FusionError extends Error {
  public readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message);
    this.name = 'FusionError';
    this.context = context;
    if (cause !== undefined) this.cause = cause;
  }
}

/**
 * Invalid site definition, configuration value or input row
 */
export class ValidationError extends FusionError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, context, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Nearest-station lookup invoked with no candidate stations
 */
export class EmptyRegistryError extends FusionError {
  constructor(message = 'Station registry is empty', context: ErrorContext = {}) {
    super(message, context);
    this.name = 'EmptyRegistryError';
  }
}

/**
 * Remote archive retrieval did not succeed. `status` is the HTTP status,
 * or 0 when no response was received at all.
 */
export class FetchError extends FusionError {
  public readonly status: number;

  constructor(
    message: string,
    status: number,
    context: ErrorContext = {},
    cause?: unknown
  ) {
    super(message, { ...context, status }, cause);
    this.name = 'FetchError';
    this.status = status;
  }
}

/**
 * Fetched archive could not be extracted or parsed
 */
export class ArchiveError extends FusionError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, context, cause);
    this.name = 'ArchiveError';
  }
}

/**
 * Sampling period is unusable, or the weather series cannot be aligned
 * onto the power series
 */
export class AlignmentError extends FusionError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'AlignmentError';
  }
}
