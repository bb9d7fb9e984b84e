/**
 * Custom Error Classes
 *
 * Every failure the extraction pipeline can meet has its own class and code.
 * Stages hand these back inside a Result rather than throwing them; see
 * FAILURE_POLICY for which ones end in a heuristic fallback.
 */

/**
 * Base error class for all mediapeek errors
 */
export class MediaPeekError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number = 500,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MediaPeekError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'DOWNLOAD_FAILED'
  | 'PROBE_ERROR'
  | 'FETCH_FAILED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR';

/**
 * No download entry exists for the host's os/arch pair
 */
export class UnsupportedPlatformError extends MediaPeekError {
  declare readonly code: 'UNSUPPORTED_PLATFORM';
  constructor(platformKey: string) {
    super(
      `Unsupported platform: ${platformKey}`,
      'UNSUPPORTED_PLATFORM',
      500,
      { platformKey }
    );
    this.name = 'UnsupportedPlatformError';
  }
}

/**
 * The probe binary could not be downloaded, written or verified
 */
export class DownloadFailedError extends MediaPeekError {
  declare readonly code: 'DOWNLOAD_FAILED';
  constructor(url: string, reason: string, cause?: unknown) {
    super(
      `Download failed for ${url}: ${reason}`,
      'DOWNLOAD_FAILED',
      502,
      { url, reason },
      { cause }
    );
    this.name = 'DownloadFailedError';
  }
}

export type ProbeFailureReason = 'timeout' | 'exit-code' | 'spawn' | 'malformed-output';

/**
 * ffprobe timed out, exited non-zero, or printed something unusable
 */
export class ProbeError extends MediaPeekError {
  declare readonly code: 'PROBE_ERROR';
  public readonly reason: ProbeFailureReason;

  constructor(reason: ProbeFailureReason, message: string, details: Record<string, unknown> = {}) {
    super(
      `Probe failed (${reason}): ${message}`,
      'PROBE_ERROR',
      500,
      { reason, ...details }
    );
    this.name = 'ProbeError';
    this.reason = reason;
  }
}

/**
 * Not even a partial head of the content could be obtained
 */
export class FetchFailedError extends MediaPeekError {
  declare readonly code: 'FETCH_FAILED';
  constructor(reference: string, reason: string, cause?: unknown) {
    super(
      `Could not fetch content head: ${reason}`,
      'FETCH_FAILED',
      502,
      { reference, reason },
      { cause }
    );
    this.name = 'FetchFailedError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends MediaPeekError {
  declare readonly code: 'NOT_FOUND';
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends MediaPeekError {
  declare readonly code: 'VALIDATION_ERROR';
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * What the request boundary does with each failure kind.
 * 'fallback' continues with filename heuristics, 'surface' ends the request.
 */
export const FAILURE_POLICY = {
  UNSUPPORTED_PLATFORM: 'fallback',
  DOWNLOAD_FAILED: 'fallback',
  PROBE_ERROR: 'fallback',
  FETCH_FAILED: 'fallback',
  NOT_FOUND: 'surface',
  VALIDATION_ERROR: 'surface',
} as const satisfies Record<ErrorCode, 'fallback' | 'surface'>;

export type FailureAction = (typeof FAILURE_POLICY)[ErrorCode];

/** Codes the policy absorbs into a heuristic fallback */
export type FallbackCode = {
  [C in ErrorCode]: (typeof FAILURE_POLICY)[C] extends 'fallback' ? C : never;
}[ErrorCode];

export function failureAction(error: MediaPeekError): FailureAction {
  return FAILURE_POLICY[error.code];
}
