/**
 * Structured Error Classes for Image Analysis
 *
 * Error hierarchy with the metadata needed to turn any failure into the
 * `{ kind, message }` payload MCP callers receive.
 */

import type { ErrorKind, ErrorReport, Result } from '../domain/types';

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  EMPTY_INPUT: 'EMPTY_INPUT',
  UNSUPPORTED_ENCODING: 'UNSUPPORTED_ENCODING',
  INPUT_TOO_LARGE: 'INPUT_TOO_LARGE',
  DECODE_FAILED: 'DECODE_FAILED',
  CONFIGURATION_INVALID: 'CONFIGURATION_INVALID',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all image analysis errors
 */
export class ImageAnalysisError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    kind: ErrorKind = 'InternalError',
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'ImageAnalysisError';
    this.kind = kind;
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      code: this.code,
      details: this.details,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }

  toReport(): ErrorReport {
    return { kind: this.kind, message: this.message };
  }
}

/**
 * Input was empty, not in a recognized encoding, or too large
 */
export class InvalidInputError extends ImageAnalysisError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INVALID_INPUT,
    details?: Record<string, unknown>,
  ) {
    super(message, 'InvalidInputError', code, details);
    this.name = 'InvalidInputError';
  }
}

/**
 * Bytes were present but the decoder could not read them as an image
 */
export class DecodeError extends ImageAnalysisError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, 'DecodeError', ErrorCodes.DECODE_FAILED, details, cause);
    this.name = 'DecodeError';
  }
}

/**
 * Start-up configuration failed validation
 */
export class ConfigurationError extends ImageAnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'InternalError', ErrorCodes.CONFIGURATION_INVALID, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Type guard to check if an error is an ImageAnalysisError
 */
export function isImageAnalysisError(error: unknown): error is ImageAnalysisError {
  return error instanceof ImageAnalysisError;
}

/**
 * Map any thrown value to the payload returned at the MCP boundary
 */
export function toErrorReport(error: unknown): ErrorReport {
  if (isImageAnalysisError(error)) {
    return error.toReport();
  }
  return {
    kind: 'InternalError',
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Execute function and convert to Result type (for MCP boundaries)
 */
export async function executeAsResult<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    const value = await fn();
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: toErrorReport(error) };
  }
}
