/**
 * Error taxonomy for the export pipeline
 * Each error class extends ExportToolError and provides:
 * - kind: stable classification used by reporters
 * - message: user-facing message
 * - details: optional verbose details
 */

import { getLogger } from './logger.js';

export type ErrorKind = 'input' | 'api' | 'protocol' | 'checksum' | 'download' | 'setup';

/**
 * Base error class. Every unhandled tool error exits with code 1.
 */
export abstract class ExportToolError extends Error {
  abstract readonly kind: ErrorKind;
  readonly details?: string;

  constructor(message: string, details?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getExitCode(): number {
    return 1;
  }

  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input: bad flags, missing credentials, unknown status filter
 */
export class InvalidInputError extends ExportToolError {
  readonly kind = 'input';

  static fromMissingToken(): InvalidInputError {
    return new InvalidInputError(
      'Access token must be provided via --token or WORKPLACE_ACCESS_TOKEN',
      'Create a custom integration with the "Manage work DIY exports" permission and copy its token'
    );
  }

  static fromInvalidStatus(value: string, allowed: readonly string[]): InvalidInputError {
    return new InvalidInputError(
      `Invalid status filter: "${value}". Expected one of: ${allowed.join(', ')}`
    );
  }

  static fromInvalidNumber(name: string, value: string): InvalidInputError {
    return new InvalidInputError(`${name} must be a non-negative integer, got: ${value}`);
  }
}

/**
 * Non-2xx response, or a request that never produced a response
 */
export class ApiError extends ExportToolError {
  readonly kind = 'api';
  readonly httpStatus?: number;

  constructor(message: string, httpStatus?: number, options?: { cause?: unknown }) {
    super(message, httpStatus === undefined ? undefined : `HTTP ${httpStatus}`, options);
    this.httpStatus = httpStatus;
  }

  static fromNetworkFailure(url: string, cause: unknown): ApiError {
    const reason = describeError(cause);
    return new ApiError(`Request to ${url} failed: ${reason}`, undefined, { cause });
  }
}

/**
 * Malformed payloads and pagination that does not terminate
 */
export class ProtocolError extends ExportToolError {
  readonly kind = 'protocol';

  static fromMalformedBody(url: string, reason: string): ProtocolError {
    return new ProtocolError(
      `Malformed response from ${url}`,
      `Parse error: ${reason}`
    );
  }

  static fromRepeatedCursor(cursor: string): ProtocolError {
    return new ProtocolError(
      'Pagination did not advance: the server returned a cursor that was already followed',
      `Cursor: ${cursor}`
    );
  }

  static fromMissingField(entity: string, field: string): ProtocolError {
    return new ProtocolError(`Response ${entity} is missing required field "${field}"`);
  }
}

/**
 * Downloaded bytes do not hash to the declared checksum. Retryable.
 */
export class ChecksumMismatchError extends ExportToolError {
  readonly kind = 'checksum';
  readonly expected: string;
  readonly actual: string;

  constructor(path: string, expected: string, actual: string) {
    super(`Checksum mismatch for ${path}: expected ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Permanent download failure for one file
 */
export class DownloadError extends ExportToolError {
  readonly kind = 'download';
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, message: string, attempts: number, options?: { cause?: unknown; details?: string }) {
    super(message, options?.details, { cause: options?.cause });
    this.url = url;
    this.attempts = attempts;
  }

  static fromExhaustedRetries(url: string, attempts: number, lastError: Error): DownloadError {
    return new DownloadError(
      url,
      `Failed to download ${url} after ${attempts} attempt(s): ${lastError.message}`,
      attempts,
      {
        cause: lastError,
        details: 'Run the export again; files already on disk are skipped',
      }
    );
  }

  static fromUnsupportedAlgorithm(url: string, algorithm: string): DownloadError {
    return new DownloadError(
      url,
      `Unsupported checksum algorithm "${algorithm}" for ${url}`,
      0
    );
  }
}

/**
 * Top-level setup failures (output directory cannot be created)
 */
export class SetupError extends ExportToolError {
  readonly kind = 'setup';

  static fromOutputDir(path: string, cause: unknown): SetupError {
    const reason = describeError(cause);
    return new SetupError(
      `Unable to create output directory: ${path}`,
      `Filesystem error: ${reason}`,
      { cause }
    );
  }
}

export function getExitCode(error: unknown): number {
  if (error instanceof ExportToolError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Errors raised by Node built-ins may come from another realm (Jest's
 * sandbox), so these helpers check shape rather than `instanceof Error`.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error), { cause: error });
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof ExportToolError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
