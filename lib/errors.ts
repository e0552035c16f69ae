/**
 * Typed error classes for the archive builder
 *
 * Per-article failures are carried as values on ScrapeResult; only the
 * fatal discovery errors below are thrown to the top level.
 */

export type ExtractionPhase = 'fetch' | 'parse' | 'extract' | 'convert';

/**
 * Base error class for all archiver errors
 */
export class ArchiverError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Original error that caused this error */
  readonly cause?: Error;
  /** URL being processed when the error occurred */
  readonly url?: string;

  constructor(message: string, options?: { code?: string; cause?: Error; url?: string }) {
    super(message);
    this.name = 'ArchiverError';
    this.code = options?.code ?? 'ARCHIVER_ERROR';
    this.cause = options?.cause;
    this.url = options?.url;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a request exceeds its absolute timeout
 */
export class RequestTimeoutError extends ArchiverError {
  /** Timeout duration in milliseconds */
  readonly timeout: number;

  constructor(message: string, options: { timeout: number; url?: string; cause?: Error }) {
    super(message, { code: 'REQUEST_TIMEOUT', ...options });
    this.name = 'RequestTimeoutError';
    this.timeout = options.timeout;
  }
}

/**
 * Thrown when a URL answers with a non-success status
 */
export class InvalidUrlError extends ArchiverError {
  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(message: string, options: { url: string; statusCode?: number; cause?: Error }) {
    super(message, { code: 'INVALID_URL', ...options });
    this.name = 'InvalidUrlError';
    this.statusCode = options.statusCode;
  }
}

/**
 * Thrown when fetching or converting one article fails
 */
export class ContentExtractionError extends ArchiverError {
  /** The extraction phase that failed */
  readonly phase: ExtractionPhase;

  constructor(message: string, options: { url: string; phase: ExtractionPhase; cause?: Error }) {
    super(message, { code: 'CONTENT_EXTRACTION_FAILED', ...options });
    this.name = 'ContentExtractionError';
    this.phase = options.phase;
  }
}

/**
 * Thrown when the first listing page cannot be fetched or parsed
 */
export class FatalDiscoveryError extends ArchiverError {
  constructor(message: string, options: { url: string; cause?: Error }) {
    super(message, { code: 'DISCOVERY_FAILED', ...options });
    this.name = 'FatalDiscoveryError';
  }
}

/**
 * A later listing page failed; discovery keeps what it already found
 */
export class PartialDiscoveryError extends ArchiverError {
  /** 1-based listing page that failed */
  readonly page: number;
  /** Articles gathered before the failure */
  readonly articlesFound: number;

  constructor(message: string, options: { url: string; page: number; articlesFound: number; cause?: Error }) {
    super(message, { code: 'DISCOVERY_PARTIAL', ...options });
    this.name = 'PartialDiscoveryError';
    this.page = options.page;
    this.articlesFound = options.articlesFound;
  }
}

/**
 * Thrown when the listing yields no articles at all
 */
export class NoContentFoundError extends ArchiverError {
  constructor(message: string, options: { url: string }) {
    super(message, { code: 'NO_CONTENT_FOUND', ...options });
    this.name = 'NoContentFoundError';
  }
}

/**
 * The checkpoint file exists but cannot be read as a ledger
 */
export class CheckpointCorruptError extends ArchiverError {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: Error }) {
    super(message, { code: 'CHECKPOINT_CORRUPT', cause: options.cause });
    this.name = 'CheckpointCorruptError';
    this.path = options.path;
  }
}

/**
 * Writing the checkpoint or the archive failed
 */
export class PersistenceError extends ArchiverError {
  readonly path: string;
  readonly target: 'checkpoint' | 'archive';

  constructor(message: string, options: { path: string; target: 'checkpoint' | 'archive'; cause?: Error }) {
    super(message, { code: 'PERSISTENCE_FAILED', cause: options.cause });
    this.name = 'PersistenceError';
    this.path = options.path;
    this.target = options.target;
  }
}

/**
 * Thrown when configuration fails validation
 */
export class ConfigError extends ArchiverError {
  readonly issues: string[];

  constructor(message: string, options: { issues: string[] }) {
    super(message, { code: 'INVALID_CONFIG' });
    this.name = 'ConfigError';
    this.issues = options.issues;
  }
}

/**
 * Type guard to check if an error is an ArchiverError
 */
export function isArchiverError(error: unknown): error is ArchiverError {
  return error instanceof ArchiverError;
}

/**
 * Type guard to check if error was caused by abort
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
