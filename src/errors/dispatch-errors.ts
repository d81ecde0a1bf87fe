import type { BatchRecord } from '../types/batch.types.js';

export interface DispatchErrorOptions {
  cause?: Error;
  metadata?: Record<string, unknown>;
}

/**
 * Base class for errors raised by the dispatch engine and its stores.
 * `exitCode` is the process exit code the CLI uses when the error is fatal.
 */
export abstract class DispatchError extends Error {
  abstract readonly exitCode: number;
  public readonly cause?: Error;
  public readonly metadata?: Record<string, unknown>;

  constructor(message: string, options: DispatchErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.cause = options.cause;
    this.metadata = options.metadata;
    Object.setPrototypeOf(this, new.target.prototype);

    if (options.cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }
}

/**
 * Bad or missing command-line combination. Raised before any row is read.
 */
export class ConfigurationError extends DispatchError {
  readonly exitCode = 2;
}

/**
 * Malformed input source or template file. Fatal when raised from `count()`
 * or `loadTemplate()`; row-scoped when carried inside a recipient entry.
 */
export class ValidationError extends DispatchError {
  readonly exitCode = 2;
}

export class RenderError extends DispatchError {
  readonly exitCode = 1;
  public readonly missing: string[];

  constructor(message: string, missing: string[] = [], options: DispatchErrorOptions = {}) {
    super(message, options);
    this.missing = missing;
  }
}

/**
 * The batch store could not be read or written. When raised after a batch ran,
 * `record` holds the sealed result that exists only in memory.
 */
export class StorageError extends DispatchError {
  readonly exitCode = 3;
  public readonly record?: BatchRecord;

  constructor(message: string, options: DispatchErrorOptions & { record?: BatchRecord } = {}) {
    super(message, options);
    this.record = options.record;
  }
}

export class BatchNotFoundError extends DispatchError {
  readonly exitCode = 1;
  public readonly batchId: string;

  constructor(batchId: string) {
    super(`batch not found: ${batchId}`);
    this.batchId = batchId;
  }
}

export class ProfileError extends DispatchError {
  readonly exitCode = 2;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
