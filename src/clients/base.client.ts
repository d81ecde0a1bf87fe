import type { AppConfig } from '../config.js';
import type { Logger } from '../types/logger.types.js';
import { ClientError } from './errors/client-error.js';

/**
 * Base class for external API clients
 *
 * Provides:
 * - Dependency injection (config, logger)
 * - Timed, logged wrapper around remote operations
 * - Error creation helper
 */
export class BaseClient {
  protected readonly config: AppConfig;
  protected readonly logger: Logger;

  constructor(config: AppConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Runs a remote operation, logging its duration at debug level under
   * `<clientName>.<operationName>`. Errors are logged and rethrown unchanged.
   */
  protected async captureOperation<T>(
    clientName: string,
    operationName: string,
    operation: () => Promise<T>,
    metadata?: Record<string, unknown>
  ): Promise<T> {
    const operationLabel = `${clientName}.${operationName}`;
    const startedAt = Date.now();

    try {
      const result = await operation();
      this.logger.debug(`${operationLabel} succeeded`, {
        ...metadata,
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      this.logger.debug(`${operationLabel} failed`, {
        ...metadata,
        durationMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  protected createError(
    clientName: string,
    message: string,
    cause?: Error,
    metadata?: Record<string, unknown>
  ): ClientError {
    return new ClientError({
      clientName,
      message,
      cause,
      metadata,
    });
  }
}
