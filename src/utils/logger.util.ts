import pino from 'pino';
import { config } from '../config.js';
import { getCorrelationId } from './runtime.util.js';
import type { Logger } from '../types/logger.types.js';

function getRequestContext(): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  const correlationId = getCorrelationId();
  if (correlationId) {
    context.correlationId = correlationId;
  }

  return context;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * A single plain-object argument is merged into the log line; anything else
 * is kept under `args`.
 */
function toLogData(args: unknown[]): Record<string, unknown> {
  if (args.length === 0) {
    return {};
  }
  if (args.length === 1 && isRecord(args[0])) {
    return { ...args[0] };
  }
  return { args };
}

class PinoLogger implements Logger {
  private readonly logger: pino.Logger;

  constructor(logger: pino.Logger) {
    this.logger = logger;
  }

  private enrichLogData(data: Record<string, unknown>): Record<string, unknown> {
    return {
      ...data,
      ...getRequestContext(),
    };
  }

  trace(message: string, ...args: unknown[]): void {
    this.logger.trace(this.enrichLogData(toLogData(args)), message);
  }

  debug(message: string, ...args: unknown[]): void {
    this.logger.debug(this.enrichLogData(toLogData(args)), message);
  }

  info(message: string, ...args: unknown[]): void {
    this.logger.info(this.enrichLogData(toLogData(args)), message);
  }

  warn(message: string, ...args: unknown[]): void {
    this.logger.warn(this.enrichLogData(toLogData(args)), message);
  }

  error(message: string, error?: Error | unknown, ...args: unknown[]): void {
    const data = this.enrichLogData(toLogData(args));
    if (error instanceof Error) {
      this.logger.error({ ...data, err: error }, message);
    } else if (error !== undefined) {
      this.logger.error({ ...data, error }, message);
    } else {
      this.logger.error(data, message);
    }
  }

  fatal(message: string, error?: Error | unknown, ...args: unknown[]): void {
    const data = this.enrichLogData(toLogData(args));
    if (error instanceof Error) {
      this.logger.fatal({ ...data, err: error }, message);
    } else if (error !== undefined) {
      this.logger.fatal({ ...data, error }, message);
    } else {
      this.logger.fatal(data, message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.logger.child(bindings));
  }
}

/**
 * Logs go to stderr; stdout is reserved for command output.
 */
export function createLogger(options?: {
  level?: string;
  pretty?: boolean;
  context?: Record<string, unknown>;
}): Logger {
  const level = options?.level ?? config.logging.level;
  const pretty = options?.pretty ?? config.logging.pretty;

  const pinoOptions: pino.LoggerOptions = {
    level,
    base: {
      ...(options?.context ?? {}),
    },
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    }),
  };

  const pinoLogger = pretty ? pino(pinoOptions) : pino(pinoOptions, pino.destination(2));

  return new PinoLogger(pinoLogger);
}

export const logger = createLogger();
