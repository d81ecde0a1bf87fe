export interface ClientErrorOptions {
  clientName: string;
  message: string;
  cause?: Error;
  metadata?: Record<string, unknown>;
}

/**
 * Error raised by an external API client.
 *
 * The name is derived from the client (`MailApi` becomes `MailApiError`) and
 * the cause's stack is appended to this error's stack.
 */
export class ClientError extends Error {
  public readonly clientName: string;
  public readonly cause?: Error;
  public readonly metadata?: Record<string, unknown>;

  constructor(options: ClientErrorOptions) {
    super(options.message);
    this.clientName = options.clientName;
    this.cause = options.cause;
    this.metadata = options.metadata;
    this.name = `${options.clientName}Error`;
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    if (options.cause && options.cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${options.cause.stack}`;
    }
  }
}

/**
 * The mail API answered with a non-success response.
 */
export class MailApiError extends ClientError {
  public readonly statusCode: number;
  public readonly payload?: unknown;

  constructor(statusCode: number, message: string, payload?: unknown) {
    super({
      clientName: 'MailApi',
      message: `mail API error (${statusCode}): ${message}`,
      metadata: { statusCode },
    });
    this.statusCode = statusCode;
    this.payload = payload;
  }
}

/**
 * The mail API could not be reached (connection failure or timeout).
 */
export class MailNetworkError extends ClientError {
  constructor(message: string, cause?: Error) {
    super({
      clientName: 'MailNetwork',
      message,
      cause,
    });
  }
}
