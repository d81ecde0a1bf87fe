import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { BaseClient } from './base.client.js';
import { MailApiError, MailNetworkError } from './errors/client-error.js';
import type { AppConfig } from '../config.js';
import type { Logger } from '../types/logger.types.js';
import type { Profile } from '../types/profile.types.js';
import type { MailSender, Message, SendMessageInput } from '../types/message.types.js';

const CLIENT_NAME = 'MailApi';

type JsonObject = Record<string, unknown>;

interface AttachmentPayload {
  name: string;
  content_type: string;
  data: string;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseJsonBody(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    // Non-JSON bodies are reported by the caller with the raw text.
    return undefined;
  }
}

function errorMessageFrom(data: unknown, fallback: string): string {
  if (isJsonObject(data)) {
    const nested = isJsonObject(data.data) ? data.data : {};
    return (
      optionalString(data.error) ??
      optionalString(data.message) ??
      optionalString(nested.message) ??
      fallback
    );
  }
  return fallback;
}

function extractMessageId(data: JsonObject): string | undefined {
  const nested = isJsonObject(data.data) ? data.data : {};
  const nestedMessage = isJsonObject(nested.message) ? nested.message : {};
  const candidates = [nested.message_id, nestedMessage.id, data.message_id, data.id];

  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate !== '') {
      return candidate;
    }
    if (typeof candidate === 'number') {
      return String(candidate);
    }
  }
  return undefined;
}

export function messageFromApi(payload: JsonObject): Message {
  const source = payload.status === 'success' && isJsonObject(payload.data) ? payload.data : payload;
  const toValue = source.to;
  let recipients: string[] = [];
  if (typeof toValue === 'string') {
    recipients = [toValue];
  } else if (Array.isArray(toValue)) {
    recipients = toValue.map(item => String(item));
  }

  const id = source.id ?? source.message_id ?? '';

  return {
    id: String(id),
    to: recipients,
    fromAddress: optionalString(source.from) ?? optionalString(source.from_address),
    subject: optionalString(source.subject),
    body: optionalString(source.body) ?? optionalString(source.plain_body) ?? optionalString(source.text_body),
    status: optionalString(source.status),
    raw: payload,
  };
}

/**
 * HTTP client for a Postal-compatible mail API, bound to one profile.
 */
export class MailApiClient extends BaseClient implements MailSender {
  private readonly server: string;
  private readonly apiKey: string;

  constructor(profile: Profile, config: AppConfig, logger: Logger) {
    super(config, logger);
    this.server = profile.server.replace(/\/+$/, '');
    this.apiKey = profile.apiKey;
  }

  async send(input: SendMessageInput): Promise<string> {
    const to = Array.isArray(input.to) ? input.to : [input.to];
    const payload: JsonObject = {
      to,
      subject: input.subject,
      plain_body: input.body,
    };
    if (input.fromAddress) {
      payload.from = input.fromAddress;
    }
    if (input.attachments && input.attachments.length > 0) {
      payload.attachments = await this.buildAttachments(input.attachments);
    }

    return this.captureOperation(CLIENT_NAME, 'send', async () => {
      const { status, data } = await this.request('POST', '/api/v1/send/message', payload);
      const messageId = extractMessageId(data);
      if (!messageId) {
        throw new MailApiError(status, 'missing message_id in API response', data);
      }
      return messageId;
    }, { recipients: to.length });
  }

  async read(messageId: string): Promise<Message> {
    return this.captureOperation(CLIENT_NAME, 'read', async () => {
      const { data } = await this.request('GET', `/api/v1/messages/${encodeURIComponent(messageId)}`);
      return messageFromApi(data);
    }, { messageId });
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: JsonObject
  ): Promise<{ status: number; data: JsonObject }> {
    let response: Response;
    try {
      response = await fetch(`${this.server}${path}`, {
        method,
        headers: {
          'X-Server-API-Key': this.apiKey,
          Accept: 'application/json',
          'User-Agent': this.config.http.userAgent,
          ...(body && { 'Content-Type': 'application/json' }),
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.config.http.timeoutMs),
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      const reason = cause?.name === 'TimeoutError'
        ? `request timed out after ${this.config.http.timeoutMs}ms`
        : cause?.message ?? String(error);
      throw new MailNetworkError(`${method} ${path} failed: ${reason}`, cause);
    }

    const text = await response.text();
    const data = parseJsonBody(text);

    if (response.status >= 400) {
      throw new MailApiError(response.status, errorMessageFrom(data, text || 'unknown API error'), data);
    }
    if (!isJsonObject(data)) {
      throw new MailApiError(response.status, 'invalid JSON response from API', text);
    }
    if (data.status === 'error') {
      throw new MailApiError(response.status, errorMessageFrom(data, 'unknown API error'), data);
    }

    return { status: response.status, data };
  }

  private async buildAttachments(paths: string[]): Promise<AttachmentPayload[]> {
    return Promise.all(
      paths.map(async path => {
        try {
          const content = await readFile(path);
          return {
            name: basename(path),
            content_type: 'application/octet-stream',
            data: content.toString('base64'),
          };
        } catch (error) {
          throw this.createError(
            CLIENT_NAME,
            `could not read attachment ${path}`,
            error instanceof Error ? error : undefined,
            { path }
          );
        }
      })
    );
  }
}

export function createMailApiClient(profile: Profile, config: AppConfig, logger: Logger): MailApiClient {
  return new MailApiClient(profile, config, logger.child({ client: CLIENT_NAME, profile: profile.name }));
}
