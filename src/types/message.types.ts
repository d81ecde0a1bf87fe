export interface SendMessageInput {
  to: string | string[];
  subject: string;
  body: string;
  fromAddress?: string;
  /** File paths, uploaded base64-encoded */
  attachments?: string[];
}

/**
 * A message as returned by the mail API read endpoint.
 */
export interface Message {
  id: string;
  to: string[];
  fromAddress?: string;
  subject?: string;
  body?: string;
  status?: string;
  raw: Record<string, unknown>;
}

/**
 * Single-message send primitive consumed by the batch orchestrator.
 */
export interface MailSender {
  send(input: SendMessageInput): Promise<string>;
}
