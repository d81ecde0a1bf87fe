import type { ValidationError } from '../errors/dispatch-errors.js';

export interface TemplateSpec {
  subject: string;
  body: string;
  from?: string;
}

/**
 * One input row. `fields` holds every non-reserved column in input order.
 */
export interface RecipientRow {
  to: string[];
  subject?: string;
  body?: string;
  from?: string;
  fields: ReadonlyMap<string, string>;
}

export type RecipientEntry =
  | { index: number; row: RecipientRow }
  | { index: number; error: ValidationError };

export interface RenderedMessage {
  to: string[];
  subject: string;
  body: string;
  fromAddress?: string;
}

export type OutcomeStatus = 'sent' | 'failed';

export type FailureKind = 'validation' | 'render' | 'send';

export interface OutcomeError {
  kind: FailureKind;
  message: string;
  statusCode?: number;
}

export interface MessageOutcome {
  rowIndex: number;
  to: readonly string[];
  status: OutcomeStatus;
  messageId?: string;
  error?: OutcomeError;
}

export type BatchStatus = 'completed' | 'partially_failed' | 'aborted';

export interface BatchRecord {
  batchId: string;
  createdAt: string;
  finishedAt: string;
  profile: string;
  totalCount: number;
  continueOnError: boolean;
  rateLimit: number | null;
  status: BatchStatus;
  outcomes: readonly MessageOutcome[];
}

/**
 * Orchestrator loop states, in the order a row moves through them.
 */
export type DispatchState = 'idle' | 'rendering' | 'sending' | 'recorded' | 'sealed';
