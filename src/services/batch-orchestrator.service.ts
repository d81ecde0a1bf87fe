import { randomUUID } from 'node:crypto';
import { renderMessage } from './template.service.js';
import { createRateLimiter, systemClock, type Clock, type RateLimiter } from './rate-limiter.service.js';
import { MailApiError } from '../clients/errors/client-error.js';
import { RenderError, StorageError, ValidationError, toError } from '../errors/dispatch-errors.js';
import type { BatchStore } from './batch-store.service.js';
import type { RecipientSource } from '../interfaces/recipient-source.interface.js';
import type { Logger } from '../types/logger.types.js';
import type { MailSender } from '../types/message.types.js';
import type { Profile } from '../types/profile.types.js';
import type {
  BatchRecord,
  BatchStatus,
  DispatchState,
  MessageOutcome,
  OutcomeError,
  RecipientEntry,
  TemplateSpec,
} from '../types/batch.types.js';

export interface BatchOrchestratorDeps {
  logger: Logger;
  mailClient: MailSender;
  store: BatchStore;
  clock?: Clock;
  generateId?: () => string;
}

export interface RunBatchOptions {
  source: RecipientSource;
  template: TemplateSpec | null;
  profile: Profile;
  continueOnError: boolean;
  /** Sends per second; omitted means unlimited */
  rateLimit?: number;
  onProgress?: (outcome: MessageOutcome, attempted: number, total: number) => void;
}

function describeFailure(error: unknown): OutcomeError {
  if (error instanceof ValidationError) {
    return { kind: 'validation', message: error.message };
  }
  if (error instanceof RenderError) {
    return { kind: 'render', message: error.message };
  }
  if (error instanceof MailApiError) {
    return { kind: 'send', message: error.message, statusCode: error.statusCode };
  }
  return { kind: 'send', message: toError(error).message };
}

export function computeStatus(outcomes: readonly MessageOutcome[], stoppedEarly: boolean): BatchStatus {
  if (stoppedEarly) {
    return 'aborted';
  }
  return outcomes.some(outcome => outcome.status === 'failed') ? 'partially_failed' : 'completed';
}

/**
 * Drives one batch: render, pace, send and record each row in input order,
 * then seal the record and hand it to the store.
 */
export class BatchOrchestrator {
  private readonly logger: Logger;
  private readonly mailClient: MailSender;
  private readonly store: BatchStore;
  private readonly clock: Clock;
  private readonly generateId: () => string;
  private state: DispatchState = 'idle';

  constructor(deps: BatchOrchestratorDeps) {
    this.logger = deps.logger;
    this.mailClient = deps.mailClient;
    this.store = deps.store;
    this.clock = deps.clock ?? systemClock;
    this.generateId = deps.generateId ?? randomUUID;
  }

  getState(): DispatchState {
    return this.state;
  }

  /**
   * Runs the batch to completion or to the first failure when
   * `continueOnError` is off. Row failures never throw.
   *
   * @throws ConfigurationError for an invalid rate
   * @throws ValidationError when the input cannot be read
   * @throws StorageError when the sealed record cannot be saved; the error
   *   carries the record
   */
  async run(options: RunBatchOptions): Promise<BatchRecord> {
    this.state = 'idle';
    const rateLimiter = createRateLimiter(options.rateLimit, this.clock);
    const totalCount = await options.source.count();

    const batchId = this.generateId();
    const createdAt = new Date(this.clock.now()).toISOString();
    const log = this.logger.child({ batchId });
    const outcomes: MessageOutcome[] = [];
    let stoppedEarly = false;

    log.info('Batch started', {
      source: options.source.getMetadata().type,
      profile: options.profile.name,
      totalCount,
      continueOnError: options.continueOnError,
      rateLimit: options.rateLimit ?? null,
    });

    for await (const entry of options.source.read()) {
      const outcome = await this.dispatch(entry, options, rateLimiter);
      outcomes.push(outcome);
      this.state = 'recorded';
      options.onProgress?.(outcome, outcomes.length, totalCount);

      if (outcome.status === 'failed') {
        log.warn('Message failed', {
          rowIndex: outcome.rowIndex,
          to: outcome.to,
          kind: outcome.error?.kind,
          error: outcome.error?.message,
        });
        if (!options.continueOnError) {
          stoppedEarly = true;
          break;
        }
      } else {
        log.debug('Message sent', { rowIndex: outcome.rowIndex, messageId: outcome.messageId });
      }
    }

    const record = this.seal({
      batchId,
      createdAt,
      finishedAt: new Date(this.clock.now()).toISOString(),
      profile: options.profile.name,
      totalCount,
      continueOnError: options.continueOnError,
      rateLimit: options.rateLimit ?? null,
      status: computeStatus(outcomes, stoppedEarly),
      outcomes,
    });

    log.info('Batch sealed', {
      status: record.status,
      attempted: outcomes.length,
      failed: outcomes.filter(outcome => outcome.status === 'failed').length,
      pacingWaitMs: rateLimiter.totalWaitMs,
    });

    try {
      await this.store.save(record);
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`could not persist batch ${batchId}: ${toError(error).message}`, {
        cause: toError(error),
        record,
      });
    }

    return record;
  }

  private async dispatch(
    entry: RecipientEntry,
    options: RunBatchOptions,
    rateLimiter: RateLimiter
  ): Promise<MessageOutcome> {
    if ('error' in entry) {
      return { rowIndex: entry.index, to: [], status: 'failed', error: describeFailure(entry.error) };
    }

    const { index, row } = entry;
    try {
      this.state = 'rendering';
      const message = renderMessage(options.template, row, options.profile);

      await rateLimiter.acquire();
      this.state = 'sending';
      const messageId = await this.mailClient.send({
        to: message.to,
        subject: message.subject,
        body: message.body,
        fromAddress: message.fromAddress,
      });

      return { rowIndex: index, to: row.to, status: 'sent', messageId };
    } catch (error) {
      return { rowIndex: index, to: row.to, status: 'failed', error: describeFailure(error) };
    }
  }

  private seal(record: BatchRecord): BatchRecord {
    this.state = 'sealed';
    return Object.freeze({
      ...record,
      outcomes: Object.freeze(
        record.outcomes.map(outcome =>
          Object.freeze({
            ...outcome,
            to: Object.freeze([...outcome.to]),
            ...(outcome.error && { error: Object.freeze({ ...outcome.error }) }),
          })
        )
      ),
    });
  }
}
