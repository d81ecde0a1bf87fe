import { appendFile } from 'node:fs/promises';
import { BatchOrchestrator } from '../services/batch-orchestrator.service.js';
import { listPlaceholders } from '../services/template.service.js';
import { RecipientSourceFactory } from '../factories/recipient-source.factory.js';
import { ConfigurationError, StorageError, toError } from '../errors/dispatch-errors.js';
import { writeLine, type AppContext } from '../app-context.js';
import { formatErrorLog, formatSummary, summarizeBatch } from './batch-summary.js';
import {
  getValue,
  hasFlag,
  optionsMissingValues,
  parseArgs,
  unknownOptions,
} from '../utils/cli-helpers.js';
import type { BatchRecord, MessageOutcome } from '../types/batch.types.js';

const VALUE_OPTIONS = ['profile', 'csv', 'json', 'template', 'rate-limit', 'error-log'];
const FLAG_OPTIONS = ['stdin', 'continue-on-error', 'json-output'];

const PROGRESS_WIDTH = 24;

export const SEND_BATCH_USAGE =
  'mailgoat send-batch [--profile NAME] (--csv PATH | --json PATH | --stdin) [--template NAME|PATH] ' +
  '[--continue-on-error] [--rate-limit N] [--error-log PATH] [--json-output]';

/**
 * @throws ConfigurationError when the value is not a number
 */
export function parseRateLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 1) {
    throw new ConfigurationError(`--rate-limit must be a number >= 1, got '${raw}'`);
  }
  return value;
}

export function formatProgress(attempted: number, total: number, sent: number, failed: number): string {
  const filled = total > 0 ? Math.floor((attempted / total) * PROGRESS_WIDTH) : PROGRESS_WIDTH;
  const bar = '#'.repeat(filled) + '-'.repeat(PROGRESS_WIDTH - filled);
  return `[${bar}] ${attempted}/${total} sent=${sent} failed=${failed}`;
}

function isTerminal(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

async function writeErrorLog(ctx: AppContext, path: string, record: BatchRecord): Promise<void> {
  const content = formatErrorLog(record);
  if (!content) {
    return;
  }
  try {
    await appendFile(path, content, 'utf-8');
  } catch (error) {
    ctx.logger.error('Could not write error log', error, { path });
    writeLine(ctx.io.stderr, `warning: could not write error log ${path}: ${toError(error).message}`);
  }
}

function printResult(ctx: AppContext, record: BatchRecord, asJson: boolean): void {
  const summary = summarizeBatch(record);
  if (asJson) {
    writeLine(ctx.io.stdout, JSON.stringify(summary));
    return;
  }
  for (const line of formatSummary(summary)) {
    writeLine(ctx.io.stdout, line);
  }
}

/**
 * `send-batch`: exit 0 for completed or partially_failed, 1 for aborted,
 * 3 when the result could not be stored. Configuration and validation
 * errors are thrown to the CLI shell.
 */
export async function runSendBatch(ctx: AppContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args, { valueOptions: VALUE_OPTIONS });

  const unknown = unknownOptions(parsed, [...VALUE_OPTIONS, ...FLAG_OPTIONS]);
  if (unknown.length > 0) {
    throw new ConfigurationError(`unknown option(s): ${unknown.map(name => `--${name}`).join(', ')}`);
  }
  const withoutValue = optionsMissingValues(parsed, VALUE_OPTIONS);
  if (withoutValue.length > 0) {
    throw new ConfigurationError(`option(s) require a value: ${withoutValue.map(name => `--${name}`).join(', ')}`);
  }
  if (parsed.positional.length > 0) {
    throw new ConfigurationError(`unexpected argument(s): ${parsed.positional.join(' ')}`);
  }

  const rateLimit = parseRateLimit(getValue(parsed, 'rate-limit'));
  const templateRef = getValue(parsed, 'template');
  const continueOnError = hasFlag(parsed, 'continue-on-error');
  const asJson = hasFlag(parsed, 'json-output');
  const errorLogPath = getValue(parsed, 'error-log');

  const source = RecipientSourceFactory.create(
    {
      csvPath: getValue(parsed, 'csv'),
      jsonPath: getValue(parsed, 'json'),
      stdin: hasFlag(parsed, 'stdin') ? ctx.io.stdin : undefined,
    },
    { hasTemplate: templateRef !== undefined }
  );

  const profile = await ctx.profiles.resolve(getValue(parsed, 'profile'), ctx.config.profileOverride);
  const template = templateRef ? await ctx.templates.resolve(templateRef) : null;
  if (template) {
    ctx.logger.debug('Template loaded', {
      template: templateRef,
      placeholders: listPlaceholders(`${template.subject}\n${template.body}`),
    });
  }

  const orchestrator = new BatchOrchestrator({
    logger: ctx.logger,
    mailClient: ctx.createMailClient(profile),
    store: ctx.batches,
    clock: ctx.clock,
  });

  const showProgress = isTerminal(ctx.io.stderr);
  let sent = 0;
  let failed = 0;
  const onProgress = (outcome: MessageOutcome, attempted: number, total: number): void => {
    if (outcome.status === 'sent') {
      sent++;
    } else {
      failed++;
    }
    if (showProgress) {
      ctx.io.stderr.write(`\r${formatProgress(attempted, total, sent, failed)}`);
    }
  };

  let record: BatchRecord;
  try {
    record = await orchestrator.run({ source, template, profile, continueOnError, rateLimit, onProgress });
  } catch (error) {
    if (error instanceof StorageError && error.record) {
      if (showProgress) {
        writeLine(ctx.io.stderr);
      }
      printResult(ctx, error.record, asJson);
      if (errorLogPath) {
        await writeErrorLog(ctx, errorLogPath, error.record);
      }
      writeLine(ctx.io.stderr, `error: ${error.message}`);
      writeLine(ctx.io.stderr, 'the batch result above was not persisted and will not be available to `batch status`');
      return error.exitCode;
    }
    throw error;
  }

  if (showProgress) {
    writeLine(ctx.io.stderr);
  }
  printResult(ctx, record, asJson);
  if (errorLogPath) {
    await writeErrorLog(ctx, errorLogPath, record);
  }

  return record.status === 'aborted' ? 1 : 0;
}
