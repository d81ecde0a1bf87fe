import { ConfigurationError } from '../errors/dispatch-errors.js';
import { writeLine, type AppContext } from '../app-context.js';
import { formatSummary, summarizeBatch } from './batch-summary.js';
import { hasFlag, parseArgs, unknownOptions } from '../utils/cli-helpers.js';

export const BATCH_USAGE = 'mailgoat batch status <batch_id> [--json-output]';

/**
 * `batch status <id>`. An unknown id surfaces as BatchNotFoundError.
 */
export async function runBatchCommand(ctx: AppContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args);
  const [subcommand, batchId, ...rest] = parsed.positional;

  if (subcommand !== 'status') {
    throw new ConfigurationError(`unknown batch command '${subcommand ?? ''}'; usage: ${BATCH_USAGE}`);
  }
  const unknown = unknownOptions(parsed, ['json-output']);
  if (unknown.length > 0) {
    throw new ConfigurationError(`unknown option(s): ${unknown.map(name => `--${name}`).join(', ')}`);
  }
  if (!batchId || rest.length > 0) {
    throw new ConfigurationError(`usage: ${BATCH_USAGE}`);
  }

  const record = await ctx.batches.load(batchId);
  const summary = summarizeBatch(record);

  if (hasFlag(parsed, 'json-output')) {
    writeLine(ctx.io.stdout, JSON.stringify({ ...summary, continueOnError: record.continueOnError, rateLimit: record.rateLimit }));
    return 0;
  }

  for (const line of formatSummary(summary)) {
    writeLine(ctx.io.stdout, line);
  }
  return 0;
}
