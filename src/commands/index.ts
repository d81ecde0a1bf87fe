import { DispatchError, toError } from '../errors/dispatch-errors.js';
import { writeLine, type AppContext } from '../app-context.js';
import { runSendBatch, SEND_BATCH_USAGE } from './send-batch.command.js';
import { runBatchCommand, BATCH_USAGE } from './batch-status.command.js';
import { runProfileCommand, PROFILE_USAGE } from './profile.command.js';
import { runTemplateCommand, TEMPLATE_USAGE } from './template.command.js';

export const USAGE = [
  'Usage:',
  `  ${SEND_BATCH_USAGE}`,
  `  ${BATCH_USAGE}`,
  ...PROFILE_USAGE.split('\n').map(line => `  ${line}`),
  ...TEMPLATE_USAGE.split('\n').map(line => `  ${line}`),
].join('\n');

async function dispatchCommand(ctx: AppContext, args: string[]): Promise<number> {
  const [command, ...rest] = args;
  switch (command) {
    case 'send-batch':
      return runSendBatch(ctx, rest);
    case 'batch':
      return runBatchCommand(ctx, rest);
    case 'profile':
      return runProfileCommand(ctx, rest);
    case 'template':
      return runTemplateCommand(ctx, rest);
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      writeLine(ctx.io.stdout, USAGE);
      return command === undefined ? 2 : 0;
    default:
      writeLine(ctx.io.stderr, `error: unknown command '${command}'`);
      writeLine(ctx.io.stderr, USAGE);
      return 2;
  }
}

/**
 * Runs one CLI invocation and returns the process exit code. Dispatch errors
 * map to their own exit codes; anything else is reported as exit 1.
 */
export async function runCli(ctx: AppContext, args: string[]): Promise<number> {
  try {
    return await dispatchCommand(ctx, args);
  } catch (error) {
    if (error instanceof DispatchError) {
      ctx.logger.debug('Command failed', { error: error.name, exitCode: error.exitCode });
      writeLine(ctx.io.stderr, `error: ${error.message}`);
      return error.exitCode;
    }
    ctx.logger.error('Unexpected failure', error);
    writeLine(ctx.io.stderr, `error: ${toError(error).message}`);
    return 1;
  }
}
