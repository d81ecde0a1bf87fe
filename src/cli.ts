#!/usr/bin/env node
import { createAppContext } from './app-context.js';
import { runCli } from './commands/index.js';
import { initializeCorrelationId } from './utils/runtime.util.js';

async function main(): Promise<void> {
  const correlationId = initializeCorrelationId();
  const ctx = createAppContext();
  ctx.logger.debug('CLI invoked', { correlationId, command: process.argv[2] });

  process.exitCode = await runCli(ctx, process.argv.slice(2));
}

main().catch((error: unknown) => {
  createAppContext().logger.fatal('Fatal error in CLI', error);
  process.exitCode = 1;
});
