import { logger } from './utils/logger.util.js';
import { config } from './config.js';
import { createMailApiClient } from './clients/mail-api.client.js';
import { FileBatchStore, type BatchStore } from './services/batch-store.service.js';
import { FileProfileStore, type ProfileStore } from './services/profile-store.service.js';
import { systemClock, type Clock } from './services/rate-limiter.service.js';
import { FileTemplateLibrary, type TemplateLibrary } from './services/template-library.service.js';
import type { AppConfig } from './config.js';
import type { Logger } from './types/logger.types.js';
import type { MailSender } from './types/message.types.js';
import type { Profile } from './types/profile.types.js';

export interface CommandIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface AppContext {
  logger: Logger;
  config: AppConfig;
  io: CommandIO;
  clock: Clock;
  profiles: ProfileStore;
  batches: BatchStore;
  templates: TemplateLibrary;
  createMailClient(profile: Profile): MailSender;
}

let appContextInstance: AppContext | null = null;

export function createAppContext(): AppContext {
  if (appContextInstance) {
    return appContextInstance;
  }

  appContextInstance = {
    logger,
    config,
    io: {
      stdin: process.stdin,
      stdout: process.stdout,
      stderr: process.stderr,
    },
    clock: systemClock,
    profiles: new FileProfileStore(config.profilesPath, logger.child({ component: 'profiles' })),
    batches: new FileBatchStore(config.batchesDir, logger.child({ component: 'batches' })),
    templates: new FileTemplateLibrary(config.templatesDir, logger.child({ component: 'templates' })),
    createMailClient: (profile: Profile) => createMailApiClient(profile, config, logger),
  };

  return appContextInstance;
}

export function writeLine(stream: NodeJS.WritableStream, line = ''): void {
  stream.write(`${line}\n`);
}
