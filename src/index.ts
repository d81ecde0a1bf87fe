export { BatchOrchestrator, computeStatus } from './services/batch-orchestrator.service.js';
export type { BatchOrchestratorDeps, RunBatchOptions } from './services/batch-orchestrator.service.js';
export { FileBatchStore } from './services/batch-store.service.js';
export type { BatchStore } from './services/batch-store.service.js';
export { FileProfileStore, resolveProfileName } from './services/profile-store.service.js';
export type { ProfileStore } from './services/profile-store.service.js';
export { loadTemplate, listPlaceholders, renderMessage } from './services/template.service.js';
export type { SenderDefaults } from './services/template.service.js';
export {
  BUILTIN_TEMPLATES,
  FileTemplateLibrary,
  findTagProblems,
  parseVariables,
  validateTemplate,
} from './services/template-library.service.js';
export type { TemplateLibrary } from './services/template-library.service.js';
export {
  TokenBucketRateLimiter,
  UnlimitedRateLimiter,
  createRateLimiter,
  systemClock,
} from './services/rate-limiter.service.js';
export type { Clock, RateLimiter } from './services/rate-limiter.service.js';
export { RecipientSourceFactory } from './factories/recipient-source.factory.js';
export type { RecipientSourceSelection } from './factories/recipient-source.factory.js';
export { CsvRecipientSource } from './sources/csv.source.js';
export { JsonRecipientSource } from './sources/json.source.js';
export { StdinRecipientSource } from './sources/stdin.source.js';
export type {
  RecipientSource,
  RecipientSourceMetadata,
  RecipientSourceOptions,
} from './interfaces/recipient-source.interface.js';
export { MailApiClient, createMailApiClient } from './clients/mail-api.client.js';
export { ClientError, MailApiError, MailNetworkError } from './clients/errors/client-error.js';
export {
  BatchNotFoundError,
  ConfigurationError,
  DispatchError,
  ProfileError,
  RenderError,
  StorageError,
  ValidationError,
} from './errors/dispatch-errors.js';
export { runCli } from './commands/index.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export type { AppContext, CommandIO } from './app-context.js';
export type * from './types/batch.types.js';
export type { Profile, AddProfileOptions } from './types/profile.types.js';
export type { MailSender, Message, SendMessageInput } from './types/message.types.js';
export type { Logger } from './types/logger.types.js';
