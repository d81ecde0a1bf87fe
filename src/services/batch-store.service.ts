import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { BatchNotFoundError, StorageError, toError } from '../errors/dispatch-errors.js';
import type { Logger } from '../types/logger.types.js';
import type { BatchRecord } from '../types/batch.types.js';

const BATCH_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const OutcomeSchema = z.object({
  rowIndex: z.number().int().nonnegative(),
  to: z.array(z.string()),
  status: z.enum(['sent', 'failed']),
  messageId: z.string().optional(),
  error: z
    .object({
      kind: z.enum(['validation', 'render', 'send']),
      message: z.string(),
      statusCode: z.number().int().optional(),
    })
    .optional(),
});

const BatchRecordSchema = z.object({
  batchId: z.string(),
  createdAt: z.string(),
  finishedAt: z.string(),
  profile: z.string(),
  totalCount: z.number().int().nonnegative(),
  continueOnError: z.boolean(),
  rateLimit: z.number().nullable(),
  status: z.enum(['completed', 'partially_failed', 'aborted']),
  outcomes: z.array(OutcomeSchema),
});

/**
 * Write-once persistence for sealed batch records.
 */
export interface BatchStore {
  /**
   * @throws StorageError when the record cannot be written or already exists
   */
  save(record: BatchRecord): Promise<void>;

  /**
   * @throws BatchNotFoundError for an unknown id
   * @throws StorageError when the stored record cannot be read
   */
  load(batchId: string): Promise<BatchRecord>;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * One JSON file per batch under `directory`. Files are created exclusively,
 * so concurrent saves of distinct ids never touch each other and a saved
 * record cannot be overwritten.
 */
export class FileBatchStore implements BatchStore {
  constructor(
    private readonly directory: string,
    private readonly logger: Logger
  ) {}

  async save(record: BatchRecord): Promise<void> {
    if (!BATCH_ID_PATTERN.test(record.batchId)) {
      throw new StorageError(`refusing to store batch with invalid id: ${record.batchId}`, { record });
    }

    const path = this.pathFor(record.batchId);
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      const reason = errorCode(error) === 'EEXIST'
        ? `batch ${record.batchId} is already stored`
        : `could not write batch ${record.batchId} to ${path}: ${toError(error).message}`;
      throw new StorageError(reason, { cause: toError(error), record });
    }

    this.logger.debug('Batch record stored', { batchId: record.batchId, path });
  }

  async load(batchId: string): Promise<BatchRecord> {
    if (!BATCH_ID_PATTERN.test(batchId)) {
      throw new BatchNotFoundError(batchId);
    }

    const path = this.pathFor(batchId);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new BatchNotFoundError(batchId);
      }
      throw new StorageError(`could not read batch ${batchId} from ${path}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(`batch file ${path} is not valid JSON`, { cause: toError(error) });
    }

    const parsed = BatchRecordSchema.safeParse(document);
    if (!parsed.success) {
      throw new StorageError(`batch file ${path} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }

  private pathFor(batchId: string): string {
    return join(this.directory, `${batchId}.json`);
  }
}
