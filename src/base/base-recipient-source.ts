/**
 * Base Recipient Source
 *
 * Loads a source once, caches its entries and replays them on every read.
 * Also holds the field normalization shared by every input format.
 */

import type {
  RecipientSource,
  RecipientSourceMetadata,
  RecipientSourceOptions,
} from '../interfaces/recipient-source.interface.js';
import type { RecipientEntry } from '../types/batch.types.js';

export const RESERVED_FIELDS = new Set(['to', 'subject', 'body', 'from']);

/**
 * Splits an address list on `,` or `;` outside double quotes and angle
 * brackets, so `"Lovelace, Ada" <ada@example.com>` stays one address.
 */
export function splitAddressList(value: string): string[] {
  const addresses: string[] = [];
  let current = '';
  let quoted = false;
  let bracketed = false;

  for (const char of value) {
    if (char === '"' && !bracketed) {
      quoted = !quoted;
    } else if (char === '<' && !quoted) {
      bracketed = true;
    } else if (char === '>' && !quoted) {
      bracketed = false;
    } else if ((char === ',' || char === ';') && !quoted && !bracketed) {
      addresses.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  addresses.push(current);

  return addresses.map(address => address.trim()).filter(address => address !== '');
}

/**
 * Normalizes a `to` value. Returns null when the value is neither a string
 * nor an array of strings.
 */
export function parseAddresses(value: unknown): string[] | null {
  if (typeof value === 'string') {
    return splitAddressList(value);
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value.map(address => address.trim()).filter(address => address !== '');
  }
  return null;
}

/**
 * String form of a field value. `null` and `undefined` count as absent.
 */
export function stringifyField(value: unknown): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

export abstract class BaseRecipientSource implements RecipientSource {
  protected readonly hasTemplate: boolean;
  private entries: RecipientEntry[] | null = null;

  constructor(options: RecipientSourceOptions) {
    this.hasTemplate = options.hasTemplate;
  }

  /**
   * Reads and validates the whole input. Called at most once per instance.
   */
  protected abstract load(): Promise<RecipientEntry[]>;

  abstract getMetadata(): RecipientSourceMetadata;

  async count(): Promise<number> {
    const entries = await this.loadOnce();
    return entries.length;
  }

  async *read(): AsyncGenerator<RecipientEntry> {
    const entries = await this.loadOnce();
    for (const entry of entries) {
      yield entry;
    }
  }

  private async loadOnce(): Promise<RecipientEntry[]> {
    this.entries ??= await this.load();
    return this.entries;
  }
}
