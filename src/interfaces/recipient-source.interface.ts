/**
 * Recipient Source Interface
 *
 * Contract shared by the CSV, JSON file and stdin readers.
 */

import type { RecipientEntry } from '../types/batch.types.js';

export interface RecipientSourceMetadata {
  name: string;
  type: 'csv' | 'json' | 'stdin';
  description: string;
  location: string;
}

export interface RecipientSourceOptions {
  /** When true, literal subject/body columns are ignored in favor of rendering */
  hasTemplate: boolean;
}

export interface RecipientSource {
  /**
   * Number of rows in the input. The first call loads and validates the
   * whole source, so fatal input errors surface here.
   * @throws ValidationError for malformed input
   */
  count(): Promise<number>;

  /**
   * Entries in input order. Every call starts again from the first row.
   */
  read(): AsyncIterable<RecipientEntry>;

  getMetadata(): RecipientSourceMetadata;
}
