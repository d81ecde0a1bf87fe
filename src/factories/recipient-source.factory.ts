import { CsvRecipientSource } from '../sources/csv.source.js';
import { JsonRecipientSource } from '../sources/json.source.js';
import { StdinRecipientSource } from '../sources/stdin.source.js';
import { ConfigurationError } from '../errors/dispatch-errors.js';
import type { RecipientSource, RecipientSourceOptions } from '../interfaces/recipient-source.interface.js';

export interface RecipientSourceSelection {
  csvPath?: string;
  jsonPath?: string;
  /** Stream to read when --stdin was given */
  stdin?: NodeJS.ReadableStream;
}

export class RecipientSourceFactory {
  /**
   * Builds the reader for the one selected input. No I/O happens here.
   * @throws ConfigurationError when zero or several inputs are selected
   */
  static create(selection: RecipientSourceSelection, options: RecipientSourceOptions): RecipientSource {
    const selected = [
      selection.csvPath !== undefined && '--csv',
      selection.jsonPath !== undefined && '--json',
      selection.stdin !== undefined && '--stdin',
    ].filter((flag): flag is string => typeof flag === 'string');

    if (selected.length !== 1) {
      const detail = selected.length === 0 ? 'none was given' : `got ${selected.join(', ')}`;
      throw new ConfigurationError(`exactly one input source is required (--csv, --json or --stdin); ${detail}`);
    }

    if (selection.csvPath !== undefined) {
      return new CsvRecipientSource(selection.csvPath, options);
    }
    if (selection.jsonPath !== undefined) {
      return new JsonRecipientSource(selection.jsonPath, options);
    }
    if (selection.stdin !== undefined) {
      return new StdinRecipientSource(selection.stdin, options);
    }

    throw new ConfigurationError('no input source selected');
  }
}
