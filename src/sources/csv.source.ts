/**
 * CSV Recipient Source
 *
 * First record is the header. `to` is always required; `subject` and `body`
 * are required unless a template renders them.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { BaseRecipientSource, parseAddresses } from '../base/base-recipient-source.js';
import { ValidationError, toError } from '../errors/dispatch-errors.js';
import type { RecipientSourceMetadata, RecipientSourceOptions } from '../interfaces/recipient-source.interface.js';
import type { RecipientEntry } from '../types/batch.types.js';

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(record => Array.isArray(record) && record.every(cell => typeof cell === 'string'))
  );
}

export class CsvRecipientSource extends BaseRecipientSource {
  private readonly filePath: string;

  constructor(filePath: string, options: RecipientSourceOptions) {
    super(options);
    this.filePath = filePath;
  }

  protected async load(): Promise<RecipientEntry[]> {
    const records = this.parseRecords(await this.readText());
    const [header, ...rows] = records;

    if (!header) {
      throw new ValidationError(`CSV ${this.filePath} is empty: a header row is required`);
    }

    const columns = header.map(name => name.trim());
    this.validateHeader(columns);

    return rows.map((cells, index) => this.toEntry(columns, cells, index));
  }

  getMetadata(): RecipientSourceMetadata {
    return {
      name: 'CSV File',
      type: 'csv',
      description: 'Reads recipients from a CSV file with a header row',
      location: this.filePath,
    };
  }

  private async readText(): Promise<string> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new ValidationError(`cannot read CSV ${this.filePath}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }
  }

  private parseRecords(text: string): string[][] {
    let parsed: unknown;
    try {
      parsed = parse(text, {
        bom: true,
        skip_empty_lines: true,
      });
    } catch (error) {
      throw new ValidationError(`invalid CSV ${this.filePath}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }

    if (!isStringMatrix(parsed)) {
      throw new ValidationError(`invalid CSV ${this.filePath}: unexpected record shape`);
    }
    return parsed;
  }

  private validateHeader(columns: string[]): void {
    if (!columns.includes('to')) {
      throw new ValidationError(`CSV ${this.filePath} is missing required column 'to'`);
    }

    if (!this.hasTemplate) {
      const missing = ['subject', 'body'].filter(name => !columns.includes(name));
      if (missing.length > 0) {
        throw new ValidationError(
          `CSV ${this.filePath} is missing required column(s) ${missing.map(name => `'${name}'`).join(', ')} (required without a template)`
        );
      }
    }
  }

  private toEntry(columns: string[], cells: string[], index: number): RecipientEntry {
    const fields = new Map<string, string>();
    let to: string[] = [];
    let subject: string | undefined;
    let body: string | undefined;
    let from: string | undefined;

    for (const [position, column] of columns.entries()) {
      const cell = cells[position] ?? '';
      switch (column) {
        case 'to':
          to = parseAddresses(cell) ?? [];
          break;
        case 'subject':
          subject = this.hasTemplate ? undefined : cell;
          break;
        case 'body':
          body = this.hasTemplate ? undefined : cell;
          break;
        case 'from':
          from = cell.trim() || undefined;
          break;
        default:
          fields.set(column, cell);
      }
    }

    if (to.length === 0) {
      return { index, error: new ValidationError(`row ${index} has an empty 'to' value`) };
    }

    return { index, row: { to, subject, body, from, fields } };
  }
}
