/**
 * JSON Recipient Source
 *
 * A JSON array of objects with the same field rules as a CSV row. Element
 * problems are row-scoped; a document that is not an array is fatal.
 */

import { readFile } from 'node:fs/promises';
import { BaseRecipientSource, RESERVED_FIELDS, parseAddresses, stringifyField } from '../base/base-recipient-source.js';
import { ValidationError, toError } from '../errors/dispatch-errors.js';
import type { RecipientSourceMetadata, RecipientSourceOptions } from '../interfaces/recipient-source.interface.js';
import type { RecipientEntry } from '../types/batch.types.js';

function describeJsonType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class JsonRecipientSource extends BaseRecipientSource {
  protected readonly location: string;

  constructor(location: string, options: RecipientSourceOptions) {
    super(options);
    this.location = location;
  }

  protected async readText(): Promise<string> {
    try {
      return await readFile(this.location, 'utf-8');
    } catch (error) {
      throw new ValidationError(`cannot read JSON ${this.location}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }
  }

  protected async load(): Promise<RecipientEntry[]> {
    const text = await this.readText();

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`invalid JSON in ${this.location}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }

    if (!Array.isArray(document)) {
      throw new ValidationError(
        `JSON input ${this.location} must be an array of recipient objects, got ${describeJsonType(document)}`
      );
    }

    return document.map((element: unknown, index) => this.toEntry(element, index));
  }

  getMetadata(): RecipientSourceMetadata {
    return {
      name: 'JSON File',
      type: 'json',
      description: 'Reads recipients from a JSON array of objects',
      location: this.location,
    };
  }

  protected toEntry(element: unknown, index: number): RecipientEntry {
    if (!isRecord(element)) {
      return {
        index,
        error: new ValidationError(`row ${index} must be an object, got ${describeJsonType(element)}`),
      };
    }

    if (element.to === undefined || element.to === null) {
      return { index, error: new ValidationError(`row ${index} is missing 'to'`) };
    }

    const to = parseAddresses(element.to);
    if (to === null) {
      return {
        index,
        error: new ValidationError(
          `row ${index} has an invalid 'to': expected a string or an array of strings, got ${describeJsonType(element.to)}`
        ),
      };
    }
    if (to.length === 0) {
      return { index, error: new ValidationError(`row ${index} has an empty 'to' value`) };
    }

    const fields = new Map<string, string>();
    for (const [key, value] of Object.entries(element)) {
      if (RESERVED_FIELDS.has(key)) {
        continue;
      }
      const text = stringifyField(value);
      if (text !== undefined) {
        fields.set(key, text);
      }
    }

    return {
      index,
      row: {
        to,
        subject: this.hasTemplate ? undefined : stringifyField(element.subject),
        body: this.hasTemplate ? undefined : stringifyField(element.body),
        from: stringifyField(element.from),
        fields,
      },
    };
  }
}
