/**
 * Stdin Recipient Source
 *
 * Same format as the JSON file source. The stream is consumed once and the
 * text kept, so later reads replay it.
 */

import { text } from 'node:stream/consumers';
import { JsonRecipientSource } from './json.source.js';
import { ValidationError, toError } from '../errors/dispatch-errors.js';
import type { RecipientSourceMetadata, RecipientSourceOptions } from '../interfaces/recipient-source.interface.js';

export class StdinRecipientSource extends JsonRecipientSource {
  private readonly stream: NodeJS.ReadableStream;
  private buffered: string | null = null;

  constructor(stream: NodeJS.ReadableStream, options: RecipientSourceOptions) {
    super('<stdin>', options);
    this.stream = stream;
  }

  protected override async readText(): Promise<string> {
    if (this.buffered !== null) {
      return this.buffered;
    }
    try {
      this.buffered = await text(this.stream);
    } catch (error) {
      throw new ValidationError(`cannot read standard input: ${toError(error).message}`, {
        cause: toError(error),
      });
    }
    return this.buffered;
  }

  override getMetadata(): RecipientSourceMetadata {
    return {
      name: 'Standard Input',
      type: 'stdin',
      description: 'Reads recipients as a JSON array from standard input',
      location: this.location,
    };
  }
}
