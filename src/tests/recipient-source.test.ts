import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { CsvRecipientSource } from '../sources/csv.source.js';
import { JsonRecipientSource } from '../sources/json.source.js';
import { StdinRecipientSource } from '../sources/stdin.source.js';
import { RecipientSourceFactory } from '../factories/recipient-source.factory.js';
import { parseAddresses, stringifyField } from '../base/base-recipient-source.js';
import { ConfigurationError, ValidationError } from '../errors/dispatch-errors.js';
import { createTempDir } from './test-helpers.js';
import type { RecipientSource } from '../interfaces/recipient-source.interface.js';
import type { RecipientEntry } from '../types/batch.types.js';

async function collect(source: RecipientSource): Promise<RecipientEntry[]> {
  const entries: RecipientEntry[] = [];
  for await (const entry of source.read()) {
    entries.push(entry);
  }
  return entries;
}

function errorMessage(entry: RecipientEntry | undefined): string | undefined {
  return entry && 'error' in entry ? entry.error.message : undefined;
}

describe('parseAddresses', () => {
  it('should split on commas and semicolons and drop blanks', () => {
    expect(parseAddresses(' a@example.com, b@example.com;c@example.com ;')).toEqual([
      'a@example.com',
      'b@example.com',
      'c@example.com',
    ]);
  });

  it('should keep separators inside quoted display names and angle brackets', () => {
    expect(parseAddresses('"Lovelace, Ada" <ada@example.com>, b@example.com')).toEqual([
      '"Lovelace, Ada" <ada@example.com>',
      'b@example.com',
    ]);
    expect(parseAddresses('Ops <ops;desk@example.com>; c@example.com')).toEqual([
      'Ops <ops;desk@example.com>',
      'c@example.com',
    ]);
  });

  it('should accept an array of strings', () => {
    expect(parseAddresses(['a@example.com', ' '])).toEqual(['a@example.com']);
  });

  it('should reject other types', () => {
    expect(parseAddresses(42)).toBeNull();
    expect(parseAddresses(['a@example.com', 1])).toBeNull();
  });
});

describe('stringifyField', () => {
  it('should stringify JSON values', () => {
    expect(stringifyField('x')).toBe('x');
    expect(stringifyField(12.5)).toBe('12.5');
    expect(stringifyField(false)).toBe('false');
    expect(stringifyField({ a: [1, 2] })).toBe('{"a":[1,2]}');
    expect(stringifyField(null)).toBeUndefined();
  });
});

describe('recipient sources', () => {
  let dir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  async function writeInput(name: string, content: string): Promise<string> {
    const path = join(dir.path, name);
    await writeFile(path, content, 'utf-8');
    return path;
  }

  describe('CsvRecipientSource', () => {
    it('should read rows with literal subject and body', async () => {
      const path = await writeInput(
        'recipients.csv',
        'to,subject,body,name\nuser1@example.com,Welcome,Hello user1,Ada\nuser2@example.com,Welcome,Hello user2,Grace\n'
      );
      const source = new CsvRecipientSource(path, { hasTemplate: false });

      expect(await source.count()).toBe(2);
      const entries = await collect(source);

      expect(entries[0]).toEqual({
        index: 0,
        row: {
          to: ['user1@example.com'],
          subject: 'Welcome',
          body: 'Hello user1',
          from: undefined,
          fields: new Map([['name', 'Ada']]),
        },
      });
      expect(entries[1]).toMatchObject({ index: 1, row: { to: ['user2@example.com'], body: 'Hello user2' } });
    });

    it('should replay the same entries on every read', async () => {
      const path = await writeInput('recipients.csv', 'to,name\na@example.com,Ada\n');
      const source = new CsvRecipientSource(path, { hasTemplate: true });

      expect(await collect(source)).toEqual(await collect(source));
    });

    it('should split multiple recipients and keep the row sender', async () => {
      const path = await writeInput(
        'recipients.csv',
        'to,from,code\n"a@example.com, b@example.com",Ops <ops@example.com>,X1\n'
      );
      const [entry] = await collect(new CsvRecipientSource(path, { hasTemplate: true }));

      expect(entry).toMatchObject({
        index: 0,
        row: { to: ['a@example.com', 'b@example.com'], from: 'Ops <ops@example.com>' },
      });
      expect(entry && 'row' in entry ? [...entry.row.fields] : []).toEqual([['code', 'X1']]);
    });

    it('should ignore literal subject and body columns when a template is used', async () => {
      const path = await writeInput('recipients.csv', 'to,subject,body\na@example.com,S,B\n');
      const [entry] = await collect(new CsvRecipientSource(path, { hasTemplate: true }));

      expect(entry).toMatchObject({ row: { subject: undefined, body: undefined } });
    });

    it('should report an empty to cell as a row error', async () => {
      const path = await writeInput('recipients.csv', 'to,subject,body\n,Hi,There\nb@example.com,Hi,There\n');
      const entries = await collect(new CsvRecipientSource(path, { hasTemplate: false }));

      expect(errorMessage(entries[0])).toBe("row 0 has an empty 'to' value");
      expect(entries[0]).toMatchObject({ index: 0 });
      expect(entries[1]).toMatchObject({ index: 1, row: { to: ['b@example.com'] } });
    });

    it('should reject a file without a to column', async () => {
      const path = await writeInput('recipients.csv', 'email,subject,body\na@example.com,S,B\n');
      const source = new CsvRecipientSource(path, { hasTemplate: false });

      await expect(source.count()).rejects.toThrow(`CSV ${path} is missing required column 'to'`);
    });

    it('should require subject and body columns without a template', async () => {
      const path = await writeInput('recipients.csv', 'to,name\na@example.com,Ada\n');
      const source = new CsvRecipientSource(path, { hasTemplate: false });

      await expect(source.count()).rejects.toThrow(
        `CSV ${path} is missing required column(s) 'subject', 'body' (required without a template)`
      );
    });

    it('should reject an empty file', async () => {
      const path = await writeInput('recipients.csv', '');

      await expect(new CsvRecipientSource(path, { hasTemplate: true }).count()).rejects.toThrow(
        `CSV ${path} is empty: a header row is required`
      );
    });

    it('should raise ValidationError for a missing file', async () => {
      const source = new CsvRecipientSource(join(dir.path, 'absent.csv'), { hasTemplate: true });

      await expect(source.count()).rejects.toBeInstanceOf(ValidationError);
    });

    it('should count only data rows for a header-only file', async () => {
      const path = await writeInput('recipients.csv', 'to,subject,body\n');

      expect(await new CsvRecipientSource(path, { hasTemplate: false }).count()).toBe(0);
    });
  });

  describe('JsonRecipientSource', () => {
    it('should map objects to rows and stringify extra fields', async () => {
      const path = await writeInput(
        'recipients.json',
        JSON.stringify([
          { to: 'a@example.com', subject: 'S', body: 'B', name: 'Ada', code: 1234, vip: true, meta: { tier: 1 }, nothing: null },
        ])
      );
      const [entry] = await collect(new JsonRecipientSource(path, { hasTemplate: false }));

      expect(entry).toEqual({
        index: 0,
        row: {
          to: ['a@example.com'],
          subject: 'S',
          body: 'B',
          from: undefined,
          fields: new Map([
            ['name', 'Ada'],
            ['code', '1234'],
            ['vip', 'true'],
            ['meta', '{"tier":1}'],
          ]),
        },
      });
    });

    it('should turn malformed elements into row errors', async () => {
      const path = await writeInput(
        'recipients.json',
        JSON.stringify([5, { name: 'x' }, { to: 42 }, { to: [] }, { to: ['b@example.com'] }])
      );
      const entries = await collect(new JsonRecipientSource(path, { hasTemplate: true }));

      expect(entries.map(errorMessage)).toEqual([
        'row 0 must be an object, got number',
        "row 1 is missing 'to'",
        "row 2 has an invalid 'to': expected a string or an array of strings, got number",
        "row 3 has an empty 'to' value",
        undefined,
      ]);
      expect(entries[4]).toMatchObject({ index: 4, row: { to: ['b@example.com'] } });
    });

    it('should reject a document that is not an array', async () => {
      const path = await writeInput('recipients.json', JSON.stringify({ to: 'a@example.com' }));

      await expect(new JsonRecipientSource(path, { hasTemplate: true }).count()).rejects.toThrow(
        `JSON input ${path} must be an array of recipient objects, got object`
      );
    });

    it('should reject invalid JSON', async () => {
      const path = await writeInput('recipients.json', '[{"to": ');

      await expect(new JsonRecipientSource(path, { hasTemplate: true }).count()).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('StdinRecipientSource', () => {
    it('should buffer the stream so it can be read twice', async () => {
      const stream = Readable.from(['[{"to":"a@example.com",', '"subject":"S","body":"B"}]']);
      const source = new StdinRecipientSource(stream, { hasTemplate: false });

      expect(await source.count()).toBe(1);
      const first = await collect(source);
      const second = await collect(source);

      expect(first).toEqual(second);
      expect(first[0]).toMatchObject({ index: 0, row: { to: ['a@example.com'], subject: 'S', body: 'B' } });
      expect(source.getMetadata()).toMatchObject({ type: 'stdin', location: '<stdin>' });
    });
  });

  describe('RecipientSourceFactory', () => {
    it('should build the selected source', () => {
      const source = RecipientSourceFactory.create({ csvPath: 'in.csv' }, { hasTemplate: false });

      expect(source).toBeInstanceOf(CsvRecipientSource);
      expect(source.getMetadata()).toMatchObject({ type: 'csv', location: 'in.csv' });
    });

    it('should require exactly one source', () => {
      expect(() => RecipientSourceFactory.create({}, { hasTemplate: false })).toThrow(
        'exactly one input source is required (--csv, --json or --stdin); none was given'
      );
      expect(() =>
        RecipientSourceFactory.create({ csvPath: 'a.csv', jsonPath: 'b.json' }, { hasTemplate: false })
      ).toThrow(ConfigurationError);
    });
  });
});
