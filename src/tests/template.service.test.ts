import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { listPlaceholders, loadTemplate, renderMessage } from '../services/template.service.js';
import { RenderError, ValidationError } from '../errors/dispatch-errors.js';
import {
  BUILTIN_TEMPLATES,
  FileTemplateLibrary,
  findTagProblems,
  parseVariables,
  validateTemplate,
} from '../services/template-library.service.js';
import { createMockLogger, createTempDir } from './test-helpers.js';
import type { RecipientRow, TemplateSpec } from '../types/batch.types.js';

function row(fields: Record<string, string>, overrides: Partial<RecipientRow> = {}): RecipientRow {
  return { to: ['a@example.com'], fields: new Map(Object.entries(fields)), ...overrides };
}

const welcome: TemplateSpec = { subject: 'Hello {{name}}', body: 'Your code is {{code}}' };

describe('renderMessage', () => {
  it('should substitute placeholders from row fields', () => {
    const message = renderMessage(welcome, row({ name: 'Ada', code: 'X1' }));

    expect(message).toEqual({
      to: ['a@example.com'],
      subject: 'Hello Ada',
      body: 'Your code is X1',
      fromAddress: undefined,
    });
  });

  it('should report every missing placeholder at once', () => {
    const error = (() => {
      try {
        renderMessage({ subject: '{{greeting}} {{name}}', body: '{{code}} {{name}}' }, row({ name: 'Ada' }));
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(RenderError);
    expect(error).toHaveProperty('message', 'missing value for placeholder(s): greeting, code');
    expect(error).toHaveProperty('missing', ['greeting', 'code']);
  });

  it('should not expand placeholders that appear inside substituted values', () => {
    const message = renderMessage(welcome, row({ name: '{{code}}', code: 'X1' }));

    expect(message.subject).toBe('Hello {{code}}');
  });

  it('should match names exactly', () => {
    expect(() => renderMessage(welcome, row({ Name: 'Ada', code: 'X1' }))).toThrow(
      'missing value for placeholder(s): name'
    );
  });

  it('should leave text without placeholders unchanged', () => {
    const message = renderMessage({ subject: 'Static', body: 'No fields {here}' }, row({}));

    expect(message.subject).toBe('Static');
    expect(message.body).toBe('No fields {here}');
  });

  it('should use literal subject and body without a template', () => {
    const message = renderMessage(null, row({}, { subject: 'Welcome', body: 'Hello user1' }));

    expect(message).toMatchObject({ subject: 'Welcome', body: 'Hello user1' });
  });

  it('should fail without a template when the row lacks a body', () => {
    expect(() => renderMessage(null, row({}, { subject: 'Welcome' }))).toThrow(
      'row has no body and no template was given'
    );
  });

  describe('row values', () => {
    it('should fill {{to}} with the joined recipients', () => {
      const message = renderMessage(
        { subject: 'For {{to}}', body: 'B' },
        row({}, { to: ['a@example.com', 'b@example.com'] })
      );

      expect(message.subject).toBe('For a@example.com, b@example.com');
    });

    it('should fill {{from}}, {{subject}} and {{body}} from the row', () => {
      const message = renderMessage(
        { subject: 'Re: {{subject}}', body: 'Sent by {{from}}: {{body}}' },
        row({}, { from: 'ops@example.com', subject: 'Outage', body: 'resolved' })
      );

      expect(message.subject).toBe('Re: Outage');
      expect(message.body).toBe('Sent by ops@example.com: resolved');
    });

    it('should prefer an extra field over the row value', () => {
      const message = renderMessage({ subject: '{{from}}', body: 'B' }, row({ from: 'field' }, { from: 'ops@example.com' }));

      expect(message.subject).toBe('field');
    });

    it('should still report {{from}} missing when the row has no sender', () => {
      expect(() => renderMessage({ subject: 'From {{from}}', body: 'B' }, row({}))).toThrow(
        'missing value for placeholder(s): from'
      );
    });
  });

  describe('sender', () => {
    const profileDefaults = { fromAddress: 'ops@example.com', fromName: 'Ops' };

    it('should prefer the row sender', () => {
      const message = renderMessage(
        { ...welcome, from: 'template@example.com' },
        row({ name: 'Ada', code: 'X1' }, { from: 'row@example.com' }),
        profileDefaults
      );
      expect(message.fromAddress).toBe('row@example.com');
    });

    it('should fall back to the template sender', () => {
      const message = renderMessage({ ...welcome, from: 'template@example.com' }, row({ name: 'Ada', code: 'X1' }), profileDefaults);
      expect(message.fromAddress).toBe('template@example.com');
    });

    it('should fall back to the profile default', () => {
      expect(renderMessage(welcome, row({ name: 'Ada', code: 'X1' }), profileDefaults).fromAddress).toBe(
        'Ops <ops@example.com>'
      );
      expect(renderMessage(welcome, row({ name: 'Ada', code: 'X1' }), { fromAddress: 'ops@example.com' }).fromAddress).toBe(
        'ops@example.com'
      );
    });
  });
});

describe('listPlaceholders', () => {
  it('should list names in order of first use', () => {
    expect(listPlaceholders('{{b}} {{a}} {{b}}')).toEqual(['b', 'a']);
  });
});

describe('loadTemplate', () => {
  let dir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('should load a valid template', async () => {
    const path = join(dir.path, 'welcome.json');
    await writeFile(path, JSON.stringify({ subject: 'Hello {{name}}', body: 'Your code is {{code}}' }));

    await expect(loadTemplate(path)).resolves.toEqual({ subject: 'Hello {{name}}', body: 'Your code is {{code}}' });
  });

  it('should reject a template without a body', async () => {
    const path = join(dir.path, 'broken.json');
    await writeFile(path, JSON.stringify({ subject: 'Hello' }));

    await expect(loadTemplate(path)).rejects.toThrow(`template ${path} is invalid: 'body' is required`);
  });

  it('should reject a non-string subject', async () => {
    const path = join(dir.path, 'broken.json');
    await writeFile(path, JSON.stringify({ subject: 3, body: 'B' }));

    await expect(loadTemplate(path)).rejects.toThrow(`template ${path} is invalid: 'subject' must be a string`);
  });

  it('should reject invalid JSON and missing files', async () => {
    const path = join(dir.path, 'broken.json');
    await writeFile(path, '{');

    await expect(loadTemplate(path)).rejects.toBeInstanceOf(ValidationError);
    await expect(loadTemplate(join(dir.path, 'absent.json'))).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('validateTemplate', () => {
  it('should list unresolved variables in sorted order', () => {
    const problems = validateTemplate(
      { subject: '{{title}} for {{name}}', body: '{{code}}' },
      new Map([['name', 'Ada']])
    );

    expect(problems).toEqual(['unresolved variables: code, title']);
  });

  it('should skip the variable check when no variables are given', () => {
    expect(validateTemplate({ subject: '{{title}}', body: 'plain text' })).toEqual([]);
  });

  it('should check tags in HTML bodies', () => {
    const problems = validateTemplate({ subject: 'S', body: '<html><body><p>Hi<br></div></body>' });

    expect(problems).toEqual(['unclosed tags: html', 'mismatched tag: expected </p> got </div>']);
  });

  it('should not check tags in plain text bodies', () => {
    expect(validateTemplate({ subject: 'S', body: 'a <b and c>' })).toEqual([]);
  });
});

describe('findTagProblems', () => {
  it('should accept balanced markup with void and self-closing tags', () => {
    expect(findTagProblems('<div><img src="x.png"><hr/><span/><p class="a">x</p></div>')).toEqual([]);
  });

  it('should report a closing tag without an opener', () => {
    expect(findTagProblems('text</p>')).toEqual(['closing tag without opener: p']);
  });

  it('should report every unclosed tag', () => {
    expect(findTagProblems('<table><tr><td>x')).toEqual(['unclosed tags: table, tr, td']);
  });
});

describe('parseVariables', () => {
  let dir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('should split key=value items on the first equals sign', async () => {
    const variables = await parseVariables(['name=Ada', 'query=a=b']);

    expect([...variables]).toEqual([['name', 'Ada'], ['query', 'a=b']]);
  });

  it('should let items override the vars file', async () => {
    const path = join(dir.path, 'vars.json');
    await writeFile(path, JSON.stringify({ name: 'Grace', count: 3, skipped: null }));

    const variables = await parseVariables(['name=Ada'], path);

    expect(Object.fromEntries(variables)).toEqual({ name: 'Ada', count: '3' });
  });

  it('should reject an item without a key', async () => {
    await expect(parseVariables(['=Ada'])).rejects.toThrow('invalid --var format: =Ada (expected key=value)');
    await expect(parseVariables(['name'])).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject a vars file that is not an object', async () => {
    const path = join(dir.path, 'vars.json');
    await writeFile(path, '["Ada"]');

    await expect(parseVariables([], path)).rejects.toThrow(`vars file ${path} must contain a JSON object`);
  });
});

describe('FileTemplateLibrary', () => {
  let dir: { path: string; cleanup: () => Promise<void> };
  let library: FileTemplateLibrary;

  beforeEach(async () => {
    dir = await createTempDir();
    library = new FileTemplateLibrary(join(dir.path, 'templates'), createMockLogger());
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it('should seed the built-in templates on first use', async () => {
    expect(await library.list()).toEqual(['error', 'notification', 'report', 'welcome']);
    expect(await library.get('welcome')).toEqual(BUILTIN_TEMPLATES.welcome);
  });

  it('should not overwrite an edited built-in', async () => {
    await library.create('welcome', { subject: 'Hi', body: 'Custom' });

    const fresh = new FileTemplateLibrary(join(dir.path, 'templates'), createMockLogger());

    expect(await fresh.get('welcome')).toEqual({ subject: 'Hi', body: 'Custom' });
  });

  it('should create and replace named templates', async () => {
    const path = await library.create('reminder', { subject: 'S1', body: 'B1', from: 'ops@example.com' });
    await library.create('reminder', { subject: 'S2', body: 'B2' });

    expect(path).toBe(join(dir.path, 'templates', 'reminder.json'));
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({ subject: 'S2', body: 'B2' });
    expect(await library.list()).toContain('reminder');
  });

  it('should reject unknown and invalid names', async () => {
    await expect(library.get('ghost')).rejects.toThrow('template not found: ghost');
    await expect(library.create('../escape', { subject: 'S', body: 'B' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('should resolve a name through the library and a path through the file system', async () => {
    const path = join(dir.path, 'inline.json');
    await writeFile(path, JSON.stringify({ subject: 'Inline', body: 'B' }));

    expect(await library.resolve('report')).toEqual(BUILTIN_TEMPLATES.report);
    expect(await library.resolve(path)).toEqual({ subject: 'Inline', body: 'B' });
  });
});
