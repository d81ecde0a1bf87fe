import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { listPlaceholders, loadTemplate } from './template.service.js';
import { stringifyField } from '../base/base-recipient-source.js';
import { StorageError, ValidationError, toError } from '../errors/dispatch-errors.js';
import type { Logger } from '../types/logger.types.js';
import type { TemplateSpec } from '../types/batch.types.js';

const TEMPLATE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const TEMPLATE_EXTENSION = '.json';

const VOID_ELEMENTS = new Set(['br', 'hr', 'img', 'meta', 'link', 'input']);
const TAG_PATTERN = /<(\/?)([A-Za-z][A-Za-z0-9-]*)\b[^>]*?(\/?)>/g;

/**
 * Seeded into an empty template directory.
 */
export const BUILTIN_TEMPLATES: Readonly<Record<string, TemplateSpec>> = {
  welcome: {
    subject: 'Welcome to {{appName}}!',
    from: 'noreply@example.com',
    body: 'Hi {{name}},\n\nWelcome to {{appName}}! Your account is ready.\n\nBest regards,\nThe {{appName}} Team\n',
  },
  notification: {
    subject: 'Notification: {{title}}',
    from: 'noreply@example.com',
    body: 'Hello {{name}},\n\n{{message}}\n\nTime: {{timestamp}}\n',
  },
  report: {
    subject: 'Report for {{period}}',
    from: 'reports@example.com',
    body: 'Report summary for {{period}}:\n\n{{summary}}\n',
  },
  error: {
    subject: 'Error Alert: {{service}}',
    from: 'alerts@example.com',
    body: 'Service: {{service}}\nSeverity: {{severity}}\nDetails: {{details}}\n',
  },
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Unclosed, stray and mismatched tags in an HTML body.
 */
export function findTagProblems(html: string): string[] {
  const stack: string[] = [];
  const problems: string[] = [];

  for (const match of html.matchAll(TAG_PATTERN)) {
    const [, closing, rawName, selfClosing] = match;
    const tag = rawName.toLowerCase();
    if (VOID_ELEMENTS.has(tag) || selfClosing) {
      continue;
    }
    if (!closing) {
      stack.push(tag);
      continue;
    }
    const open = stack.pop();
    if (open === undefined) {
      problems.push(`closing tag without opener: ${tag}`);
    } else if (open !== tag) {
      problems.push(`mismatched tag: expected </${open}> got </${tag}>`);
    }
  }

  if (stack.length > 0) {
    problems.unshift(`unclosed tags: ${stack.join(', ')}`);
  }
  return problems;
}

function looksLikeHtml(text: string): boolean {
  return text.includes('</') || text.toLowerCase().includes('<html');
}

/**
 * Problems that would make a template fail or render badly. Placeholders
 * are checked only when `variables` is given.
 */
export function validateTemplate(template: TemplateSpec, variables?: ReadonlyMap<string, string>): string[] {
  const problems: string[] = [];

  if (variables) {
    const unresolved = listPlaceholders(`${template.subject}\n${template.body}`)
      .filter(name => !variables.has(name))
      .sort();
    if (unresolved.length > 0) {
      problems.push(`unresolved variables: ${unresolved.join(', ')}`);
    }
  }

  if (looksLikeHtml(template.body)) {
    problems.push(...findTagProblems(template.body));
  }
  return problems;
}

/**
 * Builds a variable map from `key=value` items and an optional JSON object
 * file. Items override file entries; `null` file values are skipped.
 * @throws ValidationError for a malformed item or file
 */
export async function parseVariables(items: string[], varsFile?: string): Promise<Map<string, string>> {
  const variables = new Map<string, string>();

  if (varsFile !== undefined) {
    let document: unknown;
    try {
      document = JSON.parse(await readFile(varsFile, 'utf-8'));
    } catch (error) {
      throw new ValidationError(`cannot read vars file ${varsFile}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }
    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
      throw new ValidationError(`vars file ${varsFile} must contain a JSON object`);
    }
    for (const [key, value] of Object.entries(document)) {
      const text = stringifyField(value);
      if (text !== undefined) {
        variables.set(key, text);
      }
    }
  }

  for (const item of items) {
    const equalsAt = item.indexOf('=');
    if (equalsAt <= 0) {
      throw new ValidationError(`invalid --var format: ${item} (expected key=value)`);
    }
    variables.set(item.slice(0, equalsAt), item.slice(equalsAt + 1));
  }

  return variables;
}

export interface TemplateLibrary {
  list(): Promise<string[]>;
  /**
   * @throws ValidationError when the template does not exist or is malformed
   */
  get(name: string): Promise<TemplateSpec>;
  /**
   * Writes (or replaces) a named template and returns its path.
   */
  create(name: string, template: TemplateSpec): Promise<string>;
  /**
   * A value ending in `.json` or containing a path separator is read as a
   * file; anything else is a template name.
   */
  resolve(reference: string): Promise<TemplateSpec>;
}

/**
 * Named templates stored as `<directory>/<name>.json`, seeded with the
 * built-in set on first use. Seeding never overwrites an existing file.
 */
export class FileTemplateLibrary implements TemplateLibrary {
  private seeded = false;

  constructor(
    private readonly directory: string,
    private readonly logger: Logger
  ) {}

  async list(): Promise<string[]> {
    await this.ensureBuiltins();
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      throw new StorageError(`cannot list templates in ${this.directory}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }
    return entries
      .filter(entry => entry.endsWith(TEMPLATE_EXTENSION))
      .map(entry => entry.slice(0, -TEMPLATE_EXTENSION.length))
      .sort();
  }

  async get(name: string): Promise<TemplateSpec> {
    const path = this.pathFor(name);
    const names = await this.list();
    if (!names.includes(name)) {
      throw new ValidationError(`template not found: ${name}`);
    }
    return loadTemplate(path);
  }

  async create(name: string, template: TemplateSpec): Promise<string> {
    const path = this.pathFor(name);
    const document: TemplateSpec = {
      subject: template.subject,
      body: template.body,
      ...(template.from !== undefined && { from: template.from }),
    };

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new StorageError(`cannot write template ${path}: ${toError(error).message}`, { cause: toError(error) });
    }

    this.logger.info('Template saved', { template: name, path });
    return path;
  }

  async resolve(reference: string): Promise<TemplateSpec> {
    if (reference.endsWith(TEMPLATE_EXTENSION) || reference.includes('/') || reference.includes('\\')) {
      return loadTemplate(reference);
    }
    return this.get(reference);
  }

  private pathFor(name: string): string {
    if (!TEMPLATE_NAME_PATTERN.test(name)) {
      throw new ValidationError(`invalid template name: ${name} (use letters, digits, '-' or '_')`);
    }
    return join(this.directory, `${name}${TEMPLATE_EXTENSION}`);
  }

  private async ensureBuiltins(): Promise<void> {
    if (this.seeded) {
      return;
    }
    try {
      await mkdir(this.directory, { recursive: true });
      for (const [name, template] of Object.entries(BUILTIN_TEMPLATES)) {
        try {
          await writeFile(this.pathFor(name), `${JSON.stringify(template, null, 2)}\n`, {
            encoding: 'utf-8',
            flag: 'wx',
          });
          this.logger.debug('Built-in template seeded', { template: name });
        } catch (error) {
          if (errorCode(error) !== 'EEXIST') {
            throw error;
          }
        }
      }
    } catch (error) {
      throw new StorageError(`cannot prepare template directory ${this.directory}: ${toError(error).message}`, {
        cause: toError(error),
      });
    }
    this.seeded = true;
  }
}
