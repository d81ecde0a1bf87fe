import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { RenderError, ValidationError, toError } from '../errors/dispatch-errors.js';
import type { Profile } from '../types/profile.types.js';
import type { RecipientRow, RenderedMessage, TemplateSpec } from '../types/batch.types.js';

const PLACEHOLDER_PATTERN = /\{\{([^{}]+)\}\}/g;

const TemplateSchema = z.object({
  subject: z.string({ required_error: "'subject' is required", invalid_type_error: "'subject' must be a string" }),
  body: z.string({ required_error: "'body' is required", invalid_type_error: "'body' must be a string" }),
  from: z.string({ invalid_type_error: "'from' must be a string" }).optional(),
});

export type SenderDefaults = Pick<Profile, 'fromAddress' | 'fromName'>;

/**
 * Reads a template file: a JSON object with string `subject` and `body` and
 * an optional `from`.
 * @throws ValidationError when the file is unreadable or malformed
 */
export async function loadTemplate(path: string): Promise<TemplateSpec> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ValidationError(`cannot read template ${path}: ${toError(error).message}`, { cause: toError(error) });
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`template ${path} is not valid JSON: ${toError(error).message}`, {
      cause: toError(error),
    });
  }

  const parsed = TemplateSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => issue.message).join('; ');
    throw new ValidationError(`template ${path} is invalid: ${issues}`);
  }

  return parsed.data;
}

/**
 * Placeholder names referenced by a template string, in order of first use.
 */
export function listPlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Value for a placeholder name: the row's extra fields first, then its own
 * `to`, `from`, `subject` and `body`. Recipients are joined with `, `.
 */
function lookupValue(row: RecipientRow, name: string): string | undefined {
  const field = row.fields.get(name);
  if (field !== undefined) {
    return field;
  }
  switch (name) {
    case 'to':
      return row.to.join(', ');
    case 'from':
      return row.from;
    case 'subject':
      return row.subject;
    case 'body':
      return row.body;
    default:
      return undefined;
  }
}

/**
 * Single pass: substituted values are never scanned again. Names are matched
 * exactly; unmatched names are added to `missing`.
 */
function substitute(text: string, row: RecipientRow, missing: Set<string>): string {
  return text.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) => {
    const value = lookupValue(row, name);
    if (value === undefined) {
      missing.add(name);
      return placeholder;
    }
    return value;
  });
}

function formatSender(defaults: SenderDefaults | undefined): string | undefined {
  if (!defaults?.fromAddress) {
    return undefined;
  }
  return defaults.fromName ? `${defaults.fromName} <${defaults.fromAddress}>` : defaults.fromAddress;
}

/**
 * Produces the concrete message for one row.
 *
 * Sender precedence: the row's `from`, then the template's, then the
 * profile default.
 *
 * @throws RenderError when a placeholder has no row value, or when there is no
 *   template and the row lacks a subject or body
 */
export function renderMessage(
  template: TemplateSpec | null,
  row: RecipientRow,
  defaults?: SenderDefaults
): RenderedMessage {
  const fromAddress = row.from ?? template?.from ?? formatSender(defaults);

  if (!template) {
    const absent = (['subject', 'body'] as const).filter(field => row[field] === undefined);
    if (absent.length > 0) {
      throw new RenderError(`row has no ${absent.join(' or ')} and no template was given`, absent);
    }
    return {
      to: [...row.to],
      subject: row.subject ?? '',
      body: row.body ?? '',
      fromAddress,
    };
  }

  const missing = new Set<string>();
  const subject = substitute(template.subject, row, missing);
  const body = substitute(template.body, row, missing);

  if (missing.size > 0) {
    const names = [...missing];
    throw new RenderError(`missing value for placeholder(s): ${names.join(', ')}`, names);
  }

  return {
    to: [...row.to],
    subject,
    body,
    fromAddress,
  };
}
