import { readFile } from 'node:fs/promises';
import { ConfigurationError, ValidationError, toError } from '../errors/dispatch-errors.js';
import { writeLine, type AppContext } from '../app-context.js';
import { listPlaceholders } from '../services/template.service.js';
import { parseVariables, validateTemplate } from '../services/template-library.service.js';
import {
  getValue,
  getValues,
  optionsMissingValues,
  parseArgs,
  unknownOptions,
  type ParsedArgs,
} from '../utils/cli-helpers.js';

const CREATE_VALUE_OPTIONS = ['subject', 'body', 'body-file', 'from'];
const VALIDATE_VALUE_OPTIONS = ['var', 'vars-file'];

export const TEMPLATE_USAGE = [
  'mailgoat template list',
  'mailgoat template create <name> --subject TEXT (--body TEXT | --body-file PATH) [--from ADDRESS]',
  'mailgoat template validate <name|path> [--var KEY=VALUE ...] [--vars-file PATH]',
].join('\n');

function checkOptions(parsed: ParsedArgs, valueOptions: string[]): void {
  const unknown = unknownOptions(parsed, valueOptions);
  if (unknown.length > 0) {
    throw new ConfigurationError(`unknown option(s): ${unknown.map(name => `--${name}`).join(', ')}`);
  }
  const withoutValue = optionsMissingValues(parsed, valueOptions);
  if (withoutValue.length > 0) {
    throw new ConfigurationError(`option(s) require a value: ${withoutValue.map(name => `--${name}`).join(', ')}`);
  }
}

async function listTemplates(ctx: AppContext): Promise<number> {
  for (const name of await ctx.templates.list()) {
    writeLine(ctx.io.stdout, name);
  }
  return 0;
}

async function readBody(parsed: ParsedArgs): Promise<string> {
  const inline = getValue(parsed, 'body');
  const bodyFile = getValue(parsed, 'body-file');
  if (inline !== undefined && bodyFile === undefined) {
    return inline;
  }
  if (inline !== undefined || bodyFile === undefined) {
    throw new ConfigurationError('exactly one of --body or --body-file is required');
  }
  try {
    return await readFile(bodyFile, 'utf-8');
  } catch (error) {
    throw new ValidationError(`cannot read body file ${bodyFile}: ${toError(error).message}`, {
      cause: toError(error),
    });
  }
}

async function createTemplate(ctx: AppContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args, { valueOptions: CREATE_VALUE_OPTIONS });
  checkOptions(parsed, CREATE_VALUE_OPTIONS);

  const [name, ...rest] = parsed.positional;
  const subject = getValue(parsed, 'subject');
  if (!name || rest.length > 0 || subject === undefined) {
    throw new ConfigurationError(`usage: ${TEMPLATE_USAGE.split('\n')[1]}`);
  }

  const from = getValue(parsed, 'from');
  const path = await ctx.templates.create(name, {
    subject,
    body: await readBody(parsed),
    ...(from !== undefined && { from }),
  });
  writeLine(ctx.io.stdout, `template '${name}' saved to ${path}`);
  return 0;
}

/**
 * Exit 0 when the template has no problems, 1 otherwise.
 */
async function validateCommand(ctx: AppContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args, { valueOptions: VALIDATE_VALUE_OPTIONS });
  checkOptions(parsed, VALIDATE_VALUE_OPTIONS);

  const [reference, ...rest] = parsed.positional;
  if (!reference || rest.length > 0) {
    throw new ConfigurationError(`usage: ${TEMPLATE_USAGE.split('\n')[2]}`);
  }

  const template = await ctx.templates.resolve(reference);
  const items = getValues(parsed, 'var');
  const varsFile = getValue(parsed, 'vars-file');
  const variables = items.length > 0 || varsFile !== undefined
    ? await parseVariables(items, varsFile)
    : undefined;

  const placeholders = listPlaceholders(`${template.subject}\n${template.body}`);
  writeLine(ctx.io.stdout, `placeholders: ${placeholders.length > 0 ? placeholders.join(', ') : '(none)'}`);

  const problems = validateTemplate(template, variables);
  if (problems.length === 0) {
    writeLine(ctx.io.stdout, `template '${reference}' is valid`);
    return 0;
  }
  for (const problem of problems) {
    writeLine(ctx.io.stdout, `- ${problem}`);
  }
  return 1;
}

export async function runTemplateCommand(ctx: AppContext, args: string[]): Promise<number> {
  const [subcommand, ...rest] = args;
  switch (subcommand) {
    case 'list':
      return listTemplates(ctx);
    case 'create':
      return createTemplate(ctx, rest);
    case 'validate':
      return validateCommand(ctx, rest);
    default:
      throw new ConfigurationError(`unknown template command '${subcommand ?? ''}'; usage:\n${TEMPLATE_USAGE}`);
  }
}
