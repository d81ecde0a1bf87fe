import { ConfigurationError } from '../errors/dispatch-errors.js';
import { writeLine, type AppContext } from '../app-context.js';
import {
  askQuestion,
  askSecret,
  createQuestionInterface,
  getValue,
  hasFlag,
  optionsMissingValues,
  parseArgs,
  unknownOptions,
} from '../utils/cli-helpers.js';
import type { Profile } from '../types/profile.types.js';

const ADD_VALUE_OPTIONS = ['server', 'api-key', 'from', 'from-name'];

export const PROFILE_USAGE = [
  'mailgoat profile add <name> [--server URL] [--api-key KEY] [--from ADDRESS] [--from-name NAME] [--default]',
  'mailgoat profile list',
  'mailgoat profile use <name>',
].join('\n');

function isInteractiveInput(stream: NodeJS.ReadableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

/**
 * Fills in server and API key from prompts when they were not passed as flags.
 */
async function promptForMissing(ctx: AppContext, partial: Partial<Profile>): Promise<Partial<Profile>> {
  if (partial.server && partial.apiKey) {
    return partial;
  }
  if (!isInteractiveInput(ctx.io.stdin)) {
    throw new ConfigurationError('--server and --api-key are required when not running interactively');
  }

  const prompt = createQuestionInterface(ctx.io.stdin, ctx.io.stderr);
  try {
    const server = partial.server ?? await askQuestion(prompt, 'Server URL: ');
    const apiKey = partial.apiKey ?? await askSecret(prompt, 'API key: ');
    const fromAddress = partial.fromAddress ?? (await askQuestion(prompt, 'From address (optional): ') || undefined);
    const fromName = partial.fromName ?? (await askQuestion(prompt, 'From name (optional): ') || undefined);
    return { ...partial, server, apiKey, fromAddress, fromName };
  } finally {
    prompt.rl.close();
  }
}

async function addProfile(ctx: AppContext, args: string[]): Promise<number> {
  const parsed = parseArgs(args, { valueOptions: ADD_VALUE_OPTIONS });
  const unknown = unknownOptions(parsed, [...ADD_VALUE_OPTIONS, 'default']);
  if (unknown.length > 0) {
    throw new ConfigurationError(`unknown option(s): ${unknown.map(name => `--${name}`).join(', ')}`);
  }
  const withoutValue = optionsMissingValues(parsed, ADD_VALUE_OPTIONS);
  if (withoutValue.length > 0) {
    throw new ConfigurationError(`option(s) require a value: ${withoutValue.map(name => `--${name}`).join(', ')}`);
  }

  const [name] = parsed.positional;
  if (!name) {
    throw new ConfigurationError(`usage: ${PROFILE_USAGE}`);
  }

  const filled = await promptForMissing(ctx, {
    server: getValue(parsed, 'server'),
    apiKey: getValue(parsed, 'api-key'),
    fromAddress: getValue(parsed, 'from'),
    fromName: getValue(parsed, 'from-name'),
  });

  await ctx.profiles.add(
    {
      name,
      server: filled.server ?? '',
      apiKey: filled.apiKey ?? '',
      fromAddress: filled.fromAddress,
      fromName: filled.fromName,
    },
    { makeDefault: hasFlag(parsed, 'default') }
  );

  writeLine(ctx.io.stdout, `profile '${name.trim()}' saved`);
  return 0;
}

async function listProfiles(ctx: AppContext): Promise<number> {
  const profiles = await ctx.profiles.list();
  if (profiles.length === 0) {
    writeLine(ctx.io.stdout, 'no profiles configured');
    return 0;
  }

  const defaultName = await ctx.profiles.getDefaultName();
  for (const profile of profiles) {
    const marker = profile.name === defaultName ? '*' : ' ';
    const sender = profile.fromAddress
      ? profile.fromName ? `${profile.fromName} <${profile.fromAddress}>` : profile.fromAddress
      : '-';
    writeLine(ctx.io.stdout, `${marker} ${profile.name}\t${profile.server}\t${sender}`);
  }
  return 0;
}

async function useProfile(ctx: AppContext, args: string[]): Promise<number> {
  const [name, ...rest] = parseArgs(args).positional;
  if (!name || rest.length > 0) {
    throw new ConfigurationError('usage: mailgoat profile use <name>');
  }
  await ctx.profiles.use(name);
  writeLine(ctx.io.stdout, `default profile is now '${name}'`);
  return 0;
}

export async function runProfileCommand(ctx: AppContext, args: string[]): Promise<number> {
  const [subcommand, ...rest] = args;
  switch (subcommand) {
    case 'add':
      return addProfile(ctx, rest);
    case 'list':
      return listProfiles(ctx);
    case 'use':
      return useProfile(ctx, rest);
    default:
      throw new ConfigurationError(`unknown profile command '${subcommand ?? ''}'; usage:\n${PROFILE_USAGE}`);
  }
}
