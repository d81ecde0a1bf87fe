import readline from 'node:readline';
import { Writable } from 'node:stream';

/**
 * CLI utilities for interactive prompts and argument parsing
 */

/**
 * Forwards writes to `target` unless muted. Used as the readline output so
 * secret answers are not echoed.
 */
export class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

export interface QuestionInterface {
  rl: readline.Interface;
  output: MutableOutput;
}

function isTerminal(stream: NodeJS.ReadableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

export function createQuestionInterface(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): QuestionInterface {
  const mutable = new MutableOutput(output);
  // On a terminal readline does its own echo through `mutable`.
  const rl = readline.createInterface({ input, output: mutable, terminal: isTerminal(input) });
  return { rl, output: mutable };
}

/**
 * Ask a question and return the trimmed answer
 */
export async function askQuestion(prompt: QuestionInterface, question: string): Promise<string> {
  return new Promise((resolve) => {
    prompt.rl.question(question, (answer) => {
      resolve(answer.trim());
    });
  });
}

/**
 * Like askQuestion, but the typed answer is not echoed.
 */
export async function askSecret(prompt: QuestionInterface, question: string): Promise<string> {
  prompt.output.write(question);
  prompt.output.muted = true;
  return new Promise((resolve) => {
    prompt.rl.question('', (answer) => {
      prompt.output.muted = false;
      prompt.output.write('\n');
      resolve(answer.trim());
    });
  });
}

/**
 * Parsed command line arguments
 */
export interface ParsedArgs {
  flags: Set<string>;
  /** Last value given for each option */
  values: Map<string, string>;
  /** Every value given for each option, in order */
  lists: Map<string, string[]>;
  positional: string[];
}

export interface ParseArgsOptions {
  /** Long options that take a value (`--name value` or `--name=value`) */
  valueOptions?: Iterable<string>;
}

/**
 * Parse command line arguments into structured format.
 *
 * Options listed in `valueOptions` consume the next argument; every other
 * `--name` or `-x` is a boolean flag. Everything after `--` is positional.
 */
export function parseArgs(args: string[], options: ParseArgsOptions = {}): ParsedArgs {
  const valueOptions = new Set(options.valueOptions ?? []);
  const result: ParsedArgs = {
    flags: new Set<string>(),
    values: new Map<string, string>(),
    lists: new Map<string, string[]>(),
    positional: [],
  };
  const setValue = (name: string, value: string): void => {
    result.values.set(name, value);
    result.lists.set(name, [...(result.lists.get(name) ?? []), value]);
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--') {
      result.positional.push(...args.slice(i + 1));
      break;
    }

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const equalsAt = body.indexOf('=');
      if (equalsAt >= 0) {
        setValue(body.slice(0, equalsAt), body.slice(equalsAt + 1));
      } else if (valueOptions.has(body) && i + 1 < args.length) {
        setValue(body, args[i + 1]);
        i++;
      } else {
        result.flags.add(body);
      }
    } else if (arg.startsWith('-') && arg.length === 2) {
      result.flags.add(arg.slice(1));
    } else {
      result.positional.push(arg);
    }
  }

  return result;
}

/**
 * Check if any of the flags is present
 */
export function hasFlag(parsed: ParsedArgs, ...flagNames: string[]): boolean {
  return flagNames.some(name => parsed.flags.has(name));
}

export function getValue(parsed: ParsedArgs, key: string): string | undefined {
  return parsed.values.get(key);
}

export function getValues(parsed: ParsedArgs, key: string): string[] {
  return parsed.lists.get(key) ?? [];
}

export function getPositional(parsed: ParsedArgs): string[] {
  return parsed.positional;
}

/**
 * Names given on the command line that are neither known flags nor known
 * value options.
 */
export function unknownOptions(parsed: ParsedArgs, known: Iterable<string>): string[] {
  const knownSet = new Set(known);
  return [...parsed.flags, ...parsed.values.keys()].filter(name => !knownSet.has(name));
}

/**
 * Value options that were given without a value (for example a trailing `--csv`).
 */
export function optionsMissingValues(parsed: ParsedArgs, valueOptions: Iterable<string>): string[] {
  return [...valueOptions].filter(name => parsed.flags.has(name));
}
