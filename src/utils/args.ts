export type CommandName = 'search' | 'download' | 'fetch' | 'clear-cache' | 'help';

const COMMANDS: readonly CommandName[] = ['search', 'download', 'fetch', 'clear-cache', 'help'];

const BOOLEAN_FLAGS = new Set(['all', 'help', 'check-ocr']);

export interface ParsedArgs {
  command: CommandName;
  positionals: string[];
  flags: Map<string, string | true>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

/**
 * Splits argv into a command, positionals and flags. Accepts both
 * `--flag value` and `--flag=value`; boolean flags take no value.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const [first, ...rest] = argv;
  if (first === undefined || first === '--help' || first === '-h') {
    return { command: 'help', positionals: [], flags: new Map() };
  }
  if (!isCommandName(first)) {
    throw new UsageError(`Unknown command: ${first}`);
  }

  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      flags.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }

    if (BOOLEAN_FLAGS.has(body)) {
      flags.set(body, true);
      continue;
    }

    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for --${body}`);
    }
    flags.set(body, value);
    i++;
  }

  return { command: first, positionals, flags };
}

export function getString(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  if (value === undefined) {
    return undefined;
  }
  if (value === true) {
    throw new UsageError(`--${name} needs a value`);
  }
  return value;
}

export function getInteger(args: ParsedArgs, name: string): number | undefined {
  const raw = getString(args, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new UsageError(`--${name} must be an integer, got "${raw}"`);
  }
  return value;
}

export function hasFlag(args: ParsedArgs, name: string): boolean {
  return args.flags.has(name);
}
