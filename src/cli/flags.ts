import { DEFAULTS, ENV } from '../core/constants';
import { UsageError } from '../core/errors';

export type Environment = Readonly<Record<string, string | undefined>>;

export type FlagName = 's' | 'creds' | 'q' | 't' | 'h' | 'v';

export interface FlagDefinition {
  name: FlagName;
  kind: 'string' | 'bool';
  usage: string;
}

/**
 * Every flag the tool accepts, in the order `-h` lists them
 */
export const FLAG_DEFINITIONS: readonly FlagDefinition[] = [
  { name: 'creds', kind: 'string', usage: 'User Credentials File' },
  { name: 'h', kind: 'bool', usage: 'Show help message' },
  { name: 'q', kind: 'string', usage: 'Queue Group Name' },
  { name: 's', kind: 'string', usage: 'The NATS System' },
  { name: 't', kind: 'bool', usage: 'Display timestamps' },
  { name: 'v', kind: 'bool', usage: 'Show version' },
];

/**
 * Parsed command line
 */
export interface ToolFlags {
  server: string;
  credentials: string;
  queue: string;
  timestamps: boolean;
  help: boolean;
  version: boolean;
  /** Positional arguments left after the flags */
  args: string[];
}

const TRUE_VALUES = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'false', 'FALSE', 'False']);

function envValue(env: Environment, key: string): string | undefined {
  const value = env[key];
  return value ? value : undefined;
}

/**
 * Flag values before the command line is read
 */
export function flagDefaults(env: Environment = {}): Omit<ToolFlags, 'args'> {
  return {
    server: envValue(env, ENV.URL) ?? DEFAULTS.SERVER,
    credentials: envValue(env, ENV.CREDS) ?? '',
    queue: DEFAULTS.QUEUE_GROUP,
    timestamps: false,
    help: false,
    version: false,
  };
}

function findFlag(name: string): FlagDefinition | undefined {
  return FLAG_DEFINITIONS.find((definition) => definition.name === name);
}

function parseBool(flag: string, value: string): boolean {
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw UsageError.invalidValue(flag, value);
}

function assign(
  flags: Omit<ToolFlags, 'args'>,
  name: FlagName,
  value: string | boolean
): void {
  switch (name) {
    case 's':
      flags.server = String(value);
      break;
    case 'creds':
      flags.credentials = String(value);
      break;
    case 'q':
      flags.queue = String(value);
      break;
    case 't':
      flags.timestamps = value === true;
      break;
    case 'h':
      flags.help = value === true;
      break;
    case 'v':
      flags.version = value === true;
      break;
  }
}

/**
 * Parse the command line the way Go's `flag` package does
 *
 * Flags come first: parsing stops at the first positional argument, at a
 * lone `-`, or after `--`. `-name` and `--name` are the same flag, string
 * flags take `-name=value` or the next argument, and boolean flags only take
 * an attached value. `-help` asks for help even though it is not a flag, and
 * ends parsing on the spot.
 *
 * A non-empty NATS_URL wins over `-s`.
 *
 * @throws {UsageError} On unknown flags, missing values or bad boolean values
 */
export function parseFlags(argv: readonly string[], env: Environment = {}): ToolFlags {
  const flags = flagDefaults(env);
  let index = 0;

  while (index < argv.length) {
    const arg = argv[index];
    if (arg.length < 2 || arg[0] !== '-') {
      break;
    }

    let dashes = 1;
    if (arg[1] === '-') {
      dashes = 2;
      if (arg.length === 2) {
        index++;
        break;
      }
    }

    let name = arg.slice(dashes);
    if (name.length === 0 || name[0] === '-' || name[0] === '=') {
      throw UsageError.badSyntax(arg);
    }
    index++;

    let value: string | undefined;
    const equals = name.indexOf('=');
    if (equals > 0) {
      value = name.slice(equals + 1);
      name = name.slice(0, equals);
    }

    const definition = findFlag(name);
    if (!definition) {
      if (name === 'help') {
        return { ...flags, help: true, args: argv.slice(index) };
      }
      throw UsageError.unknownFlag(name);
    }

    if (definition.kind === 'bool') {
      assign(flags, definition.name, value === undefined ? true : parseBool(name, value));
      continue;
    }

    if (value === undefined) {
      if (index >= argv.length) {
        throw UsageError.missingValue(name);
      }
      value = argv[index];
      index++;
    }
    assign(flags, definition.name, value);
  }

  const server = envValue(env, ENV.URL) ?? flags.server;

  return { ...flags, server, args: argv.slice(index) };
}
