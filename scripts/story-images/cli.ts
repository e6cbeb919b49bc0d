import { z } from 'zod';
import { DEFAULT_WINDOW_COUNT, DEFAULT_WINDOW_START } from '@/shared/constants/image-generation';
import type { StoryRunMode } from '@/shared/types/stories';

export type CliOptions = {
  mode: StoryRunMode;
  assumeYes: boolean;
  help: boolean;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: npm run story-images -- [--test | --level <n> | --all [--yes] | --start <n> --count <n>]

  --test          Process only the first story
  --level <n>     Process every story with difficultyLevel <n>
  --all           Process ALL stories (asks for confirmation)
  --yes           Skip the --all confirmation
  --start <n>     First story index of the batch (default ${DEFAULT_WINDOW_START})
  --count <n>     Number of stories in the batch (default ${DEFAULT_WINDOW_COUNT})
  -h, --help      Show this help`;

const integerArg = (flag: string, min: number) =>
  z.coerce
    .number({ invalid_type_error: `${flag} must be an integer` })
    .int(`${flag} must be an integer`)
    .min(min, `${flag} must be >= ${min}`);

const levelArg = integerArg('--level', Number.MIN_SAFE_INTEGER);
const startArg = integerArg('--start', 0);
const countArg = integerArg('--count', 0);

const BOOLEAN_FLAGS = new Set(['--test', '--all', '--yes', '--help', '-h']);
const VALUE_FLAGS = new Set(['--level', '--start', '--count']);

function parseValue(schema: z.ZodNumber, flag: string, raw: string) {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new CliUsageError(`${flag} must be an integer, got "${raw}"`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CliUsageError(parsed.error.issues[0]?.message ?? `Invalid value for ${flag}`);
  }
  return parsed.data;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const flags = new Set<string>();
  const values = new Map<string, string>();
  const args = [...argv];

  while (args.length > 0) {
    const token = String(args.shift());
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const name = eq > 0 ? token.slice(0, eq) : token;
    if (BOOLEAN_FLAGS.has(name) && eq < 0) {
      flags.add(name);
      continue;
    }
    if (VALUE_FLAGS.has(name)) {
      const value = eq > 0 ? token.slice(eq + 1) : args.shift();
      if (value === undefined || value.length === 0) {
        throw new CliUsageError(`Missing value for ${name}`);
      }
      values.set(name, value);
      continue;
    }
    throw new CliUsageError(`Unexpected argument: ${token}`);
  }

  const help = flags.has('--help') || flags.has('-h');
  const assumeYes = flags.has('--yes');
  const level = values.get('--level');
  const start = values.get('--start');
  const count = values.get('--count');

  let mode: StoryRunMode;
  if (flags.has('--test')) {
    mode = { kind: 'test' };
  } else if (level !== undefined) {
    mode = { kind: 'level', level: parseValue(levelArg, '--level', level) };
  } else if (flags.has('--all')) {
    mode = { kind: 'all' };
  } else {
    mode = {
      kind: 'window',
      start: start !== undefined ? parseValue(startArg, '--start', start) : DEFAULT_WINDOW_START,
      count: count !== undefined ? parseValue(countArg, '--count', count) : DEFAULT_WINDOW_COUNT,
    };
  }

  return { mode, assumeYes, help };
}
