/**
 * Command-line options
 *
 * Flags are picked out of argv by hand; the raw values then go through a
 * zod schema so the rest of the program gets a typed CliOptions.
 */

import { z } from 'zod';
import { DEFAULT_CORPUS } from './corpus';
import { DEFAULT_WIDTH } from './games/typing';
import { PALETTE_NAMES } from './themes';

export const DEFAULT_TIME = 60;

export const PROLOG =
  'A typing speed test for the terminal: type the words, beat the clock.';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = (flag: string) =>
  z.coerce
    .number({ invalid_type_error: `${flag} must be a positive integer` })
    .int(`${flag} must be a positive integer`)
    .positive(`${flag} must be a positive integer`);

export const CliOptionsSchema = z.object({
  time: positiveInt('--time').default(DEFAULT_TIME),
  corpus: z.string().min(1, '--corpus must not be empty').default(DEFAULT_CORPUS),
  width: positiveInt('--width').default(DEFAULT_WIDTH),
  list: z.boolean().default(false),
  rigorousSpaces: z.boolean().default(false),
  theme: z.enum(PALETTE_NAMES, {
    errorMap: () => ({ message: `--theme must be one of: ${PALETTE_NAMES.join(', ')}` }),
  }).default('classic'),
  help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

interface FlagSpec {
  key: keyof CliOptions;
  names: string[];
  takesValue: boolean;
}

const FLAGS: FlagSpec[] = [
  { key: 'time', names: ['-t', '--time'], takesValue: true },
  { key: 'corpus', names: ['-c', '--corpus'], takesValue: true },
  { key: 'width', names: ['-w', '--width'], takesValue: true },
  { key: 'list', names: ['-l', '--list'], takesValue: false },
  { key: 'rigorousSpaces', names: ['-r', '--rigorous-spaces'], takesValue: false },
  { key: 'theme', names: ['--theme'], takesValue: true },
  { key: 'help', names: ['-h', '--help'], takesValue: false },
];

/**
 * Parse argv (without the node and script entries) into validated options.
 * Accepts `--flag value` and `--flag=value`.
 */
export function parseArgs(args: string[]): CliOptions {
  const raw: Partial<Record<keyof CliOptions, string | boolean>> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const spec = FLAGS.find(f => f.names.includes(name));
    if (!spec) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }

    if (!spec.takesValue) {
      if (eq !== -1) throw new ConfigError(`${name} does not take a value`);
      raw[spec.key] = true;
      continue;
    }

    if (eq !== -1) {
      raw[spec.key] = arg.slice(eq + 1);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined) {
      throw new ConfigError(`${name} requires a value`);
    }
    raw[spec.key] = value;
    i++;
  }

  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => issue.message).join('\n'));
  }
  return result.data;
}

export function getHelpText(): string {
  return `
  typedash: ${PROLOG}

  Usage:
    typedash [options]

  Options:
    -t, --time SECONDS        How long to play for (default ${DEFAULT_TIME})
    -c, --corpus NAME|PATH    Word list to play with (default "${DEFAULT_CORPUS}")
    -w, --width COLUMNS       Width of the text area (default ${DEFAULT_WIDTH})
    -l, --list                List the built-in corpora
    -r, --rigorous-spaces     Treat a double space as an error
        --theme NAME          ${PALETTE_NAMES.join(', ')} (default classic)
    -h, --help                Show this help

  Controls:
    Space / Enter        Finish the current word
    Backspace            Delete a character
    Ctrl-W               Clear the current word
    Ctrl-C               End the game

  Examples:
    typedash
    typedash -t 30 -c programming
    typedash --corpus ./my-words.txt --rigorous-spaces
`;
}
