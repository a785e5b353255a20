import minimist from 'minimist';

import {
  createApplicationLayer,
  type ApplicationCommand,
  type ApplicationLayer,
  type GeneratedCrossword,
} from '../../application';
import {
  DEFAULT_GRID_HEIGHT,
  DEFAULT_GRID_WIDTH,
  EMPTY_CELL,
  TEXT_EMPTY_CELL,
} from '../../config/engine-defaults';
import { toErrorMessage } from '../../shared/errors';
import { MODULE_IDS } from '../../shared/module-ids';
import { createTelemetryModule, formatEventLine } from '../Telemetry';

export type GenerateCrosswordCommandInput = Extract<
  ApplicationCommand,
  { readonly type: 'GenerateCrossword' }
>;

export interface CliOptions {
  readonly command: GenerateCrosswordCommandInput;
  readonly verbose: boolean;
}

export type CliParseResult =
  | { readonly type: 'ok'; readonly options: CliOptions }
  | { readonly type: 'help' }
  | { readonly type: 'error'; readonly message: string };

export const CLI_USAGE = [
  'Usage: generate [options] WORD...',
  '',
  'Options:',
  `  --width N        grid width (default ${DEFAULT_GRID_WIDTH})`,
  `  --height N       grid height (default ${DEFAULT_GRID_HEIGHT})`,
  '  --wrap           wrap words across the left/right edge',
  '  --trials N       trials per execution unit',
  '  --units N        number of concurrent execution units',
  '  --seed N         base random seed',
  '  --random-start   place the first word at a random offset',
  '  --verbose        print engine events to stderr',
  '  --help           show this message',
].join('\n');

const NUMERIC_FLAGS = ['width', 'height', 'trials', 'units', 'seed'] as const;
const BOOLEAN_FLAGS = ['wrap', 'random-start', 'verbose', 'help'] as const;
type NumericFlag = (typeof NUMERIC_FLAGS)[number];

function parseNumber(flag: NumericFlag, raw: unknown): number | string {
  // A repeated flag collects every value; the last one wins.
  const value: unknown = Array.isArray(raw) ? raw.at(-1) : raw;

  if (typeof value !== 'string' || value.trim().length === 0) {
    return `--${flag} expects a number.`;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return `--${flag} expects a number, got "${value}".`;
  }

  return parsed;
}

export function parseCliArguments(argv: readonly string[]): CliParseResult {
  const unknownOptions: string[] = [];
  const flags = minimist(
    argv.filter((argument) => argument !== '--'),
    {
      string: ['_', ...NUMERIC_FLAGS],
      boolean: [...BOOLEAN_FLAGS],
      unknown: (argument) => {
        if (!argument.startsWith('-')) {
          return true;
        }

        unknownOptions.push(argument.split('=', 1)[0] ?? argument);
        return false;
      },
    },
  );

  if (flags.help === true) {
    return { type: 'help' };
  }

  const [unknownOption] = unknownOptions;
  if (unknownOption !== undefined) {
    return { type: 'error', message: `Unknown option "${unknownOption}".` };
  }

  const numbers: Partial<Record<NumericFlag, number>> = {};
  for (const flag of NUMERIC_FLAGS) {
    const raw: unknown = flags[flag];
    if (raw === undefined) {
      continue;
    }

    const parsed = parseNumber(flag, raw);
    if (typeof parsed === 'string') {
      return { type: 'error', message: parsed };
    }

    numbers[flag] = parsed;
  }

  return {
    type: 'ok',
    options: {
      verbose: flags.verbose === true,
      command: {
        type: 'GenerateCrossword',
        words: flags._.map(String),
        configuration: {
          width: numbers.width ?? DEFAULT_GRID_WIDTH,
          height: numbers.height ?? DEFAULT_GRID_HEIGHT,
          wrap: flags.wrap === true,
        },
        execution: {
          trialsPerUnit: numbers.trials,
          unitCount: numbers.units,
          seed: numbers.seed,
          initialPlacement: flags['random-start'] === true ? 'random' : 'center',
        },
      },
    },
  };
}

export function formatCrossword(crossword: GeneratedCrossword): readonly string[] {
  const lines = crossword.rows.map((row) => row.split(EMPTY_CELL).join(TEXT_EMPTY_CELL));

  lines.push('');
  lines.push(
    `density ${crossword.density.toFixed(3)} (${crossword.placedWords.length} placed, ${crossword.unplacedWords.length} unplaced)`,
  );

  for (const [title, entries] of [
    ['Across', crossword.layout.across],
    ['Down', crossword.layout.down],
  ] as const) {
    if (entries.length === 0) {
      continue;
    }

    lines.push('');
    lines.push(title);
    for (const entry of entries) {
      lines.push(`  ${entry.number}. ${entry.answer} (${entry.length})`);
    }
  }

  if (crossword.unplacedWords.length > 0) {
    lines.push('');
    lines.push(`Unplaced: ${crossword.unplacedWords.join(', ')}`);
  }

  return lines;
}

export interface CliIo {
  readonly writeOut: (line: string) => void;
  readonly writeErr: (line: string) => void;
}

export interface CliModuleOptions {
  readonly io: CliIo;
  readonly createApplication?: () => ApplicationLayer;
}

export interface CliModule {
  readonly moduleName: typeof MODULE_IDS.cli;
  run: (argv: readonly string[]) => Promise<number>;
}

export function createCliModule(options: CliModuleOptions): CliModule {
  const { io } = options;
  const createApplication = options.createApplication ?? (() => createApplicationLayer());

  return {
    moduleName: MODULE_IDS.cli,
    run: async (argv) => {
      const parsed = parseCliArguments(argv);

      if (parsed.type === 'help') {
        io.writeOut(CLI_USAGE);
        return 0;
      }

      if (parsed.type === 'error') {
        io.writeErr(parsed.message);
        io.writeErr(CLI_USAGE);
        return 2;
      }

      const application = createApplication();
      const telemetry = createTelemetryModule(application.events, {
        sinks: parsed.options.verbose ? [(event) => io.writeErr(formatEventLine(event))] : [],
      });

      telemetry.start();
      try {
        const result = await application.commands.dispatch(parsed.options.command);

        if (result.type !== 'ok') {
          io.writeErr(`${result.error.code}: ${result.error.message}`);
          return 1;
        }

        if (result.value.type !== 'CrosswordGenerated') {
          io.writeErr(`Unexpected command outcome: ${result.value.type}`);
          return 1;
        }

        formatCrossword(result.value.crossword).forEach((line) => {
          io.writeOut(line);
        });
        return 0;
      } catch (error: unknown) {
        io.writeErr(toErrorMessage(error));
        return 1;
      } finally {
        telemetry.stop();
      }
    },
  };
}
