import * as os from 'os';
import * as path from 'path';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { ShowOptions, DEFAULT_LIMIT } from './model/ShowOptions';
import { ShowConf } from './model/ShowConf';
import { SNDS_TYPE_SELECTORS, SndsTypeSelector, isTypeSelector } from './model/SndsFileType';
import { ShowConfReader } from './reader/ShowConfReader';
import { ColumnSelector, DEFAULT_WISHLIST } from './processor/ColumnSelector';
import { SndsProcessor } from './processor/SndsProcessor';
import { ShowOutput, consoleOutput } from './processor/ShowOutput';

export const EXIT_USAGE = 2;

const DATE_TAG_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

type CliOptions = {
  dir?: string;
  date?: string;
  type: SndsTypeSelector;
  columns?: string;
  limit?: number;
  conf?: string;
};

type Env = { [name: string]: string | undefined };

/**
 * Formats a date as the YYYY-MM-DD tag used in export file names, in local time.
 */
export function toDateTag(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function parseDateTag(value: string): string {
  const match = DATE_TAG_PATTERN.exec(value);
  if (match) {
    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day) {
      return value;
    }
  }
  throw new InvalidArgumentError('Expected a date in YYYY-MM-DD form, e.g. 2025-11-01.');
}

function parseLimit(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return Number.parseInt(value, 10);
}

function parseTypeSelector(value: string): SndsTypeSelector {
  if (!isTypeSelector(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${SNDS_TYPE_SELECTORS.join(', ')}.`);
  }
  return value;
}

function expandHome(dir: string): string {
  return dir.replace(/^~(?=$|[\\/])/, os.homedir());
}

export function buildProgram(output: ShowOutput = consoleOutput): Command {
  const program = new Command();
  program
    .name('snds-show')
    .description('Show Microsoft SNDS CSV exports in a readable CLI table.')
    .option('--dir <path>', 'Data directory (default: $SNDS_DATA_DIR, or ./data next to the program).')
    .option('--date <YYYY-MM-DD>', 'Date tag used in file names, e.g. 2025-11-01 (default: today).', parseDateTag)
    .addOption(
      new Option('--type <type>', 'Which SNDS file to show.')
        .choices(SNDS_TYPE_SELECTORS)
        .argParser(parseTypeSelector)
        .default('both')
    )
    .option('--columns <list>', "Comma-separated list of columns to display (for 'data' only).")
    .option('--limit <n>', `Max rows to display (0 = no limit). Default: ${DEFAULT_LIMIT}.`, parseLimit)
    .option('-c, --conf <path>', 'Path to a YAML configuration file')
    .exitOverride()
    .configureOutput({
      writeOut: text => output.out(text.replace(/\n$/, '')),
      writeErr: text => output.err(text.replace(/\n$/, '')),
    });
  return program;
}

/**
 * Merges command line, configuration file and environment into the run options.
 * The command line wins over the file, the file over the environment.
 */
export function resolveOptions(cliOptions: CliOptions, conf: ShowConf, env: Env, now: Date = new Date()): ShowOptions {
  // an empty SNDS_DATA_DIR= in .env means unset
  const dir = cliOptions.dir ?? conf.dir ?? (env.SNDS_DATA_DIR || path.resolve(__dirname, '..', 'data'));
  const columns =
    cliOptions.columns !== undefined ? ColumnSelector.parseColumnList(cliOptions.columns) : conf.columns;

  return new ShowOptions(
    path.resolve(expandHome(dir)),
    cliOptions.date ?? toDateTag(now),
    cliOptions.type,
    // an empty list means nothing was asked for, so the columns are guessed
    columns !== undefined && columns.length > 0 ? columns : null,
    cliOptions.limit ?? conf.limit ?? DEFAULT_LIMIT,
    conf.wishlist ?? [...DEFAULT_WISHLIST]
  );
}

/**
 * Parses the user arguments (without node and script) and shows the exports.
 * @returns The process exit code.
 */
export function runCli(args: string[], output: ShowOutput = consoleOutput, env: Env = process.env): number {
  const program = buildProgram(output);
  try {
    program.parse(args, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --help ends here as well, with exit code 0
      return error.exitCode === 0 ? 0 : EXIT_USAGE;
    }
    throw error;
  }

  const cliOptions = program.opts<CliOptions>();
  const conf = cliOptions.conf !== undefined ? ShowConfReader.readConfFile(cliOptions.conf) : new ShowConf();
  return SndsProcessor.run(resolveOptions(cliOptions, conf, env), output);
}
