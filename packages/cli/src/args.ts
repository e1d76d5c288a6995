// Command-line argument parsing
import { CalendarDateSchema, type FilterCriteria } from '@neoscope/shared';
import { UsageError } from './errors.js';

export interface GlobalOptions {
  neoFile?: string;
  approachFile?: string;
}

export interface InspectCommand {
  command: 'inspect';
  pdes?: string;
  name?: string;
  verbose: boolean;
}

export interface QueryCommand {
  command: 'query';
  criteria: FilterCriteria;
  limit?: number;
  outfile?: string;
}

export interface HelpCommand {
  command: 'help';
}

export type Command = InspectCommand | QueryCommand | HelpCommand;

export interface ParsedArgs {
  global: GlobalOptions;
  command: Command;
}

type DateOption = 'date' | 'startDate' | 'endDate';
type NumberOption = Exclude<keyof FilterCriteria, DateOption | 'hazardous'>;

const DATE_OPTIONS = new Map<string, DateOption>([
  ['--date', 'date'],
  ['--start-date', 'startDate'],
  ['--end-date', 'endDate'],
]);

const NUMBER_OPTIONS = new Map<string, NumberOption>([
  ['--min-distance', 'distanceMin'],
  ['--max-distance', 'distanceMax'],
  ['--min-velocity', 'velocityMin'],
  ['--max-velocity', 'velocityMax'],
  ['--min-diameter', 'diameterMin'],
  ['--max-diameter', 'diameterMax'],
]);

export const USAGE = `Usage: neoscope [--neofile PATH] [--cadfile PATH] <command> [options]

Commands:
  inspect   Look up one NEO
      --pdes DESIGNATION      Primary designation (exact match)
      --name NAME             IAU name (exact match)
      -v, --verbose           Also list the NEO's close approaches
  query     Find close approaches matching criteria
      -d, --date YYYY-MM-DD   Approaches on this date
      -s, --start-date DATE   Approaches on or after this date
      -e, --end-date DATE     Approaches on or before this date
      --min-distance AU       --max-distance AU
      --min-velocity KM_S     --max-velocity KM_S
      --min-diameter KM       --max-diameter KM
      --hazardous             Only potentially hazardous NEOs
      --not-hazardous         Only NEOs that are not potentially hazardous
      -l, --limit N           Return at most N results
      -o, --outfile PATH      Write results to a .csv or .json file

Global options:
  --neofile PATH              NEO CSV file (default: $NEOSCOPE_NEO_FILE or data/neos.csv)
  --cadfile PATH              Close approach JSON file (default: $NEOSCOPE_CAD_FILE or data/cad.json)
  -h, --help                  Show this help`;

const ALIASES = new Map<string, string>([
  ['-d', '--date'],
  ['-s', '--start-date'],
  ['-e', '--end-date'],
  ['-l', '--limit'],
  ['-o', '--outfile'],
  ['-v', '--verbose'],
  ['-h', '--help'],
]);

/**
 * Split `--option=value` and expand short aliases
 */
function normalize(args: readonly string[]): string[] {
  return args.flatMap((arg) => {
    const eq = arg.indexOf('=');
    if (arg.startsWith('--') && eq > 2) {
      return [arg.slice(0, eq), arg.slice(eq + 1)];
    }
    return [ALIASES.get(arg) ?? arg];
  });
}

function takeValue(args: string[], index: number, option: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Option ${option} requires a value`, option);
  }
  return value;
}

function parseNumber(value: string, option: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new UsageError(
      `Option ${option} expects a number, got "${value}"`,
      option,
    );
  }
  return parsed;
}

function parseDate(value: string, option: string): string {
  const result = CalendarDateSchema.safeParse(value);
  if (!result.success) {
    throw new UsageError(
      `Option ${option} expects a date in YYYY-MM-DD format, got "${value}"`,
      option,
    );
  }
  return result.data;
}

function parseLimit(value: string): number {
  const parsed = parseNumber(value, '--limit');
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(
      `Option --limit expects a non-negative integer, got "${value}"`,
      '--limit',
    );
  }
  return parsed;
}

function parseInspect(args: string[]): InspectCommand {
  const command: InspectCommand = { command: 'inspect', verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--pdes':
        command.pdes = takeValue(args, i++, arg);
        break;
      case '--name':
        command.name = takeValue(args, i++, arg);
        break;
      case '--verbose':
        command.verbose = true;
        break;
      default:
        throw new UsageError(`Unknown option for inspect: ${arg}`, arg);
    }
  }

  if ((command.pdes === undefined) === (command.name === undefined)) {
    throw new UsageError('inspect requires exactly one of --pdes or --name');
  }
  return command;
}

function parseQuery(args: string[]): QueryCommand {
  const criteria: FilterCriteria = {};
  const command: QueryCommand = { command: 'query', criteria };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const dateKey = DATE_OPTIONS.get(arg);
    const numberKey = NUMBER_OPTIONS.get(arg);

    if (dateKey) {
      criteria[dateKey] = parseDate(takeValue(args, i++, arg), arg);
    } else if (numberKey) {
      criteria[numberKey] = parseNumber(takeValue(args, i++, arg), arg);
    } else if (arg === '--hazardous' || arg === '--not-hazardous') {
      const hazardous = arg === '--hazardous';
      if (
        criteria.hazardous !== undefined &&
        criteria.hazardous !== hazardous
      ) {
        throw new UsageError(
          '--hazardous and --not-hazardous cannot be combined',
          arg,
        );
      }
      criteria.hazardous = hazardous;
    } else if (arg === '--limit') {
      command.limit = parseLimit(takeValue(args, i++, arg));
    } else if (arg === '--outfile') {
      command.outfile = takeValue(args, i++, arg);
    } else {
      throw new UsageError(`Unknown option for query: ${arg}`, arg);
    }
  }

  return command;
}

/**
 * Parse command-line arguments (without the node and script entries)
 * @throws {UsageError} When the arguments are invalid
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args = normalize(argv);
  const global: GlobalOptions = {};

  let i = 0;
  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help') {
      return { global, command: { command: 'help' } };
    }
    if (arg === '--neofile') {
      global.neoFile = takeValue(args, i++, arg);
    } else if (arg === '--cadfile') {
      global.approachFile = takeValue(args, i++, arg);
    } else {
      break;
    }
  }

  const name: string | undefined = args[i];
  const rest = args.slice(i + 1);
  if (rest.includes('--help')) {
    return { global, command: { command: 'help' } };
  }

  switch (name) {
    case 'inspect':
      return { global, command: parseInspect(rest) };
    case 'query':
      return { global, command: parseQuery(rest) };
    case undefined:
      throw new UsageError('Missing command: expected inspect or query');
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}
