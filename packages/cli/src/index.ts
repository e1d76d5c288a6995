// neoscope command line
export { run, loadDatabase } from './cli.js';
export type { CliIO } from './cli.js';
export { parseArgs, USAGE } from './args.js';
export type {
  Command,
  GlobalOptions,
  HelpCommand,
  InspectCommand,
  ParsedArgs,
  QueryCommand,
} from './args.js';
export {
  describeApproach,
  runInspect,
  runQuery,
  NO_MATCHING_APPROACHES,
  NO_MATCHING_NEO,
} from './commands.js';
export { CliError, UsageError, isCliError } from './errors.js';
