// Command-line front end: argument handling, data loading and dispatch
import {
  NEODatabase,
  UnsupportedCriterionError,
  isFilterError,
  isIndexError,
  isIoError,
  loadApproaches,
  loadNeos,
} from '@neoscope/core';
import {
  ConfigValidationError,
  type DataConfig,
  loadConfig,
} from '@neoscope/shared';
import { USAGE, parseArgs } from './args.js';
import { runInspect, runQuery } from './commands.js';
import { isCliError } from './errors.js';

export interface CliIO {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

const CONSOLE_IO: CliIO = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Load both data files and link them, warning about approaches whose
 * designation matched no NEO
 */
export async function loadDatabase(
  data: DataConfig,
  io: Pick<CliIO, 'warn'>,
): Promise<NEODatabase> {
  const [neos, approaches] = await Promise.all([
    loadNeos(data.neoFile),
    loadApproaches(data.approachFile),
  ]);
  const database = new NEODatabase(neos, approaches);

  const unresolved = database.unresolvedApproaches();
  if (unresolved.length > 0) {
    const sample = [
      ...new Set(unresolved.map(({ approach }) => approach.designation)),
    ].slice(0, 3);
    io.warn(
      `Warning: ${unresolved.length} close approach(es) reference unknown NEOs (${sample.join(', ')})`,
    );
  }

  return database;
}

/**
 * Run the command line and return the process exit code.
 * Errors that signal misuse of the filter framework are rethrown.
 */
export async function run(
  argv: readonly string[],
  io: CliIO = CONSOLE_IO,
): Promise<number> {
  try {
    const { global, command } = parseArgs(argv);
    if (command.command === 'help') {
      io.log(USAGE);
      return 0;
    }

    const config = loadConfig({
      data: { neoFile: global.neoFile, approachFile: global.approachFile },
    });
    const database = await loadDatabase(config.data, io);

    if (command.command === 'inspect') {
      runInspect(database, command, io);
    } else {
      await runQuery(database, command, io, config.output.printLimit);
    }
    return 0;
  } catch (error) {
    if (error instanceof UnsupportedCriterionError) {
      throw error;
    }
    if (isCliError(error)) {
      io.error(`Error: ${error.message}`);
      if (error.exitCode === 2) io.error(USAGE);
      return error.exitCode;
    }
    if (error instanceof ConfigValidationError) {
      io.error(`Error: invalid configuration\n${error.getFormattedErrors()}`);
      return 1;
    }
    if (isIoError(error) || isFilterError(error) || isIndexError(error)) {
      io.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
