// inspect and query commands over a loaded index
import { extname } from 'node:path';
import {
  type LinkedApproach,
  type NEODatabase,
  createFilters,
  limit,
  writeToCsv,
  writeToJson,
} from '@neoscope/core';
import type { InspectCommand, QueryCommand } from './args.js';
import { UsageError } from './errors.js';

export interface CommandOutput {
  log(line: string): void;
}

export const NO_MATCHING_NEO = 'No matching NEOs exist in the database.';
export const NO_MATCHING_APPROACHES = 'No matching close approaches found.';

type Writer = (
  results: Iterable<LinkedApproach>,
  path: string,
) => Promise<void>;

const WRITERS = new Map<string, Writer>([
  ['.csv', writeToCsv],
  ['.json', writeToJson],
]);

export function describeApproach({ approach, neo }: LinkedApproach): string {
  return approach.describe(neo ? neo.fullName : approach.designation);
}

/**
 * Print one NEO, and with `verbose` each of its close approaches
 */
export function runInspect(
  database: NEODatabase,
  command: InspectCommand,
  out: CommandOutput,
): void {
  const neo =
    command.pdes !== undefined
      ? database.getNeoByDesignation(command.pdes)
      : database.getNeoByName(command.name);

  if (!neo) {
    out.log(NO_MATCHING_NEO);
    return;
  }

  out.log(neo.toString());
  if (command.verbose) {
    for (const linked of database.getApproaches(neo)) {
      out.log(`- ${describeApproach(linked)}`);
    }
  }
}

/**
 * Run a filtered query. Results go to `command.outfile` when given, otherwise
 * up to `--limit` (or `printLimit` when unset) of them are printed.
 * @returns The number of results written or printed
 */
export async function runQuery(
  database: NEODatabase,
  command: QueryCommand,
  out: CommandOutput,
  printLimit: number,
): Promise<number> {
  const filters = createFilters(command.criteria);

  if (command.outfile !== undefined) {
    const writer = WRITERS.get(extname(command.outfile).toLowerCase());
    if (!writer) {
      throw new UsageError(
        `Output file must end in .csv or .json: ${command.outfile}`,
        '--outfile',
      );
    }
    const results = Array.from(limit(database.query(filters), command.limit));
    await writer(results, command.outfile);
    out.log(`Wrote ${results.length} result(s) to ${command.outfile}`);
    return results.length;
  }

  let count = 0;
  for (const result of limit(
    database.query(filters),
    command.limit || printLimit,
  )) {
    out.log(describeApproach(result));
    count += 1;
  }
  if (count === 0) {
    out.log(NO_MATCHING_APPROACHES);
  }
  return count;
}
