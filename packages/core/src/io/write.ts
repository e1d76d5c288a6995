// Output of approach results to CSV or JSON files
import { writeFile } from 'node:fs/promises';
import {
  type ApproachOutputRecord,
  CSV_OUTPUT_FIELDS,
  type CsvOutputField,
} from '@neoscope/shared';
import type { LinkedApproach } from '../database/database.js';
import { formatCsvRow } from './csv.js';
import { WriteError, toError } from './errors.js';

/**
 * Flatten a linked approach into the CSV output columns.
 * Absent name and unknown diameter become empty cells, as do the NEO
 * columns of an unresolved approach.
 */
export function toCsvRow({
  approach,
  neo,
}: LinkedApproach): Record<CsvOutputField, string> {
  return {
    datetime_utc: approach.timeStr,
    distance_au: String(approach.distance),
    velocity_km_s: String(approach.velocity),
    designation: approach.designation,
    name: neo?.name ?? '',
    diameter_km: neo?.diameter == null ? '' : String(neo.diameter),
    potentially_hazardous: neo ? String(neo.hazardous) : '',
  };
}

/**
 * Nest the NEO's serialization under `neo` (null when unresolved)
 */
export function toJsonRecord({
  approach,
  neo,
}: LinkedApproach): ApproachOutputRecord {
  return {
    ...approach.serialize(),
    neo: neo ? neo.serialize() : null,
  };
}

export function formatCsv(results: Iterable<LinkedApproach>): string {
  const lines = [formatCsvRow(CSV_OUTPUT_FIELDS)];
  for (const result of results) {
    const row = toCsvRow(result);
    lines.push(formatCsvRow(CSV_OUTPUT_FIELDS.map((field) => row[field])));
  }
  return `${lines.join('\n')}\n`;
}

export function formatJson(results: Iterable<LinkedApproach>): string {
  return `${JSON.stringify(Array.from(results, toJsonRecord), null, 2)}\n`;
}

async function writeText(path: string, text: string): Promise<void> {
  try {
    await writeFile(path, text, 'utf8');
  } catch (error) {
    throw new WriteError(`Failed to write ${path}`, path, toError(error));
  }
}

/**
 * Write approaches and their NEOs to a CSV file with a header row
 * @throws {WriteError} When the file cannot be written
 */
export async function writeToCsv(
  results: Iterable<LinkedApproach>,
  path: string,
): Promise<void> {
  await writeText(path, formatCsv(results));
}

/**
 * Write approaches and their NEOs to a JSON file as an array of records
 * @throws {WriteError} When the file cannot be written
 */
export async function writeToJson(
  results: Iterable<LinkedApproach>,
  path: string,
): Promise<void> {
  await writeText(path, formatJson(results));
}
