// Extraction of NEOs from CSV and close approaches from JSON
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { cdToDatetime } from '../helpers/time.js';
import { CloseApproach } from '../models/approach.js';
import { NearEarthObject } from '../models/neo.js';
import { parseCsv, toRecords } from './csv.js';
import { ExtractError, toError } from './errors.js';

/**
 * Schema for one row of the NEO CSV file (other columns are ignored)
 */
const NeoCsvRowSchema = z.object({
  pdes: z.string(),
  name: z.string().optional().default(''),
  diameter: z.string().optional().default(''),
  pha: z.string().optional().default(''),
});

/**
 * Schema for the close-approach JSON document
 */
const CadFileSchema = z.object({
  fields: z.array(z.string()),
  data: z.array(z.array(z.union([z.string(), z.number(), z.null()]))),
});

const CAD_COLUMNS = ['des', 'cd', 'dist', 'v_rel'] as const;

type CadCell = string | number | null;

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw new ExtractError(
      `Failed to read ${path}`,
      path,
      undefined,
      toError(error),
    );
  }
}

/**
 * Parse a numeric cell; empty or missing means unknown
 */
function parseOptionalNumber(value: CadCell | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  if (Number.isNaN(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

/**
 * Build NEO records from the text of an NEO CSV file.
 * @throws {ExtractError} When the CSV is malformed or a row is invalid
 */
export function parseNeos(text: string, path = '<memory>'): NearEarthObject[] {
  let records: Record<string, string>[];
  try {
    records = toRecords(parseCsv(text));
  } catch (error) {
    throw new ExtractError(
      `Malformed CSV in ${path}`,
      path,
      undefined,
      toError(error),
    );
  }

  return records.map((record, index) => {
    const row = index + 1;
    try {
      const parsed = NeoCsvRowSchema.parse(record);
      return new NearEarthObject({
        designation: parsed.pdes.trim(),
        name: parsed.name.trim() || null,
        diameter: parseOptionalNumber(parsed.diameter),
        hazardous: parsed.pha.trim().toUpperCase() === 'Y',
      });
    } catch (error) {
      const cause = toError(error);
      throw new ExtractError(
        `Invalid NEO on row ${row} of ${path}: ${cause.message}`,
        path,
        row,
        cause,
      );
    }
  });
}

/**
 * Build close-approach records from the text of a close-approach JSON file.
 * Columns are located by name through the document's `fields` list.
 * @throws {ExtractError} When the JSON is malformed, a column is missing or a row is invalid
 */
export function parseApproaches(
  text: string,
  path = '<memory>',
): CloseApproach[] {
  let document: z.infer<typeof CadFileSchema>;
  try {
    document = CadFileSchema.parse(JSON.parse(text));
  } catch (error) {
    throw new ExtractError(
      `Malformed close-approach JSON in ${path}`,
      path,
      undefined,
      toError(error),
    );
  }

  const columns = new Map(document.fields.map((field, index) => [field, index]));
  const missing = CAD_COLUMNS.filter((column) => !columns.has(column));
  if (missing.length > 0) {
    throw new ExtractError(
      `Missing close-approach fields in ${path}: ${missing.join(', ')}`,
      path,
    );
  }
  const cell = (values: CadCell[], column: (typeof CAD_COLUMNS)[number]) => {
    const index = columns.get(column);
    return index === undefined ? undefined : values[index];
  };

  return document.data.map((values, index) => {
    const row = index + 1;
    try {
      const designation = cell(values, 'des');
      const calendarDate = cell(values, 'cd');
      return new CloseApproach({
        designation:
          designation === null || designation === undefined
            ? ''
            : String(designation),
        time:
          typeof calendarDate === 'string' && calendarDate.trim() !== ''
            ? cdToDatetime(calendarDate)
            : null,
        distance: parseOptionalNumber(cell(values, 'dist')) ?? Number.NaN,
        velocity: parseOptionalNumber(cell(values, 'v_rel')) ?? Number.NaN,
      });
    } catch (error) {
      const cause = toError(error);
      throw new ExtractError(
        `Invalid close approach on row ${row} of ${path}: ${cause.message}`,
        path,
        row,
        cause,
      );
    }
  });
}

/**
 * Read near-Earth objects from a CSV file
 */
export async function loadNeos(path: string): Promise<NearEarthObject[]> {
  return parseNeos(await readText(path), path);
}

/**
 * Read close approaches from a JSON file
 */
export async function loadApproaches(path: string): Promise<CloseApproach[]> {
  return parseApproaches(await readText(path), path);
}
