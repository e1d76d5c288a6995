// Shared type definitions for neoscope

// Serialized entities - the dictionary form handed to output writers
export interface SerializedNeo {
  designation: string;
  name: string;
  diameter_km: number | null;
  potentially_hazardous: boolean;
}

export interface SerializedApproach {
  datetime_utc: string;
  distance_au: number;
  velocity_km_s: number;
}

// JSON output record: an approach with its NEO nested under `neo`
export interface ApproachOutputRecord extends SerializedApproach {
  neo: SerializedNeo | null;
}

// Columns of the CSV output, in order
export const CSV_OUTPUT_FIELDS = [
  'datetime_utc',
  'distance_au',
  'velocity_km_s',
  'designation',
  'name',
  'diameter_km',
  'potentially_hazardous',
] as const;

export type CsvOutputField = (typeof CSV_OUTPUT_FIELDS)[number];

// Filter attributes and comparators understood by the filter framework
export type FilterAttribute =
  | 'date'
  | 'distance'
  | 'velocity'
  | 'diameter'
  | 'hazardous';

export type ComparatorName = 'eq' | 'le' | 'ge';

// Index statistics
export interface IndexStats {
  neoCount: number;
  namedNeoCount: number;
  approachCount: number;
  unresolvedCount: number;
}
