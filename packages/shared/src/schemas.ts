// Zod schemas for records, filter criteria and configuration
import { z } from 'zod';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar date in `YYYY-MM-DD` form that also names a real day
 */
export const CalendarDateSchema = z
  .string()
  .regex(DATE_PATTERN, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return (
      !Number.isNaN(parsed.getTime()) &&
      parsed.toISOString().slice(0, 10) === value
    );
  }, 'Not a valid calendar date');

// ============================================================================
// Entity inputs - validated eagerly by the model constructors
// ============================================================================

export const NearEarthObjectInputSchema = z.object({
  designation: z.string().min(1).describe('Primary designation'),
  name: z
    .string()
    .nullable()
    .optional()
    .transform((name) => (name ? name : null))
    .describe('IAU name, empty means unnamed'),
  diameter: z
    .number()
    .finite()
    .nonnegative()
    .nullable()
    .optional()
    .transform((diameter) => diameter ?? null)
    .describe('Diameter in km, null when unknown'),
  hazardous: z.boolean().optional().default(false),
});

export const CloseApproachInputSchema = z.object({
  designation: z.string().min(1).describe('Designation of the approaching NEO'),
  time: z
    .date()
    .nullable()
    .describe('Approach time (UTC), null when unknown'),
  distance: z
    .number()
    .finite()
    .nonnegative()
    .describe('Nominal distance in au'),
  velocity: z
    .number()
    .finite()
    .nonnegative()
    .describe('Relative velocity in km/s'),
});

// ============================================================================
// Filter criteria - the query front end's input to createFilters
// ============================================================================

const bound = z.number().finite().nonnegative();

export const FilterCriteriaSchema = z
  .object({
    date: CalendarDateSchema.optional(),
    startDate: CalendarDateSchema.optional(),
    endDate: CalendarDateSchema.optional(),
    distanceMin: bound.optional(),
    distanceMax: bound.optional(),
    velocityMin: bound.optional(),
    velocityMax: bound.optional(),
    diameterMin: bound.optional(),
    diameterMax: bound.optional(),
    hazardous: z.boolean().optional(),
  })
  .strict();

export const LimitSchema = z.number().int().nonnegative().optional();

// ============================================================================
// Configuration
// ============================================================================

export const DataConfigSchema = z.object({
  neoFile: z.string().min(1),
  approachFile: z.string().min(1),
});

export const OutputConfigSchema = z.object({
  printLimit: z.number().int().positive(),
});

export const NeoscopeConfigSchema = z.object({
  data: DataConfigSchema,
  output: OutputConfigSchema,
});

export type NearEarthObjectInput = z.input<typeof NearEarthObjectInputSchema>;
export type CloseApproachInput = z.input<typeof CloseApproachInputSchema>;
export type FilterCriteria = z.infer<typeof FilterCriteriaSchema>;
export type DataConfig = z.infer<typeof DataConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type NeoscopeConfig = z.infer<typeof NeoscopeConfigSchema>;
