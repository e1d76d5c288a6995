// Configuration loading and validation for neoscope
import type { ZodError } from 'zod';
import {
  type DataConfig,
  type NeoscopeConfig,
  NeoscopeConfigSchema,
  type OutputConfig,
} from './schemas.js';

export type { DataConfig, NeoscopeConfig, OutputConfig };

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: ZodError['errors'],
  ) {
    super(message);
    this.name = 'ConfigValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string of all validation errors
   */
  getFormattedErrors(): string {
    return formatIssues(this.errors);
  }
}

/**
 * Partial overrides, one level deep per section
 */
export interface ConfigOverrides {
  data?: Partial<DataConfig>;
  output?: Partial<OutputConfig>;
}

function formatIssues(errors: ZodError['errors']): string {
  return errors
    .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
    .join('\n');
}

/**
 * Parse environment variable as a positive integer
 */
function parseEnvCount(envVar: string | undefined, fallback: number): number {
  if (!envVar) return fallback;
  const count = Number.parseInt(envVar, 10);
  if (Number.isNaN(count) || count < 1) {
    return fallback;
  }
  return count;
}

/**
 * Build raw configuration from environment variables
 */
function buildRawConfig(): NeoscopeConfig {
  return {
    data: {
      neoFile: process.env.NEOSCOPE_NEO_FILE || 'data/neos.csv',
      approachFile: process.env.NEOSCOPE_CAD_FILE || 'data/cad.json',
    },
    output: {
      printLimit: parseEnvCount(process.env.NEOSCOPE_PRINT_LIMIT, 10),
    },
  };
}

/**
 * Default configuration (validated)
 */
export const DEFAULT_CONFIG: NeoscopeConfig = NeoscopeConfigSchema.parse(
  buildRawConfig(),
);

function mergeConfig(
  base: NeoscopeConfig,
  overrides: ConfigOverrides | undefined,
): NeoscopeConfig {
  if (!overrides) return base;
  return {
    data: { ...base.data, ...stripUndefined(overrides.data) },
    output: { ...base.output, ...stripUndefined(overrides.output) },
  };
}

function stripUndefined<T extends object>(value: T | undefined): Partial<T> {
  if (!value) return {};
  const result: Partial<T> = {};
  for (const key of Object.keys(value) as Array<keyof T>) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

/**
 * Load and validate configuration
 * @throws {ConfigValidationError} When configuration is invalid
 */
export function loadConfig(overrides?: ConfigOverrides): NeoscopeConfig {
  const merged = mergeConfig(buildRawConfig(), overrides);

  const result = NeoscopeConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid configuration:\n${formatIssues(result.error.errors)}`,
      result.error.errors,
    );
  }

  return result.data;
}
