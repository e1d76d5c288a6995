// Near-Earth object entity
import {
  type NearEarthObjectInput,
  NearEarthObjectInputSchema,
  type SerializedNeo,
} from '@neoscope/shared';
import { RecordValidationError } from './errors.js';

/**
 * A near-Earth object: a unique primary designation, an optional IAU name,
 * a diameter in kilometers (null when unknown) and a potentially-hazardous flag.
 *
 * Instances are immutable. Close approaches are reached through the
 * `NEODatabase` that indexes the object.
 */
export class NearEarthObject {
  readonly designation: string;
  readonly name: string | null;
  readonly diameter: number | null;
  readonly hazardous: boolean;

  /**
   * @throws {RecordValidationError} When any field has the wrong type or range
   */
  constructor(input: NearEarthObjectInput) {
    const diameter =
      typeof input.diameter === 'number' && Number.isNaN(input.diameter)
        ? null
        : input.diameter;

    const parsed = NearEarthObjectInputSchema.safeParse({ ...input, diameter });
    if (!parsed.success) {
      throw RecordValidationError.fromZodError('NearEarthObject', parsed.error);
    }

    this.designation = parsed.data.designation;
    this.name = parsed.data.name;
    this.diameter = parsed.data.diameter;
    this.hazardous = parsed.data.hazardous;
    Object.freeze(this);
  }

  /**
   * Designation followed by the name in parentheses, when there is one
   */
  get fullName(): string {
    return this.name ? `${this.designation} (${this.name})` : this.designation;
  }

  serialize(): SerializedNeo {
    return {
      designation: this.designation,
      name: this.name ?? '',
      diameter_km: this.diameter,
      potentially_hazardous: this.hazardous,
    };
  }

  toString(): string {
    const diameter =
      this.diameter === null
        ? 'an unknown diameter'
        : `a diameter of ${this.diameter.toFixed(3)} km`;
    const hazard = this.hazardous ? 'is' : 'is not';
    return `NEO ${this.fullName} has ${diameter} and ${hazard} potentially hazardous.`;
  }
}
