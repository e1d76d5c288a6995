// Close approach entity
import {
  type CloseApproachInput,
  CloseApproachInputSchema,
  type SerializedApproach,
} from '@neoscope/shared';
import { datetimeToStr, toDateKey } from '../helpers/time.js';
import { RecordValidationError } from './errors.js';

/**
 * A close approach to Earth: the approaching object's designation, the UTC
 * time of closest approach (null when the source had none), the nominal
 * distance in au and the relative velocity in km/s.
 */
export class CloseApproach {
  readonly designation: string;
  readonly distance: number;
  readonly velocity: number;
  private readonly epochMs: number | null;

  /**
   * @throws {RecordValidationError} When any field has the wrong type or range
   */
  constructor(input: CloseApproachInput) {
    const parsed = CloseApproachInputSchema.safeParse(input);
    if (!parsed.success) {
      throw RecordValidationError.fromZodError('CloseApproach', parsed.error);
    }

    this.designation = parsed.data.designation;
    this.epochMs = parsed.data.time ? parsed.data.time.getTime() : null;
    this.distance = parsed.data.distance;
    this.velocity = parsed.data.velocity;
    Object.freeze(this);
  }

  /**
   * Approach time (UTC), or null when unknown. Each read returns a new Date.
   */
  get time(): Date | null {
    return this.epochMs === null ? null : new Date(this.epochMs);
  }

  /**
   * Approach time as `YYYY-MM-DD HH:MM`, or an empty string when unknown
   */
  get timeStr(): string {
    const time = this.time;
    return time ? datetimeToStr(time) : '';
  }

  /**
   * UTC calendar day of the approach, or null when unknown
   */
  get dateKey(): string | null {
    const time = this.time;
    return time ? toDateKey(time) : null;
  }

  serialize(): SerializedApproach {
    return {
      datetime_utc: this.timeStr,
      distance_au: this.distance,
      velocity_km_s: this.velocity,
    };
  }

  /**
   * One-line summary naming the approaching object by `subject`
   */
  describe(subject: string = this.designation): string {
    const when = this.epochMs !== null ? `On ${this.timeStr}` : 'At an unknown time';
    return `${when}, '${subject}' approaches Earth at a distance of ${this.distance.toFixed(2)} au and a velocity of ${this.velocity.toFixed(2)} km/s.`;
  }

  toString(): string {
    return this.describe();
  }
}
