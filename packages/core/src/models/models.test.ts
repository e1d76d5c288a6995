import { describe, expect, it } from 'vitest';
import { CloseApproach } from './approach.js';
import { RecordValidationError, isModelError } from './errors.js';
import { NearEarthObject } from './neo.js';

describe('NearEarthObject', () => {
  it('should hold validated attributes', () => {
    const neo = new NearEarthObject({
      designation: '433',
      name: 'Eros',
      diameter: 16.84,
      hazardous: false,
    });

    expect(neo.designation).toBe('433');
    expect(neo.name).toBe('Eros');
    expect(neo.diameter).toBe(16.84);
    expect(neo.hazardous).toBe(false);
  });

  it('should treat an empty name as no name', () => {
    const neo = new NearEarthObject({ designation: '2020 AB', name: '' });
    expect(neo.name).toBeNull();
    expect(neo.fullName).toBe('2020 AB');
  });

  it('should treat a NaN diameter as unknown', () => {
    const neo = new NearEarthObject({
      designation: '2020 AB',
      diameter: Number.NaN,
    });
    expect(neo.diameter).toBeNull();
  });

  it('should default to unknown diameter and not hazardous', () => {
    const neo = new NearEarthObject({ designation: '2020 AB' });
    expect(neo.diameter).toBeNull();
    expect(neo.hazardous).toBe(false);
  });

  it('should include the name in fullName', () => {
    const neo = new NearEarthObject({ designation: '433', name: 'Eros' });
    expect(neo.fullName).toBe('433 (Eros)');
  });

  it('should serialize with output field names', () => {
    const named = new NearEarthObject({
      designation: '433',
      name: 'Eros',
      diameter: 16.84,
    });
    const unnamed = new NearEarthObject({
      designation: '2020 AB',
      hazardous: true,
    });

    expect(named.serialize()).toEqual({
      designation: '433',
      name: 'Eros',
      diameter_km: 16.84,
      potentially_hazardous: false,
    });
    expect(unnamed.serialize()).toEqual({
      designation: '2020 AB',
      name: '',
      diameter_km: null,
      potentially_hazardous: true,
    });
  });

  it('should describe itself', () => {
    const eros = new NearEarthObject({
      designation: '433',
      name: 'Eros',
      diameter: 16.84,
    });
    const unknown = new NearEarthObject({
      designation: '2020 AB',
      hazardous: true,
    });

    expect(String(eros)).toBe(
      'NEO 433 (Eros) has a diameter of 16.840 km and is not potentially hazardous.',
    );
    expect(String(unknown)).toBe(
      'NEO 2020 AB has an unknown diameter and is potentially hazardous.',
    );
  });

  it('should be immutable', () => {
    const neo = new NearEarthObject({ designation: '433' });
    expect(Object.isFrozen(neo)).toBe(true);
  });

  it('should reject an empty designation with the failing field', () => {
    try {
      new NearEarthObject({ designation: '' });
      expect.fail('expected constructor to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(RecordValidationError);
      expect(isModelError(error)).toBe(true);
      if (error instanceof RecordValidationError) {
        expect(error.entityType).toBe('NearEarthObject');
        expect(error.field).toBe('designation');
      }
    }
  });

  it('should reject a wrongly typed hazardous flag', () => {
    const input = JSON.parse('{"designation":"433","hazardous":"Y"}');
    expect(() => new NearEarthObject(input)).toThrow(
      'Invalid NearEarthObject field "hazardous"',
    );
  });

  it('should reject a negative diameter', () => {
    expect(
      () => new NearEarthObject({ designation: '433', diameter: -2 }),
    ).toThrow(RecordValidationError);
  });

  it('should reject an infinite diameter', () => {
    expect(
      () =>
        new NearEarthObject({
          designation: '433',
          diameter: Number.POSITIVE_INFINITY,
        }),
    ).toThrow('Invalid NearEarthObject field "diameter"');
  });
});

describe('CloseApproach', () => {
  const time = new Date('2020-01-01T00:00:00Z');

  it('should hold validated attributes', () => {
    const approach = new CloseApproach({
      designation: '433',
      time,
      distance: 0.15,
      velocity: 5,
    });

    expect(approach.designation).toBe('433');
    expect(approach.time?.toISOString()).toBe('2020-01-01T00:00:00.000Z');
    expect(approach.distance).toBe(0.15);
    expect(approach.velocity).toBe(5);
  });

  it('should copy the time so later mutation has no effect', () => {
    const mutable = new Date('2020-01-01T00:00:00Z');
    const approach = new CloseApproach({
      designation: '433',
      time: mutable,
      distance: 0.15,
      velocity: 5,
    });
    mutable.setUTCFullYear(1999);

    expect(approach.timeStr).toBe('2020-01-01 00:00');
  });

  it('should not let a returned time change the stored instant', () => {
    const approach = new CloseApproach({
      designation: '433',
      time,
      distance: 0.15,
      velocity: 5,
    });
    approach.time?.setUTCFullYear(1999);

    expect(approach.dateKey).toBe('2020-01-01');
    expect(approach.time?.toISOString()).toBe('2020-01-01T00:00:00.000Z');
  });

  it('should format time and date key', () => {
    const approach = new CloseApproach({
      designation: '433',
      time: new Date('2020-03-04T05:06:00Z'),
      distance: 0.15,
      velocity: 5,
    });

    expect(approach.timeStr).toBe('2020-03-04 05:06');
    expect(approach.dateKey).toBe('2020-03-04');
  });

  it('should represent an unknown time', () => {
    const approach = new CloseApproach({
      designation: '433',
      time: null,
      distance: 0.15,
      velocity: 5,
    });

    expect(approach.timeStr).toBe('');
    expect(approach.dateKey).toBeNull();
    expect(String(approach)).toBe(
      "At an unknown time, '433' approaches Earth at a distance of 0.15 au and a velocity of 5.00 km/s.",
    );
  });

  it('should serialize with output field names', () => {
    const approach = new CloseApproach({
      designation: '433',
      time,
      distance: 0.15,
      velocity: 5,
    });

    expect(approach.serialize()).toEqual({
      datetime_utc: '2020-01-01 00:00',
      distance_au: 0.15,
      velocity_km_s: 5,
    });
  });

  it('should describe itself under a given subject', () => {
    const approach = new CloseApproach({
      designation: '433',
      time,
      distance: 0.15,
      velocity: 5,
    });

    expect(approach.describe('433 (Eros)')).toBe(
      "On 2020-01-01 00:00, '433 (Eros)' approaches Earth at a distance of 0.15 au and a velocity of 5.00 km/s.",
    );
  });

  it('should reject a missing distance', () => {
    expect(
      () =>
        new CloseApproach({
          designation: '433',
          time,
          distance: Number.NaN,
          velocity: 5,
        }),
    ).toThrow('Invalid CloseApproach field "distance"');
  });

  it('should reject an infinite distance or velocity', () => {
    expect(
      () =>
        new CloseApproach({
          designation: '433',
          time,
          distance: Number.POSITIVE_INFINITY,
          velocity: 5,
        }),
    ).toThrow('Invalid CloseApproach field "distance"');
    expect(
      () =>
        new CloseApproach({
          designation: '433',
          time,
          distance: 0.1,
          velocity: Number.POSITIVE_INFINITY,
        }),
    ).toThrow('Invalid CloseApproach field "velocity"');
  });

  it('should reject a negative velocity', () => {
    try {
      new CloseApproach({ designation: '433', time, distance: 0.1, velocity: -1 });
      expect.fail('expected constructor to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(RecordValidationError);
      if (error instanceof RecordValidationError) {
        expect(error.field).toBe('velocity');
      }
    }
  });
});
