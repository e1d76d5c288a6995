// Attribute filters - (attribute, comparator, reference value) predicates
import type { ComparatorName, FilterAttribute } from '@neoscope/shared';
import type { LinkedApproach } from '../database/database.js';
import { UnsupportedCriterionError } from './errors.js';

/**
 * Type of each attribute's value; dates compare as `YYYY-MM-DD` strings
 */
export interface AttributeValues {
  date: string;
  distance: number;
  velocity: number;
  diameter: number;
  hazardous: boolean;
}

export type AttributeValue = AttributeValues[FilterAttribute];

type AttributeGetter<K extends FilterAttribute> = (
  approach: LinkedApproach,
) => AttributeValues[K] | null;

// A getter returns null when the value is unknown or the NEO is unresolved
const ATTRIBUTE_GETTERS: { [K in FilterAttribute]: AttributeGetter<K> } = {
  date: ({ approach }) => approach.dateKey,
  distance: ({ approach }) => approach.distance,
  velocity: ({ approach }) => approach.velocity,
  diameter: ({ neo }) => neo?.diameter ?? null,
  hazardous: ({ neo }) => neo?.hazardous ?? null,
};

type Comparator = <T extends AttributeValue>(left: T, right: T) => boolean;

export const COMPARATORS: Record<ComparatorName, Comparator> = {
  eq: (left, right) => left === right,
  le: (left, right) => left <= right,
  ge: (left, right) => left >= right,
};

const COMPARATOR_SYMBOLS: Record<ComparatorName, string> = {
  eq: '==',
  le: '<=',
  ge: '>=',
};

export function isFilterAttribute(name: string): name is FilterAttribute {
  return Object.prototype.hasOwnProperty.call(ATTRIBUTE_GETTERS, name);
}

/**
 * Read an attribute of interest from a linked approach.
 * @throws {UnsupportedCriterionError} When no getter exists for the attribute
 */
export function readAttribute<K extends FilterAttribute>(
  attribute: K,
  approach: LinkedApproach,
): AttributeValues[K] | null;
export function readAttribute(
  attribute: string,
  approach: LinkedApproach,
): AttributeValue | null;
export function readAttribute(
  attribute: string,
  approach: LinkedApproach,
): AttributeValue | null {
  if (!isFilterAttribute(attribute)) {
    throw new UnsupportedCriterionError(attribute);
  }
  return ATTRIBUTE_GETTERS[attribute](approach);
}

/**
 * A callable predicate evaluating `comparator(attribute(approach), value)`.
 * An unknown attribute value never matches.
 */
export interface AttributeFilter<K extends FilterAttribute = FilterAttribute> {
  (approach: LinkedApproach): boolean;
  readonly attribute: K;
  readonly comparator: ComparatorName;
  readonly value: AttributeValues[K];
}

export function createAttributeFilter<K extends FilterAttribute>(
  attribute: K,
  comparator: ComparatorName,
  value: AttributeValues[K],
): AttributeFilter<K> {
  const compare = COMPARATORS[comparator];
  const predicate = (approach: LinkedApproach): boolean => {
    const actual = readAttribute(attribute, approach);
    return actual !== null && compare(actual, value);
  };

  return Object.assign(predicate, {
    attribute,
    comparator,
    value,
    toString: () =>
      `${attribute} ${COMPARATOR_SYMBOLS[comparator]} ${String(value)}`,
  });
}

export const dateFilter = (op: ComparatorName, value: string) =>
  createAttributeFilter('date', op, value);
export const distanceFilter = (op: ComparatorName, value: number) =>
  createAttributeFilter('distance', op, value);
export const velocityFilter = (op: ComparatorName, value: number) =>
  createAttributeFilter('velocity', op, value);
export const diameterFilter = (op: ComparatorName, value: number) =>
  createAttributeFilter('diameter', op, value);
export const hazardousFilter = (op: ComparatorName, value: boolean) =>
  createAttributeFilter('hazardous', op, value);
