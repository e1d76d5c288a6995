// Filter-set factory - turns user criteria into a list of attribute filters
import {
  type FilterCriteria,
  FilterCriteriaSchema,
} from '@neoscope/shared';
import {
  type AttributeFilter,
  createAttributeFilter,
} from './attribute-filter.js';
import { InvalidCriteriaError } from './errors.js';

/**
 * Create a filter set from user-specified criteria.
 *
 * Each present option adds one filter: `*Min` and `startDate` compare with
 * `ge`, `*Max` and `endDate` with `le`, `date` and `hazardous` with `eq`.
 * Absent options add nothing. `hazardous: false` keeps only approaches of
 * non-hazardous NEOs, while leaving `hazardous` out places no constraint.
 *
 * @throws {InvalidCriteriaError} When an option has the wrong type or range
 */
export function createFilters(criteria: FilterCriteria = {}): AttributeFilter[] {
  const result = FilterCriteriaSchema.safeParse(criteria);
  if (!result.success) {
    throw new InvalidCriteriaError(
      `Invalid filter criteria:\n${result.error.errors
        .map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`)
        .join('\n')}`,
      result.error.errors,
    );
  }

  const c = result.data;
  const filters: AttributeFilter[] = [];

  if (c.date !== undefined) {
    filters.push(createAttributeFilter('date', 'eq', c.date));
  }
  if (c.startDate !== undefined) {
    filters.push(createAttributeFilter('date', 'ge', c.startDate));
  }
  if (c.endDate !== undefined) {
    filters.push(createAttributeFilter('date', 'le', c.endDate));
  }
  if (c.distanceMin !== undefined) {
    filters.push(createAttributeFilter('distance', 'ge', c.distanceMin));
  }
  if (c.distanceMax !== undefined) {
    filters.push(createAttributeFilter('distance', 'le', c.distanceMax));
  }
  if (c.velocityMin !== undefined) {
    filters.push(createAttributeFilter('velocity', 'ge', c.velocityMin));
  }
  if (c.velocityMax !== undefined) {
    filters.push(createAttributeFilter('velocity', 'le', c.velocityMax));
  }
  if (c.diameterMin !== undefined) {
    filters.push(createAttributeFilter('diameter', 'ge', c.diameterMin));
  }
  if (c.diameterMax !== undefined) {
    filters.push(createAttributeFilter('diameter', 'le', c.diameterMax));
  }
  if (c.hazardous !== undefined) {
    filters.push(createAttributeFilter('hazardous', 'eq', c.hazardous));
  }

  return filters;
}
