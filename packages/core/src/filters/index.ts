// Filter framework and result limiting
export {
  COMPARATORS,
  createAttributeFilter,
  dateFilter,
  diameterFilter,
  distanceFilter,
  hazardousFilter,
  isFilterAttribute,
  readAttribute,
  velocityFilter,
} from './attribute-filter.js';
export type {
  AttributeFilter,
  AttributeValue,
  AttributeValues,
} from './attribute-filter.js';
export { createFilters } from './create-filters.js';
export { limit } from './limit.js';
export {
  FilterError,
  InvalidCriteriaError,
  UnsupportedCriterionError,
  isFilterError,
} from './errors.js';
