// Linking index
export { NEODatabase } from './database.js';
export type { ApproachPredicate, LinkedApproach } from './database.js';
export { IndexError, DuplicateDesignationError, isIndexError } from './errors.js';
