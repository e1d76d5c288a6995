// Entity model
export { NearEarthObject } from './neo.js';
export { CloseApproach } from './approach.js';
export { ModelError, RecordValidationError, isModelError } from './errors.js';
