// neoscope shared - schemas, types and configuration
export * from './config.js';
export * from './schemas.js';
export * from './types.js';

export const VERSION = '0.1.0';
