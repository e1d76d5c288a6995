// neoscope core - entity model, linking index, filters and file I/O
export * from './database/index.js';
export * from './filters/index.js';
export * from './io/index.js';
export * from './models/index.js';
export {
  TimeFormatError,
  cdToDatetime,
  datetimeToStr,
  toDateKey,
} from './helpers/time.js';

export const VERSION = '0.1.0';
