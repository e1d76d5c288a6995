// Reading source files and writing results
export { loadApproaches, loadNeos, parseApproaches, parseNeos } from './extract.js';
export {
  formatCsv,
  formatJson,
  toCsvRow,
  toJsonRecord,
  writeToCsv,
  writeToJson,
} from './write.js';
export { CsvSyntaxError, formatCsvRow, parseCsv, toRecords } from './csv.js';
export { ExtractError, IoError, WriteError, isIoError } from './errors.js';
