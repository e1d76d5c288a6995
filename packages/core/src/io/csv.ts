// Minimal RFC 4180 CSV reading and writing

/**
 * Error thrown when CSV text cannot be tokenized
 */
export class CsvSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(message);
    this.name = 'CsvSyntaxError';
  }
}

/**
 * Split CSV text into rows of fields. Handles quoted fields containing
 * commas, doubled quotes and line breaks, and both LF and CRLF endings.
 * A trailing newline does not produce an empty row.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let i = 0;

  // Strip a UTF-8 byte order mark
  if (text.charCodeAt(0) === 0xfeff) i = 1;

  for (; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        if (field !== '') {
          throw new CsvSyntaxError(
            `Unexpected quote inside unquoted field on line ${line}`,
            line,
          );
        }
        inQuotes = true;
        break;
      case ',':
        row.push(field);
        field = '';
        break;
      case '\r':
        if (text[i + 1] !== '\n') field += char;
        break;
      case '\n':
        row.push(field);
        rows.push(row);
        row = [];
        field = '';
        line++;
        break;
      default:
        field += char;
    }
  }

  if (inQuotes) {
    throw new CsvSyntaxError(`Unterminated quoted field on line ${line}`, line);
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

/**
 * Turn parsed rows into records keyed by the header row
 */
export function toRecords(rows: string[][]): Record<string, string>[] {
  const [header, ...body] = rows;
  if (!header) return [];

  return body.map((fields) => {
    const record: Record<string, string> = {};
    header.forEach((column, index) => {
      record[column] = fields[index] ?? '';
    });
    return record;
  });
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Format one CSV line (without the line terminator)
 */
export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(escapeField).join(',');
}
