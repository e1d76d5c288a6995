// Conversions between close-approach timestamps and Date values

const MONTHS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

const CALENDAR_DATE = /^(\d{4})-([A-Za-z]{3})-(\d{2}) (\d{2}):(\d{2})$/;

/**
 * Error thrown when a calendar-date string cannot be parsed
 */
export class TimeFormatError extends Error {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
    this.name = 'TimeFormatError';
  }
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Parse a calendar date such as `1900-Jan-01 00:11` into a UTC Date.
 * @throws {TimeFormatError} When the input does not name a real minute
 */
export function cdToDatetime(calendarDate: string): Date {
  const match = CALENDAR_DATE.exec(calendarDate.trim());
  if (!match) {
    throw new TimeFormatError(
      `Invalid calendar date: ${calendarDate}`,
      calendarDate,
    );
  }

  const [, year, monthName, day, hour, minute] = match;
  const month = MONTHS.findIndex(
    (m) => m.toLowerCase() === monthName.toLowerCase(),
  );
  if (month === -1) {
    throw new TimeFormatError(
      `Unknown month in calendar date: ${calendarDate}`,
      calendarDate,
    );
  }

  const date = new Date(
    Date.UTC(
      Number(year),
      month,
      Number(day),
      Number(hour),
      Number(minute),
    ),
  );

  // Date.UTC rolls over out-of-range parts instead of rejecting them
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCDate() !== Number(day) ||
    date.getUTCHours() !== Number(hour) ||
    date.getUTCMinutes() !== Number(minute)
  ) {
    throw new TimeFormatError(
      `Out-of-range calendar date: ${calendarDate}`,
      calendarDate,
    );
  }

  return date;
}

/**
 * Format a Date as `YYYY-MM-DD HH:MM` in UTC, without seconds
 */
export function datetimeToStr(time: Date): string {
  return (
    `${pad(time.getUTCFullYear(), 4)}-${pad(time.getUTCMonth() + 1)}-${pad(time.getUTCDate())} ` +
    `${pad(time.getUTCHours())}:${pad(time.getUTCMinutes())}`
  );
}

/**
 * Truncate a Date to its UTC calendar day, as `YYYY-MM-DD`
 */
export function toDateKey(time: Date): string {
  return `${pad(time.getUTCFullYear(), 4)}-${pad(time.getUTCMonth() + 1)}-${pad(time.getUTCDate())}`;
}
