/**
 * Normalization of container entry timestamps
 *
 * `zipinfo` reports each entry's modification time in one of two forms,
 * both local wall-clock time:
 *
 *   decimal   `YYYYMMDD.HHMMSS` or `YYMMDD.HHMMSS`   (`zipinfo -T`)
 *   compact   `YY-Mmm-DD HH:MM`                       (default listing)
 *
 * Two-digit years below 80 are 20xx, the rest 19xx; zip cannot store
 * dates before 1980. Anything else is rejected with EntryTimestampError.
 */

export class EntryTimestampError extends Error {
  readonly raw: string;

  constructor(raw: string, reason: string) {
    super(`Unparseable entry timestamp "${raw}": ${reason}`);
    this.name = "EntryTimestampError";
    this.raw = raw;
  }
}

const DECIMAL_PATTERN = /^(\d{2}|\d{4})(\d{2})(\d{2})\.(\d{2})(\d{2})(\d{2})$/;
const COMPACT_PATTERN = /^(\d{2})-([A-Za-z]{3})-(\d{2}) (\d{2}):(\d{2})$/;

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

interface Fields {
  year: number;
  monthIndex: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
}

function expandYear(digits: string): number {
  const value = Number(digits);
  if (digits.length === 4) return value;
  return value < 80 ? 2000 + value : 1900 + value;
}

function readDecimal(raw: string): Fields | null {
  const match = DECIMAL_PATTERN.exec(raw);
  if (!match) return null;
  const [, year = "", month = "", day = "", hours = "", minutes = "", seconds = ""] = match;
  return {
    year: expandYear(year),
    monthIndex: Number(month) - 1,
    day: Number(day),
    hours: Number(hours),
    minutes: Number(minutes),
    seconds: Number(seconds),
  };
}

function readCompact(raw: string): Fields | null {
  const match = COMPACT_PATTERN.exec(raw);
  if (!match) return null;
  const [, year = "", monthName = "", day = "", hours = "", minutes = ""] = match;
  const monthIndex = MONTHS.indexOf(monthName.toLowerCase());
  if (monthIndex === -1) {
    throw new EntryTimestampError(raw, `unknown month "${monthName}"`);
  }
  return {
    year: expandYear(year),
    monthIndex,
    day: Number(day),
    hours: Number(hours),
    minutes: Number(minutes),
    seconds: 0,
  };
}

export function parseEntryTimestamp(raw: string): Date {
  const value = raw.trim();
  const fields = readDecimal(value) ?? readCompact(value);
  if (!fields) {
    throw new EntryTimestampError(raw, "expected YYYYMMDD.HHMMSS or YY-Mmm-DD HH:MM");
  }

  const { year, monthIndex, day, hours, minutes, seconds } = fields;
  if (monthIndex < 0 || monthIndex > 11) {
    throw new EntryTimestampError(raw, "month out of range");
  }
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new EntryTimestampError(raw, "time out of range");
  }

  const date = new Date(year, monthIndex, day, hours, minutes, seconds);
  if (date.getFullYear() !== year || date.getMonth() !== monthIndex || date.getDate() !== day) {
    throw new EntryTimestampError(raw, "not a calendar date");
  }

  return date;
}
