/**
 * Cycle naming utilities
 *
 * Every backup cycle is named after the local wall-clock second it started
 * in, as `YYYYMMDD_HHMMSS`. Stores append their own extension.
 */

export const CYCLE_NAME_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function generateCycleName(date: Date = new Date()): string {
  const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Wall-clock stamp written at the top of every cycle in the run log
 */
export function formatWallClock(date: Date = new Date()): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function isValidCycleName(name: string): boolean {
  return parseCycleName(name) !== null;
}

/**
 * Convert a cycle name back to the local instant it encodes.
 * Returns null for anything that is not a real calendar second.
 */
export function parseCycleName(name: string): Date | null {
  const match = CYCLE_NAME_PATTERN.exec(name);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return null;
  }

  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hours ||
    date.getMinutes() !== minutes ||
    date.getSeconds() !== seconds
  ) {
    return null;
  }

  return date;
}
