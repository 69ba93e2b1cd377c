import { InvalidTimestampError } from "./merge-errors";

const TIMESTAMP_PATTERN = /^(\d{2})\.(\d{2})\.(\d{4}) (\d{2}):(\d{2}):(\d{2})$/;

const pad = (value: number, width = 2): string =>
  value.toString().padStart(width, "0");

/**
 * Format a date as "DD.MM.YYYY HH:MM:SS" in local time
 */
export const formatTimestamp = (date: Date): string =>
  `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${pad(
    date.getFullYear(),
    4
  )} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Check that a string is "DD.MM.YYYY HH:MM:SS" and names a real date/time
 */
export const isValidTimestamp = (value: string): boolean => {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return false;

  const [day, month, year, hours, minutes, seconds] = match
    .slice(1)
    .map((part) => parseInt(part, 10));

  if (year < 1 || hours > 23 || minutes > 59 || seconds > 59) return false;
  if (month < 1 || month > 12 || day < 1) return false;

  // day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(2000, month, 0)).getUTCDate();
  const isLeap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const limit = month === 2 && !isLeap ? 28 : daysInMonth;

  return day <= limit;
};

/**
 * Empty input means "now"; anything else must already be a valid timestamp.
 */
export const normalizeTimestamp = (
  value: string,
  now: Date = new Date()
): string => {
  const trimmed = value.trim();
  if (!trimmed) return formatTimestamp(now);

  if (!isValidTimestamp(trimmed)) {
    throw new InvalidTimestampError(trimmed);
  }
  return trimmed;
};
