/**
 * Calendar date utilities
 * Dates are "YYYY-MM-DD" strings interpreted in UTC
 */

import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import utc from "dayjs/plugin/utc.js";

dayjs.extend(customParseFormat);
dayjs.extend(utc);

const DATE_FORMAT = "YYYY-MM-DD";

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;
const TIMESTAMP = /^\d{4}-\d{2}-\d{2}T([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Check for a real "YYYY-MM-DD" calendar date (rejects 2025-02-30)
 */
export function isCalendarDate(value: string): boolean {
  return CALENDAR_DATE.test(value) && dayjs(value, DATE_FORMAT, true).isValid();
}

/**
 * Check for an ISO-8601 timestamp carrying a time designator
 */
export function isTimestamp(value: string): boolean {
  return TIMESTAMP.test(value) && isCalendarDate(value.slice(0, 10));
}

export function hasTimeDesignator(value: string): boolean {
  return value.includes("T");
}

export function addDays(date: string, days: number): string {
  return dayjs.utc(date).add(days, "day").format(DATE_FORMAT);
}

export function todayUtc(now: Date = new Date()): string {
  return dayjs(now).utc().format(DATE_FORMAT);
}

/**
 * Normalize any parseable timestamp to its UTC calendar date
 */
export function toUtcDate(timestamp: string): string | null {
  const parsed = dayjs(timestamp);
  if (!parsed.isValid()) {
    return null;
  }
  return parsed.utc().format(DATE_FORMAT);
}

/**
 * Every calendar date from start to end inclusive, ascending
 * Empty when start is after end
 */
export function enumerateDates(start: string, end: string): string[] {
  const dates: string[] = [];
  const last = dayjs.utc(end);
  for (let current = dayjs.utc(start); !current.isAfter(last, "day"); current = current.add(1, "day")) {
    dates.push(current.format(DATE_FORMAT));
  }
  return dates;
}
