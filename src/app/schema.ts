/**
 * Zod schemas for git-backfill inputs
 */

import { z } from "zod";
import { isCalendarDate, isTimestamp } from "../lib/date.ts";

export const CalendarDateSchema = z.string().refine(
  isCalendarDate,
  "Date must be in YYYY-MM-DD format",
);

export const TargetDateSchema = z.string().refine(
  (val) => isCalendarDate(val) || isTimestamp(val),
  "Date must be YYYY-MM-DD or an ISO-8601 timestamp",
);

export const TimeSchema = z.string().regex(
  /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/,
  "Time must be HH:MM or HH:MM:SS",
);

export const TimezoneSchema = z.string().regex(
  /^(Z|[+-]\d{2}:?\d{2})$/,
  "Timezone must be Z or an offset like +02:00",
);

export const ConfigFileSchema = z.object({
  name: z.string().min(1).optional(),
  email: z.string().email().optional(),
  time: TimeSchema.optional(),
  timezone: TimezoneSchema.optional(),
  message: z.string().min(1).optional(),
  push: z.boolean().optional(),
  remoteLookup: z.boolean().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * First zod issue as a single line
 */
export function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return error.message;
  }
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
