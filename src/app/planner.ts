/**
 * Plan a backfill
 * Decides which dates get a commit and what each commit looks like,
 * without touching the repository
 */

import { addDays, enumerateDates, hasTimeDesignator, todayUtc, toUtcDate } from "../lib/date.ts";
import { BackfillError } from "./errors.ts";
import { CalendarDateSchema, TargetDateSchema } from "./schema.ts";
import type { BackfillRequest, CommitPlan, DateSpec } from "./types.ts";

export const DATE_PLACEHOLDER = "{date}";

export interface DateOptions {
  date?: string;
  dates?: string[];
  start?: string;
  end?: string;
  auto?: boolean;
}

/**
 * Pick the one active date mode. First match wins:
 * explicit list, then range, then single date, then auto
 */
export function toDateSpec(options: DateOptions): DateSpec {
  const dates = (options.dates ?? [])
    .flatMap((entry) => entry.split(","))
    .map((entry) => entry.trim())
    .filter(Boolean);

  if (dates.length > 0) {
    return { kind: "list", dates };
  }

  if (options.start !== undefined || options.end !== undefined) {
    const { start, end } = options;
    if (start === undefined || end === undefined) {
      throw new BackfillError("--start and --end must be given together");
    }
    for (const [flag, value] of [["--start", start], ["--end", end]] as const) {
      if (!CalendarDateSchema.safeParse(value).success) {
        throw new BackfillError(`Invalid ${flag} '${value}'. Use YYYY-MM-DD`);
      }
    }
    if (start > end) {
      throw new BackfillError(`Start date ${start} is after end date ${end}`);
    }
    return { kind: "range", start, end };
  }

  if (options.date !== undefined) {
    if (!TargetDateSchema.safeParse(options.date).success) {
      throw new BackfillError(`Invalid --date '${options.date}'. Use YYYY-MM-DD or an ISO-8601 timestamp`);
    }
    return { kind: "single", date: options.date };
  }

  if (options.auto === false) {
    throw new BackfillError("No target dates. Pass --date, --dates or --start/--end, or drop --no-auto");
  }

  return { kind: "auto" };
}

/**
 * Expand a date spec into the ordered list of target dates
 * Only auto mode can produce an empty list
 */
export function resolveTargetDates(
  spec: DateSpec,
  context: { lastCommitDate: string | null; now?: Date },
): string[] {
  switch (spec.kind) {
    case "list":
      return [...spec.dates];
    case "range":
      return enumerateDates(spec.start, spec.end);
    case "single":
      return [spec.date];
    case "auto": {
      const today = todayUtc(context.now);
      const last = (context.lastCommitDate && toUtcDate(context.lastCommitDate)) || addDays(today, -1);
      return enumerateDates(addDays(last, 1), today);
    }
  }
}

/**
 * Full author/committer timestamp for a target date
 */
export function buildTimestamp(date: string, time: string, timezone: string): string {
  if (hasTimeDesignator(date)) {
    return date;
  }
  return `${date}T${time}${timezone}`;
}

/**
 * Substitute every placeholder with the bare date
 */
export function renderMessage(template: string, date: string): string {
  return template.replaceAll(DATE_PLACEHOLDER, date);
}

export type PlanOutcome =
  | { ok: true; plan: CommitPlan }
  | { ok: false; date: string; reason: string };

/**
 * Plan one commit, or explain why the date is skipped
 */
export function createCommitPlan(date: string, request: BackfillRequest): PlanOutcome {
  const check = TargetDateSchema.safeParse(date);
  if (!check.success) {
    return { ok: false, date, reason: `Invalid date format '${date}'. Use YYYY-MM-DD or an ISO-8601 timestamp` };
  }

  return {
    ok: true,
    plan: {
      date,
      timestamp: buildTimestamp(date, request.time, request.timezone),
      message: renderMessage(request.message, date),
      author: request.author,
    },
  };
}
