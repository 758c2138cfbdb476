/**
 * Domain types for git-backfill
 */

export interface Identity {
  name: string;
  email: string;
}

/**
 * Resolved configuration for one run
 */
export interface BackfillRequest {
  readonly author: Identity;
  readonly message: string; // template containing "{date}"
  readonly time: string; // "12:00:00"
  readonly timezone: string; // "Z" | "+02:00"
  readonly push: boolean;
}

/**
 * Where the target dates come from; exactly one mode per run
 */
export type DateSpec =
  | { kind: "list"; dates: string[] }
  | { kind: "range"; start: string; end: string }
  | { kind: "single"; date: string }
  | { kind: "auto" };

export interface CommitPlan {
  date: string; // as given, used in the message
  timestamp: string; // full ISO-8601 author/committer date
  message: string;
  author: Identity;
}

export interface RunResult {
  created: number;
  skipped: number;
  failed: number;
  push: "skipped" | "succeeded";
}
