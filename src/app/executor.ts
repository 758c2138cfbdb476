/**
 * Execute a backfill: one empty commit per date, then an optional push
 */

import { setTimeout as sleep } from "node:timers/promises";
import * as git from "../lib/git.ts";
import { BackfillError } from "./errors.ts";
import { createCommitPlan } from "./planner.ts";
import type { BackfillRequest, RunResult } from "./types.ts";

/**
 * The git operations a run depends on
 */
export interface BackfillGit {
  createEmptyCommit(options: git.EmptyCommitOptions): Promise<git.CommitOutcome>;
  push(): Promise<git.GitResult>;
  showHead(): Promise<string>;
}

export const DEFAULT_PAUSE_MS = 200;

/**
 * Create a commit for each date in order
 * Bad dates and failed commits are reported and skipped; a failed push is fatal
 */
export async function executeBackfill(
  request: BackfillRequest,
  dates: string[],
  options: { git?: BackfillGit; pauseMs?: number } = {},
): Promise<RunResult> {
  const { git: client = git, pauseMs = DEFAULT_PAUSE_MS } = options;
  const result: RunResult = { created: 0, skipped: 0, failed: 0, push: "skipped" };
  let attempts = 0;

  for (let i = 0; i < dates.length; i++) {
    const outcome = createCommitPlan(dates[i], request);
    if (!outcome.ok) {
      console.error(`\n[${i + 1}/${dates.length}] Error: ${outcome.reason}, skipping`);
      result.skipped++;
      continue;
    }

    // Keep git's own commit-creation clock strictly increasing
    if (attempts > 0 && pauseMs > 0) {
      await sleep(pauseMs);
    }
    attempts++;

    const { plan } = outcome;
    console.log(`\n[${i + 1}/${dates.length}] ${plan.date} → ${plan.timestamp}`);

    const commit = await client.createEmptyCommit({
      name: plan.author.name,
      email: plan.author.email,
      date: plan.timestamp,
      message: plan.message,
    });

    if (!commit.ok) {
      console.error(`  Error: Commit for ${plan.date} failed:`);
      console.error(indent(git.diagnostic(commit.result)));
      result.failed++;
      continue;
    }

    console.log(`  ✓ Created ${commit.hash.substring(0, 7)}: ${plan.message}`);
    result.created++;
  }

  if (result.created === 0) {
    console.log("\nNo commits created, nothing to push");
    return result;
  }

  if (request.push) {
    console.log("\nPushing...");
    const pushed = await client.push();
    if (pushed.code !== 0) {
      console.error(indent(git.diagnostic(pushed)));
      throw new BackfillError(`Push failed after creating ${result.created} commit${result.created === 1 ? "" : "s"}`, pushed.code);
    }
    console.log("✓ Pushed");
    result.push = "succeeded";
  }

  return result;
}

/**
 * Print identity, the final HEAD and the commit count
 */
export async function printSummary(
  request: BackfillRequest,
  result: RunResult,
  client: BackfillGit = git,
): Promise<void> {
  console.log("\n=== git-backfill ===");
  console.log(`Identity: ${request.author.name} <${request.author.email}>`);
  console.log("\nHEAD:");
  console.log(indent(await client.showHead()));
  console.log(`\nCreated ${result.created} commit${result.created === 1 ? "" : "s"}`);
  if (result.skipped > 0 || result.failed > 0) {
    console.log(`Skipped ${result.skipped} invalid date${result.skipped === 1 ? "" : "s"}, ${result.failed} failed commit${result.failed === 1 ? "" : "s"}`);
  }
}

function indent(text: string): string {
  return text.split("\n").map((line) => `  ${line}`).join("\n");
}
