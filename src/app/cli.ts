/**
 * CLI workflow for git-backfill
 * These functions can be imported and used programmatically
 */

import { Command } from "commander";
import * as git from "../lib/git.ts";
import { todayUtc } from "../lib/date.ts";
import { confirm } from "../lib/prompt.ts";
import { resolveRequest, DEFAULTS, CONFIG_FILE_NAME, type ConfigSources } from "./config.ts";
import { BackfillError } from "./errors.ts";
import { executeBackfill, printSummary, type BackfillGit } from "./executor.ts";
import { formatPlanYaml } from "./plan-yaml.ts";
import { resolveTargetDates, toDateSpec } from "./planner.ts";
import type { RunResult } from "./types.ts";

export type CliOptions = {
  date?: string;
  dates?: string[];
  start?: string;
  end?: string;
  time?: string;
  timezone?: string;
  message?: string;
  name?: string;
  email?: string;
  auto: boolean;
  push?: boolean;
  force: boolean;
  remoteLookup?: boolean;
  config?: string;
  dryRun?: boolean;
};

export interface RunDependencies {
  git: BackfillGit & { getLastCommitDate(): Promise<string | null> };
  sources?: Partial<ConfigSources>;
  confirm: (question: string) => Promise<boolean>;
  now?: Date;
  pauseMs?: number;
}

const defaultDependencies: RunDependencies = { git, confirm };

/**
 * Resolve dates and identity, then create and push the commits
 */
export async function runBackfill(
  options: CliOptions,
  deps: RunDependencies = defaultDependencies,
): Promise<RunResult> {
  // Fails fast on a bad range before anything touches git or the network
  const spec = toDateSpec(options);

  const request = await resolveRequest({
    name: options.name,
    email: options.email,
    time: options.time,
    timezone: options.timezone,
    message: options.message,
    push: options.push,
    remoteLookup: options.remoteLookup,
    config: options.config,
  }, deps.sources);

  const lastCommitDate = spec.kind === "auto" ? await deps.git.getLastCommitDate() : null;
  const dates = resolveTargetDates(spec, { lastCommitDate, now: deps.now });

  if (dates.length === 0) {
    if (spec.kind !== "auto") {
      throw new BackfillError("No target dates resolved");
    }
    console.log(`Nothing to do: history is already up to date through ${todayUtc(deps.now)}`);
    return { created: 0, skipped: 0, failed: 0, push: "skipped" };
  }

  console.log(`Backfilling ${dates.length} date${dates.length === 1 ? "" : "s"} (${dates[0]} … ${dates[dates.length - 1]})`);
  console.log(`Author: ${request.author.name} <${request.author.email}>`);

  if (options.dryRun) {
    console.log("\nDry run, nothing will be committed:\n");
    console.log(await formatPlanYaml(request, dates));
    return { created: 0, skipped: 0, failed: 0, push: "skipped" };
  }

  if (!options.force && !await deps.confirm(`Create ${dates.length} commit${dates.length === 1 ? "" : "s"}?`)) {
    throw new BackfillError("Aborted");
  }

  const result = await executeBackfill(request, dates, { git: deps.git, pauseMs: deps.pauseMs });
  await printSummary(request, result, deps.git);
  return result;
}

export function createProgram(): Command {
  return new Command()
    .name("git-backfill")
    .description("Fill gaps in your commit history with empty, back-dated commits and push them")
    .option("-d, --date <date>", "single target date (YYYY-MM-DD or ISO-8601 timestamp)")
    .option("--dates <dates...>", "explicit target dates, space or comma separated")
    .option("--start <date>", "first date of an inclusive range (YYYY-MM-DD)")
    .option("--end <date>", "last date of an inclusive range (YYYY-MM-DD)")
    .option("-t, --time <time>", `time of day for date-only inputs (default: ${DEFAULTS.time})`)
    .option("-z, --timezone <tz>", `timezone token for date-only inputs (default: ${DEFAULTS.timezone})`)
    .option("-m, --message <template>", `commit message, {date} is replaced (default: "${DEFAULTS.message}")`)
    .option("--name <name>", "author and committer name (default: git config user.name)")
    .option("--email <email>", "author and committer email (default: git config user.email)")
    .option("--no-auto", "do not derive dates from the last commit")
    .option("--no-push", "create commits without pushing")
    .option("--no-force", "ask before creating commits")
    .option("--remote-lookup", "use the primary verified GitHub email (needs GITHUB_TOKEN)")
    .option("--config <path>", `config file (default: ${CONFIG_FILE_NAME} at the repository root)`)
    .option("--dry-run", "print the plan as YAML without committing")
    .addHelpText("after", `
Examples:
  git-backfill                                   Fill every day since the last commit
  git-backfill --start 2025-10-28 --end 2025-10-30
  git-backfill --dates 2025-11-01 2025-11-03 --no-push
  git-backfill -d 2025-11-01 -t 09:30:00 -z +02:00`);
}

/**
 * Main CLI entry point
 * Parses arguments and maps failures to exit statuses
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  // Only an explicit --no-push overrides the config file
  if (program.getOptionValueSource("push") === "default") {
    options.push = undefined;
  }

  try {
    await runBackfill(options);
  } catch (error) {
    if (error instanceof BackfillError) {
      console.error(`Error: ${error.message}`);
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }
}
