import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parse as parseYaml } from "yaml";

import { createProgram, runBackfill, type CliOptions, type RunDependencies } from "../../src/app/cli.ts";
import { BackfillError } from "../../src/app/errors.ts";
import type { CommitOutcome, EmptyCommitOptions, GitResult } from "../../src/lib/git.ts";

const now = new Date("2025-11-05T08:00:00Z");

function fakeDependencies(lastCommitDate: string | null = "2025-11-02T10:00:00Z") {
  const git = {
    getLastCommitDate: vi.fn(async () => lastCommitDate),
    createEmptyCommit: vi.fn(async (options: EmptyCommitOptions): Promise<CommitOutcome> => ({
      ok: true,
      hash: `abcdef0${options.date}`,
    })),
    push: vi.fn(async (): Promise<GitResult> => ({ code: 0, stdout: "", stderr: "" })),
    showHead: vi.fn(async () => "commit abcdef0"),
  };
  const confirm = vi.fn(async () => true);
  const deps: RunDependencies = {
    git,
    confirm,
    now,
    pauseMs: 0,
    sources: {
      loadConfig: async () => ({}),
      gitConfig: async (key) => (key === "user.name" ? "Test User" : "test@example.com"),
      lookupEmail: async () => null,
      env: {},
    },
  };
  return { git, confirm, deps };
}

const defaults: CliOptions = { auto: true, force: true };

describe("runBackfill", () => {
  let logSpy: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    logSpy = vi.fn();
    vi.spyOn(console, "log").mockImplementation(logSpy);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fills every day since the last commit and pushes", async () => {
    const { git, deps } = fakeDependencies();

    const result = await runBackfill(defaults, deps);

    expect(result).toEqual({ created: 3, skipped: 0, failed: 0, push: "succeeded" });
    expect(git.createEmptyCommit.mock.calls.map(([options]) => options.date)).toEqual([
      "2025-11-03T12:00:00Z",
      "2025-11-04T12:00:00Z",
      "2025-11-05T12:00:00Z",
    ]);
    expect(git.push).toHaveBeenCalledTimes(1);
    expect(git.showHead).toHaveBeenCalledTimes(1);
  });

  it("reports nothing to do when the last commit is from today", async () => {
    const { git, deps } = fakeDependencies("2025-11-05T06:00:00Z");

    const result = await runBackfill(defaults, deps);

    expect(result).toEqual({ created: 0, skipped: 0, failed: 0, push: "skipped" });
    expect(git.createEmptyCommit).not.toHaveBeenCalled();
    expect(git.push).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledWith("Nothing to do: history is already up to date through 2025-11-05");
  });

  it("uses an explicit range without asking git for the last commit", async () => {
    const { git, deps } = fakeDependencies();

    const result = await runBackfill({ ...defaults, start: "2025-10-28", end: "2025-10-30", push: false }, deps);

    expect(result).toEqual({ created: 3, skipped: 0, failed: 0, push: "skipped" });
    expect(git.getLastCommitDate).not.toHaveBeenCalled();
    expect(git.createEmptyCommit.mock.calls.map(([options]) => options.message)).toEqual([
      "Restore streak for 2025-10-28",
      "Restore streak for 2025-10-29",
      "Restore streak for 2025-10-30",
    ]);
  });

  it("rejects an inverted range before creating anything", async () => {
    const { git, deps } = fakeDependencies();

    await expect(runBackfill({ ...defaults, start: "2025-10-30", end: "2025-10-28" }, deps))
      .rejects.toThrow(BackfillError);
    expect(git.createEmptyCommit).not.toHaveBeenCalled();
  });

  it("fails when auto mode is disabled and no dates are given", async () => {
    const { deps } = fakeDependencies();

    await expect(runBackfill({ ...defaults, auto: false }, deps)).rejects.toMatchObject({ exitCode: 1 });
  });

  it("applies time, timezone and message to a single date", async () => {
    const { git, deps } = fakeDependencies();

    await runBackfill({
      ...defaults,
      date: "2025-11-01",
      time: "09:30:00",
      timezone: "+02:00",
      message: "Backfill {date} done",
    }, deps);

    expect(git.createEmptyCommit).toHaveBeenCalledWith({
      name: "Test User",
      email: "test@example.com",
      date: "2025-11-01T09:30:00+02:00",
      message: "Backfill 2025-11-01 done",
    });
  });

  it("prints the plan without committing on a dry run", async () => {
    const { git, deps } = fakeDependencies();

    const result = await runBackfill({ ...defaults, dates: ["2025-11-01", "not-a-date"], dryRun: true }, deps);

    expect(result.created).toBe(0);
    expect(git.createEmptyCommit).not.toHaveBeenCalled();
    expect(git.push).not.toHaveBeenCalled();

    const yamlOutput = logSpy.mock.calls.map(([line]) => line).find((line) => String(line).startsWith("commits:"));
    expect(parseYaml(String(yamlOutput))).toEqual({
      commits: [{
        date: "2025-11-01",
        timestamp: "2025-11-01T12:00:00Z",
        message: "Restore streak for 2025-11-01",
        author: "Test User <test@example.com>",
      }],
      skipped: [{
        date: "not-a-date",
        reason: "Invalid date format 'not-a-date'. Use YYYY-MM-DD or an ISO-8601 timestamp",
      }],
    });
  });

  it("asks for confirmation without --force and aborts on no", async () => {
    const { git, confirm, deps } = fakeDependencies();
    confirm.mockResolvedValueOnce(false);

    await expect(runBackfill({ ...defaults, force: false }, deps)).rejects.toThrow("Aborted");
    expect(confirm).toHaveBeenCalledWith("Create 3 commits?");
    expect(git.createEmptyCommit).not.toHaveBeenCalled();
  });

  it("does not ask with --force", async () => {
    const { confirm, deps } = fakeDependencies();

    await runBackfill(defaults, deps);

    expect(confirm).not.toHaveBeenCalled();
  });
});

describe("createProgram", () => {
  it("parses dates and negated flags", () => {
    const program = createProgram().parse([
      "node", "git-backfill", "--dates", "2025-11-01", "2025-11-02", "--no-push", "-z", "+02:00",
    ]);

    expect(program.opts()).toEqual({
      dates: ["2025-11-01", "2025-11-02"],
      timezone: "+02:00",
      auto: true,
      push: false,
      force: true,
    });
    expect(program.getOptionValueSource("push")).toBe("cli");
  });

  it("defaults every flag to on", () => {
    const program = createProgram().parse(["node", "git-backfill"]);

    expect(program.opts()).toEqual({ auto: true, push: true, force: true });
    expect(program.getOptionValueSource("push")).toBe("default");
  });
});
