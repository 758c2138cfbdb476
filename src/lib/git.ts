/**
 * Git utilities
 * Thin wrappers around the git command line
 */

import { spawn } from "node:child_process";

export interface GitResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Run a git command and collect its output
 * Never rejects; callers inspect `code`
 */
export function runGit(
  args: string[],
  options?: { env?: Record<string, string>; cwd?: string },
): Promise<GitResult> {
  return new Promise((resolve) => {
    const child = spawn("git", args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    // A git that cannot start is reported like any failed command
    let settled = false;
    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      resolve({ code: 127, stdout, stderr: error.message });
    });
    child.on("close", (code) => {
      if (settled) return;
      settled = true;
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
}

/**
 * Best text to show when a git command fails
 */
export function diagnostic(result: GitResult): string {
  return result.stderr.trim() || result.stdout.trim() || `git exited with code ${result.code}`;
}

/**
 * Read a value from git config, or null when unset
 */
export async function getConfigValue(key: string): Promise<string | null> {
  const { code, stdout } = await runGit(["config", "--get", key]);
  const value = stdout.trim();
  return code === 0 && value ? value : null;
}

/**
 * Author date of the most recent commit (strict ISO-8601), or null
 * when the repository has no commits or git fails
 */
export async function getLastCommitDate(): Promise<string | null> {
  const { code, stdout } = await runGit(["log", "-1", "--format=%aI"]);
  const value = stdout.trim();
  return code === 0 && value ? value : null;
}

/**
 * Absolute path of the working tree root, or null outside a repository
 */
export async function getTopLevel(): Promise<string | null> {
  const { code, stdout } = await runGit(["rev-parse", "--show-toplevel"]);
  return code === 0 ? stdout.trim() : null;
}

export interface EmptyCommitOptions {
  name: string;
  email: string;
  date: string;
  message: string;
}

export type CommitOutcome =
  | { ok: true; hash: string }
  | { ok: false; result: GitResult };

/**
 * Create an empty commit on HEAD with forced author and committer metadata
 * The identity and date only reach the spawned git process
 */
export async function createEmptyCommit(options: EmptyCommitOptions): Promise<CommitOutcome> {
  const { name, email, date, message } = options;

  const result = await runGit(["commit", "--allow-empty", "--no-verify", "-m", message], {
    env: {
      GIT_AUTHOR_NAME: name,
      GIT_AUTHOR_EMAIL: email,
      GIT_AUTHOR_DATE: date,
      GIT_COMMITTER_NAME: name,
      GIT_COMMITTER_EMAIL: email,
      GIT_COMMITTER_DATE: date,
    },
  });
  if (result.code !== 0) {
    return { ok: false, result };
  }

  const head = await runGit(["rev-parse", "HEAD"]);
  return { ok: true, hash: head.stdout.trim() };
}

/**
 * Push the current branch to its upstream
 */
export function push(): Promise<GitResult> {
  return runGit(["push"]);
}

/**
 * Describe HEAD with full author and committer details
 */
export async function showHead(): Promise<string> {
  const { code, stdout, stderr } = await runGit(["show", "--no-patch", "--format=fuller", "HEAD"]);
  return code === 0 ? stdout.trimEnd() : stderr.trim();
}
