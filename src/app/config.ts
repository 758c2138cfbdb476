/**
 * Resolve the configuration for a run
 * Command-line options win over the config file, which wins over
 * git config, which wins over the built-in defaults
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { exists } from "../lib/fs.ts";
import { getConfigValue, getTopLevel } from "../lib/git.ts";
import { lookupPrimaryEmail } from "../lib/github.ts";
import { BackfillError } from "./errors.ts";
import { ConfigFileSchema, TimeSchema, TimezoneSchema, describeIssue, type ConfigFile } from "./schema.ts";
import type { BackfillRequest, Identity } from "./types.ts";

export const CONFIG_FILE_NAME = ".git-backfill.yml";

export const DEFAULTS = {
  name: "git-backfill",
  email: "git-backfill@users.noreply.github.com",
  time: "12:00:00",
  timezone: "Z",
  message: "Restore streak for {date}",
  push: true,
} as const;

export interface RequestOptions {
  name?: string;
  email?: string;
  time?: string;
  timezone?: string;
  message?: string;
  push?: boolean;
  remoteLookup?: boolean;
  config?: string;
}

export interface ConfigSources {
  loadConfig: (path?: string) => Promise<ConfigFile>;
  gitConfig: (key: string) => Promise<string | null>;
  lookupEmail: (token: string) => Promise<string | null>;
  env: NodeJS.ProcessEnv;
}

const defaultSources: ConfigSources = {
  loadConfig: loadConfigFile,
  gitConfig: getConfigValue,
  lookupEmail: (token) => lookupPrimaryEmail(token),
  env: process.env,
};

/**
 * Read and validate a config file
 * Without an explicit path, the file at the repository root is optional
 */
export async function loadConfigFile(path?: string): Promise<ConfigFile> {
  const required = path !== undefined;
  const target = path ?? join((await getTopLevel()) ?? process.cwd(), CONFIG_FILE_NAME);

  if (!await exists(target)) {
    if (required) {
      throw new BackfillError(`Config file not found: ${target}`);
    }
    return {};
  }

  return parseConfigFile(await readFile(target, "utf8"), target);
}

export function parseConfigFile(content: string, source: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BackfillError(`Could not parse ${source}: ${message}`);
  }

  const validated = ConfigFileSchema.safeParse(parsed ?? {});
  if (!validated.success) {
    throw new BackfillError(`Invalid ${source}: ${describeIssue(validated.error)}`);
  }
  return validated.data;
}

/**
 * Build the immutable request for this run
 */
export async function resolveRequest(
  options: RequestOptions,
  sources: Partial<ConfigSources> = {},
): Promise<BackfillRequest> {
  const { loadConfig, gitConfig, lookupEmail, env } = { ...defaultSources, ...sources };
  const file = await loadConfig(options.config);

  const time = options.time ?? file.time ?? DEFAULTS.time;
  const timeCheck = TimeSchema.safeParse(time);
  if (!timeCheck.success) {
    throw new BackfillError(`Invalid time '${time}': ${describeIssue(timeCheck.error)}`);
  }

  const timezone = options.timezone ?? file.timezone ?? DEFAULTS.timezone;
  const timezoneCheck = TimezoneSchema.safeParse(timezone);
  if (!timezoneCheck.success) {
    throw new BackfillError(`Invalid timezone '${timezone}': ${describeIssue(timezoneCheck.error)}`);
  }

  const author = await resolveIdentity(
    { name: options.name ?? file.name, email: options.email ?? file.email },
    {
      gitConfig,
      lookupEmail,
      remoteLookup: options.remoteLookup ?? file.remoteLookup ?? false,
      token: env.GITHUB_TOKEN || env.GH_TOKEN,
    },
  );

  return Object.freeze({
    author: Object.freeze(author),
    message: options.message ?? file.message ?? DEFAULTS.message,
    time,
    timezone,
    push: options.push ?? file.push ?? DEFAULTS.push,
  });
}

/**
 * Explicit values, then git config, then the fallback identity.
 * The remote lookup, when enabled, replaces only the email
 */
export async function resolveIdentity(
  explicit: Partial<Identity>,
  context: {
    gitConfig: ConfigSources["gitConfig"];
    lookupEmail: ConfigSources["lookupEmail"];
    remoteLookup: boolean;
    token: string | undefined;
  },
): Promise<Identity> {
  const name = explicit.name ?? await context.gitConfig("user.name") ?? DEFAULTS.name;
  let email = explicit.email ?? await context.gitConfig("user.email") ?? DEFAULTS.email;

  if (context.remoteLookup) {
    if (!context.token) {
      console.error(`Warning: --remote-lookup needs GITHUB_TOKEN or GH_TOKEN; keeping ${email}`);
    } else {
      email = await context.lookupEmail(context.token) ?? email;
    }
  }

  return { name, email };
}
