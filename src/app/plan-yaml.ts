/**
 * Render a backfill plan as YAML for --dry-run
 */

import { formatYaml } from "../lib/yaml-prettier.ts";
import { createCommitPlan } from "./planner.ts";
import type { BackfillRequest } from "./types.ts";

export async function formatPlanYaml(request: BackfillRequest, dates: string[]): Promise<string> {
  const commits: Record<string, string>[] = [];
  const skipped: Record<string, string>[] = [];

  for (const date of dates) {
    const outcome = createCommitPlan(date, request);
    if (outcome.ok) {
      const { plan } = outcome;
      commits.push({
        date: plan.date,
        timestamp: plan.timestamp,
        message: plan.message,
        author: `${plan.author.name} <${plan.author.email}>`,
      });
    } else {
      skipped.push({ date: outcome.date, reason: outcome.reason });
    }
  }

  return await formatYaml(skipped.length > 0 ? { commits, skipped } : { commits });
}
