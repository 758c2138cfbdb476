/**
 * GitHub identity lookup
 */

import { Octokit } from "@octokit/rest";
import { z } from "zod";

const EmailRecordsSchema = z.array(z.object({
  email: z.string(),
  primary: z.boolean(),
  verified: z.boolean(),
  visibility: z.string().nullable().optional(),
}));

export type EmailRecord = z.infer<typeof EmailRecordsSchema>[number];

/**
 * Fetches the raw `GET /user/emails` payload for a token
 */
export type EmailRequest = (token: string) => Promise<unknown>;

export const requestUserEmails: EmailRequest = async (token) => {
  const octokit = new Octokit({ auth: token });
  const { data } = await octokit.request("GET /user/emails");
  return data;
};

/**
 * Primary verified address, else the first verified one
 */
export function selectEmail(records: EmailRecord[]): string | null {
  const primary = records.find((record) => record.primary && record.verified);
  if (primary) {
    return primary.email;
  }
  return records.find((record) => record.verified)?.email ?? null;
}

/**
 * Look up the account's email. Any failure yields null after a warning
 */
export async function lookupPrimaryEmail(
  token: string,
  request: EmailRequest = requestUserEmails,
): Promise<string | null> {
  try {
    const payload = await request(token);
    const parsed = EmailRecordsSchema.safeParse(payload);
    if (!parsed.success) {
      console.error("Warning: Unexpected response from GitHub email lookup");
      return null;
    }

    const email = selectEmail(parsed.data);
    if (!email) {
      console.error("Warning: GitHub account has no verified email");
    }
    return email;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Warning: GitHub email lookup failed: ${message}`);
    return null;
  }
}
