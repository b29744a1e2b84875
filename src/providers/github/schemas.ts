import { z } from "zod";
import { ProviderError } from "../../errors.js";
import { PROVIDER_NAME } from "./gh.js";

// --- REST payloads as returned by `gh api` (only the fields we read) ---

export const RestUserSchema = z.object({
  login: z.string(),
  type: z.string().optional(),
});

export const RestRepositorySchema = z.object({
  id: z.number(),
  name: z.string(),
  full_name: z.string(),
  owner: RestUserSchema,
  default_branch: z.string(),
  private: z.boolean(),
  visibility: z.string().optional(),
  archived: z.boolean().default(false),
  html_url: z.string().optional(),
});

export const RestPullRequestSchema = z.object({
  id: z.number(),
  number: z.number(),
  title: z.string(),
  body: z.string().nullable().default(null),
  state: z.enum(["open", "closed"]),
  draft: z.boolean().default(false),
  locked: z.boolean().default(false),
  mergeable: z.boolean().nullable().default(null),
  merged_at: z.string().nullable().default(null),
  user: RestUserSchema,
  labels: z.array(z.object({ name: z.string(), color: z.string().optional() })).default([]),
  head: z.object({ ref: z.string(), sha: z.string() }),
  base: z.object({ ref: z.string(), sha: z.string() }),
  html_url: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const RestCombinedStatusSchema = z.object({
  state: z.string(),
  total_count: z.number(),
  statuses: z
    .array(
      z.object({
        state: z.string(),
        description: z.string().nullable().default(null),
        context: z.string(),
      }),
    )
    .default([]),
});

export const RestCheckRunsSchema = z.object({
  total_count: z.number(),
  check_runs: z.array(
    z.object({
      name: z.string(),
      status: z.enum(["queued", "in_progress", "completed", "waiting", "requested", "pending"]),
      conclusion: z.string().nullable(),
      details_url: z.string().nullable().default(null),
    }),
  ),
});

export const RestMergeResponseSchema = z.object({
  merged: z.boolean(),
  message: z.string().default(""),
  sha: z.string().optional(),
});

export const RestRateLimitSchema = z.object({
  resources: z.object({
    core: z.object({
      limit: z.number(),
      remaining: z.number(),
      reset: z.number(),
    }),
  }),
});

/** `gh repo list --json` row. */
export const GhRepoListItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  nameWithOwner: z.string(),
  owner: z.object({ login: z.string() }),
  defaultBranchRef: z.object({ name: z.string() }).nullable().default(null),
  visibility: z.string(),
  isArchived: z.boolean(),
  url: z.string(),
});

export const GH_REPO_LIST_FIELDS = "id,name,nameWithOwner,owner,defaultBranchRef,visibility,isArchived,url";

export type RestRepository = z.infer<typeof RestRepositorySchema>;
export type RestPullRequest = z.infer<typeof RestPullRequestSchema>;
export type RestCombinedStatus = z.infer<typeof RestCombinedStatusSchema>;
export type RestCheckRuns = z.infer<typeof RestCheckRunsSchema>;
export type GhRepoListItem = z.infer<typeof GhRepoListItemSchema>;

/** Parse gh's stdout as JSON and validate it; malformed payloads become ProviderErrors. */
export function parseResponse<T extends z.ZodTypeAny>(schema: T, raw: string, what: string): z.output<T> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ProviderError(PROVIDER_NAME, "unknown", `invalid JSON in ${what} response`, { cause: err });
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ProviderError(PROVIDER_NAME, "unknown", `unexpected ${what} response: ${issues.join("; ")}`);
  }
  return result.data;
}
