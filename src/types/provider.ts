// --- Common data model shared by every hosting-service client ---

export type Visibility = "public" | "private" | "internal";

export type PRState = "open" | "closed" | "merged";

export type StatusState = "success" | "failure" | "pending" | "error";

export type CheckStatus = "queued" | "in_progress" | "completed";

export type MergeMethod = "merge" | "squash" | "rebase";

export interface User {
  login: string;
  /** Account type as reported by the provider ("User", "Bot", ...). */
  type?: string;
}

export interface Label {
  name: string;
  color?: string;
}

export interface Repository {
  id: string;
  name: string;
  /** `owner/name` */
  fullName: string;
  owner: string;
  provider: string;
  defaultBranch: string;
  visibility: Visibility;
  isArchived: boolean;
  webUrl?: string;
}

export interface PullRequest {
  id: string;
  number: number;
  title: string;
  body: string;
  state: PRState;
  draft: boolean;
  locked: boolean;
  /** `null` when the provider has not computed mergeability yet. */
  mergeable: boolean | null;
  author: User;
  labels: Label[];
  headBranch: string;
  headSha: string;
  baseBranch: string;
  baseSha: string;
  url: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface PRStatus {
  state: StatusState;
  description: string;
  context?: string;
}

export interface Check {
  name: string;
  status: CheckStatus;
  conclusion: string | null;
  detailsUrl?: string;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  resetAt: Date;
}

export interface ListPullRequestsOptions {
  state?: PRState | "all";
  base?: string;
  perPage?: number;
}

export interface MergeRequestOptions {
  method: MergeMethod;
  commitTitle: string;
  commitMessage: string;
  /** Head SHA the merge must match; guards against merging newer unreviewed commits. */
  sha?: string;
  deleteBranch: boolean;
}

/**
 * Capability set every hosting-service client implements. The core only ever
 * talks to a service through this interface.
 *
 * Every operation accepts the run's abort signal and must reject promptly
 * once it fires.
 */
export interface Provider {
  readonly name: string;

  authenticate(signal?: AbortSignal): Promise<void>;

  listRepositories(signal?: AbortSignal): Promise<Repository[]>;
  getRepository(owner: string, name: string, signal?: AbortSignal): Promise<Repository>;

  listPullRequests(
    repo: Repository,
    options: ListPullRequestsOptions,
    signal?: AbortSignal,
  ): Promise<PullRequest[]>;
  getPullRequest(repo: Repository, number: number, signal?: AbortSignal): Promise<PullRequest>;
  mergePullRequest(
    repo: Repository,
    pr: PullRequest,
    options: MergeRequestOptions,
    signal?: AbortSignal,
  ): Promise<void>;

  getPRStatus(repo: Repository, pr: PullRequest, signal?: AbortSignal): Promise<PRStatus>;
  getChecks(repo: Repository, pr: PullRequest, signal?: AbortSignal): Promise<Check[]>;

  getRateLimit(signal?: AbortSignal): Promise<RateLimitInfo>;
}

/** Providers keyed by configuration name (e.g. "github"). */
export type ProviderRegistry = ReadonlyMap<string, Provider>;

const SUCCESSFUL_CONCLUSIONS = new Set(["success", "neutral", "skipped"]);
const FAILED_CONCLUSIONS = new Set([
  "failure",
  "cancelled",
  "timed_out",
  "action_required",
  "startup_failure",
]);

/** True when the check completed with a passing conclusion. */
export function isCheckSuccessful(check: Check): boolean {
  return check.status === "completed" && SUCCESSFUL_CONCLUSIONS.has(check.conclusion ?? "");
}

/** True when the check completed with a failing conclusion. */
export function isCheckFailed(check: Check): boolean {
  return check.status === "completed" && FAILED_CONCLUSIONS.has(check.conclusion ?? "");
}

/** Split `owner/name`; throws when the identifier has any other shape. */
export function parseRepositoryName(fullName: string): { owner: string; name: string } {
  const parts = fullName.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`invalid repository format, expected 'owner/name', got: ${fullName}`);
  }
  return { owner: parts[0], name: parts[1] };
}
