import type {
  Check,
  CheckStatus,
  PRState,
  PRStatus,
  PullRequest,
  Repository,
  StatusState,
  Visibility,
} from "../../types.js";
import { PROVIDER_NAME } from "./gh.js";
import type {
  GhRepoListItem,
  RestCheckRuns,
  RestCombinedStatus,
  RestPullRequest,
  RestRepository,
} from "./schemas.js";

function toVisibility(value: string | undefined, isPrivate: boolean): Visibility {
  switch (value?.toLowerCase()) {
    case "public":
      return "public";
    case "internal":
      return "internal";
    case "private":
      return "private";
    default:
      return isPrivate ? "private" : "public";
  }
}

export function convertRepository(repo: RestRepository): Repository {
  return {
    id: String(repo.id),
    name: repo.name,
    fullName: repo.full_name,
    owner: repo.owner.login,
    provider: PROVIDER_NAME,
    defaultBranch: repo.default_branch,
    visibility: toVisibility(repo.visibility, repo.private),
    isArchived: repo.archived,
    webUrl: repo.html_url,
  };
}

export function convertRepoListItem(item: GhRepoListItem): Repository {
  return {
    id: item.id,
    name: item.name,
    fullName: item.nameWithOwner,
    owner: item.owner.login,
    provider: PROVIDER_NAME,
    defaultBranch: item.defaultBranchRef?.name ?? "",
    visibility: toVisibility(item.visibility, false),
    isArchived: item.isArchived,
    webUrl: item.url,
  };
}

function toPRState(pr: RestPullRequest): PRState {
  if (pr.state === "open") return "open";
  return pr.merged_at ? "merged" : "closed";
}

export function convertPullRequest(pr: RestPullRequest): PullRequest {
  return {
    id: String(pr.id),
    number: pr.number,
    title: pr.title,
    body: pr.body ?? "",
    state: toPRState(pr),
    draft: pr.draft,
    locked: pr.locked,
    mergeable: pr.mergeable,
    author: { login: pr.user.login, type: pr.user.type },
    labels: pr.labels.map((label) => ({ name: label.name, color: label.color })),
    headBranch: pr.head.ref,
    headSha: pr.head.sha,
    baseBranch: pr.base.ref,
    baseSha: pr.base.sha,
    url: pr.html_url,
    createdAt: new Date(pr.created_at),
    updatedAt: new Date(pr.updated_at),
  };
}

function toStatusState(state: string): StatusState {
  switch (state) {
    case "success":
    case "failure":
    case "pending":
    case "error":
      return state;
    default:
      return "pending";
  }
}

/**
 * Commits with no reported statuses come back as "pending" from GitHub; they
 * have nothing to wait for, so they count as success.
 */
export function convertCombinedStatus(status: RestCombinedStatus): PRStatus {
  if (status.total_count === 0) {
    return { state: "success", description: "" };
  }
  const state = toStatusState(status.state);
  const first = status.statuses.find((s) => s.state === state) ?? status.statuses[0];
  return {
    state,
    description: state === "success" ? "" : (first?.description ?? ""),
    context: first?.context,
  };
}

function toCheckStatus(status: string): CheckStatus {
  if (status === "completed" || status === "in_progress") return status;
  return "queued";
}

export function convertCheckRuns(runs: RestCheckRuns): Check[] {
  return runs.check_runs.map((run) => ({
    name: run.name,
    status: toCheckStatus(run.status),
    conclusion: run.conclusion,
    detailsUrl: run.details_url ?? undefined,
  }));
}
