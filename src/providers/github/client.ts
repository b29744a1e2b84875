import { ProviderError, errorMessage } from "../../errors.js";
import { logger as rootLogger, type Logger } from "../../logger.js";
import type {
  Check,
  ListPullRequestsOptions,
  MergeRequestOptions,
  PRStatus,
  Provider,
  PullRequest,
  RateLimitInfo,
  Repository,
} from "../../types.js";
import {
  convertCheckRuns,
  convertCombinedStatus,
  convertPullRequest,
  convertRepoListItem,
  convertRepository,
} from "./converters.js";
import { PROVIDER_NAME, execGh } from "./gh.js";
import {
  GH_REPO_LIST_FIELDS,
  GhRepoListItemSchema,
  RestCheckRunsSchema,
  RestCombinedStatusSchema,
  RestMergeResponseSchema,
  RestPullRequestSchema,
  RestRateLimitSchema,
  RestRepositorySchema,
  RestUserSchema,
  parseResponse,
} from "./schemas.js";

export interface GitHubProviderOptions {
  token?: string;
  /** Upper bound for `listRepositories`. */
  repoLimit?: number;
  logger?: Logger;
}

const DEFAULT_PER_PAGE = 100;
const DEFAULT_REPO_LIMIT = 1000;

function repoPath(repo: Repository): string {
  return `repos/${repo.fullName}`;
}

/** GitHub client driven entirely through `gh api`. */
export class GitHubProvider implements Provider {
  readonly name = PROVIDER_NAME;
  private readonly token?: string;
  private readonly repoLimit: number;
  private readonly log: Logger;

  constructor(options: GitHubProviderOptions = {}) {
    this.token = options.token;
    this.repoLimit = options.repoLimit ?? DEFAULT_REPO_LIMIT;
    this.log = (options.logger ?? rootLogger).child({ component: "github-provider" });
  }

  private gh(args: string[], signal?: AbortSignal): Promise<string> {
    return execGh(args, { token: this.token, signal, logger: this.log });
  }

  async authenticate(signal?: AbortSignal): Promise<void> {
    const user = parseResponse(RestUserSchema, await this.gh(["api", "user"], signal), "user");
    this.log.info({ login: user.login }, "authenticated with GitHub");
  }

  async listRepositories(signal?: AbortSignal): Promise<Repository[]> {
    const raw = await this.gh(
      ["repo", "list", "--limit", String(this.repoLimit), "--json", GH_REPO_LIST_FIELDS],
      signal,
    );
    return parseResponse(GhRepoListItemSchema.array(), raw, "repository list").map(convertRepoListItem);
  }

  async getRepository(owner: string, name: string, signal?: AbortSignal): Promise<Repository> {
    const raw = await this.gh(["api", `repos/${owner}/${name}`], signal);
    return convertRepository(parseResponse(RestRepositorySchema, raw, "repository"));
  }

  async listPullRequests(
    repo: Repository,
    options: ListPullRequestsOptions,
    signal?: AbortSignal,
  ): Promise<PullRequest[]> {
    const query = new URLSearchParams({
      state: options.state === "merged" ? "closed" : (options.state ?? "open"),
      per_page: String(options.perPage ?? DEFAULT_PER_PAGE),
    });
    if (options.base) {
      query.set("base", options.base);
    }
    const raw = await this.gh(["api", `${repoPath(repo)}/pulls?${query.toString()}`], signal);
    const pulls = parseResponse(RestPullRequestSchema.array(), raw, "pull request list").map(convertPullRequest);
    return options.state === "merged" ? pulls.filter((pr) => pr.state === "merged") : pulls;
  }

  async getPullRequest(repo: Repository, number: number, signal?: AbortSignal): Promise<PullRequest> {
    const raw = await this.gh(["api", `${repoPath(repo)}/pulls/${number}`], signal);
    return convertPullRequest(parseResponse(RestPullRequestSchema, raw, "pull request"));
  }

  async mergePullRequest(
    repo: Repository,
    pr: PullRequest,
    options: MergeRequestOptions,
    signal?: AbortSignal,
  ): Promise<void> {
    const args = [
      "api",
      "--method",
      "PUT",
      `${repoPath(repo)}/pulls/${pr.number}/merge`,
      "-f",
      `merge_method=${options.method}`,
      "-f",
      `commit_title=${options.commitTitle}`,
    ];
    if (options.commitMessage) {
      args.push("-f", `commit_message=${options.commitMessage}`);
    }
    if (options.sha) {
      args.push("-f", `sha=${options.sha}`);
    }

    const response = parseResponse(RestMergeResponseSchema, await this.gh(args, signal), "merge");
    if (!response.merged) {
      throw new ProviderError(PROVIDER_NAME, "conflict", response.message || "pull request was not merged");
    }

    if (options.deleteBranch) {
      await this.deleteBranch(repo, pr.headBranch, signal);
    }
  }

  /** Branch cleanup never fails a merge that already happened. */
  private async deleteBranch(repo: Repository, branch: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.gh(["api", "--method", "DELETE", `${repoPath(repo)}/git/refs/heads/${branch}`], signal);
      this.log.info({ repo: repo.fullName, branch }, "deleted head branch");
    } catch (err: unknown) {
      this.log.warn({ repo: repo.fullName, branch, err: errorMessage(err) }, "failed to delete head branch");
    }
  }

  async getPRStatus(repo: Repository, pr: PullRequest, signal?: AbortSignal): Promise<PRStatus> {
    const raw = await this.gh(["api", `${repoPath(repo)}/commits/${pr.headSha}/status`], signal);
    return convertCombinedStatus(parseResponse(RestCombinedStatusSchema, raw, "combined status"));
  }

  async getChecks(repo: Repository, pr: PullRequest, signal?: AbortSignal): Promise<Check[]> {
    const raw = await this.gh(
      ["api", `${repoPath(repo)}/commits/${pr.headSha}/check-runs?per_page=${DEFAULT_PER_PAGE}`],
      signal,
    );
    return convertCheckRuns(parseResponse(RestCheckRunsSchema, raw, "check runs"));
  }

  async getRateLimit(signal?: AbortSignal): Promise<RateLimitInfo> {
    const raw = await this.gh(["api", "rate_limit"], signal);
    const { core } = parseResponse(RestRateLimitSchema, raw, "rate limit").resources;
    return {
      limit: core.limit,
      remaining: core.remaining,
      resetAt: new Date(core.reset * 1000),
    };
  }
}
