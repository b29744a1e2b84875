import { vi } from "vitest";
import { createLogger } from "../../src/logger.js";
import type {
  Check,
  MergeRequestOptions,
  OrchestratorSettings,
  PRStatus,
  Provider,
  PullRequest,
  RateLimitInfo,
  Repository,
  RepositorySettings,
} from "../../src/types.js";

export const silentLogger = createLogger({ level: "silent", pretty: false });

export const NOW = new Date("2026-03-01T12:00:00Z");

export function makeRepository(fullName = "acme/api", overrides: Partial<Repository> = {}): Repository {
  const [owner = "acme", name = "api"] = fullName.split("/");
  return {
    id: `id-${fullName}`,
    name,
    fullName,
    owner,
    provider: "fake",
    defaultBranch: "main",
    visibility: "private",
    isArchived: false,
    ...overrides,
  };
}

export function makePullRequest(number: number, overrides: Partial<PullRequest> = {}): PullRequest {
  return {
    id: `pr-${number}`,
    number,
    title: `Bump dependency ${number}`,
    body: "",
    state: "open",
    draft: false,
    locked: false,
    mergeable: true,
    author: { login: "dependabot[bot]", type: "Bot" },
    labels: [],
    headBranch: `dependabot/npm/dep-${number}`,
    headSha: `sha-${number}`,
    baseBranch: "main",
    baseSha: "base-sha",
    url: `https://example.test/acme/api/pull/${number}`,
    createdAt: new Date("2026-02-27T12:00:00Z"),
    updatedAt: new Date("2026-02-28T12:00:00Z"),
    ...overrides,
  };
}

export interface RepoFixture {
  pullRequests: PullRequest[];
  status?: PRStatus;
  checks?: Check[];
}

export interface MergeCall {
  repo: string;
  pr: number;
  options: MergeRequestOptions;
}

/**
 * In-memory provider. Repositories are keyed by full name; every method is a
 * spy so tests can inject failures with mockRejectedValueOnce.
 */
export class FakeProvider implements Provider {
  readonly name: string;
  readonly repos = new Map<string, RepoFixture>();
  readonly merges: MergeCall[] = [];

  constructor(name = "fake") {
    this.name = name;
  }

  addRepo(fullName: string, fixture: RepoFixture): this {
    this.repos.set(fullName, fixture);
    return this;
  }

  private fixture(fullName: string): RepoFixture {
    const fixture = this.repos.get(fullName);
    if (!fixture) {
      throw new Error(`repository ${fullName} not found`);
    }
    return fixture;
  }

  authenticate = vi.fn(async (_signal?: AbortSignal): Promise<void> => undefined);

  listRepositories = vi.fn(async (_signal?: AbortSignal): Promise<Repository[]> =>
    [...this.repos.keys()].map((fullName) => makeRepository(fullName, { provider: this.name })),
  );

  getRepository = vi.fn(async (owner: string, name: string, _signal?: AbortSignal): Promise<Repository> => {
    this.fixture(`${owner}/${name}`);
    return makeRepository(`${owner}/${name}`, { provider: this.name });
  });

  listPullRequests = vi.fn(
    async (repo: Repository, _options: unknown, _signal?: AbortSignal): Promise<PullRequest[]> =>
      this.fixture(repo.fullName).pullRequests,
  );

  getPullRequest = vi.fn(async (repo: Repository, number: number, _signal?: AbortSignal): Promise<PullRequest> => {
    const pr = this.fixture(repo.fullName).pullRequests.find((p) => p.number === number);
    if (!pr) {
      throw new Error(`pull request ${number} not found`);
    }
    return pr;
  });

  mergePullRequest = vi.fn(
    async (repo: Repository, pr: PullRequest, options: MergeRequestOptions, _signal?: AbortSignal): Promise<void> => {
      this.merges.push({ repo: repo.fullName, pr: pr.number, options });
    },
  );

  getPRStatus = vi.fn(
    async (repo: Repository, _pr: PullRequest, _signal?: AbortSignal): Promise<PRStatus> =>
      this.fixture(repo.fullName).status ?? { state: "success", description: "" },
  );

  getChecks = vi.fn(
    async (repo: Repository, _pr: PullRequest, _signal?: AbortSignal): Promise<Check[]> =>
      this.fixture(repo.fullName).checks ?? [],
  );

  getRateLimit = vi.fn(
    async (_signal?: AbortSignal): Promise<RateLimitInfo> => ({
      limit: 5000,
      remaining: 4990,
      resetAt: new Date("2026-03-01T13:00:00Z"),
    }),
  );
}

export function repoSettings(name: string, overrides: Partial<RepositorySettings> = {}): RepositorySettings {
  return {
    provider: "fake",
    name,
    mergeStrategy: "squash",
    requireChecks: false,
    skipLabels: [],
    deleteBranches: false,
    ...overrides,
  };
}

/** Settings with rate limiting off and immediate, single-attempt retries. */
export function makeSettings(overrides: Partial<OrchestratorSettings> = {}): OrchestratorSettings {
  return {
    concurrency: 5,
    dryRun: false,
    filters: { allowedActors: ["dependabot[bot]"], skipLabels: [] },
    repositories: [repoSettings("acme/api")],
    behavior: {
      rateLimit: { requestsPerSecond: 0, burst: 1, timeoutMs: 30_000 },
      retry: { maxAttempts: 1, backoffMs: 1000, maxBackoffMs: 30_000, jitter: false },
    },
    ...overrides,
  };
}
