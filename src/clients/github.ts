import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import type { Logger } from '../lib/logger';
import {
  AppError,
  NotFoundError,
  RateLimitedError,
  UpstreamError,
  UpstreamTimeoutError,
  isTimeoutError,
} from '../lib/errors';
import type { Contributor, RepoInfo } from '../types/activity';
import type {
  CommitEntry,
  CommitPageQuery,
  IssueEntry,
  PullRequestEntry,
  RateLimitInfo,
  RepositorySource,
} from '../types/github';

export interface GitHubClientConfig {
  baseUrl: string;
  token?: string;
  userAgent: string;
  /** Bound applied to every single request */
  timeoutMs: number;
  /** Replaces the global fetch, e.g. with an in-process stand-in */
  fetch?: typeof fetch;
}

type HeaderBag = Record<string, unknown>;

const CONTRIBUTORS_PAGE_SIZE = 100;
const LIST_PAGE_SIZE = 100;

const readNumberHeader = (headers: HeaderBag | undefined, name: string): number | undefined => {
  const value = headers?.[name];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const readStatus = (error: unknown): number | undefined => {
  if (error instanceof RequestError) return error.status;
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
};

const readResponseHeaders = (error: unknown): HeaderBag | undefined => {
  if (error instanceof RequestError) return error.response?.headers;
  return undefined;
};

export class GitHubClient implements RepositorySource {
  private readonly octokit: Octokit;
  private readonly logger: Logger;
  private readonly config: GitHubClientConfig;
  private rateLimitInfo: RateLimitInfo | null = null;

  constructor(clientConfig: GitHubClientConfig, logger: Logger) {
    this.config = clientConfig;
    this.logger = logger.child({ component: 'github-client' });

    this.octokit = new Octokit({
      auth: this.config.token,
      userAgent: this.config.userAgent,
      baseUrl: this.config.baseUrl,
      request: this.config.fetch ? { fetch: this.config.fetch } : undefined,
      log: {
        debug: (message: string) => this.logger.trace(message),
        info: (message: string) => this.logger.debug(message),
        warn: (message: string) => this.logger.warn(message),
        error: (message: string) => this.logger.error(message),
      },
    });

    if (this.config.token) {
      this.logger.info('GitHub token configured');
    } else {
      this.logger.warn('No GitHub token configured - API rate limits will be restricted');
    }
  }

  isAuthenticated(): boolean {
    return Boolean(this.config.token);
  }

  /**
   * Last rate limit figures reported by GitHub, if any request was made yet
   */
  getRateLimitInfo(): RateLimitInfo | null {
    return this.rateLimitInfo;
  }

  async getRepository(owner: string, repo: string): Promise<RepoInfo> {
    const data = await this.request(`repos/${owner}/${repo}`, signal =>
      this.octokit.rest.repos.get({ owner, repo, request: { signal } })
    );

    return {
      full_name: data.full_name,
      owner: data.owner.login,
      name: data.name,
      description: data.description,
      language: data.language,
      stargazers_count: data.stargazers_count ?? 0,
      forks_count: data.forks_count ?? 0,
      subscribers_count: data.subscribers_count ?? 0,
      open_issues_count: data.open_issues_count ?? 0,
      watchers_count: data.watchers_count ?? 0,
      size: data.size ?? 0,
      default_branch: data.default_branch || 'main',
      created_at: data.created_at ?? null,
      updated_at: data.updated_at ?? null,
      pushed_at: data.pushed_at ?? null,
      html_url: data.html_url ?? null,
      topics: data.topics ?? [],
      has_issues: data.has_issues ?? true,
      has_projects: data.has_projects ?? true,
      has_wiki: data.has_wiki ?? true,
    };
  }

  async listCommits(owner: string, repo: string, query: CommitPageQuery): Promise<CommitEntry[]> {
    const data = await this.request(`repos/${owner}/${repo}/commits?page=${query.page}`, signal =>
      this.octokit.rest.repos.listCommits({
        owner,
        repo,
        since: query.since,
        until: query.until,
        per_page: query.perPage,
        page: query.page,
        request: { signal },
      })
    );

    return data.map(item => ({
      author: item.commit.author?.name || 'Unknown',
      date: item.commit.author?.date ?? null,
    }));
  }

  async listContributors(owner: string, repo: string): Promise<Contributor[]> {
    const data = await this.request(`repos/${owner}/${repo}/contributors`, signal =>
      this.octokit.rest.repos.listContributors({
        owner,
        repo,
        per_page: CONTRIBUTORS_PAGE_SIZE,
        request: { signal },
      })
    );

    // GitHub answers 204 without a body for empty repositories
    if (!Array.isArray(data)) {
      return [];
    }

    return data.map(contributor => ({
      login: contributor.login ?? null,
      contributions: contributor.contributions,
      avatar_url: contributor.avatar_url ?? null,
      html_url: contributor.html_url ?? null,
    }));
  }

  async listIssues(owner: string, repo: string, since: string): Promise<IssueEntry[]> {
    const data = await this.request(`repos/${owner}/${repo}/issues`, signal =>
      this.octokit.rest.issues.listForRepo({
        owner,
        repo,
        state: 'all',
        since,
        per_page: LIST_PAGE_SIZE,
        request: { signal },
      })
    );

    return data.map(issue => ({
      state: issue.state,
      isPullRequest: issue.pull_request !== undefined && issue.pull_request !== null,
      labels: issue.labels
        .map(label => (typeof label === 'string' ? label : label.name))
        .filter((name): name is string => typeof name === 'string' && name.length > 0),
    }));
  }

  async listPullRequests(owner: string, repo: string): Promise<PullRequestEntry[]> {
    const data = await this.request(`repos/${owner}/${repo}/pulls`, signal =>
      this.octokit.rest.pulls.list({
        owner,
        repo,
        state: 'all',
        per_page: LIST_PAGE_SIZE,
        request: { signal },
      })
    );

    return data.map(pr => ({
      state: pr.state,
      mergedAt: pr.merged_at,
    }));
  }

  async getLanguages(owner: string, repo: string): Promise<Record<string, number>> {
    return this.request(`repos/${owner}/${repo}/languages`, signal =>
      this.octokit.rest.repos.listLanguages({ owner, repo, request: { signal } })
    );
  }

  /**
   * Run one bounded request and translate failures into the error taxonomy
   */
  private async request<T>(
    endpoint: string,
    send: (signal: AbortSignal) => Promise<{ data: T; headers: HeaderBag }>
  ): Promise<T> {
    try {
      const response = await send(AbortSignal.timeout(this.config.timeoutMs));
      this.trackRateLimit(response.headers);
      return response.data;
    } catch (error) {
      throw this.handleError(error, endpoint);
    }
  }

  private trackRateLimit(headers: HeaderBag | undefined): void {
    const remaining = readNumberHeader(headers, 'x-ratelimit-remaining');
    const limit = readNumberHeader(headers, 'x-ratelimit-limit');
    if (remaining === undefined || limit === undefined) {
      return;
    }

    const reset = readNumberHeader(headers, 'x-ratelimit-reset') ?? 0;
    const resource = headers?.['x-ratelimit-resource'];
    this.rateLimitInfo = {
      limit,
      remaining,
      reset: new Date(reset * 1000),
      resource: typeof resource === 'string' ? resource : 'core',
    };
    this.logger.debug({ remaining, limit }, `GitHub API rate limit: ${remaining}/${limit}`);
  }

  /**
   * Handle GitHub API errors
   */
  private handleError(error: unknown, endpoint: string): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (isTimeoutError(error)) {
      this.logger.error({ endpoint, timeoutMs: this.config.timeoutMs }, 'GitHub request timed out');
      return new UpstreamTimeoutError('GitHub', this.config.timeoutMs, { endpoint });
    }

    const status = readStatus(error);
    const headers = readResponseHeaders(error);
    this.trackRateLimit(headers);

    if (status === 404) {
      return new NotFoundError('Repository', { endpoint });
    }

    if (status === 403 || status === 429) {
      const reset = readNumberHeader(headers, 'x-ratelimit-reset');
      this.logger.warn({ endpoint, status }, 'GitHub API rate limit exceeded');
      return new RateLimitedError('GitHub API rate limit exceeded', {
        endpoint,
        remaining: readNumberHeader(headers, 'x-ratelimit-remaining') ?? 0,
        ...(reset !== undefined && { resetAt: new Date(reset * 1000).toISOString() }),
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error({ endpoint, status, err: error }, 'GitHub request failed');
    return new UpstreamError(
      'GitHub',
      status ? `GitHub API error (${status}): ${message}` : `GitHub request failed: ${message}`,
      { endpoint, ...(status !== undefined && { status }) },
      { cause: error }
    );
  }
}
