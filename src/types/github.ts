import type { RepoInfo, Contributor } from './activity';

// Narrow views of the GitHub REST payloads the activity fetcher consumes

export interface CommitEntry {
  author: string;
  /** ISO timestamp of the authored date, when GitHub reports one */
  date: string | null;
}

export interface IssueEntry {
  state: string;
  labels: string[];
  isPullRequest: boolean;
}

export interface PullRequestEntry {
  state: string;
  mergedAt: string | null;
}

export interface CommitPageQuery {
  since: string;
  until?: string;
  page: number;
  perPage: number;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  reset: Date;
  resource: string;
}

/**
 * What the activity fetcher needs from the code-hosting API.
 */
export interface RepositorySource {
  getRepository(owner: string, repo: string): Promise<RepoInfo>;
  listCommits(owner: string, repo: string, query: CommitPageQuery): Promise<CommitEntry[]>;
  listContributors(owner: string, repo: string): Promise<Contributor[]>;
  listIssues(owner: string, repo: string, since: string): Promise<IssueEntry[]>;
  listPullRequests(owner: string, repo: string): Promise<PullRequestEntry[]>;
  getLanguages(owner: string, repo: string): Promise<Record<string, number>>;
}
