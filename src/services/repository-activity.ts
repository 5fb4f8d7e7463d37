import type { Logger } from '../lib/logger';
import { createPerformanceLogger } from '../lib/logger';
import {
  EMPTY_ISSUE_STATS,
  EMPTY_LANGUAGE_STATS,
  EMPTY_PR_STATS,
  type ActivitySnapshot,
  type RepoInfo,
} from '../types/activity';
import type { CommitEntry, RepositorySource } from '../types/github';
import {
  computeActivityIndex,
  countPeriodDays,
  summarizeCommits,
  summarizeIssues,
  summarizeLanguages,
  summarizePullRequests,
} from './statistics';

export const COMMITS_PER_PAGE = 100;
export const CONTRIBUTORS_LIMIT = 50;

export interface RepositoryActivityOptions {
  /** Upper bound on commit pages read per analysis */
  maxCommitPages: number;
}

/**
 * Collects a repository's activity over a window into one snapshot.
 */
export class RepositoryActivityService {
  private readonly logger: Logger;

  constructor(
    private readonly source: RepositorySource,
    private readonly options: RepositoryActivityOptions,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'repository-activity' });
  }

  async getRepository(owner: string, repo: string): Promise<RepoInfo> {
    return this.source.getRepository(owner, repo);
  }

  /**
   * Fetch and aggregate activity for `owner/repo` between `since` and `until`
   * (ISO-8601 instants). Repository, commit and contributor failures
   * propagate; issues, pull requests and languages degrade to empty stats.
   */
  async fetch(owner: string, repo: string, since: string, until: string): Promise<ActivitySnapshot> {
    const perf = createPerformanceLogger(this.logger, 'fetch-activity');
    const days = countPeriodDays(new Date(since), new Date(until));
    this.logger.info({ owner, repo, days }, `Starting analysis: ${owner}/${repo}`);

    try {
      const repoInfo = await this.source.getRepository(owner, repo);
      const commits = await this.fetchCommits(owner, repo, since, until);
      const allContributors = await this.source.listContributors(owner, repo);

      const issueStats = await this.bestEffort('issues', EMPTY_ISSUE_STATS, async () =>
        summarizeIssues(await this.source.listIssues(owner, repo, since))
      );
      const prStats = await this.bestEffort('pull requests', EMPTY_PR_STATS, async () =>
        summarizePullRequests(await this.source.listPullRequests(owner, repo))
      );
      const languageStats = await this.bestEffort('languages', EMPTY_LANGUAGE_STATS, async () =>
        summarizeLanguages(await this.source.getLanguages(owner, repo))
      );

      const commitStats = summarizeCommits(commits, days);
      const snapshot: ActivitySnapshot = {
        repo_info: repoInfo,
        commit_stats: commitStats,
        contributors: allContributors.slice(0, CONTRIBUTORS_LIMIT),
        total_contributors: allContributors.length,
        issue_stats: issueStats,
        pr_stats: prStats,
        language_stats: languageStats,
        analysis_period_days: days,
        activity_index: computeActivityIndex(commitStats.total_commits, repoInfo.subscribers_count),
        start_date: since,
        end_date: until,
      };

      perf.end({ owner, repo, totalCommits: commitStats.total_commits });
      return snapshot;
    } catch (error) {
      perf.error(error, { owner, repo });
      throw error;
    }
  }

  private async fetchCommits(owner: string, repo: string, since: string, until: string): Promise<CommitEntry[]> {
    const commits: CommitEntry[] = [];

    for (let page = 1; page <= this.options.maxCommitPages; page++) {
      const batch = await this.source.listCommits(owner, repo, {
        since,
        until,
        page,
        perPage: COMMITS_PER_PAGE,
      });
      commits.push(...batch);

      if (batch.length < COMMITS_PER_PAGE) {
        break;
      }
      if (page === this.options.maxCommitPages) {
        this.logger.warn({ owner, repo, pages: page }, 'Commit page limit reached, later commits are ignored');
      }
    }

    return commits;
  }

  private async bestEffort<T>(section: string, empty: T, load: () => Promise<T>): Promise<T> {
    try {
      return await load();
    } catch (error) {
      this.logger.warn({ err: error, section }, `Could not fetch ${section}`);
      return empty;
    }
  }
}
