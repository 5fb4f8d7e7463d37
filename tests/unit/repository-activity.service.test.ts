import { describe, it, expect, vi } from 'vitest';
import { RepositoryActivityService } from '../../src/services/repository-activity';
import { createSilentLogger } from '../../src/lib/logger';
import { NotFoundError, UpstreamError } from '../../src/lib/errors';
import type { Contributor, RepoInfo } from '../../src/types/activity';
import type { CommitEntry, RepositorySource } from '../../src/types/github';

const repoInfo: RepoInfo = {
  full_name: 'acme/widgets',
  owner: 'acme',
  name: 'widgets',
  description: null,
  language: 'TypeScript',
  stargazers_count: 10,
  forks_count: 1,
  subscribers_count: 40,
  open_issues_count: 2,
  watchers_count: 10,
  size: 100,
  default_branch: 'main',
  created_at: null,
  updated_at: null,
  pushed_at: null,
  html_url: null,
  topics: [],
  has_issues: true,
  has_projects: true,
  has_wiki: true,
};

const commitsOf = (count: number, author: string = 'alice'): CommitEntry[] =>
  Array.from({ length: count }, () => ({ author, date: '2024-03-05T10:00:00Z' }));

const contributorsOf = (count: number): Contributor[] =>
  Array.from({ length: count }, (_, i) => ({
    login: `dev${i}`,
    contributions: count - i,
    avatar_url: null,
    html_url: null,
  }));

const createSource = (overrides: Partial<RepositorySource> = {}) => {
  const source = {
    getRepository: vi.fn<RepositorySource['getRepository']>().mockResolvedValue(repoInfo),
    listCommits: vi.fn<RepositorySource['listCommits']>().mockResolvedValue(commitsOf(3)),
    listContributors: vi.fn<RepositorySource['listContributors']>().mockResolvedValue(contributorsOf(2)),
    listIssues: vi.fn<RepositorySource['listIssues']>().mockResolvedValue([
      { state: 'open', labels: ['bug'], isPullRequest: false },
    ]),
    listPullRequests: vi.fn<RepositorySource['listPullRequests']>().mockResolvedValue([
      { state: 'closed', mergedAt: '2024-03-06T00:00:00Z' },
    ]),
    getLanguages: vi.fn<RepositorySource['getLanguages']>().mockResolvedValue({ TypeScript: 900, CSS: 100 }),
  };
  return { ...source, ...overrides };
};

const SINCE = '2024-03-01T00:00:00Z';
const UNTIL = '2024-03-30T23:59:59Z';

describe('RepositoryActivityService', () => {
  it('should assemble a snapshot for the window', async () => {
    const source = createSource();
    const service = new RepositoryActivityService(source, { maxCommitPages: 10 }, createSilentLogger());

    const snapshot = await service.fetch('acme', 'widgets', SINCE, UNTIL);

    expect(snapshot).toEqual({
      repo_info: repoInfo,
      commit_stats: {
        total_commits: 3,
        commits_by_author: { alice: 3 },
        commits_by_day: { '2024-03-05': 3 },
        average_commits_per_day: 0.1,
        most_active_day: '2024-03-05',
        most_active_author: 'alice',
      },
      contributors: contributorsOf(2),
      total_contributors: 2,
      issue_stats: { total_issues: 1, open_issues: 1, closed_issues: 0, issues_by_label: { bug: 1 } },
      pr_stats: { total_prs: 1, open_prs: 0, closed_prs: 1, merged_prs: 1 },
      language_stats: { languages: { TypeScript: 900, CSS: 100 }, primary_language: 'TypeScript', total_bytes: 1000 },
      analysis_period_days: 30,
      activity_index: 7.5,
      start_date: SINCE,
      end_date: UNTIL,
    });
    expect(source.listIssues).toHaveBeenCalledWith('acme', 'widgets', SINCE);
  });

  it('should page through commits until a short page', async () => {
    const listCommits = vi.fn<RepositorySource['listCommits']>()
      .mockResolvedValueOnce(commitsOf(100))
      .mockResolvedValueOnce(commitsOf(20));
    const service = new RepositoryActivityService(
      createSource({ listCommits }),
      { maxCommitPages: 10 },
      createSilentLogger()
    );

    const snapshot = await service.fetch('acme', 'widgets', SINCE, UNTIL);

    expect(listCommits).toHaveBeenCalledTimes(2);
    expect(listCommits).toHaveBeenLastCalledWith('acme', 'widgets', { since: SINCE, until: UNTIL, page: 2, perPage: 100 });
    expect(snapshot.commit_stats.total_commits).toBe(120);
    expect(snapshot.commit_stats.average_commits_per_day).toBe(4);
    expect(snapshot.activity_index).toBe(300);
  });

  it('should stop at the page limit', async () => {
    const listCommits = vi.fn<RepositorySource['listCommits']>().mockResolvedValue(commitsOf(100));
    const service = new RepositoryActivityService(
      createSource({ listCommits }),
      { maxCommitPages: 2 },
      createSilentLogger()
    );

    const snapshot = await service.fetch('acme', 'widgets', SINCE, UNTIL);

    expect(listCommits).toHaveBeenCalledTimes(2);
    expect(snapshot.commit_stats.total_commits).toBe(200);
  });

  it('should keep at most 50 contributors but count them all', async () => {
    const service = new RepositoryActivityService(
      createSource({ listContributors: vi.fn<RepositorySource['listContributors']>().mockResolvedValue(contributorsOf(70)) }),
      { maxCommitPages: 10 },
      createSilentLogger()
    );

    const snapshot = await service.fetch('acme', 'widgets', SINCE, UNTIL);

    expect(snapshot.contributors).toHaveLength(50);
    expect(snapshot.total_contributors).toBe(70);
  });

  it('should fall back to empty stats when optional sections fail', async () => {
    const failure = vi.fn().mockRejectedValue(new UpstreamError('GitHub', 'boom'));
    const service = new RepositoryActivityService(
      createSource({ listIssues: failure, listPullRequests: failure, getLanguages: failure }),
      { maxCommitPages: 10 },
      createSilentLogger()
    );

    const snapshot = await service.fetch('acme', 'widgets', SINCE, UNTIL);

    expect(snapshot.issue_stats).toEqual({ total_issues: 0, open_issues: 0, closed_issues: 0, issues_by_label: {} });
    expect(snapshot.pr_stats).toEqual({ total_prs: 0, open_prs: 0, closed_prs: 0, merged_prs: 0 });
    expect(snapshot.language_stats).toEqual({ languages: {}, primary_language: null, total_bytes: 0 });
    expect(snapshot.commit_stats.total_commits).toBe(3);
  });

  it('should propagate a missing repository', async () => {
    const service = new RepositoryActivityService(
      createSource({
        getRepository: vi.fn<RepositorySource['getRepository']>().mockRejectedValue(new NotFoundError('Repository')),
      }),
      { maxCommitPages: 10 },
      createSilentLogger()
    );

    await expect(service.fetch('acme', 'missing', SINCE, UNTIL)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should propagate commit failures', async () => {
    const service = new RepositoryActivityService(
      createSource({
        listCommits: vi.fn<RepositorySource['listCommits']>().mockRejectedValue(new UpstreamError('GitHub', 'boom')),
      }),
      { maxCommitPages: 10 },
      createSilentLogger()
    );

    await expect(service.fetch('acme', 'widgets', SINCE, UNTIL)).rejects.toBeInstanceOf(UpstreamError);
  });
});
