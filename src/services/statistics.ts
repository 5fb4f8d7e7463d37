import type { CommitStats, IssueStats, LanguageStats, PullRequestStats } from '../types/activity';
import type { CommitEntry, IssueEntry, PullRequestEntry } from '../types/github';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

export const roundTo = (value: number, decimals: number = 2): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

/**
 * Whole days between the two instants, counting both ends.
 */
export const countPeriodDays = (since: Date, until: Date): number =>
  Math.floor((until.getTime() - since.getTime()) / MS_PER_DAY) + 1;

export const averagePerDay = (total: number, days: number): number =>
  days > 0 ? roundTo(total / days) : 0;

/**
 * Commits per subscriber, as a percentage. Repositories without subscribers
 * are treated as having one.
 */
export const computeActivityIndex = (totalCommits: number, subscribers: number): number =>
  roundTo((totalCommits / Math.max(subscribers, 1)) * 100);

/**
 * Key with the highest count. Ties go to the key seen first.
 */
export const pickMostActive = (counts: Map<string, number>): string | null => {
  let best: string | null = null;
  let bestCount = -Infinity;
  for (const [key, count] of counts) {
    if (count > bestCount) {
      best = key;
      bestCount = count;
    }
  }
  return best;
};

const increment = (counts: Map<string, number>, key: string): void => {
  counts.set(key, (counts.get(key) ?? 0) + 1);
};

export const summarizeCommits = (commits: CommitEntry[], days: number): CommitStats => {
  const byAuthor = new Map<string, number>();
  const byDay = new Map<string, number>();

  for (const commit of commits) {
    increment(byAuthor, commit.author);
    if (commit.date) {
      const day = commit.date.split('T')[0];
      if (day) increment(byDay, day);
    }
  }

  return {
    total_commits: commits.length,
    commits_by_author: Object.fromEntries(byAuthor),
    commits_by_day: Object.fromEntries(byDay),
    average_commits_per_day: averagePerDay(commits.length, days),
    most_active_day: pickMostActive(byDay),
    most_active_author: pickMostActive(byAuthor),
  };
};

export const summarizeIssues = (issues: IssueEntry[]): IssueStats => {
  const byLabel = new Map<string, number>();
  let open = 0;
  let closed = 0;

  for (const issue of issues) {
    // the issues endpoint lists pull requests too
    if (issue.isPullRequest) continue;

    if (issue.state === 'open') {
      open++;
    } else {
      closed++;
    }
    issue.labels.forEach(label => increment(byLabel, label));
  }

  return {
    total_issues: open + closed,
    open_issues: open,
    closed_issues: closed,
    issues_by_label: Object.fromEntries(byLabel),
  };
};

export const summarizePullRequests = (pulls: PullRequestEntry[]): PullRequestStats => {
  const stats: PullRequestStats = { total_prs: 0, open_prs: 0, closed_prs: 0, merged_prs: 0 };

  for (const pr of pulls) {
    stats.total_prs++;
    if (pr.state === 'open') {
      stats.open_prs++;
    } else {
      stats.closed_prs++;
      if (pr.mergedAt) stats.merged_prs++;
    }
  }

  return stats;
};

export const summarizeLanguages = (languages: Record<string, number>): LanguageStats => {
  const sizes = new Map(Object.entries(languages));
  let total = 0;
  for (const bytes of sizes.values()) total += bytes;

  return {
    languages,
    primary_language: pickMostActive(sizes),
    total_bytes: total,
  };
};
