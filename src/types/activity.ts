import { z } from 'zod';

// Snapshot payloads keep the GitHub REST naming so they can be passed along unchanged.
// Every field falls back to its own default, so one mistyped value does not
// discard the rest of a caller-supplied snapshot.

export const RepoInfoSchema = z.object({
  full_name: z.string().catch(''),
  owner: z.string().catch(''),
  name: z.string().catch(''),
  description: z.string().nullable().catch(null),
  language: z.string().nullable().catch(null),
  stargazers_count: z.number().catch(0),
  forks_count: z.number().catch(0),
  subscribers_count: z.number().catch(0),
  open_issues_count: z.number().catch(0),
  watchers_count: z.number().catch(0),
  size: z.number().catch(0),
  default_branch: z.string().catch('main'),
  created_at: z.string().nullable().catch(null),
  updated_at: z.string().nullable().catch(null),
  pushed_at: z.string().nullable().catch(null),
  html_url: z.string().nullable().catch(null),
  topics: z.array(z.string()).catch(() => []),
  has_issues: z.boolean().catch(true),
  has_projects: z.boolean().catch(true),
  has_wiki: z.boolean().catch(true),
});

export const CommitStatsSchema = z.object({
  total_commits: z.number().catch(0),
  commits_by_author: z.record(z.number()).catch(() => ({})),
  commits_by_day: z.record(z.number()).catch(() => ({})),
  average_commits_per_day: z.number().catch(0),
  most_active_day: z.string().nullable().catch(null),
  most_active_author: z.string().nullable().catch(null),
});

export const ContributorSchema = z.object({
  login: z.string().nullable().catch(null),
  contributions: z.number().catch(0),
  avatar_url: z.string().nullable().catch(null),
  html_url: z.string().nullable().catch(null),
});

export const IssueStatsSchema = z.object({
  total_issues: z.number().catch(0),
  open_issues: z.number().catch(0),
  closed_issues: z.number().catch(0),
  issues_by_label: z.record(z.number()).catch(() => ({})),
});

export const PullRequestStatsSchema = z.object({
  total_prs: z.number().catch(0),
  open_prs: z.number().catch(0),
  closed_prs: z.number().catch(0),
  merged_prs: z.number().catch(0),
});

export const LanguageStatsSchema = z.object({
  languages: z.record(z.number()).catch(() => ({})),
  primary_language: z.string().nullable().catch(null),
  total_bytes: z.number().catch(0),
});

/**
 * Everything fetched for one analysis run. Built once per request and not
 * modified afterwards.
 */
export const ActivitySnapshotSchema = z.object({
  repo_info: RepoInfoSchema.catch(() => RepoInfoSchema.parse({})),
  commit_stats: CommitStatsSchema.catch(() => CommitStatsSchema.parse({})),
  contributors: z.array(ContributorSchema).catch(() => []),
  total_contributors: z.number().catch(0),
  issue_stats: IssueStatsSchema.catch(() => IssueStatsSchema.parse({})),
  pr_stats: PullRequestStatsSchema.catch(() => PullRequestStatsSchema.parse({})),
  language_stats: LanguageStatsSchema.catch(() => LanguageStatsSchema.parse({})),
  analysis_period_days: z.number().catch(0),
  activity_index: z.number().catch(0),
  start_date: z.string().catch(''),
  end_date: z.string().catch(''),
});

export type RepoInfo = z.infer<typeof RepoInfoSchema>;
export type CommitStats = z.infer<typeof CommitStatsSchema>;
export type Contributor = z.infer<typeof ContributorSchema>;
export type IssueStats = z.infer<typeof IssueStatsSchema>;
export type PullRequestStats = z.infer<typeof PullRequestStatsSchema>;
export type LanguageStats = z.infer<typeof LanguageStatsSchema>;
export type ActivitySnapshot = z.infer<typeof ActivitySnapshotSchema>;

export const EMPTY_ISSUE_STATS: IssueStats = {
  total_issues: 0,
  open_issues: 0,
  closed_issues: 0,
  issues_by_label: {},
};

export const EMPTY_PR_STATS: PullRequestStats = {
  total_prs: 0,
  open_prs: 0,
  closed_prs: 0,
  merged_prs: 0,
};

export const EMPTY_LANGUAGE_STATS: LanguageStats = {
  languages: {},
  primary_language: null,
  total_bytes: 0,
};
