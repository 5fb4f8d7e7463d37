export interface NewAnalysisRecord {
  owner: string;
  repo_name: string;
  total_commits: number;
  total_contributors: number;
  avg_commits_per_day: number;
  analysis_period_days: number;
  activity_index: number;
  additional_data?: Record<string, unknown> | null;
}

export interface AnalysisRecord extends Omit<NewAnalysisRecord, 'additional_data'> {
  id: number;
  additional_data: Record<string, unknown> | null;
  timestamp: string;
}

export interface HistoryPage {
  history: AnalysisRecord[];
  total: number;
  limit: number;
  offset: number;
}

export interface RepoHistory {
  owner: string;
  repo_name: string;
  history: AnalysisRecord[];
  count: number;
}

export interface CacheEntry {
  cache_key: string;
  data: string;
  created_at: string;
  expires_at: string;
}

export type CacheLookup =
  | { found: true; cache_key: string; data: string }
  | { found: false; expired?: true };
