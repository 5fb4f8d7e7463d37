import type { Logger } from '../lib/logger';
import type { AnalysisRecord, HistoryPage, NewAnalysisRecord, RepoHistory } from '../types/stats';
import { withConnection } from './connection';

interface RepoStatsRow {
  id: number;
  owner: string;
  repo_name: string;
  total_commits: number | null;
  total_contributors: number | null;
  avg_commits_per_day: number | null;
  analysis_period_days: number | null;
  activity_index: number | null;
  timestamp: string;
  additional_data: string | null;
}

const parseAdditionalData = (raw: string | null): Record<string, unknown> | null => {
  if (raw === null) return null;
  try {
    const value: unknown = JSON.parse(raw);
    return typeof value === 'object' && value !== null && !Array.isArray(value)
      ? Object.fromEntries(Object.entries(value))
      : null;
  } catch {
    return null;
  }
};

const toRecord = (row: RepoStatsRow): AnalysisRecord => ({
  id: row.id,
  owner: row.owner,
  repo_name: row.repo_name,
  total_commits: row.total_commits ?? 0,
  total_contributors: row.total_contributors ?? 0,
  avg_commits_per_day: row.avg_commits_per_day ?? 0,
  analysis_period_days: row.analysis_period_days ?? 0,
  activity_index: row.activity_index ?? 0,
  additional_data: parseAdditionalData(row.additional_data),
  timestamp: row.timestamp,
});

/**
 * Append-only store of analysis results
 */
export class StatsRepository {
  private readonly logger: Logger;

  constructor(private readonly databasePath: string, logger: Logger) {
    this.logger = logger.child({ component: 'stats-repository' });
  }

  save(record: NewAnalysisRecord): number {
    const id = withConnection(this.databasePath, 'save-statistics', db => {
      const result = db
        .prepare(
          `INSERT INTO repo_stats
             (owner, repo_name, total_commits, total_contributors,
              avg_commits_per_day, analysis_period_days, activity_index, additional_data)
           VALUES (@owner, @repo_name, @total_commits, @total_contributors,
              @avg_commits_per_day, @analysis_period_days, @activity_index, @additional_data)`
        )
        .run({
          owner: record.owner,
          repo_name: record.repo_name,
          total_commits: record.total_commits,
          total_contributors: record.total_contributors,
          avg_commits_per_day: record.avg_commits_per_day,
          analysis_period_days: record.analysis_period_days,
          activity_index: record.activity_index,
          additional_data: record.additional_data ? JSON.stringify(record.additional_data) : null,
        });
      return Number(result.lastInsertRowid);
    });

    this.logger.info({ id, owner: record.owner, repo: record.repo_name }, 'Statistics saved');
    return id;
  }

  listRecent(limit: number, offset: number): AnalysisRecord[] {
    return withConnection(this.databasePath, 'list-history', db =>
      db
        .prepare<[number, number], RepoStatsRow>(
          'SELECT * FROM repo_stats ORDER BY timestamp DESC, id DESC LIMIT ? OFFSET ?'
        )
        .all(limit, offset)
        .map(toRecord)
    );
  }

  count(): number {
    return withConnection(this.databasePath, 'count-history', db => {
      const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM repo_stats').get();
      return row?.count ?? 0;
    });
  }

  listForRepo(owner: string, repoName: string, limit: number): AnalysisRecord[] {
    return withConnection(this.databasePath, 'list-repo-history', db =>
      db
        .prepare<[string, string, number], RepoStatsRow>(
          `SELECT * FROM repo_stats
           WHERE owner = ? AND repo_name = ?
           ORDER BY timestamp DESC, id DESC
           LIMIT ?`
        )
        .all(owner, repoName, limit)
        .map(toRecord)
    );
  }

  historyPage(limit: number, offset: number): HistoryPage {
    return { history: this.listRecent(limit, offset), total: this.count(), limit, offset };
  }

  repoHistory(owner: string, repoName: string, limit: number): RepoHistory {
    const history = this.listForRepo(owner, repoName, limit);
    return { owner, repo_name: repoName, history, count: history.length };
  }

  /**
   * Cheap connectivity probe for health checks
   */
  ping(): boolean {
    try {
      return withConnection(this.databasePath, 'ping', db => db.prepare('SELECT 1').get() !== undefined);
    } catch (error) {
      this.logger.warn({ err: error }, 'Database ping failed');
      return false;
    }
  }
}
