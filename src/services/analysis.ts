import type { Logger } from '../lib/logger';
import { createPerformanceLogger } from '../lib/logger';
import { PersistenceError } from '../lib/errors';
import type { StatsRepository } from '../db/stats-repository';
import type { ActivitySnapshot } from '../types/activity';
import {
  isSuccessfulGeneration,
  type AnalysisRequest,
  type AnalysisResponse,
  type GeneratedAnalysis,
} from '../types/analysis';
import type { RepositoryActivityService } from './repository-activity';
import type { AISummaryService } from './ai-summary';

/**
 * Runs one analysis end to end: fetch the activity snapshot, generate the
 * narrative, persist the record and assemble the response. A failing fetch
 * or save aborts the run; the narrative step cannot fail.
 */
export class AnalysisService {
  private readonly logger: Logger;

  constructor(
    private readonly activity: RepositoryActivityService,
    private readonly aiSummary: AISummaryService,
    private readonly stats: StatsRepository,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'analysis' });
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResponse> {
    const { owner, repo_name: repo } = request;
    const perf = createPerformanceLogger(this.logger, 'analyze');

    this.logger.info({ owner, repo }, 'Step 1: fetching GitHub data');
    const snapshot = await this.activity.fetch(owner, repo, request.start_date, request.end_date);

    this.logger.info({ owner, repo }, 'Step 2: generating AI analysis');
    const narrative = await this.aiSummary.generate(owner, repo, snapshot);
    if (narrative.source !== 'model') {
      this.logger.warn({ owner, repo, source: narrative.source, error: narrative.error }, 'AI analysis degraded');
    }

    this.logger.info({ owner, repo }, 'Step 3: saving to database');
    const recordId = this.persist(owner, repo, snapshot, narrative);

    this.logger.info({ owner, repo }, 'Step 4: preparing response');
    perf.end({ owner, repo, recordId });
    return this.assemble(request, snapshot, narrative, recordId);
  }

  private persist(owner: string, repo: string, snapshot: ActivitySnapshot, narrative: GeneratedAnalysis): number {
    try {
      return this.stats.save({
        owner,
        repo_name: repo,
        total_commits: snapshot.commit_stats.total_commits,
        total_contributors: snapshot.total_contributors,
        avg_commits_per_day: snapshot.commit_stats.average_commits_per_day,
        analysis_period_days: snapshot.analysis_period_days,
        activity_index: snapshot.activity_index,
        additional_data: { ai_analysis_available: isSuccessfulGeneration(narrative) },
      });
    } catch (error) {
      this.logger.error({ err: error, owner, repo }, 'Failed to save analysis');
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError('Failed to save analysis', { owner, repo }, { cause: error });
    }
  }

  private assemble(
    request: AnalysisRequest,
    snapshot: ActivitySnapshot,
    narrative: GeneratedAnalysis,
    recordId: number
  ): AnalysisResponse {
    return {
      success: true,
      repo_info: snapshot.repo_info,
      commit_stats: snapshot.commit_stats,
      contributors: snapshot.contributors,
      total_contributors: snapshot.total_contributors,
      issue_stats: snapshot.issue_stats,
      pr_stats: snapshot.pr_stats,
      language_stats: snapshot.language_stats,
      analysis_period_days: snapshot.analysis_period_days,
      activity_index: snapshot.activity_index,
      start_date: request.start_date,
      end_date: request.end_date,
      ai_analysis: narrative.analysis,
      ai_recommendations: narrative.recommendations,
      ai_insights: narrative.insights,
      ai_summary: narrative.summary,
      database_record_id: recordId,
    };
  }
}
