import type { AppConfig } from '../lib/config';
import { createComponentLogger, type Logger } from '../lib/logger';
import { GitHubClient } from '../clients/github';
import { CompletionClient } from '../clients/completion';
import { initializeSchema } from '../db/connection';
import { StatsRepository } from '../db/stats-repository';
import { CacheRepository, type Clock } from '../db/cache-repository';
import { RepositoryActivityService } from './repository-activity';
import { AISummaryService } from './ai-summary';
import { AnalysisService } from './analysis';

export interface Services {
  github: GitHubClient;
  completion: CompletionClient;
  activity: RepositoryActivityService;
  aiSummary: AISummaryService;
  analysis: AnalysisService;
  stats: StatsRepository;
  cache: CacheRepository;
}

export interface ServiceOverrides {
  /** Used for both the GitHub and the completion endpoints */
  fetch?: typeof fetch;
  now?: Clock;
}

/**
 * Wire every component from the configuration. The database schema is
 * created here, so the store is ready before the first request.
 */
export const createServices = (config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): Services => {
  const serviceLogger = createComponentLogger(logger, 'services');

  const github = new GitHubClient(
    {
      baseUrl: config.github.apiUrl,
      token: config.github.token,
      userAgent: 'repo-pulse/1.0.0',
      timeoutMs: config.github.timeoutMs,
      fetch: overrides.fetch,
    },
    serviceLogger
  );

  const completion = new CompletionClient({ ...config.completion, fetch: overrides.fetch }, serviceLogger);

  initializeSchema(config.database.path, serviceLogger);
  const stats = new StatsRepository(config.database.path, serviceLogger);
  const cache = new CacheRepository(config.database.path, serviceLogger, overrides.now);

  const activity = new RepositoryActivityService(
    github,
    { maxCommitPages: config.github.maxCommitPages },
    serviceLogger
  );
  const aiSummary = new AISummaryService(completion, serviceLogger);
  const analysis = new AnalysisService(activity, aiSummary, stats, serviceLogger);

  return { github, completion, activity, aiSummary, analysis, stats, cache };
};
