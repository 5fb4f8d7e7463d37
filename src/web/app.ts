import express, { type Application, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../lib/config';
import type { Logger } from '../lib/logger';
import { AppError, HTTP_STATUS, asyncHandler, normalizeError } from '../lib/errors';
import { createCorsMiddleware, createRequestLoggingMiddleware, requestIdMiddleware } from '../lib/middleware';
import { commonPatterns, parseInput } from '../lib/validation';
import type { GatewayClient } from '../clients/gateway';
import { normalize } from '../services/ai-response';
import type { AIInsights, GatewayAnalysis } from '../types/analysis';
import type { WebTemplates } from './templates';

export type WebGateway = Pick<GatewayClient, 'getRepository' | 'analyze' | 'getHistory'>;

export const HISTORY_PAGE_SIZE = 20;
const TOP_CONTRIBUTORS = 10;

const formDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const statsFormSchema = z.object({
  owner: commonPatterns.githubName,
  repo_name: commonPatterns.githubName,
  start_date: formDate,
  end_date: formDate,
});

const historyPageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
});

const repoPathSchema = z.object({
  owner: commonPatterns.githubName,
  repo: commonPatterns.githubName,
});

interface AIView {
  ai_analysis: string;
  ai_summary: string;
  ai_insights: AIInsights;
  ai_recommendations: string[];
}

/**
 * Older gateways passed the raw completion through as `ai_analysis`. When the
 * text still looks like a JSON document, unpack it again.
 */
export const unpackAIFields = (data: GatewayAnalysis): AIView => {
  const view: AIView = {
    ai_analysis: data.ai_analysis,
    ai_summary: data.ai_summary,
    ai_insights: data.ai_insights,
    ai_recommendations: data.ai_recommendations,
  };

  const raw = data.ai_analysis.trim();
  if (!raw.startsWith('{') && !raw.includes('```json')) {
    return view;
  }

  const unpacked = normalize(raw);
  if (unpacked.source === 'unparsed') {
    return view;
  }
  return {
    ai_analysis: unpacked.analysis,
    ai_summary: unpacked.summary,
    ai_insights: unpacked.insights,
    ai_recommendations: unpacked.recommendations,
  };
};

export const buildLanguageRows = (languages: Record<string, number>) => {
  const total = Object.values(languages).reduce((sum, bytes) => sum + bytes, 0);
  return Object.entries(languages)
    .sort(([, a], [, b]) => b - a)
    .map(([name, bytes]) => ({
      name,
      bytes,
      percent: total > 0 ? Math.round((bytes / total) * 1000) / 10 : 0,
    }));
};

export const buildStatsView = (data: GatewayAnalysis) => ({
  totalCommits: data.commit_stats.total_commits,
  totalContributors: data.total_contributors,
  avgCommitsPerDay: data.commit_stats.average_commits_per_day,
  activityIndex: data.activity_index,
  analysisPeriodDays: data.analysis_period_days,
  mostActiveDay: data.commit_stats.most_active_day,
  mostActiveAuthor: data.commit_stats.most_active_author,
  totalIssues: data.issue_stats.total_issues,
  openIssues: data.issue_stats.open_issues,
  totalPRs: data.pr_stats.total_prs,
  mergedPRs: data.pr_stats.merged_prs,
  languages: buildLanguageRows(data.language_stats.languages),
  topContributors: data.contributors.slice(0, TOP_CONTRIBUTORS),
  ...unpackAIFields(data),
});

export function createWebApp(
  gateway: WebGateway,
  templates: WebTemplates,
  config: AppConfig,
  logger: Logger
): Application {
  const app = express();
  const log = logger.child({ component: 'web' });

  const renderError = (res: Response, error: unknown): void => {
    const appError: AppError = normalizeError(error);
    const status = appError.statusCode >= HTTP_STATUS.INTERNAL_SERVER_ERROR
      ? HTTP_STATUS.BAD_GATEWAY
      : appError.statusCode;
    const message = appError.statusCode === HTTP_STATUS.NOT_FOUND
      ? 'Repository not found'
      : appError.statusCode === HTTP_STATUS.BAD_REQUEST
        ? 'Invalid input, check the repository name and dates'
        : 'The analytics API is unavailable, try again later';

    log.warn({ err: appError, status }, 'Rendering error page');
    res.status(status).send(templates.render('error', { title: 'Error', errorMsg: message, status }));
  };

  app.use(requestIdMiddleware);
  app.use(createCorsMiddleware(config));
  app.use(express.urlencoded({ extended: false }));
  app.use(createRequestLoggingMiddleware(log));

  app.get('/', (_req: Request, res: Response) => {
    res.send(templates.render('index', { title: 'GitHub repository analytics' }));
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', service: 'web-client', timestamp: new Date().toISOString() });
  });

  app.get('/repo/:owner/:repo', asyncHandler(async (req: Request, res: Response) => {
    try {
      const { owner, repo } = parseInput(repoPathSchema, req.params, 'params');
      const lookup = await gateway.getRepository(owner, repo);
      res.send(templates.render('repo_details', {
        title: `${owner}/${repo}`,
        repoInfo: lookup.repo_info,
        owner,
        repoName: repo,
        stats: null,
        startDate: '',
        endDate: '',
      }));
    } catch (error) {
      renderError(res, error);
    }
  }));

  app.post('/get_stats', asyncHandler(async (req: Request, res: Response) => {
    try {
      const form = parseInput(statsFormSchema, req.body);
      const data = await gateway.analyze({
        owner: form.owner,
        repo_name: form.repo_name,
        start_date: `${form.start_date}T00:00:00Z`,
        end_date: `${form.end_date}T23:59:59Z`,
      });

      res.send(templates.render('repo_details', {
        title: `${form.owner}/${form.repo_name}`,
        repoInfo: data.repo_info,
        owner: form.owner,
        repoName: form.repo_name,
        stats: buildStatsView(data),
        startDate: form.start_date,
        endDate: form.end_date,
      }));
    } catch (error) {
      renderError(res, error);
    }
  }));

  app.get('/history', asyncHandler(async (req: Request, res: Response) => {
    try {
      const { page } = parseInput(historyPageQuerySchema, req.query, 'query');
      const history = await gateway.getHistory(HISTORY_PAGE_SIZE, (page - 1) * HISTORY_PAGE_SIZE);
      const totalPages = Math.ceil(history.total / HISTORY_PAGE_SIZE);

      res.send(templates.render('history', {
        title: 'History',
        statistics: history.history,
        currentPage: page,
        totalPages,
        prevPage: page > 1 ? page - 1 : null,
        nextPage: page < totalPages ? page + 1 : null,
      }));
    } catch (error) {
      renderError(res, error);
    }
  }));

  return app;
}
