import { z } from 'zod';
import type { Logger } from '../lib/logger';
import {
  AppError,
  NotFoundError,
  RateLimitedError,
  UpstreamError,
  UpstreamTimeoutError,
  isTimeoutError,
} from '../lib/errors';
import {
  AnalysisResponseSchema,
  RepoLookupResponseSchema,
  type AnalysisRequest,
  type GatewayAnalysis,
  type RepoLookupResponse,
} from '../types/analysis';

export interface GatewayClientConfig {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const AnalysisRecordSchema = z.object({
  id: z.number(),
  owner: z.string(),
  repo_name: z.string(),
  total_commits: z.number().default(0),
  total_contributors: z.number().default(0),
  avg_commits_per_day: z.number().default(0),
  analysis_period_days: z.number().default(0),
  activity_index: z.number().default(0),
  timestamp: z.string(),
});

const HistoryPageSchema = z.object({
  history: z.array(AnalysisRecordSchema),
  total: z.number(),
  limit: z.number(),
  offset: z.number(),
});

const RepoHistorySchema = z.object({
  owner: z.string(),
  repo_name: z.string(),
  history: z.array(AnalysisRecordSchema),
  count: z.number(),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export type GatewayRecord = z.infer<typeof AnalysisRecordSchema>;
export type GatewayHistoryPage = z.infer<typeof HistoryPageSchema>;
export type GatewayRepoHistory = z.infer<typeof RepoHistorySchema>;

/**
 * HTTP client the front ends use to reach the API gateway endpoints
 */
export class GatewayClient {
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: GatewayClientConfig, logger: Logger) {
    this.logger = logger.child({ component: 'gateway-client' });
    this.fetchImpl = config.fetch ?? fetch;
  }

  async getRepository(owner: string, repo: string): Promise<RepoLookupResponse> {
    return this.request(
      `/api/repo/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`,
      RepoLookupResponseSchema
    );
  }

  async analyze(request: AnalysisRequest): Promise<GatewayAnalysis> {
    return this.request('/api/analyze', AnalysisResponseSchema, {
      method: 'POST',
      body: JSON.stringify(request),
    });
  }

  async getHistory(limit: number = 50, offset: number = 0): Promise<GatewayHistoryPage> {
    const query = new URLSearchParams({ limit: String(limit), offset: String(offset) });
    return this.request(`/api/history?${query.toString()}`, HistoryPageSchema);
  }

  async getRepoHistory(owner: string, repo: string, limit: number = 10): Promise<GatewayRepoHistory> {
    const query = new URLSearchParams({ limit: String(limit) });
    return this.request(
      `/api/history/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}?${query.toString()}`,
      RepoHistorySchema
    );
  }

  private async request<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    init: { method?: 'GET' | 'POST'; body?: string } = {}
  ): Promise<z.infer<S>> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}${path}`;

    try {
      const response = await this.fetchImpl(url, {
        method: init.method ?? 'GET',
        headers: {
          'Accept': 'application/json',
          ...(init.body !== undefined && { 'Content-Type': 'application/json' }),
        },
        body: init.body,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        throw await this.toError(response, path);
      }

      const body: unknown = await response.json();
      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        throw new UpstreamError('gateway', 'Gateway returned an unexpected payload', { path });
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (isTimeoutError(error)) {
        this.logger.error({ path, timeoutMs: this.config.timeoutMs }, 'Gateway request timed out');
        throw new UpstreamTimeoutError('gateway', this.config.timeoutMs, { path });
      }
      this.logger.error({ err: error, path }, 'Gateway request failed');
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError('gateway', `Gateway unavailable: ${message}`, { path }, { cause: error });
    }
  }

  private async toError(response: Response, path: string): Promise<AppError> {
    const text = await response.text();
    let message = `Gateway error (${response.status})`;
    try {
      const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        message = parsed.data.error.message;
      }
    } catch {
      this.logger.debug({ path, status: response.status }, 'Gateway error body is not JSON');
    }

    const context = { path, status: response.status };
    if (response.status === 404) return new NotFoundError('Repository', context);
    if (response.status === 403 || response.status === 429) return new RateLimitedError(message, context);
    if (response.status === 504) return new UpstreamTimeoutError('gateway', this.config.timeoutMs, context);
    return new UpstreamError('gateway', message, context);
  }
}
