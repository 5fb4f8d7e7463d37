import { describe, it, expect } from 'vitest';
import {
  AISummaryService,
  buildFallback,
  createAnalysisPrompt,
  prepareActivitySummary,
} from '../../src/services/ai-summary';
import { CompletionClient } from '../../src/clients/completion';
import { createSilentLogger } from '../../src/lib/logger';
import { ActivitySnapshotSchema, type ActivitySnapshot } from '../../src/types/activity';
import { createFetchMock, type MockRoute } from '../mocks/github.mock';
import { MODEL_JSON, completionReply, modelAnswer } from '../mocks/completion.mock';
import { COMPLETION_API_URL } from '../mocks/config.mock';

const snapshot: ActivitySnapshot = ActivitySnapshotSchema.parse({
  repo_info: { full_name: 'acme/widgets', stargazers_count: 250, subscribers_count: 40 },
  commit_stats: { total_commits: 120 },
  total_contributors: 3,
  issue_stats: { open_issues: 4, closed_issues: 6 },
  pr_stats: { open_prs: 2, merged_prs: 5 },
  language_stats: { languages: { TypeScript: 900 } },
  analysis_period_days: 30,
  activity_index: 300,
});

const createService = (route: MockRoute | undefined, apiKey: string | undefined = 'test-secret') => {
  const mock = createFetchMock(route === undefined ? {} : { 'POST /v1/chat/completions': route });
  const completion = new CompletionClient(
    { apiUrl: COMPLETION_API_URL, apiKey, model: 'test-model', temperature: 0.2, timeoutMs: 1000, fetch: mock.fetch },
    createSilentLogger()
  );
  return { service: new AISummaryService(completion, createSilentLogger()), mock };
};

describe('AISummaryService', () => {
  it('should condense the snapshot into six lines', () => {
    expect(prepareActivitySummary(snapshot)).toBe(
      [
        'Repo: acme/widgets | Stars: 250',
        'Period: 30 days | Total Commits: 120',
        'Activity Index: 300% | Authors: 3',
        'Languages: {"TypeScript":900}',
        'Issues O/C: 4/6',
        'PRs O/M: 2/5',
      ].join('\n')
    );
  });

  it('should embed the repository and summary in the prompt', () => {
    const prompt = createAnalysisPrompt('acme', 'widgets', 'SUMMARY BLOCK');

    expect(prompt).toContain('repository acme/widgets:\nSUMMARY BLOCK\n');
    expect(prompt).toContain('"health_score": "number from 1 to 10"');
  });

  it('should return the normalized model answer', async () => {
    const { service, mock } = createService(completionReply(MODEL_JSON));

    const result = await service.generate('acme', 'widgets', snapshot);

    expect(result).toEqual({ ...modelAnswer, source: 'model' });
    expect(mock.calls).toEqual(['POST /v1/chat/completions']);
  });

  it('should use the unconfigured fallback without an API key', async () => {
    const { service, mock } = createService(completionReply(MODEL_JSON), undefined);

    const result = await service.generate('acme', 'widgets', snapshot);

    expect(service.isEnabled()).toBe(false);
    expect(mock.calls).toEqual([]);
    expect(result).toEqual({
      summary: 'AI service is not configured',
      analysis: 'Project widgets shows an activity index of 300%.',
      insights: { strengths: [], weaknesses: [], trends: [], health_score: 'N/A' },
      recommendations: ['Increase commit frequency', 'Close stale issues'],
      source: 'unconfigured',
      error: 'Completion API key not configured',
    });
  });

  it('should use the failure fallback when the endpoint is unreachable', async () => {
    const { service } = createService(new TypeError('fetch failed'));

    const result = await service.generate('acme', 'widgets', snapshot);

    expect(result).toEqual({
      summary: 'Failed to generate analytics',
      analysis: 'Project widgets shows an activity index of 300%.',
      insights: { strengths: [], weaknesses: [], trends: [], health_score: '0' },
      recommendations: ['Increase commit frequency', 'Close stale issues'],
      source: 'fallback',
      error: 'Completion request failed: fetch failed',
    });
  });

  it('should use the failure fallback on an error status', async () => {
    const { service } = createService({ status: 500, body: { message: 'overloaded' } });

    const result = await service.generate('acme', 'widgets', snapshot);

    expect(result.source).toBe('fallback');
    expect(result.insights.health_score).toBe('0');
  });

  it('should keep prose answers as the analysis', async () => {
    const { service } = createService(completionReply('Looks fine to me.'));

    const result = await service.generate('acme', 'widgets', snapshot);

    expect(result.source).toBe('unparsed');
    expect(result.analysis).toBe('Looks fine to me.');
    expect(result.summary).toBe('Analysis completed');
  });

  it('should build fallbacks without an error message', () => {
    expect(buildFallback('widgets', 12.5, 'fallback')).not.toHaveProperty('error');
  });
});
