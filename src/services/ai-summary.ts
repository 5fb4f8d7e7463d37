import type { Logger } from '../lib/logger';
import type { CompletionClient } from '../clients/completion';
import type { ActivitySnapshot } from '../types/activity';
import type { GeneratedAnalysis } from '../types/analysis';
import { defaultInsights, normalize } from './ai-response';

const SYSTEM_PROMPT = 'You are a specialized JSON generator. Never include prose outside the JSON object.';

export const UNCONFIGURED_SUMMARY = 'AI service is not configured';
export const FAILED_SUMMARY = 'Failed to generate analytics';
export const FALLBACK_RECOMMENDATIONS: readonly string[] = ['Increase commit frequency', 'Close stale issues'];

/**
 * Condensed, single-block view of a snapshot for the prompt
 */
export const prepareActivitySummary = (snapshot: ActivitySnapshot): string => {
  const { repo_info: repo, commit_stats: commits, issue_stats: issues, pr_stats: prs } = snapshot;

  return [
    `Repo: ${repo.full_name} | Stars: ${repo.stargazers_count}`,
    `Period: ${snapshot.analysis_period_days} days | Total Commits: ${commits.total_commits}`,
    `Activity Index: ${snapshot.activity_index}% | Authors: ${snapshot.total_contributors}`,
    `Languages: ${JSON.stringify(snapshot.language_stats.languages)}`,
    `Issues O/C: ${issues.open_issues}/${issues.closed_issues}`,
    `PRs O/M: ${prs.open_prs}/${prs.merged_prs}`,
  ].join('\n');
};

export const createAnalysisPrompt = (owner: string, repo: string, activitySummary: string): string =>
  `You are an expert analyst of open source projects. Analyze the data of the repository ${owner}/${repo}:
${activitySummary}

TASK: Write an in-depth technical report.
FORMAT REQUIREMENTS:
1. The answer must be STRICTLY JSON.
2. NO extra text, explanations or \`\`\`json markdown fences in the answer.
3. Every line break inside text fields must be escaped as \\n.

JSON STRUCTURE (send only this):
{
    "summary": "Short summary (2-3 sentences)",
    "analysis": "Detailed analysis (at least 4 paragraphs). Discuss commit dynamics, issue and PR handling, and the technology stack.",
    "insights": {
        "strengths": ["list", "of", "strengths"],
        "weaknesses": ["list", "of", "problems"],
        "trends": ["development", "directions"],
        "health_score": "number from 1 to 10"
    },
    "recommendations": ["Concrete advice 1", "Concrete advice 2", "Concrete advice 3"]
}`;

/**
 * Deterministic result used whenever the completion endpoint cannot be used
 */
export const buildFallback = (
  repo: string,
  activityIndex: number,
  kind: 'unconfigured' | 'fallback',
  error?: string
): GeneratedAnalysis => ({
  summary: kind === 'unconfigured' ? UNCONFIGURED_SUMMARY : FAILED_SUMMARY,
  analysis: `Project ${repo} shows an activity index of ${activityIndex}%.`,
  insights: defaultInsights(kind === 'unconfigured' ? 'N/A' : '0'),
  recommendations: [...FALLBACK_RECOMMENDATIONS],
  source: kind,
  ...(error !== undefined && { error }),
});

export class AISummaryService {
  private readonly logger: Logger;

  constructor(private readonly completion: CompletionClient, logger: Logger) {
    this.logger = logger.child({ component: 'ai-summary' });
  }

  isEnabled(): boolean {
    return this.completion.isConfigured();
  }

  /**
   * Produce the narrative for one snapshot. Never rejects: failures of the
   * completion endpoint yield the deterministic fallback instead.
   */
  async generate(owner: string, repo: string, snapshot: ActivitySnapshot): Promise<GeneratedAnalysis> {
    if (!this.isEnabled()) {
      this.logger.info('AI integration disabled, using fallback analysis');
      return buildFallback(repo, snapshot.activity_index, 'unconfigured', 'Completion API key not configured');
    }

    try {
      this.logger.info({ owner, repo }, `Starting AI analysis for ${owner}/${repo}`);
      const prompt = createAnalysisPrompt(owner, repo, prepareActivitySummary(snapshot));

      const rawText = await this.completion.complete(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        { jsonMode: true }
      );

      const result = normalize(rawText);
      if (result.source === 'model') {
        this.logger.info({ owner, repo }, 'AI analysis completed');
      } else {
        this.logger.warn({ owner, repo, source: result.source }, 'AI response needed normalization');
      }
      return result;
    } catch (error) {
      this.logger.error({ err: error, owner, repo }, 'Error during AI analysis');
      const message = error instanceof Error ? error.message : String(error);
      return buildFallback(repo, snapshot.activity_index, 'fallback', message);
    }
  }
}
