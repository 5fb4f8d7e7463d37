import type { MockReply } from './github.mock';

export const completionReply = (content: string | null): MockReply => ({
  body: {
    id: 'cmpl-test',
    model: 'test-model',
    choices: [{ index: 0, message: { role: 'assistant', content } }],
  },
});

export const modelAnswer = {
  summary: 'Steady, well-maintained project.',
  analysis: 'Commits arrive daily.\nIssues are triaged quickly.',
  insights: {
    strengths: ['Frequent releases'],
    weaknesses: ['Few reviewers'],
    trends: ['Growing contributor base'],
    health_score: '8',
  },
  recommendations: ['Add more reviewers', 'Document the release process'],
};

export const MODEL_JSON = JSON.stringify(modelAnswer);
