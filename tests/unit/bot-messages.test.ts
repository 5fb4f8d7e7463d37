import { describe, it, expect } from 'vitest';
import { escapeHtml, formatAnalysis, formatHistory, splitMessage } from '../../src/bot/messages';
import { AnalysisResponseSchema } from '../../src/types/analysis';

describe('bot messages', () => {
  it('should escape HTML special characters', () => {
    expect(escapeHtml('<a href="x">Tom & Jerry</a>')).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&lt;/a&gt;');
  });

  describe('splitMessage', () => {
    it('should keep short text in one chunk', () => {
      expect(splitMessage('hello\nworld')).toEqual(['hello\nworld']);
    });

    it('should break on line boundaries', () => {
      expect(splitMessage('aaa\nbbb\nccc', 7)).toEqual(['aaa\nbbb', 'ccc']);
    });

    it('should cut lines longer than the limit', () => {
      expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
    });

    it('should not cut through an escaped entity', () => {
      const text = 'x' + escapeHtml('&'.repeat(3000));

      const chunks = splitMessage(text);

      expect(chunks[0]).toBe('x' + '&amp;'.repeat(799));
      expect(chunks.map(chunk => chunk.length)).toEqual([3996, 4000, 4000, 3005]);
      expect(chunks.join('')).toBe(text);
    });

    it('should move the cut before entities and tags', () => {
      expect(splitMessage('x&amp;&amp;', 7)).toEqual(['x&amp;', '&amp;']);
      expect(splitMessage('ab<b>cd</b>', 4)).toEqual(['ab', '<b>c', 'd', '</b>']);
    });

    it('should keep every chunk within the limit', () => {
      const text = Array.from({ length: 500 }, (_, i) => `line ${i} ${'x'.repeat(i % 40)}`).join('\n');

      const chunks = splitMessage(text, 4000);

      expect(chunks.length).toBeGreaterThan(1);
      expect(chunks.every(chunk => chunk.length <= 4000)).toBe(true);
      expect(chunks.join('\n')).toBe(text);
    });
  });

  describe('formatHistory', () => {
    it('should say so when there is no history', () => {
      expect(formatHistory([])).toBe('No requests yet.');
    });

    it('should list repositories with their commit counts', () => {
      const text = formatHistory([
        {
          id: 1,
          owner: 'acme',
          repo_name: 'widgets',
          total_commits: 120,
          total_contributors: 3,
          avg_commits_per_day: 4,
          analysis_period_days: 30,
          activity_index: 300,
          timestamp: '2024-03-31T10:00:00.000Z',
        },
      ]);

      expect(text).toBe('📜 <b>Recently analyzed projects:</b>\n\n• <code>acme/widgets</code>\n  └ Commits: 120');
    });
  });

  describe('formatAnalysis', () => {
    it('should render statistics, summary and numbered recommendations', () => {
      const data = AnalysisResponseSchema.parse({
        success: true,
        commit_stats: { total_commits: 120 },
        total_contributors: 3,
        activity_index: 300,
        ai_summary: 'Fine & dandy',
        ai_recommendations: ['Add <tests>', 'Ship'],
      });

      expect(formatAnalysis('acme', 'widgets', data)).toEqual([
        [
          '📊 <b>ANALYSIS RESULTS: acme/widgets</b>',
          '━━━━━━━━━━━━━━━━━━━━',
          '💾 Total commits: <code>120</code>',
          '👥 Contributors: <code>3</code>',
          '📈 Activity index: <code>300%</code>',
          '',
          '📝 <b>Summary:</b> Fine &amp; dandy',
          '',
          '💡 <b>AI RECOMMENDATIONS:</b>',
          '1. Add &lt;tests&gt;',
          '2. Ship',
        ].join('\n'),
      ]);
    });

    it('should note missing recommendations', () => {
      const data = AnalysisResponseSchema.parse({ success: true });

      const [text] = formatAnalysis('acme', 'widgets', data);

      expect(text?.endsWith('⚠️ AI recommendations are temporarily unavailable.')).toBe(true);
      expect(text).not.toContain('Summary:');
    });
  });
});
