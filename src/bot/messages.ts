import type { GatewayAnalysis } from '../types/analysis';
import type { GatewayRecord } from '../clients/gateway';

export const MAX_MESSAGE_LENGTH = 4000;

export const BUTTONS = {
  analyze: '🔍 Analyze repository',
  history: '📜 History',
  help: '📖 Help',
  about: '🤖 About',
  cancel: '❌ Cancel',
} as const;

export const WELCOME_TEXT =
  '👋 Hi! I am a GitHub analytics bot.\n\n' +
  'I can analyze the activity of a repository and ask an <b>AI model</b> ' +
  'for recommendations on improving the project.';

export const ABOUT_TEXT =
  '🤖 <b>Repo Pulse Bot</b>\n\n' +
  '• <b>Data:</b> GitHub REST API\n' +
  '• <b>Analysis:</b> chat completion model\n' +
  '• <b>Features:</b> commit statistics, contributors, issues and pull requests, recommendations.';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"]/g, char => HTML_ESCAPES[char] ?? char);

/**
 * End of a chunk starting at `start`, moved back so that it never falls inside
 * an HTML entity or tag
 */
const chunkEnd = (line: string, start: number, limit: number): number => {
  const end = Math.min(start + limit, line.length);
  if (end === line.length) {
    return end;
  }
  const piece = line.slice(start, end);
  const entity = piece.lastIndexOf('&');
  const tag = piece.lastIndexOf('<');
  let cut = piece.length;
  if (entity > piece.lastIndexOf(';')) {
    cut = Math.min(cut, entity);
  }
  if (tag > piece.lastIndexOf('>')) {
    cut = Math.min(cut, tag);
  }
  return cut > 0 ? start + cut : end;
};

/**
 * Split on line boundaries so that no chunk exceeds `limit`. Lines longer
 * than the limit are cut outside of entities and tags.
 */
export const splitMessage = (text: string, limit: number = MAX_MESSAGE_LENGTH): string[] => {
  const chunks: string[] = [];
  let current = '';

  const flush = (): void => {
    if (current.length > 0) {
      chunks.push(current);
      current = '';
    }
  };

  for (const line of text.split('\n')) {
    if (line.length > limit) {
      flush();
      for (let start = 0; start < line.length; ) {
        const end = chunkEnd(line, start, limit);
        chunks.push(line.slice(start, end));
        start = end;
      }
      continue;
    }

    const candidate = current.length > 0 ? `${current}\n${line}` : line;
    if (candidate.length > limit) {
      flush();
      current = line;
    } else {
      current = candidate;
    }
  }
  flush();

  return chunks;
};

export const formatHistory = (records: GatewayRecord[]): string => {
  if (records.length === 0) {
    return 'No requests yet.';
  }

  const lines = ['📜 <b>Recently analyzed projects:</b>', ''];
  for (const record of records) {
    lines.push(`• <code>${escapeHtml(record.owner)}/${escapeHtml(record.repo_name)}</code>`);
    lines.push(`  └ Commits: ${record.total_commits}`);
  }
  return lines.join('\n');
};

export const formatAnalysis = (owner: string, repo: string, data: GatewayAnalysis): string[] => {
  const lines = [
    `📊 <b>ANALYSIS RESULTS: ${escapeHtml(owner)}/${escapeHtml(repo)}</b>`,
    '━━━━━━━━━━━━━━━━━━━━',
    `💾 Total commits: <code>${data.commit_stats.total_commits}</code>`,
    `👥 Contributors: <code>${data.total_contributors}</code>`,
    `📈 Activity index: <code>${data.activity_index}%</code>`,
  ];

  if (data.ai_summary) {
    lines.push('', `📝 <b>Summary:</b> ${escapeHtml(data.ai_summary)}`);
  }

  if (data.ai_recommendations.length > 0) {
    lines.push('', '💡 <b>AI RECOMMENDATIONS:</b>');
    data.ai_recommendations.forEach((item, index) => lines.push(`${index + 1}. ${escapeHtml(item)}`));
  } else {
    lines.push('', '⚠️ AI recommendations are temporarily unavailable.');
  }

  return splitMessage(lines.join('\n'));
};
