import { z } from 'zod';
import type { AIInsights, AIResult, AIResultSource } from '../types/analysis';

export type NormalizedSource = Extract<AIResultSource, 'model' | 'repaired' | 'unparsed'>;

export interface NormalizedAIResult extends AIResult {
  source: NormalizedSource;
}

export const DEFAULT_SUMMARY = 'Analysis completed';
export const DEFAULT_HEALTH_SCORE = '5';
export const DEFAULT_RECOMMENDATIONS: readonly string[] = ['Keep monitoring the repository'];

export const defaultInsights = (healthScore: string = DEFAULT_HEALTH_SCORE): AIInsights => ({
  strengths: [],
  weaknesses: [],
  trends: [],
  health_score: healthScore,
});

const CODE_FENCE = /```(?:json)?/gi;

export const stripCodeFences = (text: string): string => text.replace(CODE_FENCE, '').trim();

/**
 * Greedy span from the first `{` to the last `}`, or null when there is none.
 */
export const extractJsonSpan = (text: string): string | null => {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
};

const CONTROL_ESCAPES: Record<string, string> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/**
 * Fix the two mistakes models make most often: raw line breaks inside string
 * literals and trailing commas before a closing bracket.
 */
export const repairJson = (text: string): string => {
  let output = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (inString) {
      if (escaped) {
        escaped = false;
        output += char;
      } else if (char === '\\') {
        escaped = true;
        output += char;
      } else if (char === '"') {
        inString = false;
        output += char;
      } else {
        output += CONTROL_ESCAPES[char] ?? char;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      output += char;
      continue;
    }

    if (char === ',') {
      let next = i + 1;
      while (next < text.length && /\s/.test(text.charAt(next))) next++;
      const following = text.charAt(next);
      if (following === '}' || following === ']') {
        continue;
      }
    }

    output += char;
  }

  return output;
};

const tryParse = (text: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
};

// Numbers are accepted where strings are expected; other list items are dropped
const lenientString = z.union([z.string(), z.number().transform(String)]);

const lenientList = z.array(z.unknown()).transform(items =>
  items.flatMap(item => {
    const parsed = lenientString.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  })
);

const LenientInsightsSchema = z.object({
  strengths: lenientList.catch(() => []),
  weaknesses: lenientList.catch(() => []),
  trends: lenientList.catch(() => []),
  health_score: lenientString.catch(DEFAULT_HEALTH_SCORE),
});

/**
 * Field-by-field reader: anything missing or mistyped takes its default while
 * the fields that did parse are kept. `analysis` falls back to the raw text.
 */
const LenientResultSchema = z.object({
  summary: z.string().catch(DEFAULT_SUMMARY),
  analysis: z.string().optional().catch(undefined),
  insights: LenientInsightsSchema.catch(() => defaultInsights()),
  recommendations: lenientList.catch(() => [...DEFAULT_RECOMMENDATIONS]),
});

/**
 * The shape the prompt asks for; an answer matching it needs no repair.
 */
const StrictResultSchema = z.object({
  summary: z.string(),
  analysis: z.string(),
  insights: z.object({
    strengths: z.array(z.string()),
    weaknesses: z.array(z.string()),
    trends: z.array(z.string()),
    health_score: z.string(),
  }),
  recommendations: z.array(z.string()),
});

const defaultsFor = (rawText: string, source: NormalizedSource): NormalizedAIResult => ({
  summary: DEFAULT_SUMMARY,
  analysis: rawText,
  insights: defaultInsights(),
  recommendations: [...DEFAULT_RECOMMENDATIONS],
  source,
});

const fromParsedObject = (value: unknown, rawText: string, repaired: boolean): NormalizedAIResult => {
  const lenient = LenientResultSchema.safeParse(value);
  if (!lenient.success) {
    return defaultsFor(rawText, 'repaired');
  }

  const clean = !repaired && StrictResultSchema.safeParse(value).success;
  const { summary, analysis, insights, recommendations } = lenient.data;

  return {
    summary,
    analysis: analysis ?? rawText,
    insights,
    recommendations,
    source: clean ? 'model' : 'repaired',
  };
};

const decodeStringLiteral = (literal: string): string => {
  const decoded = tryParse(repairJson(`"${literal}"`));
  return decoded.ok && typeof decoded.value === 'string' ? decoded.value : literal;
};

const salvageField = (text: string, field: 'summary' | 'analysis'): string | undefined => {
  const match = new RegExp(`"${field}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`, 's').exec(text);
  const literal = match?.[1];
  return literal === undefined ? undefined : decodeStringLiteral(literal);
};

/**
 * Turn raw completion text into a fully populated AIResult. Never throws.
 */
export const normalize = (rawText: string): NormalizedAIResult => {
  const cleaned = stripCodeFences(rawText);
  const span = extractJsonSpan(cleaned);

  if (span === null) {
    return defaultsFor(rawText, 'unparsed');
  }

  const direct = tryParse(span);
  if (direct.ok) {
    return fromParsedObject(direct.value, rawText, false);
  }

  const repaired = tryParse(repairJson(span));
  if (repaired.ok) {
    return fromParsedObject(repaired.value, rawText, true);
  }

  const summary = salvageField(span, 'summary');
  const analysis = salvageField(span, 'analysis');
  if (summary === undefined && analysis === undefined) {
    return defaultsFor(rawText, 'unparsed');
  }

  return {
    ...defaultsFor(rawText, 'repaired'),
    ...(summary !== undefined && { summary }),
    ...(analysis !== undefined && { analysis }),
  };
};
