import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RECOMMENDATIONS,
  DEFAULT_SUMMARY,
  extractJsonSpan,
  normalize,
  repairJson,
  stripCodeFences,
} from '../../src/services/ai-response';
import { MODEL_JSON, modelAnswer } from '../mocks/completion.mock';

describe('AI response normalization', () => {
  describe('stripCodeFences', () => {
    it('should remove json fences and surrounding whitespace', () => {
      expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    });

    it('should remove bare fences', () => {
      expect(stripCodeFences('```\n{}\n```  ')).toBe('{}');
    });
  });

  describe('extractJsonSpan', () => {
    it('should take the span from the first opening to the last closing brace', () => {
      expect(extractJsonSpan('Here: {"a": {"b": 1}} done')).toBe('{"a": {"b": 1}}');
    });

    it('should return null without braces', () => {
      expect(extractJsonSpan('no object here')).toBeNull();
    });

    it('should return null when the closing brace comes first', () => {
      expect(extractJsonSpan('} then {')).toBeNull();
    });
  });

  describe('repairJson', () => {
    it('should escape raw line breaks inside strings only', () => {
      expect(repairJson('{\n"a": "x\ny"\n}')).toBe('{\n"a": "x\\ny"\n}');
    });

    it('should drop trailing commas before closing brackets', () => {
      expect(repairJson('{"a": [1, 2,], }')).toBe('{"a": [1, 2] }');
    });

    it('should leave commas inside strings alone', () => {
      expect(repairJson('{"a": "1,]"}')).toBe('{"a": "1,]"}');
    });

    it('should keep escaped quotes inside strings', () => {
      expect(repairJson('{"a": "say \\"hi\\",\n"}')).toBe('{"a": "say \\"hi\\",\\n"}');
    });
  });

  describe('normalize', () => {
    it('should accept a clean model answer as is', () => {
      const result = normalize(MODEL_JSON);

      expect(result).toEqual({ ...modelAnswer, source: 'model' });
    });

    it('should accept an answer wrapped in code fences', () => {
      const result = normalize('```json\n' + MODEL_JSON + '\n```');

      expect(result.source).toBe('model');
      expect(result.summary).toBe(modelAnswer.summary);
    });

    it('should repair raw newlines inside string values', () => {
      const raw = '{"summary": "First line\nsecond line", "analysis": "Body", ' +
        '"insights": {"strengths": [], "weaknesses": [], "trends": [], "health_score": "6"}, ' +
        '"recommendations": ["Ship it"]}';

      const result = normalize(raw);

      expect(result.source).toBe('repaired');
      expect(result.summary).toBe('First line\nsecond line');
      expect(result.insights.health_score).toBe('6');
      expect(result.recommendations).toEqual(['Ship it']);
    });

    it('should repair trailing commas', () => {
      const result = normalize('{"summary": "S", "analysis": "A", "recommendations": ["r1",],}');

      expect(result.source).toBe('repaired');
      expect(result.summary).toBe('S');
      expect(result.recommendations).toEqual(['r1']);
    });

    it('should convert a numeric health score to a string', () => {
      const raw = JSON.stringify({ ...modelAnswer, insights: { ...modelAnswer.insights, health_score: 7 } });

      const result = normalize(raw);

      expect(result.insights.health_score).toBe('7');
      expect(result.source).toBe('repaired');
    });

    it('should fill missing fields with defaults and keep the raw text as analysis', () => {
      const raw = '{"summary": "Only a summary"}';

      const result = normalize(raw);

      expect(result).toEqual({
        summary: 'Only a summary',
        analysis: raw,
        insights: { strengths: [], weaknesses: [], trends: [], health_score: '5' },
        recommendations: [...DEFAULT_RECOMMENDATIONS],
        source: 'repaired',
      });
    });

    it('should keep the fields that parsed when another is mistyped', () => {
      const raw = JSON.stringify({
        summary: 'Steady',
        analysis: 42,
        insights: { strengths: ['Tests'], health_score: { value: 9 } },
        recommendations: 'Ship more',
      });

      const result = normalize(raw);

      expect(result).toEqual({
        summary: 'Steady',
        analysis: raw,
        insights: { strengths: ['Tests'], weaknesses: [], trends: [], health_score: '5' },
        recommendations: [...DEFAULT_RECOMMENDATIONS],
        source: 'repaired',
      });
    });

    it('should fall back to default insights when they are not an object', () => {
      const raw = JSON.stringify({ ...modelAnswer, insights: ['not', 'an', 'object'] });

      const result = normalize(raw);

      expect(result.insights).toEqual({ strengths: [], weaknesses: [], trends: [], health_score: '5' });
      expect(result.recommendations).toEqual(modelAnswer.recommendations);
      expect(result.source).toBe('repaired');
    });

    it('should keep plain prose as the analysis', () => {
      const result = normalize('The project looks healthy.');

      expect(result).toEqual({
        summary: DEFAULT_SUMMARY,
        analysis: 'The project looks healthy.',
        insights: { strengths: [], weaknesses: [], trends: [], health_score: '5' },
        recommendations: ['Keep monitoring the repository'],
        source: 'unparsed',
      });
    });

    it('should salvage summary and analysis from a broken object', () => {
      const raw = '{"summary": "Salvaged", "analysis": "Still \\"readable\\"", "insights": {oops}}';

      const result = normalize(raw);

      expect(result.source).toBe('repaired');
      expect(result.summary).toBe('Salvaged');
      expect(result.analysis).toBe('Still "readable"');
      expect(result.recommendations).toEqual([...DEFAULT_RECOMMENDATIONS]);
    });

    it('should report unparsed when nothing can be salvaged', () => {
      const raw = '{not json at all}';

      const result = normalize(raw);

      expect(result.source).toBe('unparsed');
      expect(result.analysis).toBe(raw);
    });

    it('should drop non-string list items', () => {
      const raw = JSON.stringify({ ...modelAnswer, recommendations: ['Keep', null, 3] });

      const result = normalize(raw);

      expect(result.recommendations).toEqual(['Keep', '3']);
      expect(result.source).toBe('repaired');
    });
  });
});
