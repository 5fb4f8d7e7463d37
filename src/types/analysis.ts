import { z } from 'zod';
import {
  ActivitySnapshotSchema,
  RepoInfoSchema,
  type ActivitySnapshot,
  type RepoInfo,
} from './activity';

export interface AIInsights {
  strengths: string[];
  weaknesses: string[];
  trends: string[];
  health_score: string;
}

/**
 * Narrative result of one analysis. Every field is always populated, on the
 * error paths as well.
 */
export interface AIResult {
  summary: string;
  analysis: string;
  insights: AIInsights;
  recommendations: string[];
}

/**
 * Where an AIResult came from:
 * - `model`: the completion parsed cleanly
 * - `repaired`: parsed after repair, or with defaults substituted for some fields
 * - `unparsed`: no JSON object found, raw text kept as the analysis
 * - `fallback`: the completion call failed
 * - `unconfigured`: no API key, the endpoint was never called
 */
export type AIResultSource = 'model' | 'repaired' | 'unparsed' | 'fallback' | 'unconfigured';

export interface GeneratedAnalysis extends AIResult {
  source: AIResultSource;
  error?: string;
}

export const isSuccessfulGeneration = (result: GeneratedAnalysis): boolean =>
  result.source !== 'fallback' && result.source !== 'unconfigured';

export interface AnalysisRequest {
  owner: string;
  repo_name: string;
  start_date: string;
  end_date: string;
}

export interface AnalysisResponse {
  success: true;
  repo_info: RepoInfo;
  commit_stats: ActivitySnapshot['commit_stats'];
  contributors: ActivitySnapshot['contributors'];
  total_contributors: number;
  issue_stats: ActivitySnapshot['issue_stats'];
  pr_stats: ActivitySnapshot['pr_stats'];
  language_stats: ActivitySnapshot['language_stats'];
  analysis_period_days: number;
  activity_index: number;
  start_date: string;
  end_date: string;
  ai_analysis: string;
  ai_recommendations: string[];
  ai_insights: AIInsights;
  ai_summary: string;
  database_record_id: number;
}

export const AIInsightsSchema = z.object({
  strengths: z.array(z.string()).default([]),
  weaknesses: z.array(z.string()).default([]),
  trends: z.array(z.string()).default([]),
  health_score: z.string().default('N/A'),
});

// Lenient readers for gateway responses consumed by the front ends
export const AnalysisResponseSchema = ActivitySnapshotSchema.extend({
  success: z.boolean(),
  ai_analysis: z.string().default(''),
  ai_recommendations: z.array(z.string()).default([]),
  ai_insights: AIInsightsSchema.default({}),
  ai_summary: z.string().default(''),
  database_record_id: z.number().nullable().default(null),
});

export const RepoLookupResponseSchema = z.object({
  success: z.boolean(),
  repo_info: RepoInfoSchema,
});

export type GatewayAnalysis = z.infer<typeof AnalysisResponseSchema>;
export type RepoLookupResponse = z.infer<typeof RepoLookupResponseSchema>;
