import { z } from 'zod';
import { ValidationError } from './errors';

// Common validation patterns
export const commonPatterns = {
  githubName: z.string().min(1).max(100).regex(/^[\w.-]+$/, 'Only letters, digits, ".", "-" and "_" are allowed'),
  githubRepo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'Must be in owner/repo format (e.g., nodejs/node)'),
  iso8601Date: z.string().refine(val => !Number.isNaN(Date.parse(val)), 'Invalid ISO 8601 date'),
  nonNegativeInt: z.number().int().nonnegative('Must be a non-negative integer'),
  nonNegativeNumber: z.number().nonnegative('Must be non-negative'),
};

const paginationValue = (fallback: number, max: number) =>
  z.coerce.number().int().min(0).max(max).default(fallback);

export const repoParamsSchema = z.object({
  owner: commonPatterns.githubName,
  repo: commonPatterns.githubName,
});

export const analysisRequestSchema = z.object({
  owner: commonPatterns.githubName,
  repo_name: commonPatterns.githubName,
  start_date: commonPatterns.iso8601Date,
  end_date: commonPatterns.iso8601Date,
}).refine(data => Date.parse(data.start_date) <= Date.parse(data.end_date), {
  message: 'start_date must not be after end_date',
  path: ['start_date'],
});

export const analyticsRequestSchema = z.object({
  owner: z.string().min(1),
  repo_name: z.string().min(1),
  activity_data: z.record(z.unknown()).default({}),
});

export const statsSaveSchema = z.object({
  owner: z.string().min(1),
  repo_name: z.string().min(1),
  total_commits: commonPatterns.nonNegativeInt,
  total_contributors: commonPatterns.nonNegativeInt,
  avg_commits_per_day: commonPatterns.nonNegativeNumber,
  analysis_period_days: commonPatterns.nonNegativeInt,
  activity_index: commonPatterns.nonNegativeNumber.default(0),
  additional_data: z.record(z.unknown()).nullable().optional(),
});

export const historyQuerySchema = z.object({
  limit: paginationValue(50, 500),
  offset: paginationValue(0, Number.MAX_SAFE_INTEGER),
});

export const repoHistoryQuerySchema = z.object({
  limit: paginationValue(10, 500),
});

// Ten years; longer lifetimes overflow the expiry timestamp
export const MAX_CACHE_TTL_SECONDS = 10 * 365 * 24 * 60 * 60;

export const cacheSetSchema = z.object({
  cache_key: z.string().min(1).max(512),
  data: z.string(),
  ttl_seconds: z.coerce.number().int().min(1).max(MAX_CACHE_TTL_SECONDS).default(3600),
});

/**
 * Parse request input, turning schema violations into a ValidationError that
 * the error handler renders as a 400.
 */
export const parseInput = <T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  source: 'body' | 'query' | 'params' = 'body'
): z.infer<T> => {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError('Validation failed', {
      source,
      errors: result.error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    });
  }
  return result.data;
};
