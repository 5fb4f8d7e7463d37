import { z } from 'zod';
import type { Logger } from '../lib/logger';
import {
  AppError,
  MalformedAIResponseError,
  UpstreamError,
  UpstreamTimeoutError,
  isTimeoutError,
} from '../lib/errors';

export interface CompletionClientConfig {
  apiUrl: string;
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  /** Ask the endpoint to answer with a JSON object */
  jsonMode?: boolean;
}

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1, 'Completion API returned no choices'),
});

/**
 * Thin client for an OpenAI-compatible chat completions endpoint.
 */
export class CompletionClient {
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: CompletionClientConfig, logger: Logger) {
    this.logger = logger.child({ component: 'completion-client' });
    this.fetchImpl = config.fetch ?? fetch;
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  get model(): string {
    return this.config.model;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    if (!this.config.apiKey) {
      throw new UpstreamError('completion', 'Completion API key is not configured');
    }

    try {
      const response = await this.fetchImpl(this.config.apiUrl, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
          'User-Agent': 'repo-pulse/1.0.0',
        },
        body: JSON.stringify({
          model: this.config.model,
          messages,
          temperature: this.config.temperature,
          stream: false,
          ...(options.jsonMode && { response_format: { type: 'json_object' } }),
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        const errorBody = await response.text();
        this.logger.error({ status: response.status, body: errorBody }, 'Completion API error');
        throw new UpstreamError(
          'completion',
          `Completion API error (${response.status}): ${response.statusText}`,
          { status: response.status }
        );
      }

      const body: unknown = await response.json();
      const parsed = completionResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new MalformedAIResponseError('Completion API returned an unexpected payload', {
          issues: parsed.error.errors.map(err => err.message),
        });
      }

      const content = parsed.data.choices[0]?.message.content;
      if (!content) {
        throw new MalformedAIResponseError('Completion API returned an empty message');
      }

      this.logger.debug({ length: content.length }, 'Completion received');
      return content;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (isTimeoutError(error)) {
        throw new UpstreamTimeoutError('completion', this.config.timeoutMs);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError('completion', `Completion request failed: ${message}`, undefined, { cause: error });
    }
  }
}
