import { z } from 'zod';
import type { Logger } from '../lib/logger';
import { UpstreamError, UpstreamTimeoutError, isTimeoutError } from '../lib/errors';
import { BUTTONS } from './messages';
import type { BotReply, ConversationManager, IncomingEvent, Keyboard } from './conversation';

export interface TelegramConfig {
  apiUrl: string;
  token: string;
  /** Long-poll duration requested from getUpdates, in seconds */
  pollTimeoutSeconds?: number;
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
}

const UpdateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      chat: z.object({ id: z.number() }),
      text: z.string().optional(),
    })
    .optional(),
  callback_query: z
    .object({
      id: z.string(),
      data: z.string().optional(),
      message: z.object({ chat: z.object({ id: z.number() }) }).optional(),
    })
    .optional(),
});

const ApiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

export type TelegramUpdate = z.infer<typeof UpdateSchema>;

type ReplyMarkup =
  | { keyboard: { text: string }[][]; resize_keyboard: true }
  | { inline_keyboard: { text: string; callback_data: string }[][] };

export const buildReplyMarkup = (keyboard: Keyboard): ReplyMarkup => {
  switch (keyboard) {
    case 'menu':
      return {
        keyboard: [
          [{ text: BUTTONS.analyze }],
          [{ text: BUTTONS.history }, { text: BUTTONS.help }],
          [{ text: BUTTONS.about }],
        ],
        resize_keyboard: true,
      };
    case 'cancel':
      return { keyboard: [[{ text: BUTTONS.cancel }]], resize_keyboard: true };
    case 'periods':
      return {
        inline_keyboard: [
          [
            { text: '📅 30 days', callback_data: '30' },
            { text: '📅 90 days', callback_data: '90' },
          ],
          [{ text: '📅 Whole year', callback_data: '365' }],
        ],
      };
  }
};

/**
 * Minimal Telegram Bot API client over fetch
 */
export class TelegramApi {
  private readonly fetchImpl: typeof fetch;
  private readonly requestTimeoutMs: number;

  constructor(private readonly config: TelegramConfig) {
    this.fetchImpl = config.fetch ?? fetch;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 15000;
  }

  async getUpdates(offset: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const pollTimeout = this.config.pollTimeoutSeconds ?? 30;
    const result = await this.call(
      'getUpdates',
      { offset, timeout: pollTimeout, allowed_updates: ['message', 'callback_query'] },
      pollTimeout * 1000 + this.requestTimeoutMs,
      signal
    );
    return z.array(UpdateSchema).parse(result);
  }

  async sendMessage(chatId: number, reply: BotReply): Promise<void> {
    await this.call(
      'sendMessage',
      {
        chat_id: chatId,
        text: reply.text,
        parse_mode: 'HTML',
        ...(reply.keyboard && { reply_markup: buildReplyMarkup(reply.keyboard) }),
      },
      this.requestTimeoutMs
    );
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    await this.call('answerCallbackQuery', { callback_query_id: callbackQueryId }, this.requestTimeoutMs);
  }

  private async call(
    method: string,
    payload: Record<string, unknown>,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<unknown> {
    const timeout = AbortSignal.timeout(timeoutMs);
    try {
      const response = await this.fetchImpl(`${this.config.apiUrl}/bot${this.config.token}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });

      const body = ApiResponseSchema.parse(await response.json());
      if (!response.ok || !body.ok) {
        throw new UpstreamError('telegram', `Telegram ${method} failed: ${body.description ?? response.statusText}`, {
          method,
          status: response.status,
        });
      }
      return body.result;
    } catch (error) {
      if (error instanceof UpstreamError) throw error;
      if (timeout.aborted && isTimeoutError(error)) {
        throw new UpstreamTimeoutError('telegram', timeoutMs, { method });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError('telegram', `Telegram ${method} failed: ${message}`, { method }, { cause: error });
    }
  }
}

const toEvent = (update: TelegramUpdate): { chatId: number; event: IncomingEvent; callbackId?: string } | null => {
  const callback = update.callback_query;
  if (callback?.message && callback.data !== undefined) {
    return { chatId: callback.message.chat.id, event: { kind: 'callback', data: callback.data }, callbackId: callback.id };
  }
  if (update.message?.text !== undefined) {
    return { chatId: update.message.chat.id, event: { kind: 'text', text: update.message.text } };
  }
  return null;
};

/**
 * Long-polling loop feeding updates into the conversation manager. Updates
 * of one chat are handled in order; different chats run concurrently.
 */
export class TelegramBot {
  private readonly logger: Logger;
  private readonly chains = new Map<number, Promise<void>>();
  private offset = 0;
  private running = false;
  private abortController?: AbortController;
  private loop?: Promise<void>;

  constructor(
    private readonly api: TelegramApi,
    private readonly conversations: ConversationManager,
    logger: Logger,
    private readonly retryDelayMs: number = 5000
  ) {
    this.logger = logger.child({ component: 'telegram-bot' });
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.abortController = new AbortController();
    this.loop = this.pollLoop();
    this.logger.info('Bot started, waiting for messages');
  }

  /**
   * Stop polling and wait for in-flight conversations to finish
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.abortController?.abort();
    await this.loop;
    await Promise.all(this.chains.values());
    this.logger.info('Bot stopped');
  }

  /**
   * Fetch one batch of updates and dispatch them; resolves once the batch
   * has been handed over, not when it has been handled.
   */
  async pollOnce(): Promise<number> {
    const updates = await this.api.getUpdates(this.offset, this.abortController?.signal);
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);
      void this.dispatch(update);
    }
    return updates.length;
  }

  /**
   * Queue an update behind the previous one of the same chat
   */
  dispatch(update: TelegramUpdate): Promise<void> {
    const parsed = toEvent(update);
    if (!parsed) {
      return Promise.resolve();
    }

    const { chatId } = parsed;
    const previous = this.chains.get(chatId) ?? Promise.resolve();
    const next = previous.then(() => this.handleUpdate(parsed.chatId, parsed.event, parsed.callbackId));
    this.chains.set(chatId, next);

    return next.finally(() => {
      if (this.chains.get(chatId) === next) {
        this.chains.delete(chatId);
      }
    });
  }

  private async handleUpdate(chatId: number, event: IncomingEvent, callbackId?: string): Promise<void> {
    try {
      if (callbackId !== undefined) {
        await this.api.answerCallbackQuery(callbackId);
      }
      await this.conversations.handle(chatId, event, reply => this.api.sendMessage(chatId, reply));
    } catch (error) {
      this.logger.error({ err: error, chatId }, 'Failed to handle update');
    }
  }

  private async pollLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        if (!this.running) {
          break;
        }
        this.logger.error({ err: error }, 'Polling failed, retrying');
        await new Promise(resolve => setTimeout(resolve, this.retryDelayMs));
      }
    }
  }
}
