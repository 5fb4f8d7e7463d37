import type { Logger } from '../lib/logger';
import { NotFoundError } from '../lib/errors';
import type { GatewayClient } from '../clients/gateway';
import {
  ABOUT_TEXT,
  BUTTONS,
  WELCOME_TEXT,
  formatAnalysis,
  formatHistory,
  escapeHtml,
} from './messages';

export enum ConversationState {
  Idle = 'idle',
  AwaitingRepo = 'awaiting_repo',
  AwaitingPeriod = 'awaiting_period',
}

export type Session =
  | { state: ConversationState.Idle }
  | { state: ConversationState.AwaitingRepo }
  | { state: ConversationState.AwaitingPeriod; owner: string; repo: string };

export type IncomingEvent =
  | { kind: 'text'; text: string }
  | { kind: 'callback'; data: string };

/** Which keyboard to attach; the transport decides how to render it */
export type Keyboard = 'menu' | 'cancel' | 'periods';

export interface BotReply {
  text: string;
  keyboard?: Keyboard;
}

export type ReplySink = (reply: BotReply) => Promise<void>;

export type BotGateway = Pick<GatewayClient, 'getRepository' | 'analyze' | 'getHistory'>;

export const ANALYSIS_PERIODS: readonly number[] = [30, 90, 365];
export const HISTORY_PREVIEW_SIZE = 5;

const REPO_PATTERN = /^[\w.-]+\/[\w.-]+$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

const IDLE: Session = { state: ConversationState.Idle };

/**
 * Per-chat dialogue: pick a repository, confirm it exists, pick a period,
 * run the analysis. Invalid input keeps the current state and re-prompts.
 */
export class ConversationManager {
  private readonly sessions = new Map<number, Session>();
  private readonly logger: Logger;

  constructor(
    private readonly gateway: BotGateway,
    logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.child({ component: 'conversation' });
  }

  getSession(chatId: number): Session {
    return this.sessions.get(chatId) ?? IDLE;
  }

  async handle(chatId: number, event: IncomingEvent, reply: ReplySink): Promise<void> {
    if (event.kind === 'callback') {
      await this.handleCallback(chatId, event.data, reply);
      return;
    }

    const text = event.text.trim();

    switch (text) {
      case '/start':
      case BUTTONS.help:
        this.sessions.delete(chatId);
        await reply({ text: WELCOME_TEXT, keyboard: 'menu' });
        return;
      case '/cancel':
      case BUTTONS.cancel:
        this.sessions.delete(chatId);
        await reply({ text: 'Action cancelled.', keyboard: 'menu' });
        return;
      case '/analyze':
      case BUTTONS.analyze:
        this.sessions.set(chatId, { state: ConversationState.AwaitingRepo });
        await reply({
          text: 'Enter the repository as <code>owner/repo</code>.\nExample: <code>facebook/react</code> or <code>nodejs/node</code>',
          keyboard: 'cancel',
        });
        return;
      case BUTTONS.history:
        await this.showHistory(reply);
        return;
      case BUTTONS.about:
        await reply({ text: ABOUT_TEXT });
        return;
    }

    const session = this.getSession(chatId);
    switch (session.state) {
      case ConversationState.AwaitingRepo:
        await this.receiveRepo(chatId, text, reply);
        return;
      case ConversationState.AwaitingPeriod:
        await reply({ text: 'Choose an analysis period with the buttons above, or press Cancel.' });
        return;
      case ConversationState.Idle:
        await reply({ text: 'Choose an action from the menu.', keyboard: 'menu' });
        return;
    }
  }

  private async receiveRepo(chatId: number, input: string, reply: ReplySink): Promise<void> {
    if (!REPO_PATTERN.test(input)) {
      await reply({ text: 'Invalid format! Try again (owner/repo):' });
      return;
    }

    const [owner = '', repo = ''] = input.split('/');
    await reply({ text: `Checking <code>${escapeHtml(input)}</code>...` });

    try {
      const lookup = await this.gateway.getRepository(owner, repo);
      if (!lookup.success) {
        await reply({ text: 'Repository not found or unavailable. Check the name:' });
        return;
      }

      this.sessions.set(chatId, { state: ConversationState.AwaitingPeriod, owner, repo });
      await reply({
        text: `Repository found: <b>${escapeHtml(lookup.repo_info.full_name || input)}</b>\nChoose the analysis period:`,
        keyboard: 'periods',
      });
    } catch (error) {
      if (error instanceof NotFoundError) {
        await reply({ text: 'Repository not found or unavailable. Check the name:' });
        return;
      }
      this.logger.error({ err: error, owner, repo }, 'Repository lookup failed');
      await reply({ text: 'The service is temporarily unavailable. Try again later:' });
    }
  }

  private async handleCallback(chatId: number, data: string, reply: ReplySink): Promise<void> {
    const session = this.getSession(chatId);
    if (session.state !== ConversationState.AwaitingPeriod) {
      await reply({ text: 'This selection has expired. Start a new analysis from the menu.', keyboard: 'menu' });
      return;
    }

    const days = Number(data);
    if (!ANALYSIS_PERIODS.includes(days)) {
      await reply({ text: 'Choose one of the offered periods.', keyboard: 'periods' });
      return;
    }

    const { owner, repo } = session;
    this.sessions.delete(chatId);

    await reply({
      text: `Analyzing <code>${escapeHtml(owner)}/${escapeHtml(repo)}</code> over ${days} days...\nAsking the AI service for recommendations, please wait.`,
    });

    const endDate = this.now();
    const startDate = new Date(endDate.getTime() - days * MS_PER_DAY);

    try {
      const result = await this.gateway.analyze({
        owner,
        repo_name: repo,
        start_date: startDate.toISOString(),
        end_date: endDate.toISOString(),
      });

      for (const chunk of formatAnalysis(owner, repo, result)) {
        await reply({ text: chunk });
      }
      await reply({ text: 'What else can I help with?', keyboard: 'menu' });
    } catch (error) {
      this.logger.error({ err: error, owner, repo, days }, 'Analysis request failed');
      const text = error instanceof NotFoundError
        ? 'Repository not found or unavailable.'
        : 'The analysis service is temporarily unavailable. Try again later.';
      await reply({ text, keyboard: 'menu' });
    }
  }

  private async showHistory(reply: ReplySink): Promise<void> {
    await reply({ text: 'Loading recent requests...' });
    try {
      const page = await this.gateway.getHistory(HISTORY_PREVIEW_SIZE, 0);
      await reply({ text: formatHistory(page.history) });
    } catch (error) {
      this.logger.error({ err: error }, 'History request failed');
      await reply({ text: 'History is temporarily unavailable.' });
    }
  }
}
