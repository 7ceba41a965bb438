/**
 * SelectionFlow - the group → mode → topic → date wizard of the control chat
 */

import { ChatDirectory, MessageStore, ThreadActivity } from '../database/models';
import { SummaryEnqueuer } from '../services/SummaryJobQueue';
import { describeScope } from '../services/SummaryService';
import {
  addDays,
  calendarDayOf,
  CalendarDay,
  DEFAULT_UTC_OFFSET_MINUTES,
  formatDay,
  trailingDaysRange,
} from '../utils/time';
import { ValidationUtils } from '../utils/validation';
import { createLogger, Logger } from '../utils/logger';
import { MenuStep, WizardAction } from './callbackData';
import {
  chatsMenu,
  chatTitle,
  closedMenu,
  datesMenu,
  modesMenu,
  TEXTS,
  topicsMenu,
} from './menus';
import { SelectionSession, SessionStore } from './SessionStore';
import { ChatTransport, Menu } from './types';

export interface SelectionFlowOptions {
  controlChatId: number;
  utcOffsetMinutes?: number;
  topicLookbackDays?: number;
  chatListLimit?: number;
  now?: () => Date;
}

export class SelectionFlow {
  private logger: Logger;
  private controlChatId: number;
  private offsetMinutes: number;
  private topicLookbackDays: number;
  private chatListLimit: number;
  private now: () => Date;

  constructor(
    private sessions: SessionStore,
    private chats: ChatDirectory,
    private messages: MessageStore,
    private transport: ChatTransport,
    private queue: SummaryEnqueuer,
    options: SelectionFlowOptions,
  ) {
    this.controlChatId = options.controlChatId;
    this.offsetMinutes = options.utcOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    this.topicLookbackDays = options.topicLookbackDays ?? 7;
    this.chatListLimit = options.chatListLimit ?? 50;
    this.now = options.now ?? (() => new Date());
    this.logger = createLogger('SelectionFlow');
  }

  /**
   * Opens a new wizard, discarding any previous selection of the operator
   */
  async start(operatorId: number): Promise<void> {
    const session = this.sessions.begin(operatorId);
    const menu = await this.buildChatsMenu();
    session.menuMessageId = await this.transport.sendMenu(this.controlChatId, menu);
    this.sessions.save(session);
  }

  async cancel(operatorId: number): Promise<void> {
    const session = this.sessions.get(operatorId);
    this.sessions.clear(operatorId);

    if (session?.menuMessageId !== undefined) {
      await this.transport.editMenu(
        this.controlChatId,
        session.menuMessageId,
        closedMenu(TEXTS.cancelled),
      );
      return;
    }
    await this.transport.sendText(this.controlChatId, TEXTS.cancelled);
  }

  async handleAction(
    operatorId: number,
    messageId: number,
    action: WizardAction,
  ): Promise<void> {
    if (action.type === 'refresh') {
      const session = this.sessions.get(operatorId) ?? this.sessions.begin(operatorId);
      session.menuMessageId = messageId;
      this.sessions.save(session);
      await this.transport.editMenu(this.controlChatId, messageId, await this.buildChatsMenu());
      return;
    }

    if (action.type === 'cancel') {
      this.sessions.clear(operatorId);
      await this.transport.editMenu(this.controlChatId, messageId, closedMenu(TEXTS.cancelled));
      return;
    }

    const session = this.sessions.get(operatorId);
    if (!session) {
      await this.expire(messageId);
      return;
    }
    session.menuMessageId = messageId;

    switch (action.type) {
      case 'chat': {
        const chat = await this.chats.getById(action.chatId);
        session.chatId = action.chatId;
        session.chatTitle = chat.data ? chatTitle(chat.data) : String(action.chatId);
        session.mode = undefined;
        session.topic = undefined;
        session.awaitingDate = false;
        this.sessions.save(session);
        await this.show(session, 'modes');
        return;
      }

      case 'mode':
        if (session.chatId === undefined) {
          await this.expire(messageId);
          return;
        }
        session.mode = action.mode;
        session.topic = action.mode === 'general' ? { kind: 'all' } : undefined;
        session.awaitingDate = false;
        this.sessions.save(session);
        await this.show(session, action.mode === 'general' ? 'dates' : 'topics');
        return;

      case 'topic':
        if (session.chatId === undefined) {
          await this.expire(messageId);
          return;
        }
        session.topic = action.topic;
        session.awaitingDate = false;
        this.sessions.save(session);
        await this.show(session, 'dates');
        return;

      case 'day': {
        const day = addDays(this.today(), -action.daysAgo);
        await this.finish(session, day, true);
        return;
      }

      case 'typeDate':
        if (session.topic === undefined) {
          await this.expire(messageId);
          return;
        }
        session.awaitingDate = true;
        this.sessions.save(session);
        await this.transport.sendText(this.controlChatId, TEXTS.datePrompt);
        return;

      case 'back':
        session.awaitingDate = false;
        this.sessions.save(session);
        await this.show(session, action.to);
        return;
    }
  }

  /**
   * Handles free text from the operator. Returns false when no wizard is
   * waiting for a date, so the text is not meant for the flow.
   */
  async handleDateText(operatorId: number, text: string): Promise<boolean> {
    const session = this.sessions.get(operatorId);
    if (!session || !session.awaitingDate) {
      return false;
    }

    const parsed = ValidationUtils.parseDateToken(text, this.now(), this.offsetMinutes);
    if (!parsed.ok) {
      this.logger.debug('Rejected typed date', { operatorId, error: parsed.error });
      this.sessions.save(session);
      await this.transport.sendText(this.controlChatId, TEXTS.invalidDate);
      return true;
    }

    await this.finish(session, parsed.day, false);
    return true;
  }

  /**
   * A button press closes the menu it came from; a typed date gets the
   * notice as a new message below the operator's text.
   */
  private async finish(
    session: SelectionSession,
    day: CalendarDay,
    fromButton: boolean,
  ): Promise<void> {
    if (session.chatId === undefined || session.topic === undefined) {
      await this.expire(session.menuMessageId);
      return;
    }

    const groupByTopic = session.mode === 'topics' && session.topic.kind === 'all';
    this.queue.enqueue({
      chatId: session.chatId,
      chatTitle: session.chatTitle,
      day,
      thread: session.topic,
      groupByTopic,
    });
    this.sessions.clear(session.operatorId);

    const scope = describeScope(session.topic, groupByTopic);
    const title = session.chatTitle ?? String(session.chatId);
    const notice = `⏳ Gerando resumo de ${title} (${scope}) para ${formatDay(day)}...`;

    if (fromButton && session.menuMessageId !== undefined) {
      await this.transport.editMenu(this.controlChatId, session.menuMessageId, closedMenu(notice));
      return;
    }
    await this.transport.sendText(this.controlChatId, notice);
  }

  private async show(session: SelectionSession, step: MenuStep | 'dates'): Promise<void> {
    const menu = await this.buildMenu(session, step);
    if (!menu) {
      await this.expire(session.menuMessageId);
      return;
    }

    if (session.menuMessageId !== undefined) {
      await this.transport.editMenu(this.controlChatId, session.menuMessageId, menu);
      return;
    }
    session.menuMessageId = await this.transport.sendMenu(this.controlChatId, menu);
    this.sessions.save(session);
  }

  private async buildMenu(
    session: SelectionSession,
    step: MenuStep | 'dates',
  ): Promise<Menu | null> {
    if (step === 'chats') {
      return this.buildChatsMenu();
    }

    if (session.chatId === undefined) {
      return null;
    }
    const title = session.chatTitle ?? String(session.chatId);

    switch (step) {
      case 'modes':
        return modesMenu(title);
      case 'topics':
        return topicsMenu(title, await this.loadThreads(session.chatId));
      case 'dates':
        if (session.topic === undefined) {
          return null;
        }
        return datesMenu(
          title,
          describeScope(session.topic, session.mode === 'topics' && session.topic.kind === 'all'),
          session.mode === 'topics' ? 'topics' : 'modes',
        );
    }
  }

  private async buildChatsMenu(): Promise<Menu> {
    const result = await this.chats.list(this.chatListLimit);
    if (!result.success) {
      this.logger.warn('Could not list chats', { error: result.error });
    }
    return chatsMenu(result.data ?? []);
  }

  private async loadThreads(chatId: number): Promise<ThreadActivity[]> {
    const range = trailingDaysRange(this.today(), this.topicLookbackDays, this.offsetMinutes);
    const result = await this.messages.getThreadsForRange(chatId, range);
    if (!result.success) {
      this.logger.warn('Could not list topics', { chatId, error: result.error });
    }
    return result.data ?? [];
  }

  private async expire(messageId: number | undefined): Promise<void> {
    if (messageId !== undefined) {
      await this.transport.editMenu(
        this.controlChatId,
        messageId,
        closedMenu(TEXTS.sessionExpired),
      );
      return;
    }
    await this.transport.sendText(this.controlChatId, TEXTS.sessionExpired);
  }

  private today(): CalendarDay {
    return calendarDayOf(this.now(), this.offsetMinutes);
  }
}
