/**
 * DigestService - queues general summaries for every chat active on a day,
 * on demand (/resumo) or on a daily schedule
 */
import cron, { ScheduledTask } from 'node-cron';
import { ChatDirectory, DatabaseResult, MessageStore } from '../database/models';
import { ConfigurationError, errorMessage } from '../middleware/errorHandler';
import {
  addDays,
  calendarDayOf,
  CalendarDay,
  dayRange,
  DEFAULT_UTC_OFFSET_MINUTES,
  formatDay,
} from '../utils/time';
import { createLogger, Logger } from '../utils/logger';
import { SummaryEnqueuer } from './SummaryJobQueue';

export interface DigestServiceOptions {
  utcOffsetMinutes?: number;
  now?: () => Date;
}

export class DigestService {
  private logger: Logger;
  private offsetMinutes: number;
  private now: () => Date;
  private task?: ScheduledTask;

  constructor(
    private messages: MessageStore,
    private chats: ChatDirectory,
    private queue: SummaryEnqueuer,
    options: DigestServiceOptions = {},
  ) {
    this.logger = createLogger('DigestService');
    this.offsetMinutes = options.utcOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Queues yesterday's digests every time the cron expression fires
   */
  public schedule(cronTime: string, timezone: string): void {
    if (!cron.validate(cronTime)) {
      throw new ConfigurationError(`Invalid DIGEST_CRON expression: ${cronTime}`, [
        'DIGEST_CRON',
      ]);
    }

    this.stop();
    this.logger.info(`Daily digests scheduled at "${cronTime}"`, { timezone });
    this.task = cron.schedule(
      cronTime,
      () => {
        this.runScheduled().catch((error) => {
          this.logger.error('Scheduled digest failed', { error: errorMessage(error) });
        });
      },
      { timezone },
    );
  }

  public stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = undefined;
    }
  }

  public isScheduled(): boolean {
    return this.task !== undefined;
  }

  public async runScheduled(): Promise<DatabaseResult<number>> {
    const yesterday = addDays(calendarDayOf(this.now(), this.offsetMinutes), -1);
    this.logger.info('Starting scheduled digest', { day: formatDay(yesterday) });
    return this.summarizeDay(yesterday);
  }

  /**
   * Queues one general summary per chat with messages on `day`.
   * Resolves to the number of queued summaries.
   */
  public async summarizeDay(day: CalendarDay): Promise<DatabaseResult<number>> {
    const active = await this.messages.getActiveChatsForDay(
      dayRange(day, this.offsetMinutes),
    );

    if (!active.success) {
      this.logger.error('Could not list active chats', {
        day: formatDay(day),
        error: active.error,
      });
      return { success: false, error: active.error };
    }

    const chatIds = active.data ?? [];
    for (const chatId of chatIds) {
      const chat = await this.chats.getById(chatId);
      this.queue.enqueue({
        chatId,
        chatTitle: chat.data?.title ?? undefined,
        day,
        thread: { kind: 'all' },
        groupByTopic: false,
      });
    }

    this.logger.info('Digests queued', { day: formatDay(day), count: chatIds.length });
    return { success: true, data: chatIds.length };
  }
}
