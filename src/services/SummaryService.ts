/**
 * SummaryService - retrieves one day of a chat and asks the generator for a digest
 */

import { SummaryGenerator } from '../ai/SummaryGenerator';
import { classifyGenerationError, FailureCategory } from '../ai/generationErrors';
import { MessageStore, ThreadFilter } from '../database/models';
import { CalendarDay, dayRange, DEFAULT_UTC_OFFSET_MINUTES, formatDay } from '../utils/time';
import { createLogger, Logger } from '../utils/logger';
import { errorMessage } from '../middleware/errorHandler';
import { PromptBuilder } from './PromptBuilder';

export const EMPTY_SUMMARY_TEXT = '⚠️ Resumo vazio.';

export interface SummaryRequest {
  chatId: number;
  chatTitle?: string;
  day: CalendarDay;
  thread: ThreadFilter;
  groupByTopic: boolean;
}

export type SummaryOutcome =
  | { status: 'empty' }
  | { status: 'ok'; text: string; messageCount: number }
  | { status: 'failed'; category: FailureCategory; message: string };

export interface SummaryServiceOptions {
  utcOffsetMinutes?: number;
  maxRows?: number;
}

export function describeScope(thread: ThreadFilter, groupByTopic: boolean): string {
  switch (thread.kind) {
    case 'none':
      return 'sem tópico';
    case 'thread':
      return `tópico #${thread.threadId}`;
    case 'all':
      return groupByTopic ? 'todos os tópicos' : 'geral';
  }
}

export const chatLabel = (request: Pick<SummaryRequest, 'chatId' | 'chatTitle'>): string =>
  request.chatTitle?.trim() || String(request.chatId);

export class SummaryService {
  private logger: Logger;
  private promptBuilder: PromptBuilder;
  private offsetMinutes: number;
  private maxRows: number;

  constructor(
    private messages: MessageStore,
    private generator: SummaryGenerator,
    options: SummaryServiceOptions = {},
  ) {
    this.offsetMinutes = options.utcOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    this.maxRows = options.maxRows ?? 4000;
    this.promptBuilder = new PromptBuilder(this.offsetMinutes);
    this.logger = createLogger('SummaryService');
  }

  async summarize(request: SummaryRequest): Promise<SummaryOutcome> {
    const result = await this.messages.getMessagesForDay({
      chatId: request.chatId,
      thread: request.thread,
      range: dayRange(request.day, this.offsetMinutes),
      limit: this.maxRows,
    });

    if (!result.success) {
      this.logger.error('Message retrieval failed', {
        chatId: request.chatId,
        error: result.error,
      });
      return {
        status: 'failed',
        category: 'storage',
        message: 'Não foi possível ler as mensagens do banco de dados.',
      };
    }

    const rows = result.data ?? [];
    if (rows.length === 0) {
      return { status: 'empty' };
    }

    const built = this.promptBuilder.build(rows, {
      chatTitle: chatLabel(request),
      day: request.day,
      scope: describeScope(request.thread, request.groupByTopic),
      groupByTopic: request.groupByTopic,
    });

    try {
      const generated = await this.generator.generate({
        instructions: built.instructions,
        prompt: built.prompt,
      });

      this.logger.info('Summary generated', {
        chatId: request.chatId,
        day: formatDay(request.day),
        messageCount: rows.length,
        truncated: built.truncated,
      });

      return {
        status: 'ok',
        text: generated.trim() || EMPTY_SUMMARY_TEXT,
        messageCount: rows.length,
      };
    } catch (error) {
      const failure = classifyGenerationError(error);
      this.logger.error('Summary generation failed', {
        chatId: request.chatId,
        category: failure.category,
        error: errorMessage(error),
      });
      return { status: 'failed', ...failure };
    }
  }
}
