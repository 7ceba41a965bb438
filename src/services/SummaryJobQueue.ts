/**
 * SummaryJobQueue - runs summaries one at a time off the update handler
 * and delivers each outcome to the control chat
 */

import { ChatTransport } from '../bot/types';
import { FAILURE_LABELS } from '../ai/generationErrors';
import { createLogger, Logger } from '../utils/logger';
import { errorMessage } from '../middleware/errorHandler';
import { formatDay } from '../utils/time';
import {
  chatLabel,
  describeScope,
  SummaryOutcome,
  SummaryRequest,
  SummaryService,
} from './SummaryService';

/**
 * Anything that accepts summary requests for later delivery
 */
export interface SummaryEnqueuer {
  enqueue(request: SummaryRequest): void;
}

export class SummaryJobQueue implements SummaryEnqueuer {
  private logger: Logger;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(
    private summaries: SummaryService,
    private transport: ChatTransport,
    private controlChatId: number,
  ) {
    this.logger = createLogger('SummaryJobQueue');
  }

  /**
   * Queues a request and returns immediately
   */
  enqueue(request: SummaryRequest): void {
    this.pending++;
    this.logger.debug('Summary queued', {
      chatId: request.chatId,
      day: formatDay(request.day),
      pending: this.pending,
    });

    this.tail = this.tail
      .then(() => this.run(request))
      .catch((error) => {
        this.logger.error('Summary job crashed', { error: errorMessage(error) });
      })
      .finally(() => {
        this.pending--;
      });
  }

  /**
   * Resolves once every queued job has finished
   */
  async drain(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }

  getPendingCount(): number {
    return this.pending;
  }

  private async run(request: SummaryRequest): Promise<void> {
    const outcome = await this.summaries.summarize(request);
    const text = this.render(request, outcome);

    try {
      await this.transport.sendText(this.controlChatId, text);
    } catch (error) {
      this.logger.error('Failed to deliver summary', {
        chatId: request.chatId,
        status: outcome.status,
        error: errorMessage(error),
      });
    }
  }

  render(request: SummaryRequest, outcome: SummaryOutcome): string {
    const title = chatLabel(request);
    const scope = describeScope(request.thread, request.groupByTopic);
    const day = formatDay(request.day);

    switch (outcome.status) {
      case 'empty':
        return `Nada encontrado para ${title} (${scope}) em ${day}.`;
      case 'failed':
        return `❌ Não foi possível gerar o resumo de ${title} (${FAILURE_LABELS[outcome.category]}).\n${outcome.message}`;
      case 'ok':
        return `📝 Resumo — ${title} — ${scope} — ${day} (${outcome.messageCount} mensagens)\n\n${outcome.text}`;
    }
  }
}
