/**
 * CaptureService - logs qualifying group messages into the store.
 * Best-effort: storage failures are logged and the message is dropped.
 */

import { CapturePolicy, RejectReason } from '../capture/CapturePolicy';
import { InboundMessage } from '../bot/types';
import { ChatDirectory, MessageStore } from '../database/models';
import { createLogger, Logger } from '../utils/logger';
import { errorMessage } from '../middleware/errorHandler';

export const UNKNOWN_USER_NAME = 'Desconhecido';

export type CaptureOutcome =
  | { status: 'stored'; messageId: number }
  | { status: 'rejected'; reason: RejectReason }
  | { status: 'failed'; error: string };

export class CaptureService {
  private logger: Logger;

  constructor(
    private policy: CapturePolicy,
    private messages: MessageStore,
    private chats: ChatDirectory,
    private now: () => Date = () => new Date(),
  ) {
    this.logger = createLogger('CaptureService');
  }

  async capture(message: InboundMessage): Promise<CaptureOutcome> {
    const decision = this.policy.evaluate(message);
    if (!decision.accepted) {
      return { status: 'rejected', reason: decision.reason };
    }

    const capturedAt = this.now();

    try {
      const chatResult = await this.chats.upsert({
        chat_id: message.chatId,
        title: message.chatTitle ?? null,
        last_seen: capturedAt,
      });
      if (!chatResult.success) {
        // The registry is best-effort; the message itself is still worth keeping
        this.logger.warn('Chat registry update failed', {
          chatId: message.chatId,
          error: chatResult.error,
        });
      }

      const result = await this.messages.recordMessage({
        chat_id: message.chatId,
        thread_id: message.threadId ?? null,
        user_id: message.userId ?? null,
        user_name: message.userName.trim() || UNKNOWN_USER_NAME,
        text: message.text ?? '',
        created_at: capturedAt,
        sent_at: message.sentAt,
      });

      if (!result.success || !result.data) {
        const error = result.error ?? 'Message was not stored';
        this.logger.warn('Message capture dropped', {
          chatId: message.chatId,
          error,
        });
        return { status: 'failed', error };
      }

      return { status: 'stored', messageId: result.data.message_id };
    } catch (error) {
      this.logger.error('Unexpected capture failure', {
        chatId: message.chatId,
        error: errorMessage(error),
      });
      return { status: 'failed', error: errorMessage(error) };
    }
  }
}
