/**
 * BotController - routes inbound updates: capture first, then operator commands,
 * wizard callbacks and typed dates
 */

import { MessageStore } from '../database/models';
import { CaptureService } from '../services/CaptureService';
import { DigestService } from '../services/DigestService';
import { createLogger, Logger } from '../utils/logger';
import { errorMessage } from '../middleware/errorHandler';
import { DEFAULT_UTC_OFFSET_MINUTES, formatDay } from '../utils/time';
import { ValidationUtils } from '../utils/validation';
import { decodeAction } from './callbackData';
import { TEXTS } from './menus';
import { SelectionFlow } from './SelectionFlow';
import { ChatTransport, InboundCallback, InboundMessage } from './types';

export interface ParsedCommand {
  name: string;
  args: string;
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/;

/**
 * Parses `/name@bot args`; returns null for anything that is not a command
 */
export function parseCommand(text: string | undefined): ParsedCommand | null {
  const match = COMMAND_PATTERN.exec((text ?? '').trim());
  if (!match) {
    return null;
  }
  return { name: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

export interface BotControllerOptions {
  controlChatId: number;
  adminUserId?: number;
  utcOffsetMinutes?: number;
  now?: () => Date;
}

export class BotController {
  private logger: Logger;
  private controlChatId: number;
  private adminUserId?: number;
  private offsetMinutes: number;
  private now: () => Date;

  constructor(
    private capture: CaptureService,
    private flow: SelectionFlow,
    private digest: DigestService,
    private messages: MessageStore,
    private transport: ChatTransport,
    options: BotControllerOptions,
  ) {
    this.logger = createLogger('BotController');
    this.controlChatId = options.controlChatId;
    this.adminUserId = options.adminUserId;
    this.offsetMinutes = options.utcOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Never rejects; failures are logged so the update loop keeps running
   */
  async handleMessage(message: InboundMessage): Promise<void> {
    try {
      await this.capture.capture(message);

      const command = parseCommand(message.text);
      if (command) {
        await this.handleCommand(message, command);
        return;
      }

      if (message.userId !== undefined && this.isOperator(message.chatId, message.userId)) {
        await this.flow.handleDateText(message.userId, message.text ?? '');
      }
    } catch (error) {
      this.logger.error('Failed to handle message', {
        chatId: message.chatId,
        error: errorMessage(error),
      });
    }
  }

  async handleCallback(callback: InboundCallback): Promise<void> {
    try {
      if (!this.isOperator(callback.chatId, callback.userId)) {
        this.logger.debug('Ignoring callback from unauthorized user', {
          chatId: callback.chatId,
          userId: callback.userId,
        });
        return;
      }

      await this.transport.answerCallback(callback.callbackId);

      const action = decodeAction(callback.data);
      if (!action) {
        this.logger.debug('Ignoring unknown callback payload', { data: callback.data });
        return;
      }

      await this.flow.handleAction(callback.userId, callback.messageId, action);
    } catch (error) {
      this.logger.error('Failed to handle callback', {
        chatId: callback.chatId,
        error: errorMessage(error),
      });
    }
  }

  isOperator(chatId: number, userId: number | undefined): boolean {
    if (chatId !== this.controlChatId || userId === undefined) {
      return false;
    }
    return this.adminUserId === undefined || userId === this.adminUserId;
  }

  private async handleCommand(
    message: InboundMessage,
    command: ParsedCommand,
  ): Promise<void> {
    if (command.name === 'id') {
      await this.replyWithIds(message);
      return;
    }

    const operatorId = message.userId;
    if (operatorId === undefined || !this.isOperator(message.chatId, operatorId)) {
      this.logger.debug('Ignoring command from unauthorized user', {
        command: command.name,
        chatId: message.chatId,
        userId: message.userId,
      });
      return;
    }

    switch (command.name) {
      case 'start':
      case 'menu':
        await this.flow.start(operatorId);
        return;
      case 'status':
        await this.replyWithStatus();
        return;
      case 'resumo':
        await this.summarizeDay(command.args);
        return;
      case 'cancelar':
        await this.flow.cancel(operatorId);
        return;
      default:
        this.logger.debug('Unknown command', { command: command.name });
    }
  }

  private async replyWithIds(message: InboundMessage): Promise<void> {
    const lines = [
      `Chat ID: ${message.chatId}`,
      `Tópico: ${message.threadId ?? 'nenhum'}`,
      `Usuário: ${message.userId ?? 'desconhecido'}`,
    ];
    await this.transport.sendText(message.chatId, lines.join('\n'), {
      threadId: message.threadId,
    });
  }

  private async replyWithStatus(): Promise<void> {
    const result = await this.messages.getStatistics();
    if (!result.success || !result.data) {
      await this.transport.sendText(
        this.controlChatId,
        '❌ Não foi possível ler as estatísticas.',
      );
      return;
    }

    const stats = result.data;
    await this.transport.sendText(
      this.controlChatId,
      `📊 Status\n\nGrupos: ${stats.chat_count}\nTópicos: ${stats.topic_count}\nMensagens: ${stats.message_count}`,
    );
  }

  private async summarizeDay(argument: string): Promise<void> {
    const parsed = ValidationUtils.parseDateToken(argument, this.now(), this.offsetMinutes);
    if (!parsed.ok) {
      await this.transport.sendText(this.controlChatId, TEXTS.usage);
      return;
    }

    const day = formatDay(parsed.day);
    const result = await this.digest.summarizeDay(parsed.day);
    if (!result.success) {
      await this.transport.sendText(
        this.controlChatId,
        '❌ Não foi possível ler as mensagens do banco de dados.',
      );
      return;
    }

    const count = result.data ?? 0;
    await this.transport.sendText(
      this.controlChatId,
      count > 0
        ? `⏳ ${count} resumo(s) na fila para ${day}.`
        : `Nada encontrado para ${day}.`,
    );
  }
}
