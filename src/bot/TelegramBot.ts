/**
 * TelegramBot - node-telegram-bot-api adapter: maps updates to inbound events
 * and implements the outbound chat operations
 */

import TelegramBot from 'node-telegram-bot-api';
import { createLogger, Logger } from '../utils/logger';
import { errorMessage } from '../middleware/errorHandler';
import { splitMessage } from '../utils/text';
import { ValidationUtils } from '../utils/validation';
import { UNKNOWN_USER_NAME } from '../services/CaptureService';
import { encodeAction } from './callbackData';
import {
  ChatTransport,
  InboundCallback,
  InboundMessage,
  Menu,
  SendTextOptions,
} from './types';

export interface BotConfig {
  token: string;
  webhook?: {
    url: string;
    secret: string;
  };
}

export interface UpdateHandler {
  handleMessage(message: InboundMessage): Promise<void>;
  handleCallback(callback: InboundCallback): Promise<void>;
}

export function displayName(user: TelegramBot.User | undefined): string {
  if (!user) {
    return UNKNOWN_USER_NAME;
  }
  const fullName = [user.first_name, user.last_name]
    .filter((part): part is string => Boolean(part && part.trim()))
    .join(' ')
    .trim();
  return fullName || user.username || UNKNOWN_USER_NAME;
}

export function toInboundMessage(msg: TelegramBot.Message): InboundMessage {
  return {
    chatId: msg.chat.id,
    chatKind: msg.chat.type,
    chatTitle: ValidationUtils.sanitizeString(msg.chat.title),
    // Outside forums Telegram also sets message_thread_id on replies
    threadId: msg.is_topic_message ? msg.message_thread_id : undefined,
    userId: msg.from?.id,
    userName: displayName(msg.from),
    text: msg.text,
    sentAt: new Date(msg.date * 1000),
  };
}

export function toInboundCallback(query: TelegramBot.CallbackQuery): InboundCallback | null {
  if (!query.message) {
    return null;
  }
  return {
    callbackId: query.id,
    chatId: query.message.chat.id,
    messageId: query.message.message_id,
    userId: query.from.id,
    data: query.data,
  };
}

export function toInlineKeyboard(menu: Menu): TelegramBot.InlineKeyboardMarkup {
  return {
    inline_keyboard: menu.buttons.map((row) =>
      row.map((button) => ({
        text: button.label,
        callback_data: encodeAction(button.action),
      })),
    ),
  };
}

export class TelegramBotService implements ChatTransport {
  private bot: TelegramBot;
  private logger: Logger;
  private config: BotConfig;
  private isInitialized: boolean = false;
  private handler?: UpdateHandler;

  constructor(botConfig: BotConfig) {
    this.logger = createLogger('TelegramBot');
    this.config = botConfig;

    // Polling starts in initialize(), after the handlers are attached
    this.bot = new TelegramBot(this.config.token, { polling: false });
  }

  setHandler(handler: UpdateHandler): void {
    this.handler = handler;
  }

  async initialize(): Promise<void> {
    try {
      this.logger.info('Initializing Telegram Bot...');

      const botInfo = await this.bot.getMe();
      this.logger.info('Bot initialized successfully', {
        username: botInfo.username,
        id: botInfo.id,
      });

      this.setupUpdateHandlers();

      if (this.config.webhook) {
        await this.bot.setWebHook(this.config.webhook.url, {
          secret_token: this.config.webhook.secret,
        });
        this.logger.info('Webhook set successfully', { url: this.config.webhook.url });
      } else {
        await this.bot.deleteWebHook();
        await this.bot.startPolling();
        this.logger.info('Polling started');
      }

      this.isInitialized = true;
    } catch (error) {
      this.logger.error('Failed to initialize Telegram Bot', { error: errorMessage(error) });
      throw error;
    }
  }

  private setupUpdateHandlers(): void {
    this.bot.on('message', (msg) => {
      this.dispatch('message', () => this.handler?.handleMessage(toInboundMessage(msg)));
    });

    this.bot.on('callback_query', (query) => {
      const callback = toInboundCallback(query);
      if (callback) {
        this.dispatch('callback', () => this.handler?.handleCallback(callback));
      }
    });

    this.bot.on('polling_error', (error) => {
      this.logger.error('Polling error', { error: errorMessage(error) });
    });

    this.bot.on('webhook_error', (error) => {
      this.logger.error('Webhook error', { error: errorMessage(error) });
    });
  }

  private dispatch(kind: string, run: () => Promise<void> | undefined): void {
    Promise.resolve(run()).catch((error) => {
      this.logger.error('Update handler failed', { kind, error: errorMessage(error) });
    });
  }

  /**
   * Feeds an update received over the webhook
   */
  processUpdate(update: TelegramBot.Update): void {
    this.bot.processUpdate(update);
  }

  async sendText(chatId: number, text: string, options: SendTextOptions = {}): Promise<void> {
    for (const chunk of splitMessage(text)) {
      await this.bot.sendMessage(chatId, chunk, {
        disable_web_page_preview: true,
        message_thread_id: options.threadId,
      });
    }
  }

  async sendMenu(chatId: number, menu: Menu): Promise<number> {
    const sent = await this.bot.sendMessage(chatId, menu.text, {
      reply_markup: toInlineKeyboard(menu),
    });
    return sent.message_id;
  }

  async editMenu(chatId: number, messageId: number, menu: Menu): Promise<void> {
    try {
      await this.bot.editMessageText(menu.text, {
        chat_id: chatId,
        message_id: messageId,
        reply_markup: toInlineKeyboard(menu),
      });
    } catch (error) {
      // Re-rendering an identical menu is rejected by the API; nothing to do
      if (errorMessage(error).includes('message is not modified')) {
        return;
      }
      throw error;
    }
  }

  async answerCallback(callbackId: string): Promise<void> {
    await this.bot.answerCallbackQuery(callbackId);
  }

  async stop(): Promise<void> {
    try {
      if (!this.config.webhook && this.bot.isPolling()) {
        await this.bot.stopPolling();
      }
      this.logger.info('Bot stopped successfully');
    } catch (error) {
      this.logger.error('Error stopping bot', { error: errorMessage(error) });
    }
  }

  isReady(): boolean {
    return this.isInitialized;
  }
}
