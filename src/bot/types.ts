/**
 * Platform-neutral shapes of inbound updates and outbound operations
 */

import { WizardAction } from './callbackData';

export type ChatKind = 'private' | 'group' | 'supergroup' | 'channel';

export interface InboundMessage {
  chatId: number;
  chatKind: ChatKind;
  chatTitle?: string;
  threadId?: number;
  userId?: number;
  userName: string;
  text?: string;
  sentAt: Date;
}

export interface InboundCallback {
  callbackId: string;
  chatId: number;
  messageId: number;
  userId: number;
  data?: string;
}

export interface MenuButton {
  label: string;
  action: WizardAction;
}

export interface Menu {
  text: string;
  buttons: MenuButton[][];
}

export interface SendTextOptions {
  threadId?: number;
}

/**
 * Outbound side of the chat platform
 */
export interface ChatTransport {
  /** Sends text, split into as many messages as the platform limit needs */
  sendText(chatId: number, text: string, options?: SendTextOptions): Promise<void>;
  /** Returns the id of the sent menu message */
  sendMenu(chatId: number, menu: Menu): Promise<number>;
  editMenu(chatId: number, messageId: number, menu: Menu): Promise<void>;
  answerCallback(callbackId: string): Promise<void>;
}
