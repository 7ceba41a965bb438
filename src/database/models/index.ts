/**
 * Database models index - exports all model types and store contracts
 */

import { TimeRange } from '../../utils/time';
import { Chat, UpsertChatData } from './Chat';
import {
  CreateMessageData,
  DayQuery,
  Message,
  MessageStatistics,
  ThreadActivity,
} from './Message';

export * from './Message';
export * from './Chat';

// Common database result type
export interface DatabaseResult<T = void> {
  success: boolean;
  data?: T;
  error?: string;
  affected_rows?: number;
}

/**
 * Append-only message log
 */
export interface MessageStore {
  recordMessage(data: CreateMessageData): Promise<DatabaseResult<Message>>;
  getMessagesForDay(query: DayQuery): Promise<DatabaseResult<Message[]>>;
  getThreadsForRange(
    chatId: number,
    range: TimeRange,
  ): Promise<DatabaseResult<ThreadActivity[]>>;
  getActiveChatsForDay(range: TimeRange): Promise<DatabaseResult<number[]>>;
  getStatistics(): Promise<DatabaseResult<MessageStatistics>>;
}

/**
 * Registry of known group chats
 */
export interface ChatDirectory {
  upsert(data: UpsertChatData): Promise<DatabaseResult<Chat>>;
  getById(chatId: number): Promise<DatabaseResult<Chat>>;
  list(limit?: number): Promise<DatabaseResult<Chat[]>>;
}
