/**
 * Message model - one captured group chat message
 */

import { TimeRange } from '../../utils/time';

export interface Message {
  message_id: number;
  chat_id: number;
  thread_id: number | null; // null means "no topic"
  user_id: number | null;
  user_name: string;
  text: string;
  created_at: Date; // capture time, drives day-scoped retrieval
  sent_at: Date | null; // platform timestamp
}

export interface CreateMessageData {
  chat_id: number;
  thread_id: number | null;
  user_id: number | null;
  user_name: string;
  text: string;
  created_at: Date;
  sent_at?: Date | null;
}

/**
 * Which threads of a chat a retrieval covers
 */
export type ThreadFilter =
  | { kind: 'all' }
  | { kind: 'none' }
  | { kind: 'thread'; threadId: number };

export interface ThreadActivity {
  thread_id: number | null;
  message_count: number;
}

export interface MessageStatistics {
  chat_count: number;
  topic_count: number;
  message_count: number;
}

export interface DayQuery {
  chatId: number;
  thread: ThreadFilter;
  range: TimeRange;
  limit?: number;
}
