/**
 * MessageDAO - Data Access Object for captured messages
 */

import { db } from '../connection';
import {
  CreateMessageData,
  DatabaseResult,
  DayQuery,
  Message,
  MessageStatistics,
  MessageStore,
  ThreadActivity,
} from '../models';
import { TimeRange } from '../../utils/time';
import { createLogger, Logger } from '../../utils/logger';
import { errorMessage } from '../../middleware/errorHandler';

export const DEFAULT_DAY_LIMIT = 4000;

export class MessageDAO implements MessageStore {
  private logger: Logger;

  constructor() {
    this.logger = createLogger('MessageDAO');
  }

  /**
   * Appends one message. Duplicates are allowed.
   */
  async recordMessage(data: CreateMessageData): Promise<DatabaseResult<Message>> {
    try {
      const query = `
        INSERT INTO messages (
          chat_id,
          thread_id,
          user_id,
          user_name,
          text,
          created_at,
          sent_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        RETURNING *
      `;

      const values = [
        data.chat_id,
        data.thread_id,
        data.user_id,
        data.user_name,
        data.text,
        data.created_at,
        data.sent_at ?? null,
      ];

      const result = await db.query<Message>(query, values);

      this.logger.debug('Message stored', {
        messageId: result.rows[0]?.message_id,
        chatId: data.chat_id,
        threadId: data.thread_id,
      });

      return {
        success: true,
        data: result.rows[0],
        affected_rows: result.rowCount || 0,
      };
    } catch (error) {
      this.logger.error('Failed to store message', {
        chatId: data.chat_id,
        error: errorMessage(error),
      });
      return {
        success: false,
        error: errorMessage(error),
      };
    }
  }

  /**
   * Messages of one chat within a time range, oldest first.
   * When the range holds more than `limit` rows the most recent ones are kept.
   */
  async getMessagesForDay(query: DayQuery): Promise<DatabaseResult<Message[]>> {
    try {
      const values: unknown[] = [query.chatId, query.range.start, query.range.end];
      let paramIndex = values.length + 1;
      let threadClause = '';

      switch (query.thread.kind) {
        case 'none':
          threadClause = ' AND thread_id IS NULL';
          break;
        case 'thread':
          threadClause = ` AND thread_id = $${paramIndex++}`;
          values.push(query.thread.threadId);
          break;
        case 'all':
          break;
      }

      values.push(query.limit ?? DEFAULT_DAY_LIMIT);

      const sql = `
        SELECT * FROM (
          SELECT *
          FROM messages
          WHERE chat_id = $1
            AND created_at >= $2
            AND created_at < $3${threadClause}
          ORDER BY created_at DESC, message_id DESC
          LIMIT $${paramIndex}
        ) recent
        ORDER BY created_at ASC, message_id ASC
      `;

      const result = await db.query<Message>(sql, values);

      return {
        success: true,
        data: result.rows,
      };
    } catch (error) {
      this.logger.error('Failed to load messages for day', {
        chatId: query.chatId,
        thread: query.thread,
        error: errorMessage(error),
      });
      return {
        success: false,
        error: errorMessage(error),
        data: [],
      };
    }
  }

  /**
   * Threads with at least one message in the range, no-topic first
   */
  async getThreadsForRange(
    chatId: number,
    range: TimeRange,
  ): Promise<DatabaseResult<ThreadActivity[]>> {
    try {
      const query = `
        SELECT thread_id, COUNT(*) AS message_count
        FROM messages
        WHERE chat_id = $1
          AND created_at >= $2
          AND created_at < $3
        GROUP BY thread_id
        ORDER BY thread_id ASC NULLS FIRST
      `;

      const result = await db.query<ThreadActivity>(query, [
        chatId,
        range.start,
        range.end,
      ]);

      return {
        success: true,
        data: result.rows,
      };
    } catch (error) {
      this.logger.error('Failed to list threads', {
        chatId,
        error: errorMessage(error),
      });
      return {
        success: false,
        error: errorMessage(error),
        data: [],
      };
    }
  }

  /**
   * Chats with at least one message in the range
   */
  async getActiveChatsForDay(range: TimeRange): Promise<DatabaseResult<number[]>> {
    try {
      const query = `
        SELECT DISTINCT chat_id
        FROM messages
        WHERE created_at >= $1
          AND created_at < $2
        ORDER BY chat_id
      `;

      const result = await db.query<{ chat_id: number }>(query, [
        range.start,
        range.end,
      ]);

      return {
        success: true,
        data: result.rows.map((row) => row.chat_id),
      };
    } catch (error) {
      this.logger.error('Failed to list active chats', {
        error: errorMessage(error),
      });
      return {
        success: false,
        error: errorMessage(error),
        data: [],
      };
    }
  }

  /**
   * Totals for the operator status readout
   */
  async getStatistics(): Promise<DatabaseResult<MessageStatistics>> {
    try {
      const query = `
        SELECT
          COUNT(DISTINCT chat_id) AS chat_count,
          COUNT(DISTINCT (chat_id, COALESCE(thread_id, 0))) AS topic_count,
          COUNT(*) AS message_count
        FROM messages
      `;

      const result = await db.query<MessageStatistics>(query);
      const row = result.rows[0];

      return {
        success: true,
        data: {
          chat_count: row?.chat_count ?? 0,
          topic_count: row?.topic_count ?? 0,
          message_count: row?.message_count ?? 0,
        },
      };
    } catch (error) {
      this.logger.error('Failed to load message statistics', {
        error: errorMessage(error),
      });
      return {
        success: false,
        error: errorMessage(error),
      };
    }
  }
}

export const messageDAO = new MessageDAO();
