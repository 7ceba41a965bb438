/**
 * ChatDAO - Data Access Object for the chat registry
 */

import { db } from '../connection';
import {
  Chat,
  ChatDirectory,
  DatabaseResult,
  UpsertChatData,
} from '../models';
import { createLogger, Logger } from '../../utils/logger';
import { errorMessage } from '../../middleware/errorHandler';

export class ChatDAO implements ChatDirectory {
  private logger: Logger;

  constructor() {
    this.logger = createLogger('ChatDAO');
  }

  /**
   * Creates or refreshes a registry entry; the latest observation wins
   */
  async upsert(data: UpsertChatData): Promise<DatabaseResult<Chat>> {
    try {
      const query = `
        INSERT INTO chats (chat_id, title, last_seen)
        VALUES ($1, $2, $3)
        ON CONFLICT (chat_id) DO UPDATE
        SET title = COALESCE(EXCLUDED.title, chats.title),
            last_seen = EXCLUDED.last_seen
        RETURNING *
      `;

      const result = await db.query<Chat>(query, [
        data.chat_id,
        data.title,
        data.last_seen,
      ]);

      return {
        success: true,
        data: result.rows[0],
        affected_rows: result.rowCount || 0,
      };
    } catch (error) {
      this.logger.error('Failed to upsert chat', {
        chatId: data.chat_id,
        error: errorMessage(error),
      });
      return {
        success: false,
        error: errorMessage(error),
      };
    }
  }

  async getById(chatId: number): Promise<DatabaseResult<Chat>> {
    try {
      const result = await db.query<Chat>(
        'SELECT * FROM chats WHERE chat_id = $1',
        [chatId],
      );

      if (result.rows.length === 0) {
        return {
          success: false,
          error: 'Chat not found',
        };
      }

      return {
        success: true,
        data: result.rows[0],
      };
    } catch (error) {
      this.logger.error('Failed to load chat', {
        chatId,
        error: errorMessage(error),
      });
      return {
        success: false,
        error: errorMessage(error),
      };
    }
  }

  /**
   * Known chats, most recently active first
   */
  async list(limit: number = 50): Promise<DatabaseResult<Chat[]>> {
    try {
      const result = await db.query<Chat>(
        `
        SELECT * FROM chats
        ORDER BY last_seen DESC
        LIMIT $1
      `,
        [limit],
      );

      return {
        success: true,
        data: result.rows,
      };
    } catch (error) {
      this.logger.error('Failed to list chats', { error: errorMessage(error) });
      return {
        success: false,
        error: errorMessage(error),
        data: [],
      };
    }
  }
}

export const chatDAO = new ChatDAO();
