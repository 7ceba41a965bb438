/**
 * Schema bootstrap. Tables are created up front; later columns are added in place.
 */

import { db } from './connection';
import { createLogger } from '../utils/logger';

const logger = createLogger('Schema');

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS messages (
    message_id BIGSERIAL PRIMARY KEY,
    chat_id BIGINT NOT NULL,
    thread_id BIGINT,
    user_id BIGINT,
    user_name TEXT NOT NULL,
    text TEXT NOT NULL CHECK (length(btrim(text)) > 0),
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `ALTER TABLE messages ADD COLUMN IF NOT EXISTS sent_at TIMESTAMPTZ`,
  `CREATE INDEX IF NOT EXISTS idx_messages_chat_created
    ON messages (chat_id, created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_messages_chat_thread_created
    ON messages (chat_id, thread_id, created_at)`,
  `CREATE TABLE IF NOT EXISTS chats (
    chat_id BIGINT PRIMARY KEY,
    title TEXT,
    last_seen TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
];

export async function migrate(): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.query(statement);
  }
  logger.info('Database schema is up to date', {
    statements: SCHEMA_STATEMENTS.length,
  });
}
