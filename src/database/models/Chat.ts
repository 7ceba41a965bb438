/**
 * Chat registry entry - one row per group the bot has observed
 */

export interface Chat {
  chat_id: number;
  title: string | null;
  last_seen: Date;
}

export interface UpsertChatData {
  chat_id: number;
  title: string | null;
  last_seen: Date;
}
