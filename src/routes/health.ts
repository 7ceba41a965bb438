import { timingSafeEqual } from 'crypto';
import { Router } from 'express';
import TelegramBot from 'node-telegram-bot-api';
import { MessageStore } from '../database/models';
import { DatabaseStatus } from '../database/connection';
import {
  asyncHandler,
  AuthenticationError,
  DatabaseError,
  ValidationError,
} from '../middleware/errorHandler';

export interface BotStatusSource {
  isReady(): boolean;
}

export interface WebhookSink {
  processUpdate(update: TelegramBot.Update): void;
}

export interface WebhookOptions {
  sink: WebhookSink;
  // Echoed by Telegram in the X-Telegram-Bot-Api-Secret-Token header
  secret: string;
}

export interface RouteDependencies {
  messages: MessageStore;
  databaseStatus: () => DatabaseStatus;
  bot: BotStatusSource;
  webhook?: WebhookOptions;
}

export const SECRET_TOKEN_HEADER = 'x-telegram-bot-api-secret-token';

function secretMatches(expected: string, received: string | undefined): boolean {
  if (!received) {
    return false;
  }
  const left = Buffer.from(expected);
  const right = Buffer.from(received);
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

export function createHealthRouter(deps: RouteDependencies): Router {
  const router = Router();

  router.get('/health', (req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      database: deps.databaseStatus(),
      bot: { ready: deps.bot.isReady() },
    });
  });

  // GET /api/stats - totals of captured traffic
  router.get(
    '/api/stats',
    asyncHandler(async (req, res) => {
      const result = await deps.messages.getStatistics();

      if (!result.success || !result.data) {
        throw new DatabaseError('Failed to load statistics');
      }

      res.json({
        chats: result.data.chat_count,
        topics: result.data.topic_count,
        messages: result.data.message_count,
      });
    }),
  );

  return router;
}

export function createWebhookRouter({ sink, secret }: WebhookOptions): Router {
  const router = Router();

  // POST /telegram/webhook - updates pushed by Telegram
  router.post('/telegram/webhook', (req, res) => {
    if (!secretMatches(secret, req.get(SECRET_TOKEN_HEADER))) {
      throw new AuthenticationError('Invalid webhook secret');
    }

    const update: TelegramBot.Update = req.body;
    if (typeof update?.update_id !== 'number') {
      throw new ValidationError('Invalid update payload');
    }

    sink.processUpdate(update);
    res.sendStatus(200);
  });

  return router;
}
