import { Server } from 'http';
import { loadConfig, AppConfig } from './config';
import { createApp } from './app';
import { db } from './database/connection';
import { migrate } from './database/schema';
import { chatDAO, messageDAO } from './database/dao';
import { OpenAISummaryGenerator } from './ai/SummaryGenerator';
import { CapturePolicy } from './capture/CapturePolicy';
import { CaptureService } from './services/CaptureService';
import { SummaryService } from './services/SummaryService';
import { SummaryJobQueue } from './services/SummaryJobQueue';
import { DigestService } from './services/DigestService';
import { SessionStore } from './bot/SessionStore';
import { SelectionFlow } from './bot/SelectionFlow';
import { BotController } from './bot/BotController';
import { TelegramBotService } from './bot/TelegramBot';
import { ConfigurationError, errorMessage } from './middleware/errorHandler';
import { configureLogger, createLogger } from './utils/logger';

const logger = createLogger('Main');

interface Runtime {
  bot: TelegramBotService;
  queue: SummaryJobQueue;
  digest: DigestService;
  server: Server;
}

async function start(config: AppConfig): Promise<Runtime> {
  await db.connect();
  await migrate();

  const bot = new TelegramBotService({
    token: config.botToken,
    webhook: config.webhook,
  });

  const generator = new OpenAISummaryGenerator({
    apiKey: config.openaiApiKey,
    ...config.ai,
  });
  const summaries = new SummaryService(messageDAO, generator, {
    utcOffsetMinutes: config.utcOffsetMinutes,
    maxRows: config.maxSummaryRows,
  });
  const queue = new SummaryJobQueue(summaries, bot, config.controlChatId);
  const digest = new DigestService(messageDAO, chatDAO, queue, {
    utcOffsetMinutes: config.utcOffsetMinutes,
  });

  const capture = new CaptureService(
    new CapturePolicy({
      controlChatId: config.controlChatId,
      captureCommands: config.captureCommands,
    }),
    messageDAO,
    chatDAO,
  );
  const flow = new SelectionFlow(
    new SessionStore(config.sessionTtlMs),
    chatDAO,
    messageDAO,
    bot,
    queue,
    {
      controlChatId: config.controlChatId,
      utcOffsetMinutes: config.utcOffsetMinutes,
      topicLookbackDays: config.topicLookbackDays,
    },
  );

  bot.setHandler(
    new BotController(capture, flow, digest, messageDAO, bot, {
      controlChatId: config.controlChatId,
      adminUserId: config.adminUserId,
      utcOffsetMinutes: config.utcOffsetMinutes,
    }),
  );

  const app = createApp({
    messages: messageDAO,
    databaseStatus: () => db.getStatus(),
    bot,
    webhook: config.webhook ? { sink: bot, secret: config.webhook.secret } : undefined,
  });

  const server = app.listen(config.port, () => {
    logger.info(`🚀 Server is running on port ${config.port}`);
    logger.info(`📝 Environment: ${config.nodeEnv}`);
  });

  await bot.initialize();

  if (config.digest) {
    digest.schedule(config.digest.cron, config.digest.timezone);
  }

  logger.info('Bot is running', {
    controlChatId: config.controlChatId,
    mode: config.webhook ? 'webhook' : 'polling',
  });

  return { bot, queue, digest, server };
}

async function shutdown(runtime: Runtime, signal: string): Promise<void> {
  logger.info(`📊 Received ${signal}. Starting graceful shutdown...`);

  // Force shutdown after 10 seconds
  const forceExit = setTimeout(() => {
    logger.error('❌ Forced shutdown after timeout');
    process.exit(1);
  }, 10000);
  forceExit.unref();

  runtime.digest.stop();
  await runtime.bot.stop();
  await runtime.queue.drain();
  await new Promise<void>((resolve) => runtime.server.close(() => resolve()));
  logger.info('✅ HTTP server closed');
  await db.disconnect();
  process.exit(0);
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message, { keys: error.keys });
      process.exit(1);
    }
    throw error;
  }

  configureLogger(config.logging);
  const runtime = await start(config);

  const onSignal = (signal: string) => {
    shutdown(runtime, signal).catch((error) => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
});

main().catch((error) => {
  logger.error('Failed to start', { error: errorMessage(error) });
  process.exit(1);
});
