import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './middleware/errorHandler';
import { LoggingOptions } from './utils/logger';
import { DEFAULT_UTC_OFFSET_MINUTES, offsetTimeZone } from './utils/time';

dotenv.config();

const chatIdSchema = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform((value) => value?.trim());

const envSchema = z.object({
  BOT_TOKEN: z.string().min(1, 'is required'),
  OPENAI_API_KEY: z.string().min(1, 'is required'),
  CONTROL_CHAT_ID: chatIdSchema,
  ADMIN_USER_ID: optionalString.pipe(chatIdSchema.optional()),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  AI_MAX_TOKENS: z.coerce.number().int().positive().default(1500),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  TZ_OFFSET_MINUTES: z.coerce
    .number()
    .int()
    .min(-720)
    .max(840)
    .default(DEFAULT_UTC_OFFSET_MINUTES),
  MAX_SUMMARY_ROWS: z.coerce.number().int().positive().default(4000),
  TOPIC_LOOKBACK_DAYS: z.coerce.number().int().min(1).max(90).default(7),
  SESSION_TTL_MINUTES: z.coerce.number().int().positive().default(15),
  CAPTURE_COMMANDS: booleanFlag.default('false'),
  DIGEST_CRON: optionalString,
  DIGEST_TIMEZONE: optionalString,
  WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  WEBHOOK_SECRET: optionalString.pipe(
    z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,256}$/, 'must be 1-256 characters of A-Z, a-z, 0-9, _ or -')
      .optional(),
  ),
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_SERVICE: z.string().min(1).default('group-digest-bot'),
  LOG_FILE_PATH: z.string().min(1).default('logs/app.log'),
}).superRefine((values, ctx) => {
  if (
    values.DIGEST_CRON &&
    !values.DIGEST_TIMEZONE &&
    !offsetTimeZone(values.TZ_OFFSET_MINUTES)
  ) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DIGEST_TIMEZONE'],
      message: 'is required when TZ_OFFSET_MINUTES is not a whole hour',
    });
  }
  if (values.WEBHOOK_URL && !values.WEBHOOK_SECRET) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['WEBHOOK_SECRET'],
      message: 'is required when WEBHOOK_URL is set',
    });
  }
});

export interface AppConfig {
  botToken: string;
  openaiApiKey: string;
  controlChatId: number;
  adminUserId?: number;
  ai: {
    model: string;
    timeoutMs: number;
    maxTokens: number;
    temperature: number;
  };
  utcOffsetMinutes: number;
  maxSummaryRows: number;
  topicLookbackDays: number;
  sessionTtlMs: number;
  captureCommands: boolean;
  // Present only when DIGEST_CRON is set
  digest?: {
    cron: string;
    timezone: string;
  };
  webhook?: {
    url: string;
    secret: string;
  };
  port: number;
  nodeEnv: string;
  logging: LoggingOptions;
}

type Env = Record<string, string | undefined>;

/**
 * Builds the application config from environment variables.
 * Throws ConfigurationError listing every missing or malformed key.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  // Blank entries in .env count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1].trim().length > 0,
    ),
  );

  const result = envSchema.safeParse({
    ...present,
    CONTROL_CHAT_ID: present.CONTROL_CHAT_ID ?? present.TARGET_CHAT_ID,
  });

  if (!result.success) {
    const keys = result.error.errors.map((issue) => issue.path.join('.'));
    const details = result.error.errors
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`, keys);
  }

  const values = result.data;
  const digestTimezone = values.DIGEST_TIMEZONE ?? offsetTimeZone(values.TZ_OFFSET_MINUTES);

  return {
    botToken: values.BOT_TOKEN,
    openaiApiKey: values.OPENAI_API_KEY,
    controlChatId: values.CONTROL_CHAT_ID,
    adminUserId: values.ADMIN_USER_ID,
    ai: {
      model: values.OPENAI_MODEL,
      timeoutMs: values.AI_TIMEOUT_MS,
      maxTokens: values.AI_MAX_TOKENS,
      temperature: values.AI_TEMPERATURE,
    },
    utcOffsetMinutes: values.TZ_OFFSET_MINUTES,
    maxSummaryRows: values.MAX_SUMMARY_ROWS,
    topicLookbackDays: values.TOPIC_LOOKBACK_DAYS,
    sessionTtlMs: values.SESSION_TTL_MINUTES * 60 * 1000,
    captureCommands: values.CAPTURE_COMMANDS,
    digest:
      values.DIGEST_CRON && digestTimezone
        ? { cron: values.DIGEST_CRON, timezone: digestTimezone }
        : undefined,
    webhook:
      values.WEBHOOK_URL && values.WEBHOOK_SECRET
        ? { url: values.WEBHOOK_URL, secret: values.WEBHOOK_SECRET }
        : undefined,
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    logging: {
      level: values.LOG_LEVEL,
      service: values.LOG_SERVICE,
      filePath: values.LOG_FILE_PATH,
      production: values.NODE_ENV === 'production',
    },
  };
}
