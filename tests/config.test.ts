import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/middleware/errorHandler';

const baseEnv = {
  BOT_TOKEN: 'test-token',
  OPENAI_API_KEY: 'test-key',
  CONTROL_CHAT_ID: '-1001',
};

describe('loadConfig', () => {
  it('should apply defaults for optional settings', () => {
    const config = loadConfig(baseEnv);

    expect(config.controlChatId).toBe(-1001);
    expect(config.adminUserId).toBeUndefined();
    expect(config.ai).toEqual({
      model: 'gpt-4o-mini',
      timeoutMs: 60000,
      maxTokens: 1500,
      temperature: 0.3,
    });
    expect(config.utcOffsetMinutes).toBe(-180);
    expect(config.maxSummaryRows).toBe(4000);
    expect(config.topicLookbackDays).toBe(7);
    expect(config.sessionTtlMs).toBe(15 * 60 * 1000);
    expect(config.captureCommands).toBe(false);
    expect(config.digest).toBeUndefined();
    expect(config.webhook).toBeUndefined();
    expect(config.port).toBe(3000);
    expect(config.logging).toEqual({
      level: 'info',
      service: 'group-digest-bot',
      filePath: 'logs/app.log',
      production: false,
    });
  });

  it('should accept TARGET_CHAT_ID as an alias', () => {
    const config = loadConfig({
      BOT_TOKEN: 'test-token',
      OPENAI_API_KEY: 'test-key',
      TARGET_CHAT_ID: '-2002',
    });

    expect(config.controlChatId).toBe(-2002);
  });

  it('should parse optional overrides', () => {
    const config = loadConfig({
      ...baseEnv,
      ADMIN_USER_ID: ' 42 ',
      CAPTURE_COMMANDS: 'true',
      SESSION_TTL_MINUTES: '5',
      DIGEST_CRON: '0 8 * * *',
      WEBHOOK_URL: 'https://bot.example.com/telegram/webhook',
      WEBHOOK_SECRET: 'test-secret',
    });

    expect(config.adminUserId).toBe(42);
    expect(config.captureCommands).toBe(true);
    expect(config.sessionTtlMs).toBe(300000);
    expect(config.digest).toEqual({ cron: '0 8 * * *', timezone: 'Etc/GMT+3' });
    expect(config.webhook).toEqual({
      url: 'https://bot.example.com/telegram/webhook',
      secret: 'test-secret',
    });
  });

  it('should require a secret in webhook mode', () => {
    expect.assertions(2);
    try {
      loadConfig({ ...baseEnv, WEBHOOK_URL: 'https://bot.example.com/telegram/webhook' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.keys).toEqual(['WEBHOOK_SECRET']);
      }
    }
  });

  it('should reject secrets Telegram would not accept', () => {
    expect(() =>
      loadConfig({
        ...baseEnv,
        WEBHOOK_URL: 'https://bot.example.com/telegram/webhook',
        WEBHOOK_SECRET: 'has spaces',
      }),
    ).toThrow(ConfigurationError);
  });

  it('should derive the digest timezone from the offset', () => {
    expect(
      loadConfig({ ...baseEnv, DIGEST_CRON: '0 8 * * *', TZ_OFFSET_MINUTES: '120' }).digest,
    ).toEqual({ cron: '0 8 * * *', timezone: 'Etc/GMT-2' });
    expect(
      loadConfig({
        ...baseEnv,
        DIGEST_CRON: '0 8 * * *',
        TZ_OFFSET_MINUTES: '120',
        DIGEST_TIMEZONE: 'Europe/Lisbon',
      }).digest,
    ).toEqual({ cron: '0 8 * * *', timezone: 'Europe/Lisbon' });
  });

  it('should require a timezone for offsets that are not whole hours', () => {
    expect(() =>
      loadConfig({ ...baseEnv, DIGEST_CRON: '0 8 * * *', TZ_OFFSET_MINUTES: '330' }),
    ).toThrow(ConfigurationError);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ ...baseEnv, ADMIN_USER_ID: '', PORT: '  ' });

    expect(config.adminUserId).toBeUndefined();
    expect(config.port).toBe(3000);
  });

  it('should list every missing key', () => {
    expect.assertions(2);
    try {
      loadConfig({ CONTROL_CHAT_ID: '-1001' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.keys).toEqual(['BOT_TOKEN', 'OPENAI_API_KEY']);
      }
    }
  });

  it('should reject malformed values', () => {
    expect(() => loadConfig({ ...baseEnv, CONTROL_CHAT_ID: 'abc' })).toThrow(
      ConfigurationError,
    );
    expect(() => loadConfig({ ...baseEnv, WEBHOOK_URL: 'not-a-url' })).toThrow(
      ConfigurationError,
    );
  });
});
