/**
 * DigestService unit tests
 */

import cron from 'node-cron';
import { DigestService } from '../../src/services/DigestService';
import { ConfigurationError } from '../../src/middleware/errorHandler';
import { buildMessage, InMemoryStore, RecordingQueue } from '../helpers/fakes';

jest.mock('node-cron', () => ({
  validate: jest.fn((expression: string) => expression !== 'not a cron'),
  schedule: jest.fn(() => ({ stop: jest.fn() })),
}));

const mockCron = jest.mocked(cron);

const NOW = new Date('2026-02-16T11:00:00.000Z');

describe('DigestService', () => {
  let store: InMemoryStore;
  let queue: RecordingQueue;
  let service: DigestService;

  beforeEach(async () => {
    store = new InMemoryStore();
    queue = new RecordingQueue();
    service = new DigestService(store, store, queue, { now: () => NOW });
    await store.upsert({ chat_id: 100, title: 'Equipe', last_seen: NOW });
    store.messages.push(
      buildMessage({ message_id: 1, chat_id: 100 }),
      buildMessage({ message_id: 2, chat_id: 100, thread_id: 5 }),
      buildMessage({ message_id: 3, chat_id: 200, created_at: new Date('2026-02-16T10:00:00.000Z') }),
    );
  });

  describe('summarizeDay', () => {
    it('should queue one general summary per active chat', async () => {
      const result = await service.summarizeDay({ year: 2026, month: 2, day: 15 });

      expect(result).toEqual({ success: true, data: 1 });
      expect(queue.requests).toEqual([
        {
          chatId: 100,
          chatTitle: 'Equipe',
          day: { year: 2026, month: 2, day: 15 },
          thread: { kind: 'all' },
          groupByTopic: false,
        },
      ]);
    });

    it('should surface storage failures', async () => {
      store.failReads = true;

      await expect(service.summarizeDay({ year: 2026, month: 2, day: 15 })).resolves.toEqual({
        success: false,
        error: 'connection refused',
      });
      expect(queue.requests).toHaveLength(0);
    });
  });

  describe('runScheduled', () => {
    it('should summarize the previous local day', async () => {
      await service.runScheduled();

      expect(queue.requests.map((request) => request.day)).toEqual([
        { year: 2026, month: 2, day: 15 },
      ]);
    });
  });

  describe('schedule', () => {
    it('should register a cron task in the configured timezone', () => {
      service.schedule('0 8 * * *', 'Etc/GMT+3');

      expect(mockCron.schedule).toHaveBeenCalledWith('0 8 * * *', expect.any(Function), {
        timezone: 'Etc/GMT+3',
      });
      expect(service.isScheduled()).toBe(true);

      service.stop();
      expect(service.isScheduled()).toBe(false);
    });

    it('should reject invalid expressions', () => {
      expect(() => service.schedule('not a cron', 'Etc/GMT+3')).toThrow(ConfigurationError);
      expect(mockCron.schedule).not.toHaveBeenCalled();
    });
  });
});
