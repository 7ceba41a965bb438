/**
 * BotController tests - authorization, commands and capture routing
 */

import { BotController, parseCommand } from '../../src/bot/BotController';
import { SelectionFlow } from '../../src/bot/SelectionFlow';
import { SessionStore } from '../../src/bot/SessionStore';
import { TEXTS } from '../../src/bot/menus';
import { InboundMessage } from '../../src/bot/types';
import { encodeAction } from '../../src/bot/callbackData';
import { CapturePolicy } from '../../src/capture/CapturePolicy';
import { CaptureService } from '../../src/services/CaptureService';
import { DigestService } from '../../src/services/DigestService';
import { buildMessage, FakeTransport, InMemoryStore, RecordingQueue } from '../helpers/fakes';

const CONTROL_CHAT_ID = -999;
const ADMIN_ID = 7;
const NOW = new Date('2026-02-15T15:00:00.000Z');

describe('parseCommand', () => {
  it('should split name and arguments', () => {
    expect(parseCommand('/resumo  ontem ')).toEqual({ name: 'resumo', args: 'ontem' });
    expect(parseCommand('/Start@GroupDigestBot')).toEqual({ name: 'start', args: '' });
  });

  it('should ignore plain text', () => {
    expect(parseCommand('bom dia')).toBeNull();
    expect(parseCommand(undefined)).toBeNull();
    expect(parseCommand('/')).toBeNull();
  });
});

describe('BotController', () => {
  let store: InMemoryStore;
  let transport: FakeTransport;
  let sessions: SessionStore;
  let queue: RecordingQueue;
  let flow: SelectionFlow;

  const buildController = (adminUserId?: number) => {
    const capture = new CaptureService(
      new CapturePolicy({ controlChatId: CONTROL_CHAT_ID }),
      store,
      store,
      () => NOW,
    );
    const digest = new DigestService(store, store, queue, { now: () => NOW });
    return new BotController(capture, flow, digest, store, transport, {
      controlChatId: CONTROL_CHAT_ID,
      adminUserId,
      now: () => NOW,
    });
  };

  const operatorMessage = (text: string, overrides: Partial<InboundMessage> = {}): InboundMessage => ({
    chatId: CONTROL_CHAT_ID,
    chatKind: 'supergroup',
    chatTitle: 'Controle',
    userId: ADMIN_ID,
    userName: 'Operador',
    text,
    sentAt: NOW,
    ...overrides,
  });

  beforeEach(async () => {
    store = new InMemoryStore();
    transport = new FakeTransport();
    sessions = new SessionStore(60_000, () => NOW.getTime());
    queue = new RecordingQueue();
    flow = new SelectionFlow(sessions, store, store, transport, queue, {
      controlChatId: CONTROL_CHAT_ID,
      now: () => NOW,
    });
    await store.upsert({ chat_id: 100, title: 'Equipe', last_seen: NOW });
  });

  describe('authorization', () => {
    it('should drop /start from a non-operator in the control chat', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(operatorMessage('/start', { userId: 8 }));

      expect(transport.outboundCount()).toBe(0);
      expect(sessions.size()).toBe(0);
      expect(store.messages).toHaveLength(0);
    });

    it('should drop operator commands outside the control chat', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(operatorMessage('/start', { chatId: 100 }));
      await controller.handleMessage(operatorMessage('/status', { chatId: 100 }));

      expect(transport.outboundCount()).toBe(0);
      expect(sessions.size()).toBe(0);
    });

    it('should trust every control chat member when no admin is set', async () => {
      const controller = buildController();

      await controller.handleMessage(operatorMessage('/start', { userId: 8 }));

      expect(transport.menus).toHaveLength(1);
      expect(sessions.get(8)).toBeDefined();
    });

    it('should not answer callbacks from non-operators', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleCallback({
        callbackId: 'cb-1',
        chatId: CONTROL_CHAT_ID,
        messageId: 500,
        userId: 8,
        data: encodeAction({ type: 'refresh' }),
      });

      expect(transport.outboundCount()).toBe(0);
      expect(sessions.size()).toBe(0);
    });
  });

  describe('commands', () => {
    it('should open the wizard on /start and /menu', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(operatorMessage('/start'));
      await controller.handleMessage(operatorMessage('/menu@GroupDigestBot'));

      expect(transport.menus).toHaveLength(2);
      expect(transport.menus[1].menu.text).toBe('Escolha um grupo:');
    });

    it('should echo ids to anyone, in the same topic', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(
        operatorMessage('/id', { chatId: 100, userId: 55, threadId: 3 }),
      );

      expect(transport.texts).toEqual([
        {
          chatId: 100,
          text: 'Chat ID: 100\nTópico: 3\nUsuário: 55',
          options: { threadId: 3 },
        },
      ]);
    });

    it('should report capture totals on /status', async () => {
      store.messages.push(
        buildMessage({ message_id: 1 }),
        buildMessage({ message_id: 2, thread_id: 4 }),
        buildMessage({ message_id: 3, thread_id: 4 }),
      );
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(operatorMessage('/status'));

      expect(transport.texts[0].text).toBe('📊 Status\n\nGrupos: 1\nTópicos: 2\nMensagens: 3');
    });

    it('should show usage for /resumo without a valid day', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(operatorMessage('/resumo'));
      await controller.handleMessage(operatorMessage('/resumo amanhã'));

      expect(transport.texts.map((sent) => sent.text)).toEqual([TEXTS.usage, TEXTS.usage]);
      expect(queue.requests).toHaveLength(0);
    });

    it('should queue a general summary per active chat on /resumo', async () => {
      store.messages.push(buildMessage({ chat_id: 100 }), buildMessage({ message_id: 2, chat_id: 300 }));
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(operatorMessage('/resumo hoje'));

      expect(queue.requests.map((request) => [request.chatId, request.chatTitle])).toEqual([
        [100, 'Equipe'],
        [300, undefined],
      ]);
      expect(transport.texts[0].text).toBe('⏳ 2 resumo(s) na fila para 15/02/2026.');
    });

    it('should say when /resumo finds nothing', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(operatorMessage('/resumo 01/01/2026'));

      expect(transport.texts[0].text).toBe('Nada encontrado para 01/01/2026.');
    });

    it('should cancel the wizard on /cancelar', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage(operatorMessage('/start'));
      await controller.handleMessage(operatorMessage('/cancelar'));

      expect(sessions.size()).toBe(0);
      expect(transport.lastEdit()?.menu.text).toBe(TEXTS.cancelled);
    });
  });

  describe('routing', () => {
    it('should capture group traffic silently', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleMessage({
        chatId: 100,
        chatKind: 'group',
        chatTitle: 'Equipe',
        userId: 1,
        userName: 'Alice',
        text: 'ping',
        sentAt: NOW,
      });

      expect(store.messages).toHaveLength(1);
      expect(transport.outboundCount()).toBe(0);
    });

    it('should answer operator callbacks and drive the wizard', async () => {
      const controller = buildController(ADMIN_ID);
      await controller.handleMessage(operatorMessage('/start'));
      const messageId = transport.menus[0].messageId;

      await controller.handleCallback({
        callbackId: 'cb-1',
        chatId: CONTROL_CHAT_ID,
        messageId,
        userId: ADMIN_ID,
        data: encodeAction({ type: 'chat', chatId: 100 }),
      });

      expect(transport.answered).toEqual(['cb-1']);
      expect(sessions.get(ADMIN_ID)?.chatId).toBe(100);
    });

    it('should ignore undecodable callback payloads', async () => {
      const controller = buildController(ADMIN_ID);

      await controller.handleCallback({
        callbackId: 'cb-2',
        chatId: CONTROL_CHAT_ID,
        messageId: 1,
        userId: ADMIN_ID,
        data: 'grp:100',
      });

      expect(transport.answered).toEqual(['cb-2']);
      expect(transport.edits).toHaveLength(0);
    });

    it('should feed operator free text to the date step', async () => {
      const controller = buildController(ADMIN_ID);
      await controller.handleMessage(operatorMessage('/start'));
      const messageId = transport.menus[0].messageId;
      await flow.handleAction(ADMIN_ID, messageId, { type: 'chat', chatId: 100 });
      await flow.handleAction(ADMIN_ID, messageId, { type: 'mode', mode: 'general' });
      await flow.handleAction(ADMIN_ID, messageId, { type: 'typeDate' });

      await controller.handleMessage(operatorMessage('ontem'));

      expect(queue.requests[0].day).toEqual({ year: 2026, month: 2, day: 14 });
    });

    it('should never reject when a handler fails', async () => {
      const controller = buildController(ADMIN_ID);
      jest.spyOn(transport, 'sendMenu').mockRejectedValueOnce(new Error('Forbidden'));

      await expect(controller.handleMessage(operatorMessage('/start'))).resolves.toBeUndefined();
    });
  });
});
