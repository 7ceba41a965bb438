import { SummaryJobQueue } from '../../src/services/SummaryJobQueue';
import { SummaryRequest, SummaryService } from '../../src/services/SummaryService';
import {
  buildMessage,
  FakeGenerator,
  FakeTransport,
  InMemoryStore,
  quotaError,
} from '../helpers/fakes';

const CONTROL_CHAT_ID = -999;

const request: SummaryRequest = {
  chatId: 100,
  chatTitle: 'Equipe',
  day: { year: 2026, month: 2, day: 15 },
  thread: { kind: 'all' },
  groupByTopic: false,
};

describe('SummaryJobQueue', () => {
  let store: InMemoryStore;
  let transport: FakeTransport;

  beforeEach(() => {
    store = new InMemoryStore();
    transport = new FakeTransport();
  });

  const queueWith = (generator: FakeGenerator) =>
    new SummaryJobQueue(new SummaryService(store, generator), transport, CONTROL_CHAT_ID);

  it('should return before the job runs and deliver after drain', async () => {
    store.messages.push(buildMessage());
    const queue = queueWith(new FakeGenerator('Tudo certo'));

    queue.enqueue(request);
    expect(transport.texts).toHaveLength(0);
    expect(queue.getPendingCount()).toBe(1);

    await queue.drain();

    expect(queue.getPendingCount()).toBe(0);
    expect(transport.texts).toEqual([
      {
        chatId: CONTROL_CHAT_ID,
        text: '📝 Resumo — Equipe — geral — 15/02/2026 (1 mensagens)\n\nTudo certo',
        options: undefined,
      },
    ]);
  });

  it('should tell the operator when nothing was found', async () => {
    const queue = queueWith(new FakeGenerator());

    queue.enqueue({ ...request, chatTitle: undefined });
    await queue.drain();

    expect(transport.texts[0].text).toBe('Nada encontrado para 100 (geral) em 15/02/2026.');
  });

  it('should deliver a failure notice', async () => {
    store.messages.push(buildMessage());
    const queue = queueWith(new FakeGenerator('OK', quotaError()));

    queue.enqueue(request);
    await queue.drain();

    expect(transport.texts[0].text).toBe(
      '❌ Não foi possível gerar o resumo de Equipe (cota esgotada).\nA cota da API de IA está esgotada. Verifique o plano e o faturamento.',
    );
  });

  it('should run jobs one at a time in order', async () => {
    store.messages.push(buildMessage(), buildMessage({ message_id: 2, chat_id: 200 }));
    const queue = queueWith(new FakeGenerator());

    queue.enqueue(request);
    queue.enqueue({ ...request, chatId: 200, chatTitle: 'Outro' });
    await queue.drain();

    expect(transport.texts.map((sent) => sent.text.split('\n')[0])).toEqual([
      '📝 Resumo — Equipe — geral — 15/02/2026 (1 mensagens)',
      '📝 Resumo — Outro — geral — 15/02/2026 (1 mensagens)',
    ]);
  });

  it('should keep going when delivery fails', async () => {
    store.messages.push(buildMessage());
    const queue = queueWith(new FakeGenerator());
    jest.spyOn(transport, 'sendText').mockRejectedValueOnce(new Error('Bad Request'));

    queue.enqueue(request);
    queue.enqueue(request);
    await expect(queue.drain()).resolves.toBeUndefined();

    expect(transport.texts).toHaveLength(1);
  });
});
