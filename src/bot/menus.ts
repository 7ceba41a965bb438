/**
 * Inline menus of the selection wizard
 */

import { Chat, ThreadActivity } from '../database/models';
import { truncateText } from '../utils/text';
import { MenuStep } from './callbackData';
import { Menu, MenuButton } from './types';

const TITLE_MAX_LENGTH = 40;

export const TEXTS = {
  chooseChat: 'Escolha um grupo:',
  noChats:
    'Nenhum grupo registrado ainda. Adicione o bot a um grupo e aguarde novas mensagens.',
  chooseMode: 'Escolha o tipo de resumo:',
  chooseTopic: 'Escolha um tópico:',
  chooseDate: 'Escolha a data:',
  datePrompt: 'Digite a data no formato DD/MM/AAAA (ou "hoje" / "ontem"):',
  invalidDate: 'Data inválida. Use DD/MM/AAAA, "hoje" ou "ontem".',
  cancelled: 'Seleção cancelada.',
  sessionExpired: 'Sessão expirada. Use /start para recomeçar.',
  usage: 'Uso: /resumo hoje | ontem | DD/MM/AAAA',
} as const;

const cancelButton: MenuButton = { label: '✖️ Cancelar', action: { type: 'cancel' } };

const backRow = (to: MenuStep): MenuButton[] => [
  { label: '⬅️ Voltar', action: { type: 'back', to } },
  cancelButton,
];

export const chatTitle = (chat: Pick<Chat, 'chat_id' | 'title'>): string =>
  chat.title?.trim() || String(chat.chat_id);

export function chatsMenu(chats: Chat[]): Menu {
  const rows: MenuButton[][] = chats.map((chat) => [
    {
      label: truncateText(chatTitle(chat), TITLE_MAX_LENGTH),
      action: { type: 'chat', chatId: chat.chat_id },
    },
  ]);

  rows.push([{ label: '🔄 Atualizar lista de grupos', action: { type: 'refresh' } }]);
  rows.push([cancelButton]);

  return {
    text: chats.length > 0 ? TEXTS.chooseChat : TEXTS.noChats,
    buttons: rows,
  };
}

export function modesMenu(title: string): Menu {
  return {
    text: `Grupo: ${title}\n${TEXTS.chooseMode}`,
    buttons: [
      [{ label: '📝 Resumo geral', action: { type: 'mode', mode: 'general' } }],
      [{ label: '🧵 Por tópico', action: { type: 'mode', mode: 'topics' } }],
      backRow('chats'),
    ],
  };
}

export function topicsMenu(title: string, threads: ThreadActivity[]): Menu {
  const rows: MenuButton[][] = [
    [{ label: '📋 Todos tópicos', action: { type: 'topic', topic: { kind: 'all' } } }],
  ];

  for (const thread of threads) {
    rows.push([
      thread.thread_id === null
        ? {
            label: `💬 Sem tópico (${thread.message_count})`,
            action: { type: 'topic', topic: { kind: 'none' } },
          }
        : {
            label: `🧵 Tópico #${thread.thread_id} (${thread.message_count})`,
            action: {
              type: 'topic',
              topic: { kind: 'thread', threadId: thread.thread_id },
            },
          },
    ]);
  }

  rows.push(backRow('modes'));

  return { text: `Grupo: ${title}\n${TEXTS.chooseTopic}`, buttons: rows };
}

export function datesMenu(title: string, scope: string, back: MenuStep): Menu {
  return {
    text: `Grupo: ${title}\nEscopo: ${scope}\n${TEXTS.chooseDate}`,
    buttons: [
      [
        { label: '📅 Hoje', action: { type: 'day', daysAgo: 0 } },
        { label: '📅 Ontem', action: { type: 'day', daysAgo: 1 } },
      ],
      [{ label: '✏️ Digitar data', action: { type: 'typeDate' } }],
      backRow(back),
    ],
  };
}

export function closedMenu(text: string): Menu {
  return { text, buttons: [] };
}
