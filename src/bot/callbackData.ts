/**
 * Wizard actions carried in inline button payloads.
 * Encoded as short JSON tuples; Telegram caps callback_data at 64 bytes.
 */

import { z } from 'zod';

export const CALLBACK_DATA_MAX_BYTES = 64;

export type SummaryMode = 'general' | 'topics';

export type TopicChoice =
  | { kind: 'all' }
  | { kind: 'none' }
  | { kind: 'thread'; threadId: number };

export type MenuStep = 'chats' | 'modes' | 'topics';

export type WizardAction =
  | { type: 'refresh' }
  | { type: 'chat'; chatId: number }
  | { type: 'mode'; mode: SummaryMode }
  | { type: 'topic'; topic: TopicChoice }
  | { type: 'day'; daysAgo: 0 | 1 }
  | { type: 'typeDate' }
  | { type: 'back'; to: MenuStep }
  | { type: 'cancel' };

type Payload = [string] | [string, string | number];

const topicFromValue = (value: 'all' | 'none' | number): TopicChoice => {
  if (typeof value === 'number') {
    return { kind: 'thread', threadId: value };
  }
  return value === 'all' ? { kind: 'all' } : { kind: 'none' };
};

const payloadSchema = z.union([
  z.tuple([z.literal('r')]).transform((): WizardAction => ({ type: 'refresh' })),
  z
    .tuple([z.literal('g'), z.number().int()])
    .transform(([, chatId]): WizardAction => ({ type: 'chat', chatId })),
  z
    .tuple([z.literal('m'), z.enum(['general', 'topics'])])
    .transform(([, mode]): WizardAction => ({ type: 'mode', mode })),
  z
    .tuple([z.literal('t'), z.union([z.enum(['all', 'none']), z.number().int()])])
    .transform(([, value]): WizardAction => ({
      type: 'topic',
      topic: topicFromValue(value),
    })),
  z
    .tuple([z.literal('d'), z.union([z.literal(0), z.literal(1)])])
    .transform(([, daysAgo]): WizardAction => ({ type: 'day', daysAgo })),
  z.tuple([z.literal('dt')]).transform((): WizardAction => ({ type: 'typeDate' })),
  z
    .tuple([z.literal('b'), z.enum(['chats', 'modes', 'topics'])])
    .transform(([, to]): WizardAction => ({ type: 'back', to })),
  z.tuple([z.literal('x')]).transform((): WizardAction => ({ type: 'cancel' })),
]);

function toPayload(action: WizardAction): Payload {
  switch (action.type) {
    case 'refresh':
      return ['r'];
    case 'chat':
      return ['g', action.chatId];
    case 'mode':
      return ['m', action.mode];
    case 'topic':
      return [
        't',
        action.topic.kind === 'thread' ? action.topic.threadId : action.topic.kind,
      ];
    case 'day':
      return ['d', action.daysAgo];
    case 'typeDate':
      return ['dt'];
    case 'back':
      return ['b', action.to];
    case 'cancel':
      return ['x'];
  }
}

export function encodeAction(action: WizardAction): string {
  const encoded = JSON.stringify(toPayload(action));
  if (Buffer.byteLength(encoded, 'utf8') > CALLBACK_DATA_MAX_BYTES) {
    throw new Error(`Callback payload too long: ${encoded}`);
  }
  return encoded;
}

/**
 * Returns null for anything that is not a payload this bot produced
 */
export function decodeAction(data: string | undefined): WizardAction | null {
  if (!data) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return null;
  }

  const parsed = payloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
