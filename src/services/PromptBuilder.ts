/**
 * PromptBuilder - turns a day of stored messages into the model's input
 */

import { Message } from '../database/models';
import {
  CalendarDay,
  DEFAULT_UTC_OFFSET_MINUTES,
  formatClock,
  formatDay,
} from '../utils/time';
import { collapseWhitespace, truncateText } from '../utils/text';

export const MAX_MESSAGE_CHARS = 400;
export const MAX_PROMPT_CHARS = 12000;
export const TRUNCATION_NOTICE =
  '[Mensagens mais antigas foram cortadas para caber no limite.]';
export const TOPIC_SEPARATOR = '\n\n---\n\n';
export const NO_TOPIC_HEADER = '## Sem tópico';

export const SUMMARY_INSTRUCTIONS = [
  'Você é um assistente que resume conversas de grupos do Telegram.',
  'Com base nas mensagens fornecidas, produza:',
  '1. Um resumo geral, em linguagem simples, do que foi discutido.',
  '2. Um resumo por pessoa, destacando as contribuições de cada participante.',
  '3. Reclamações ou problemas mencionados explicitamente.',
  '4. Ações de acompanhamento sugeridas.',
  'Responda sempre em português do Brasil, mesmo que as mensagens estejam em outro idioma.',
  'Não invente informações que não estejam nas mensagens.',
].join('\n');

const isTopicHeader = (line: string): boolean => line.startsWith('## ');

// Lines of TOPIC_SEPARATOR
const isSeparatorLine = (line: string): boolean => line === '' || line === '---';

export interface PromptContext {
  chatTitle: string;
  day: CalendarDay;
  scope: string;
  groupByTopic: boolean;
}

export interface BuiltPrompt {
  instructions: string;
  prompt: string;
  truncated: boolean;
}

export class PromptBuilder {
  constructor(
    private offsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES,
    private maxPromptChars: number = MAX_PROMPT_CHARS,
  ) {}

  formatLine(message: Message): string {
    const text = truncateText(collapseWhitespace(message.text), MAX_MESSAGE_CHARS);
    return `${formatClock(message.created_at, this.offsetMinutes)} — ${message.user_name}: ${text}`;
  }

  /**
   * Plain transcript, or one block per topic when `groupByTopic` is set
   */
  buildTranscript(messages: Message[], groupByTopic: boolean): string {
    if (!groupByTopic) {
      return messages.map((message) => this.formatLine(message)).join('\n');
    }

    const blocks = new Map<number, string[]>();
    for (const message of messages) {
      const key = message.thread_id ?? 0;
      const lines = blocks.get(key) ?? [];
      lines.push(this.formatLine(message));
      blocks.set(key, lines);
    }

    return [...blocks.entries()]
      .sort(([a], [b]) => a - b)
      .map(([threadId, lines]) => {
        const header = threadId === 0 ? NO_TOPIC_HEADER : `## Tópico #${threadId}`;
        return `${header}\n${lines.join('\n')}`;
      })
      .join(TOPIC_SEPARATOR);
  }

  /**
   * Keeps the newest lines of the transcript. In a grouped transcript the
   * first surviving block keeps its topic header.
   */
  fitTranscript(
    transcript: string,
    groupByTopic: boolean = false,
  ): { text: string; truncated: boolean } {
    if (transcript.length <= this.maxPromptChars) {
      return { text: transcript, truncated: false };
    }

    const lines = transcript.split('\n');
    const headerRoom = groupByTopic
      ? Math.max(0, ...lines.filter(isTopicHeader).map((line) => line.length + 1))
      : 0;
    const budget = this.maxPromptChars - TRUNCATION_NOTICE.length - 1 - headerRoom;

    let start = lines.length;
    let used = 0;
    for (let i = lines.length - 1; i >= 0; i--) {
      const cost = lines[i].length + (start === lines.length ? 0 : 1);
      if (used + cost > budget) {
        break;
      }
      used += cost;
      start = i;
    }

    const kept = lines.slice(start);
    if (groupByTopic) {
      while (kept.length > 0 && isSeparatorLine(kept[0])) {
        kept.shift();
      }
      if (kept.length > 0 && !isTopicHeader(kept[0])) {
        const header = lines.slice(0, start).reverse().find(isTopicHeader);
        if (header) {
          kept.unshift(header);
        }
      }
    }

    return { text: [TRUNCATION_NOTICE, ...kept].join('\n'), truncated: true };
  }

  build(messages: Message[], context: PromptContext): BuiltPrompt {
    const transcript = this.buildTranscript(messages, context.groupByTopic);
    const fitted = this.fitTranscript(transcript, context.groupByTopic);

    const prompt = [
      `Grupo: ${context.chatTitle}`,
      `Data: ${formatDay(context.day)}`,
      `Escopo: ${context.scope}`,
      '',
      'Mensagens:',
      fitted.text,
    ].join('\n');

    return {
      instructions: SUMMARY_INSTRUCTIONS,
      prompt,
      truncated: fitted.truncated,
    };
  }
}
