/**
 * CapturePolicy - decides which inbound messages are logged.
 * Rules run in order; the first rejection wins.
 */

import { InboundMessage } from '../bot/types';

export type RejectReason = 'empty-text' | 'not-group' | 'control-chat' | 'command';

export type CaptureDecision =
  | { accepted: true }
  | { accepted: false; reason: RejectReason };

export interface CaptureRule {
  reason: RejectReason;
  /** true when the message passes this rule */
  test(message: InboundMessage): boolean;
}

export interface CapturePolicyConfig {
  controlChatId: number;
  captureCommands?: boolean;
}

const COMMAND_PREFIX = '/';

export const isCommandText = (text: string): boolean =>
  text.trimStart().startsWith(COMMAND_PREFIX);

export class CapturePolicy {
  private readonly rules: CaptureRule[];

  constructor(config: CapturePolicyConfig) {
    this.rules = [
      {
        reason: 'empty-text',
        test: (message) => (message.text ?? '').trim().length > 0,
      },
      {
        reason: 'not-group',
        test: (message) =>
          message.chatKind === 'group' || message.chatKind === 'supergroup',
      },
      {
        reason: 'control-chat',
        test: (message) => message.chatId !== config.controlChatId,
      },
    ];

    if (!config.captureCommands) {
      this.rules.push({
        reason: 'command',
        test: (message) => !isCommandText(message.text ?? ''),
      });
    }
  }

  evaluate(message: InboundMessage): CaptureDecision {
    for (const rule of this.rules) {
      if (!rule.test(message)) {
        return { accepted: false, reason: rule.reason };
      }
    }
    return { accepted: true };
  }

  getRuleReasons(): RejectReason[] {
    return this.rules.map((rule) => rule.reason);
  }
}
