/**
 * SessionStore - in-memory wizard state per operator, expiring after inactivity
 */

import { SummaryMode, TopicChoice } from './callbackData';

export interface SelectionSession {
  operatorId: number;
  chatId?: number;
  chatTitle?: string;
  mode?: SummaryMode;
  topic?: TopicChoice;
  awaitingDate: boolean;
  menuMessageId?: number;
  updatedAt: number;
}

export const DEFAULT_SESSION_TTL_MS = 15 * 60 * 1000;

export class SessionStore {
  private sessions = new Map<number, SelectionSession>();

  constructor(
    private ttlMs: number = DEFAULT_SESSION_TTL_MS,
    private now: () => number = () => Date.now(),
  ) {}

  /**
   * Starts a fresh session, replacing any previous one
   */
  begin(operatorId: number): SelectionSession {
    const session: SelectionSession = {
      operatorId,
      awaitingDate: false,
      updatedAt: this.now(),
    };
    this.sessions.set(operatorId, session);
    return session;
  }

  get(operatorId: number): SelectionSession | undefined {
    const session = this.sessions.get(operatorId);
    if (!session) {
      return undefined;
    }
    if (this.isExpired(session)) {
      this.sessions.delete(operatorId);
      return undefined;
    }
    return session;
  }

  save(session: SelectionSession): void {
    session.updatedAt = this.now();
    this.sessions.set(session.operatorId, session);
  }

  clear(operatorId: number): boolean {
    return this.sessions.delete(operatorId);
  }

  /**
   * Number of live sessions; expired ones are pruned first
   */
  size(): number {
    for (const [operatorId, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(operatorId);
      }
    }
    return this.sessions.size;
  }

  private isExpired(session: SelectionSession): boolean {
    return this.now() - session.updatedAt > this.ttlMs;
  }
}
