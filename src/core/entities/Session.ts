/**
 * Session entity - one ongoing conversation with a suspected scammer
 */

import { v4 as uuid } from 'uuid';
import { IndicatorSet } from './IndicatorSet.js';
import { MessageEntity } from './Message.js';
import type { ConversationMessage, MessageRole, SessionSnapshot } from './types.js';

export type Clock = () => number;

export interface SessionOptions {
  id?: string;
  clock?: Clock;
}

const SPEAKER_LABELS: Record<MessageRole, string> = {
  counterparty: 'Scammer',
  agent: 'You',
};

export class ConversationSession {
  public readonly id: string;
  public readonly createdAt: Date;
  private _lastActivityAt: Date;
  private readonly messages: MessageEntity[] = [];
  private readonly indicators = new IndicatorSet();
  private readonly keywords = new Set<string>();
  private _scamDetected = false;
  private _scamConfidence = 0;
  private readonly clock: Clock;

  constructor(options: SessionOptions = {}) {
    this.id = options.id ?? uuid();
    this.clock = options.clock ?? Date.now;
    this.createdAt = new Date(this.clock());
    this._lastActivityAt = this.createdAt;
  }

  get lastActivityAt(): Date {
    return this._lastActivityAt;
  }

  get messageCount(): number {
    return this.messages.length;
  }

  get scamDetected(): boolean {
    return this._scamDetected;
  }

  /**
   * Add a message to the log and refresh the activity timestamp
   */
  append(role: MessageRole, content: string): ConversationMessage {
    const now = new Date(this.clock());
    const message = new MessageEntity(role, content, now);
    this.messages.push(message);
    this._lastActivityAt = now;
    return message;
  }

  /**
   * Union extracted indicators into the running total.
   *
   * @returns number of values that were not already held
   */
  accumulate(indicators: unknown): number {
    return this.indicators.union(indicators);
  }

  /**
   * Raise the sticky scam flag. Confidence only ever moves up.
   */
  markScam(confidence: number, keywords: Iterable<string> = []): void {
    this._scamDetected = true;
    this._scamConfidence = Math.max(this._scamConfidence, confidence);
    for (const keyword of keywords) {
      this.keywords.add(keyword);
    }
  }

  /**
   * Last `maxMessages` messages as speaker-labelled lines, oldest first
   */
  contextWindow(maxMessages: number): string {
    if (maxMessages <= 0) return '';
    return this.messages
      .slice(-maxMessages)
      .map((m) => `${SPEAKER_LABELS[m.role]}: ${m.content}`)
      .join('\n');
  }

  isExpired(timeoutMs: number, now: number = this.clock()): boolean {
    return now > this._lastActivityAt.getTime() + timeoutMs;
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      createdAt: this.createdAt,
      lastActivityAt: this._lastActivityAt,
      messages: Object.freeze([...this.messages]),
      indicators: this.indicators.toRecord(),
      scamDetected: this._scamDetected,
      scamConfidence: this._scamConfidence,
      suspiciousKeywords: [...this.keywords],
    };
  }

  toJSON(): Record<string, unknown> {
    const snapshot = this.snapshot();
    return {
      ...snapshot,
      messages: this.messages.map((m) => m.toJSON()),
      createdAt: snapshot.createdAt.toISOString(),
      lastActivityAt: snapshot.lastActivityAt.toISOString(),
    };
  }
}
