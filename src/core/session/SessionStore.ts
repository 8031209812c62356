/**
 * SessionStore - owns every live conversation session.
 *
 * Resolves which session an inbound turn belongs to (explicit id, then the
 * caller's identity binding, then a fresh session), expires idle sessions
 * lazily on each lookup, and finalizes sessions on the way out by re-running
 * extraction over every message of the transcript.
 *
 * All operations are synchronous, so a lookup and the create-if-absent
 * branch that follows it never interleave with another request.
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuid } from 'uuid';
import { ConversationSession, type Clock } from '../entities/Session.js';
import type { IndicatorExtractorLike, SessionEndResult } from '../entities/types.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';

export const DEFAULT_SESSION_TIMEOUT_MS = 30 * 60 * 1000;

export interface SessionStoreOptions {
  /** Inactivity window after which a session is reclaimed */
  timeoutMs?: number;
  /** Used for the final pass over a finished transcript */
  extractor?: IndicatorExtractorLike;
  logger?: Logger;
  clock?: Clock;
  idGenerator?: () => string;
}

export interface GetOrCreateRequest {
  explicitId?: string;
  callerIdentity?: string;
}

export interface SessionLookup {
  id: string;
  session: ConversationSession;
  created: boolean;
}

export interface SessionStoreEvents {
  'session:created': (session: ConversationSession) => void;
  'session:ended': (result: SessionEndResult) => void;
  'session:expired': (result: SessionEndResult) => void;
}

export class SessionStore extends EventEmitter<SessionStoreEvents> {
  private readonly sessions = new Map<string, ConversationSession>();
  /** caller-requested id → server-minted session id */
  private readonly aliases = new Map<string, string>();
  /** caller identity → active session id */
  private readonly bindings = new Map<string, string>();

  private readonly timeoutMs: number;
  private readonly extractor?: IndicatorExtractorLike;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly idGenerator: () => string;

  constructor(options: SessionStoreOptions = {}) {
    super();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.extractor = options.extractor;
    this.logger = options.logger ?? createSilentLogger();
    this.clock = options.clock ?? Date.now;
    this.idGenerator = options.idGenerator ?? uuid;

    this.logger.info({ timeoutMs: this.timeoutMs }, 'Session store initialized');
  }

  get sessionTimeoutMs(): number {
    return this.timeoutMs;
  }

  /**
   * Find the live session for this request or start a new one.
   *
   * An explicit id wins over the caller identity. An unknown or expired
   * explicit id gets a freshly minted session, remembered under the
   * requested id so the caller's next turn lands in the same place.
   */
  getOrCreate(request: GetOrCreateRequest = {}): SessionLookup {
    this.sweepExpired();
    const { explicitId, callerIdentity } = request;

    if (explicitId) {
      const existing = this.resolve(explicitId);
      if (existing) {
        this.logger.debug(
          { sessionId: existing.id, messages: existing.messageCount },
          'Retrieved existing session'
        );
        return { id: existing.id, session: existing, created: false };
      }

      const session = this.create();
      this.aliases.set(explicitId, session.id);
      this.logger.info(
        { requestedId: explicitId, sessionId: session.id },
        'Requested session not found, created new session'
      );
      return { id: session.id, session, created: true };
    }

    if (callerIdentity) {
      const boundId = this.bindings.get(callerIdentity);
      const bound = boundId ? this.sessions.get(boundId) : undefined;
      if (bound) {
        return { id: bound.id, session: bound, created: false };
      }

      const session = this.create();
      this.bindings.set(callerIdentity, session.id);
      return { id: session.id, session, created: true };
    }

    const session = this.create();
    return { id: session.id, session, created: true };
  }

  /**
   * Live session by id or requested alias
   */
  get(id: string): ConversationSession | undefined {
    this.sweepExpired();
    return this.resolve(id);
  }

  /**
   * Finalize and remove a session. Null when there is no such live session.
   */
  end(id: string, extractFinal = true): SessionEndResult | null {
    this.sweepExpired();
    const session = this.resolve(id);
    if (!session) {
      this.logger.debug({ sessionId: id }, 'End requested for unknown session');
      return null;
    }

    const result = this.finalize(session, extractFinal);
    this.remove(session.id);
    this.logger.info(
      { sessionId: session.id, messages: session.messageCount },
      'Session ended'
    );
    this.emit('session:ended', result);
    return result;
  }

  /**
   * Forget which session a caller is bound to; the session itself stays.
   * With `sessionId`, only a binding to that session is dropped.
   */
  clearBinding(callerIdentity: string, sessionId?: string): void {
    if (sessionId !== undefined && this.bindings.get(callerIdentity) !== sessionId) return;
    this.bindings.delete(callerIdentity);
  }

  /**
   * Finalize and remove every expired session.
   *
   * @returns number of sessions reclaimed
   */
  sweepExpired(): number {
    const now = this.clock();
    const expired = [...this.sessions.values()].filter((s) => s.isExpired(this.timeoutMs, now));

    for (const session of expired) {
      const result = this.finalize(session, session.messageCount > 0);
      this.remove(session.id);
      this.emit('session:expired', result);
    }

    if (expired.length > 0) {
      this.logger.info({ count: expired.length }, 'Cleaned up expired sessions');
    }
    return expired.length;
  }

  activeCount(): number {
    this.sweepExpired();
    return this.sessions.size;
  }

  /**
   * Drop every session without finalizing; used at shutdown
   */
  clear(): void {
    this.sessions.clear();
    this.aliases.clear();
    this.bindings.clear();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private create(): ConversationSession {
    const session = new ConversationSession({ id: this.idGenerator(), clock: this.clock });
    this.sessions.set(session.id, session);
    this.logger.info({ sessionId: session.id }, 'Created new session');
    this.emit('session:created', session);
    return session;
  }

  private resolve(id: string): ConversationSession | undefined {
    const direct = this.sessions.get(id);
    if (direct) return direct;

    const aliased = this.aliases.get(id);
    return aliased ? this.sessions.get(aliased) : undefined;
  }

  private finalize(session: ConversationSession, extractFinal: boolean): SessionEndResult {
    if (!extractFinal || !this.extractor) {
      return { snapshot: session.snapshot() };
    }

    try {
      let added = 0;
      for (const message of session.snapshot().messages) {
        added += session.accumulate(this.extractor.extract(message.content));
      }
      const snapshot = session.snapshot();
      this.logger.debug({ sessionId: session.id, added }, 'Final extraction complete');
      return { snapshot, finalIndicators: snapshot.indicators };
    } catch (error) {
      this.logger.warn({ err: error, sessionId: session.id }, 'Final extraction failed');
      return { snapshot: session.snapshot() };
    }
  }

  private remove(sessionId: string): void {
    this.sessions.delete(sessionId);
    for (const [requested, target] of this.aliases) {
      if (target === sessionId) this.aliases.delete(requested);
    }
    for (const [identity, target] of this.bindings) {
      if (target === sessionId) this.bindings.delete(identity);
    }
  }
}

export function createSessionStore(options?: SessionStoreOptions): SessionStore {
  return new SessionStore(options);
}
