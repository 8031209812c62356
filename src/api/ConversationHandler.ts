/**
 * ConversationHandler - runs one inbound turn against the session store.
 *
 * Resolves the session, seeds it from platform history when it is new,
 * ends it on an exit command, and otherwise classifies the message,
 * accumulates extracted indicators and writes the persona's reply.
 * Turns of the same session are serialized; different sessions run
 * concurrently.
 */

import type { IndicatorExtractorLike, SessionEndResult } from '../core/entities/types.js';
import type { ConversationSession } from '../core/entities/Session.js';
import { isExitMessage } from '../core/session/exit.js';
import type { SessionLookup, SessionStore } from '../core/session/SessionStore.js';
import type { ClassificationResult } from '../detection/ScamClassifier.js';
import {
  toExtractedIntelligence,
  type ExtractedIntelligence,
} from '../integration/webhooks/ResultReporter.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { TurnLock } from '../utils/TurnLock.js';
import type { InboundTurn } from './schemas.js';

export interface Classifier {
  classify(text: string): Promise<ClassificationResult>;
}

export interface ReplyWriter {
  reply(text: string, context: string): Promise<string>;
}

export interface ConversationHandlerOptions {
  store: SessionStore;
  classifier: Classifier;
  replyGenerator: ReplyWriter;
  extractor: IndicatorExtractorLike;
  /** Messages of history handed to the reply generator */
  contextWindow?: number;
  logger?: Logger;
}

export interface TurnResult {
  sessionId: string;
  reply: string;
  scamDetected: boolean;
  confidence: number;
  reasoning: string;
  extractedIntelligence: ExtractedIntelligence;
  sessionEnded: boolean;
}

export const EXIT_REPLY = 'Okay, talk to you later. Bye!';

export const FALLBACK_REPLIES: readonly string[] = [
  "Sorry, I didn't understand. Can you explain again?",
  'Oh no, what should I do now? Please tell me the steps.',
  "I'm a bit confused, which account are you talking about?",
  'Okay, but how do I do that? Can you send the details again?',
  'Wait, is this really from the bank? What do you need from me?',
];

export class ConversationHandler {
  private readonly store: SessionStore;
  private readonly classifier: Classifier;
  private readonly replyGenerator: ReplyWriter;
  private readonly extractor: IndicatorExtractorLike;
  private readonly contextWindow: number;
  private readonly logger: Logger;
  private readonly lock = new TurnLock();

  constructor(options: ConversationHandlerOptions) {
    this.store = options.store;
    this.classifier = options.classifier;
    this.replyGenerator = options.replyGenerator;
    this.extractor = options.extractor;
    this.contextWindow = options.contextWindow ?? 10;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Process one inbound message
   *
   * @param callerIdentity - binds id-less requests to the caller's session
   */
  async handle(turn: InboundTurn, callerIdentity?: string): Promise<TurnResult> {
    for (;;) {
      const lookup = this.store.getOrCreate({ explicitId: turn.sessionId, callerIdentity });
      const release = await this.lock.acquire(lookup.id);
      try {
        // The session may have ended while this turn waited for the lock
        if (this.store.get(lookup.id) !== lookup.session) continue;
        return await this.runTurn(lookup, turn, callerIdentity);
      } finally {
        release();
      }
    }
  }

  /**
   * Explicitly end a session once any turn in flight for it has finished.
   * Null when it does not exist.
   */
  async endSession(sessionId: string): Promise<SessionEndResult | null> {
    const session = this.store.get(sessionId);
    if (!session) return null;
    return this.lock.run(session.id, async () => this.store.end(session.id, true));
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async runTurn(
    lookup: SessionLookup,
    turn: InboundTurn,
    callerIdentity?: string
  ): Promise<TurnResult> {
    const { session, created } = lookup;
    const log = this.logger.child({ sessionId: session.id });

    if (created && turn.history.length > 0) {
      this.seed(session, turn);
      log.info({ messages: turn.history.length }, 'Seeded session from conversation history');
    }

    if (isExitMessage(turn.text)) {
      return this.finish(session, turn.text, callerIdentity);
    }

    session.append('counterparty', turn.text);

    const classification = await this.classify(turn.text);
    this.accumulate(session, turn.text);
    if (classification.isScam) {
      session.markScam(classification.confidence, classification.keywords);
    }

    let reply = '';
    if (session.scamDetected) {
      reply = await this.writeReply(session, turn.text);
      session.append('agent', reply);
    }

    const snapshot = session.snapshot();
    log.info(
      { isScam: classification.isScam, messages: snapshot.messages.length },
      'Turn processed'
    );

    return {
      sessionId: session.id,
      reply,
      scamDetected: snapshot.scamDetected,
      confidence: snapshot.scamDetected ? snapshot.scamConfidence : classification.confidence,
      reasoning: classification.reasoning,
      extractedIntelligence: toExtractedIntelligence(snapshot.indicators, snapshot.suspiciousKeywords),
      sessionEnded: false,
    };
  }

  private finish(session: ConversationSession, text: string, callerIdentity?: string): TurnResult {
    session.append('counterparty', text);
    // A caller bound to some other session keeps that binding
    if (callerIdentity) this.store.clearBinding(callerIdentity, session.id);
    const result = this.store.end(session.id, true);

    const snapshot = result?.snapshot ?? session.snapshot();
    const indicators = result?.finalIndicators ?? snapshot.indicators;
    this.logger.info({ sessionId: session.id }, 'Session ended by exit command');

    return {
      sessionId: session.id,
      reply: EXIT_REPLY,
      scamDetected: snapshot.scamDetected,
      confidence: snapshot.scamConfidence,
      reasoning: 'Conversation ended by counterparty',
      extractedIntelligence: toExtractedIntelligence(indicators, snapshot.suspiciousKeywords),
      sessionEnded: true,
    };
  }

  private seed(session: ConversationSession, turn: InboundTurn): void {
    for (const entry of turn.history) {
      session.append(entry.role, entry.content);
      if (entry.role === 'counterparty') this.accumulate(session, entry.content);
    }
  }

  private accumulate(session: ConversationSession, text: string): void {
    try {
      const added = session.accumulate(this.extractor.extract(text));
      if (added > 0) this.logger.debug({ sessionId: session.id, added }, 'Indicators accumulated');
    } catch (error) {
      this.logger.warn({ err: error, sessionId: session.id }, 'Indicator extraction failed');
    }
  }

  private async classify(text: string): Promise<ClassificationResult> {
    try {
      return await this.classifier.classify(text);
    } catch (error) {
      this.logger.warn({ err: error }, 'Classification failed');
      return {
        isScam: false,
        confidence: 0,
        reasoning: 'Classification unavailable',
        keywords: [],
        source: 'heuristic',
      };
    }
  }

  private async writeReply(session: ConversationSession, text: string): Promise<string> {
    try {
      return await this.replyGenerator.reply(text, session.contextWindow(this.contextWindow));
    } catch (error) {
      this.logger.warn({ err: error, sessionId: session.id }, 'Reply generation failed, using fallback');
      return FALLBACK_REPLIES[session.messageCount % FALLBACK_REPLIES.length];
    }
  }
}

export function createConversationHandler(options: ConversationHandlerOptions): ConversationHandler {
  return new ConversationHandler(options);
}
