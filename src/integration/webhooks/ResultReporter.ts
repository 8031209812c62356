/**
 * ResultReporter - delivers a finished session's intelligence to the
 * configured callback endpoint.
 *
 * Delivery is at-most-once: one POST, bounded by a timeout, never retried.
 * Failures come back as a DispatchResult instead of throwing.
 */

import type { IndicatorRecord, SessionEndResult, SessionSnapshot } from '../../core/entities/types.js';
import { IntegrationError } from '../../core/errors.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ExtractedIntelligence {
  bankAccounts: string[];
  upiIds: string[];
  phishingLinks: string[];
  phoneNumbers: string[];
  suspiciousKeywords: string[];
}

export interface FinalResultPayload {
  sessionId: string;
  scamDetected: boolean;
  totalMessagesExchanged: number;
  extractedIntelligence: ExtractedIntelligence;
  agentNotes: string;
}

export interface DispatchResult {
  success: boolean;
  statusCode?: number;
  latencyMs?: number;
  error?: string;
  /** Set when nothing was sent */
  skipped?: 'no-callback-url' | 'no-counterparty-messages';
}

export interface ResultReporterOptions {
  url?: string;
  timeoutMs?: number;
  logger?: Logger;
}

// ============================================================================
// Payload
// ============================================================================

export function toExtractedIntelligence(
  indicators: IndicatorRecord,
  suspiciousKeywords: string[] = []
): ExtractedIntelligence {
  return {
    bankAccounts: [...indicators.bankAccounts],
    upiIds: [...indicators.upiIds],
    phishingLinks: [...indicators.urls],
    phoneNumbers: [...indicators.phoneNumbers],
    suspiciousKeywords: [...suspiciousKeywords],
  };
}

export function buildFinalPayload(result: SessionEndResult): FinalResultPayload {
  const { snapshot } = result;
  const indicators = result.finalIndicators ?? snapshot.indicators;

  return {
    sessionId: snapshot.id,
    scamDetected: snapshot.scamDetected,
    totalMessagesExchanged: snapshot.messages.length,
    extractedIntelligence: toExtractedIntelligence(indicators, snapshot.suspiciousKeywords),
    agentNotes: summarizeSession(snapshot, indicators),
  };
}

const INDICATOR_LABELS: Array<[keyof IndicatorRecord, string, string]> = [
  ['bankAccounts', 'bank detail', 'bank details'],
  ['upiIds', 'UPI id', 'UPI ids'],
  ['phoneNumbers', 'phone number', 'phone numbers'],
  ['urls', 'link', 'links'],
];

/**
 * One-paragraph summary of the engagement for the callback's agentNotes
 */
export function summarizeSession(
  snapshot: SessionSnapshot,
  indicators: IndicatorRecord = snapshot.indicators
): string {
  const total = snapshot.messages.length;
  const fromCounterparty = snapshot.messages.filter((m) => m.role === 'counterparty').length;

  const notes = [
    snapshot.scamDetected
      ? `Scam confirmed (confidence ${snapshot.scamConfidence.toFixed(2)}).`
      : 'Scam not confirmed.',
    `Engaged over ${total} messages (${fromCounterparty} from counterparty).`,
  ];

  const obtained = INDICATOR_LABELS.filter(([kind]) => indicators[kind].length > 0).map(
    ([kind, singular, plural]) => {
      const count = indicators[kind].length;
      return `${count} ${count === 1 ? singular : plural}`;
    }
  );
  notes.push(obtained.length > 0 ? `Obtained ${obtained.join(', ')}.` : 'No identifying details obtained.');

  if (snapshot.suspiciousKeywords.length > 0) {
    notes.push(`Tactics: ${snapshot.suspiciousKeywords.join(', ')}.`);
  }
  return notes.join(' ');
}

// ============================================================================
// ResultReporter
// ============================================================================

export class ResultReporter {
  private readonly url?: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ResultReporterOptions = {}) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.logger = options.logger ?? createSilentLogger();
  }

  get enabled(): boolean {
    return Boolean(this.url);
  }

  /**
   * Send the final payload for an ended or expired session
   */
  async report(result: SessionEndResult): Promise<DispatchResult> {
    const sessionId = result.snapshot.id;

    if (!this.url) {
      return { success: false, skipped: 'no-callback-url' };
    }
    if (!result.snapshot.messages.some((m) => m.role === 'counterparty')) {
      this.logger.debug({ sessionId }, 'Skipping callback for session without counterparty messages');
      return { success: false, skipped: 'no-counterparty-messages' };
    }

    const payload = buildFinalPayload(result);
    const startedAt = Date.now();
    this.logger.info({ sessionId }, 'Sending final result callback');

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const latencyMs = Date.now() - startedAt;

      if (!response.ok) {
        const failure = new IntegrationError(`Callback endpoint responded with ${response.status}`, {
          sessionId,
          statusCode: response.status,
        });
        this.logger.error({ err: failure }, 'Callback rejected');
        return { success: false, statusCode: response.status, latencyMs, error: failure.message };
      }

      this.logger.info({ sessionId, statusCode: response.status, latencyMs }, 'Callback delivered');
      return { success: true, statusCode: response.status, latencyMs };
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const failure = new IntegrationError(
        timedOut
          ? `Callback timed out after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error),
        { sessionId, cause: error instanceof Error ? error.name : typeof error }
      );
      this.logger.error({ err: failure }, 'Callback failed');
      return { success: false, latencyMs: Date.now() - startedAt, error: failure.message };
    }
  }
}

export function createResultReporter(options?: ResultReporterOptions): ResultReporter {
  return new ResultReporter(options);
}
