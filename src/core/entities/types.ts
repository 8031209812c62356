/**
 * Core type definitions for Honeytrap entities
 */

import { z } from 'zod';

// ============================================================================
// Messages
// ============================================================================

export const MessageRoleSchema = z.enum(['counterparty', 'agent']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: Date;
}

// ============================================================================
// Indicators
// ============================================================================

export const IndicatorKindSchema = z.enum(['bankAccounts', 'upiIds', 'phoneNumbers', 'urls']);
export type IndicatorKind = z.infer<typeof IndicatorKindSchema>;

export const INDICATOR_KINDS: readonly IndicatorKind[] = IndicatorKindSchema.options;

/**
 * Extractor output: normalized values per kind. Any kind may be absent.
 */
export type ExtractedIndicators = Partial<Record<IndicatorKind, string[]>>;

/**
 * Plain, fully populated view of an indicator set.
 */
export type IndicatorRecord = Record<IndicatorKind, string[]>;

// ============================================================================
// Session
// ============================================================================

export interface SessionSnapshot {
  readonly id: string;
  readonly createdAt: Date;
  readonly lastActivityAt: Date;
  readonly messages: readonly ConversationMessage[];
  readonly indicators: IndicatorRecord;
  readonly scamDetected: boolean;
  readonly scamConfidence: number;
  readonly suspiciousKeywords: string[];
}

export interface SessionEndResult {
  snapshot: SessionSnapshot;
  /** Indicators after the final pass over the full transcript, when one ran */
  finalIndicators?: IndicatorRecord;
}

/**
 * Pure text → indicators function the store re-runs over a finished transcript.
 */
export interface IndicatorExtractorLike {
  extract(text: string): ExtractedIndicators;
}
