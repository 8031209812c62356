/**
 * Request schemas for the honeypot endpoint.
 *
 * Two shapes are accepted: a plain `{ message, sessionId? }` body and the
 * chat-platform body that carries its own conversation id and history.
 * Both normalize to an InboundTurn.
 */

import { z } from 'zod';
import type { MessageRole } from '../core/entities/types.js';
import { ValidationError, type ValidationErrorDetail } from '../core/errors.js';

// ============================================================================
// Schemas
// ============================================================================

export const PlatformMessageSchema = z.object({
  sender: z.string().default('scammer'),
  text: z.string(),
  timestamp: z.union([z.string(), z.number()]).optional(),
});

export const MetadataSchema = z
  .object({
    channel: z.string().optional(),
    language: z.string().optional(),
    locale: z.string().optional(),
  })
  .passthrough();

export const SimpleRequestSchema = z.object({
  message: z.string(),
  sessionId: z.string().min(1).optional(),
});

export const PlatformRequestSchema = z.object({
  sessionId: z.string().min(1),
  message: PlatformMessageSchema,
  conversationHistory: z.array(PlatformMessageSchema).default([]),
  metadata: MetadataSchema.optional(),
});

export type PlatformMessage = z.infer<typeof PlatformMessageSchema>;
export type SimpleRequest = z.infer<typeof SimpleRequestSchema>;
export type PlatformRequest = z.infer<typeof PlatformRequestSchema>;

// ============================================================================
// Normalized form
// ============================================================================

export interface HistoryEntry {
  role: MessageRole;
  content: string;
}

export interface InboundTurn {
  text: string;
  sessionId?: string;
  /** Prior messages, used only to seed a freshly created session */
  history: HistoryEntry[];
  metadata?: z.infer<typeof MetadataSchema>;
}

// The platform calls the honeypot side "user"
const AGENT_SENDERS = new Set(['user', 'agent', 'honeypot', 'assistant']);

export function senderToRole(sender: string): MessageRole {
  return AGENT_SENDERS.has(sender.trim().toLowerCase()) ? 'agent' : 'counterparty';
}

/**
 * Validate a request body and normalize it.
 *
 * @throws ValidationError on a malformed body or empty message text
 */
export function parseHoneypotRequest(body: unknown): InboundTurn {
  const isPlatform =
    typeof body === 'object' &&
    body !== null &&
    typeof Reflect.get(body, 'message') === 'object' &&
    Reflect.get(body, 'message') !== null;

  const turn = isPlatform ? parsePlatform(body) : parseSimple(body);

  if (turn.text.length === 0) {
    throw new ValidationError('Message cannot be empty', [
      { field: 'message', message: 'Message cannot be empty' },
    ]);
  }
  return turn;
}

function parseSimple(body: unknown): InboundTurn {
  const result = SimpleRequestSchema.safeParse(body);
  if (!result.success) throw toValidationError(result.error);

  return {
    text: result.data.message.trim(),
    sessionId: result.data.sessionId,
    history: [],
  };
}

function parsePlatform(body: unknown): InboundTurn {
  const result = PlatformRequestSchema.safeParse(body);
  if (!result.success) throw toValidationError(result.error);

  const { sessionId, message, conversationHistory, metadata } = result.data;
  return {
    text: message.text.trim(),
    sessionId,
    history: conversationHistory
      .filter((m) => m.text.trim().length > 0)
      .map((m) => ({ role: senderToRole(m.sender), content: m.text })),
    metadata,
  };
}

export function toValidationError(error: z.ZodError): ValidationError {
  const details: ValidationErrorDetail[] = error.errors.map((e) => ({
    field: e.path.join('.') || 'body',
    message: e.message,
  }));
  return new ValidationError('Invalid request body', details);
}
