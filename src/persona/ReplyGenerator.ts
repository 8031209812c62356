/**
 * ReplyGenerator - writes the honeypot persona's next message.
 *
 * The persona is a confused but cooperative target who keeps asking
 * questions, so the counterparty keeps talking and reveals more details.
 */

import { LLMError } from '../core/errors.js';
import type { GenerationSettings } from '../detection/ScamClassifier.js';
import type { LLMProvider } from '../integration/providers/index.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

export const HONEYPOT_PERSONA_INSTRUCTIONS = `You are a honeypot persona agent. Your role is to generate human-like responses to scam messages.

Persona characteristics:
- Confused and uncertain about the situation
- Cooperative and eager to help/comply
- Uses casual language with occasional emojis
- Asks clarifying questions to encourage scammer engagement
- Never sounds robotic, technical, or security-aware
- Shows concern but not suspicion

Your responses should naturally encourage scammers to reveal more details while maintaining believability.`;

export const MAX_REPLY_SENTENCES = 2;

export interface ReplyGeneratorOptions {
  provider?: LLMProvider;
  timeoutMs?: number;
  generation?: GenerationSettings;
  logger?: Logger;
}

export class ReplyGenerator {
  private readonly provider?: LLMProvider;
  private readonly timeoutMs: number;
  private readonly generation: GenerationSettings;
  private readonly logger: Logger;

  constructor(options: ReplyGeneratorOptions = {}) {
    this.provider = options.provider;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.generation = options.generation ?? { temperature: 0.9, maxTokens: 150 };
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Reply to `text` given the labelled conversation so far.
   *
   * @throws LLMError when no provider is configured or it returns nothing
   * @throws TimeoutError when the provider runs past the timeout
   */
  async reply(text: string, context: string): Promise<string> {
    const provider = this.provider;
    if (!provider) {
      throw new LLMError('No LLM provider configured for reply generation');
    }

    const completion = await withTimeout(
      (signal) =>
        provider.complete(
          [
            { role: 'system', content: buildPersonaInstructions(context) },
            { role: 'user', content: buildReplyPrompt(text) },
          ],
          { ...this.generation, signal }
        ),
      this.timeoutMs,
      'Reply generation'
    );

    const reply = limitSentences(stripQuotes(completion.content), MAX_REPLY_SENTENCES);
    if (reply.length === 0) {
      throw new LLMError('Provider returned an empty reply', { finishReason: completion.finishReason });
    }

    this.logger.info({ preview: reply.slice(0, 50) }, 'Persona reply generated');
    return reply;
  }
}

export function createReplyGenerator(options?: ReplyGeneratorOptions): ReplyGenerator {
  return new ReplyGenerator(options);
}

// ============================================================================
// Prompt and output shaping
// ============================================================================

export function buildPersonaInstructions(context: string): string {
  if (!context) return HONEYPOT_PERSONA_INSTRUCTIONS;

  return `${HONEYPOT_PERSONA_INSTRUCTIONS}

Previous conversation:
${context}

Remember this context when generating your reply - be consistent with what you've said before.`;
}

export function buildReplyPrompt(text: string): string {
  return `Generate a honeypot reply to this scam message.

Scam message: "${text}"

Requirements:
- Keep it to 1-2 sentences ONLY
- Sound confused and concerned
- Be cooperative and willing to help
- Use casual language and maybe an emoji or two
- Encourage the scammer to share more details
- If this is part of an ongoing conversation, maintain consistency with previous messages

Generate ONLY the response, nothing else. No explanation, no quotes, just the reply.`;
}

/**
 * Keep the first `max` sentences. A sentence ends at `.`, `!` or `?`
 * followed by whitespace.
 */
export function limitSentences(text: string, max: number): string {
  const sentences = text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .filter((s) => s.length > 0);
  return sentences.slice(0, max).join(' ');
}

function stripQuotes(text: string): string {
  const trimmed = text.trim();
  const quoted = /^["'“](.*)["'”]$/s.exec(trimmed);
  return quoted?.[1] !== undefined ? quoted[1].trim() : trimmed;
}
