/**
 * ScamClassifier - decides whether an inbound message is a scam attempt.
 *
 * A weighted keyword score is always computed. When an LLM provider is
 * configured its three-line verdict wins; otherwise, or when the call fails
 * or runs past the timeout, the keyword score decides.
 */

import type { CompletionOptions, LLMProvider } from '../integration/providers/index.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { defaultKeywordWeights, KeywordScorer, type KeywordWeights } from './keywords.js';

export const SCAM_DETECTOR_INSTRUCTIONS = `You are a scam detection expert agent. Your role is to analyze messages and determine if they are scams.

Your expertise includes:
- Identifying phishing attempts and social engineering tactics
- Recognizing urgency manipulation and authority impersonation
- Detecting requests for sensitive information (OTP, passwords, bank details)
- Spotting suspicious patterns in financial transaction requests

Analyze each message objectively and provide clear, evidence-based reasoning.`;

export interface ClassificationResult {
  isScam: boolean;
  /** 0..1 */
  confidence: number;
  reasoning: string;
  /** Scam keywords found in the text */
  keywords: string[];
  source: 'llm' | 'heuristic';
}

export type GenerationSettings = Pick<CompletionOptions, 'temperature' | 'maxTokens' | 'topP' | 'topK'>;

export interface ScamClassifierOptions {
  provider?: LLMProvider;
  /** Heuristic score at or above which a message counts as a scam */
  threshold?: number;
  /** Keyword weight total that maps to a score of 1 */
  saturation?: number;
  timeoutMs?: number;
  keywords?: KeywordWeights;
  generation?: GenerationSettings;
  logger?: Logger;
}

export class ScamClassifier {
  private readonly provider?: LLMProvider;
  private readonly scorer: KeywordScorer;
  private readonly threshold: number;
  private readonly timeoutMs: number;
  private readonly generation: GenerationSettings;
  private readonly logger: Logger;

  constructor(options: ScamClassifierOptions = {}) {
    this.provider = options.provider;
    this.threshold = options.threshold ?? 0.5;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.generation = options.generation ?? { temperature: 0.2, maxTokens: 256 };
    this.scorer = new KeywordScorer(options.keywords ?? defaultKeywordWeights(), options.saturation ?? 10);
    this.logger = options.logger ?? createSilentLogger();
  }

  async classify(text: string): Promise<ClassificationResult> {
    const { score, matched } = this.scorer.score(text);
    this.logger.debug({ score, matched }, 'Keyword score calculated');

    if (!this.provider) {
      return this.heuristic(score, matched);
    }

    const provider = this.provider;
    try {
      const completion = await withTimeout(
        (signal) =>
          provider.complete(
            [
              { role: 'system', content: SCAM_DETECTOR_INSTRUCTIONS },
              { role: 'user', content: buildClassificationPrompt(text, score) },
            ],
            { ...this.generation, signal }
          ),
        this.timeoutMs,
        'Scam classification'
      );

      const verdict = parseVerdict(completion.content, score);
      this.logger.info(
        { isScam: verdict.isScam, confidence: verdict.confidence },
        'LLM classification complete'
      );
      return { ...verdict, keywords: matched, source: 'llm' };
    } catch (error) {
      this.logger.warn({ err: error }, 'LLM classification failed, using keyword score');
      return this.heuristic(score, matched);
    }
  }

  private heuristic(score: number, matched: string[]): ClassificationResult {
    return {
      isScam: score >= this.threshold,
      confidence: score,
      reasoning:
        matched.length > 0
          ? `Matched scam indicators: ${matched.join(', ')}`
          : 'No scam indicators matched',
      keywords: matched,
      source: 'heuristic',
    };
  }
}

export function createScamClassifier(options?: ScamClassifierOptions): ScamClassifier {
  return new ScamClassifier(options);
}

// ============================================================================
// Prompt and response handling
// ============================================================================

export function buildClassificationPrompt(text: string, keywordScore: number): string {
  return `Analyze this message and determine if it's a scam.

Message: "${text}"

Provide your analysis in this exact format:
1. Is it a scam? (YES or NO)
2. Confidence (0.0 to 1.0, where 1.0 is definitely a scam)
3. Reasoning (2-3 sentences explaining why)

Context:
- Keyword score: ${keywordScore.toFixed(2)}
- Be conservative: only mark as scam if there's clear evidence
- Consider urgency, requests for sensitive info, impersonation
- Return ONLY the three lines, nothing else`;
}

/**
 * Read the three-line verdict. Unparseable confidence falls back to the
 * keyword score; confidence is clamped to [0, 1].
 */
export function parseVerdict(
  response: string,
  keywordScore: number
): Pick<ClassificationResult, 'isScam' | 'confidence' | 'reasoning'> {
  const lines = response
    .split('\n')
    .map((line) => line.trim().replace(/^\d+[.)]\s+/, ''))
    .filter((line) => line.length > 0);

  const isScam = lines.length > 0 && /\bYES\b/i.test(lines[0] ?? '');

  let confidence = keywordScore;
  const confidenceText = lines[1]?.split(':').pop()?.trim();
  if (confidenceText) {
    const parsed = Number.parseFloat(confidenceText);
    if (Number.isFinite(parsed)) confidence = parsed;
  }

  const reasoningLine = lines[2];
  const reasoning = reasoningLine
    ? reasoningLine.includes(':')
      ? reasoningLine.slice(reasoningLine.indexOf(':') + 1).trim()
      : reasoningLine
    : 'No reasoning provided';

  return { isScam, confidence: Math.max(0, Math.min(1, confidence)), reasoning };
}
