/**
 * Scam keyword table and weighted scoring
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

export const KeywordWeightsSchema = z.record(z.string().min(1), z.number().positive());
export type KeywordWeights = z.infer<typeof KeywordWeightsSchema>;

const DEFAULT_KEYWORDS_FILE = new URL('../../data/scam-keywords.json', import.meta.url);

let defaultWeights: KeywordWeights | undefined;

/**
 * Read and validate a keyword → weight table
 */
export function loadKeywordWeights(file: string | URL = DEFAULT_KEYWORDS_FILE): KeywordWeights {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read keyword table: ${String(file)}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const result = KeywordWeightsSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid keyword table: ${errors.join(', ')}`, { errors });
  }
  return result.data;
}

/**
 * Bundled keyword table, read once
 */
export function defaultKeywordWeights(): KeywordWeights {
  defaultWeights ??= loadKeywordWeights();
  return defaultWeights;
}

export interface KeywordScore {
  /** Matched weight over the saturation point, capped at 1 */
  score: number;
  matched: string[];
}

export class KeywordScorer {
  private readonly entries: Array<{ keyword: string; weight: number; pattern: RegExp }>;
  private readonly saturation: number;

  constructor(weights: KeywordWeights, saturation: number) {
    this.saturation = saturation;
    this.entries = Object.entries(weights).map(([keyword, weight]) => ({
      keyword: keyword.toLowerCase(),
      weight,
      pattern: new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword.toLowerCase())}(?![a-z0-9])`),
    }));
  }

  /**
   * Whole-word matches only; "won" does not fire on "wonderful"
   */
  score(text: string): KeywordScore {
    const lower = text.toLowerCase();
    let total = 0;
    const matched: string[] = [];

    for (const entry of this.entries) {
      if (entry.pattern.test(lower)) {
        total += entry.weight;
        matched.push(entry.keyword);
      }
    }

    return { score: Math.min(total / this.saturation, 1), matched };
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
