/**
 * IndicatorExtractor - pulls identifying artifacts out of scammer messages.
 *
 * Pure and synchronous: the same text always yields the same normalized
 * values, so the store can re-run it over a finished transcript.
 */

import type { IndicatorExtractorLike, IndicatorRecord } from '../core/entities/types.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Patterns
// ============================================================================

const UPI_PROVIDERS = [
  'upi', 'paytm', 'phonepe', 'gpay', 'googlepay', 'bhim', 'amazonpay', 'whatsapp',
  'okaxis', 'oksbi', 'okicici', 'okhdfcbank', 'axl', 'apl', 'yapl', 'ybl', 'ibl',
  'icici', 'airtel', 'freecharge', 'mobikwik',
];

const UPI_PATTERN = new RegExp(
  `\\b[a-z0-9_][\\w.-]*@(?:${UPI_PROVIDERS.join('|')})(?![\\w-]|\\.[a-z])`,
  'gi'
);

// Ordered most specific first; a later match overlapping an earlier one is dropped
const PHONE_PATTERNS: readonly RegExp[] = [
  /(?<![\w+])\+\d{1,3}[-.\s]?\d{10}(?!\d)/g,
  /(?<![\w+])\+\d{1,3}[-.\s]\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}(?!\d)/g,
  /(?<![\w+])\+\d{1,3}[-.\s]?\d{5}[-\s]\d{5}(?!\d)/g,
  /(?<![\w+])(?:0|91|1)?\d{10}(?!\d)/g,
  /(?<![\w+])\(?\d{3}\)?[-.\s]\d{3}[-.\s]\d{4}(?!\d)/g,
  /(?<![\w+])\d{5}[-\s]\d{5}(?!\d)/g,
];

const URL_CHARS = '[^\\s<>"\'{}|\\\\^`\\[\\]]';

const COMMON_TLDS = [
  'com', 'net', 'org', 'info', 'biz', 'io', 'co', 'in', 'xyz', 'online', 'site', 'shop',
  'app', 'link', 'click', 'ltd', 'tech', 'store', 'live', 'pro', 'dev', 'me', 'tv', 'us',
  'uk', 'ca', 'au', 'de', 'fr', 'jp', 'cn', 'ru',
];

const URL_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b(?:https?|ftps?):\\/\\/${URL_CHARS}+`, 'gi'),
  new RegExp(`(?<![\\w.@/-])www\\.[a-z0-9-]+\\.[a-z]{2,}${URL_CHARS}*`, 'gi'),
  new RegExp(
    `(?<![\\w.@/-])(?:[a-z0-9-]+\\.)+(?:${COMMON_TLDS.join('|')})\\b(?![@-]|\\.\\w)(?:\\/${URL_CHARS}*)?`,
    'gi'
  ),
];

const ACCOUNT_PATTERN = /(?<![\d+])\d{9,18}(?!\d)/g;
const IFSC_PATTERN = /\b[A-Z]{4}0[A-Z0-9]{6}\b/g;
const TRAILING_PUNCTUATION = /[,;:!?.)]+$/;

interface Span {
  start: number;
  end: number;
}

interface Match extends Span {
  value: string;
}

// ============================================================================
// IndicatorExtractor
// ============================================================================

export interface IndicatorExtractorOptions {
  logger?: Logger;
}

export class IndicatorExtractor implements IndicatorExtractorLike {
  private readonly logger: Logger;

  constructor(options: IndicatorExtractorOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Extract every indicator kind from the text
   */
  extract(text: string): IndicatorRecord {
    const urlMatches = this.matchUrls(text);
    const phoneMatches = this.matchPhones(text, urlMatches);

    const result: IndicatorRecord = {
      bankAccounts: this.extractBankAccounts(text, [...urlMatches, ...phoneMatches]),
      upiIds: this.extractUpiIds(text),
      phoneNumbers: unique(phoneMatches.map((m) => m.value)),
      urls: unique(urlMatches.map((m) => m.value)),
    };

    const total =
      result.bankAccounts.length +
      result.upiIds.length +
      result.phoneNumbers.length +
      result.urls.length;
    this.logger.debug({ total }, 'Indicator extraction complete');
    return result;
  }

  /**
   * UPI ids on known payment-service handles, lower-cased
   */
  extractUpiIds(text: string): string[] {
    return unique(scan(text, UPI_PATTERN).map((m) => m.value.toLowerCase()));
  }

  /**
   * Phone numbers in E.164-like form (`+91XXXXXXXXXX` for Indian numbers)
   */
  extractPhoneNumbers(text: string): string[] {
    return unique(this.matchPhones(text, this.matchUrls(text)).map((m) => m.value));
  }

  extractUrls(text: string): string[] {
    return unique(this.matchUrls(text).map((m) => m.value));
  }

  /**
   * Account numbers as `Account: N` and IFSC codes as `IFSC: CODE`.
   * Digit runs already claimed as phone numbers or URL parts are skipped.
   */
  extractBankAccounts(text: string, claimed?: Span[]): string[] {
    let taken = claimed;
    if (!taken) {
      const urls = this.matchUrls(text);
      taken = [...urls, ...this.matchPhones(text, urls)];
    }
    const results: string[] = [];

    for (const match of scan(text, ACCOUNT_PATTERN)) {
      if (overlapsAny(taken, match) || isRepeatedDigit(match.value)) continue;
      results.push(`Account: ${match.value}`);
    }
    for (const match of scan(text, IFSC_PATTERN)) {
      if (overlapsAny(taken, match)) continue;
      results.push(`IFSC: ${match.value}`);
    }
    return unique(results);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private matchPhones(text: string, claimed: Span[]): Match[] {
    const accepted: Match[] = [];
    for (const pattern of PHONE_PATTERNS) {
      for (const match of scan(text, pattern)) {
        if (overlapsAny(claimed, match) || overlapsAny(accepted, match)) continue;
        const normalized = normalizePhone(match.value);
        if (normalized) accepted.push({ ...match, value: normalized });
      }
    }
    return accepted.sort((a, b) => a.start - b.start);
  }

  private matchUrls(text: string): Match[] {
    const accepted: Match[] = [];
    for (const pattern of URL_PATTERNS) {
      for (const match of scan(text, pattern)) {
        if (overlapsAny(accepted, match)) continue;
        const normalized = normalizeUrl(match.value);
        if (normalized) accepted.push({ ...match, value: normalized });
      }
    }
    return accepted.sort((a, b) => a.start - b.start);
  }
}

export function createIndicatorExtractor(options?: IndicatorExtractorOptions): IndicatorExtractor {
  return new IndicatorExtractor(options);
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Normalize a raw phone match, or null when it is not a plausible number
 */
export function normalizePhone(raw: string): string | null {
  const clean = raw.replace(/[^\d+]/g, '');
  const digits = clean.replace(/\+/g, '');

  if (digits.length < 10 || isRepeatedDigit(digits)) return null;

  if (clean.startsWith('+')) return `+${digits}`;
  if (digits.length === 12 && digits.startsWith('91')) return `+${digits}`;
  if (digits.length === 11 && digits.startsWith('0')) return `+91${digits.slice(1)}`;
  if (digits.length === 10) return `+91${digits}`;
  if (digits.length === 11 && digits.startsWith('1')) return `+${digits}`;
  return `+${digits}`;
}

/**
 * Strip trailing punctuation and add a scheme when one is missing
 */
export function normalizeUrl(raw: string): string | null {
  const trimmed = raw.trim().replace(TRAILING_PUNCTUATION, '');
  if (trimmed.length <= 4 || !trimmed.includes('.')) return null;

  return /^(?:https?|ftps?):\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

// ============================================================================
// Helpers
// ============================================================================

function scan(text: string, pattern: RegExp): Match[] {
  const matches: Match[] = [];
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    matches.push({ value: match[0], start, end: start + match[0].length });
  }
  return matches;
}

function overlapsAny(spans: Span[], candidate: Span): boolean {
  return spans.some((s) => candidate.start < s.end && s.start < candidate.end);
}

function isRepeatedDigit(digits: string): boolean {
  return new Set(digits).size === 1;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
