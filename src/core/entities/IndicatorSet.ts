/**
 * IndicatorSet - deduplicated, per-kind collection of extracted indicators
 */

import { INDICATOR_KINDS, type IndicatorKind, type IndicatorRecord } from './types.js';

export class IndicatorSet {
  private readonly kinds: Record<IndicatorKind, Set<string>> = {
    bankAccounts: new Set(),
    upiIds: new Set(),
    phoneNumbers: new Set(),
    urls: new Set(),
  };

  /**
   * Union incoming values into each kind. Absent, non-iterable and
   * non-string input is skipped; values are expected pre-normalized.
   *
   * @returns number of values that were new
   */
  union(input: unknown): number {
    if (typeof input !== 'object' || input === null) return 0;

    let added = 0;
    for (const kind of INDICATOR_KINDS) {
      const values: unknown = Reflect.get(input, kind);
      if (!isIterable(values) || typeof values === 'string') continue;

      const target = this.kinds[kind];
      for (const value of values) {
        if (typeof value !== 'string' || value.length === 0) continue;
        if (!target.has(value)) {
          target.add(value);
          added++;
        }
      }
    }
    return added;
  }

  values(kind: IndicatorKind): string[] {
    return [...this.kinds[kind]];
  }

  toRecord(): IndicatorRecord {
    return {
      bankAccounts: this.values('bankAccounts'),
      upiIds: this.values('upiIds'),
      phoneNumbers: this.values('phoneNumbers'),
      urls: this.values('urls'),
    };
  }
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'string' ||
    (typeof value === 'object' && value !== null && Symbol.iterator in value)
  );
}
