/**
 * ConversationSession & IndicatorSet - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ConversationSession } from '../../../src/core/entities/Session.js';
import { IndicatorSet } from '../../../src/core/entities/IndicatorSet.js';
import { MessageEntity } from '../../../src/core/entities/Message.js';
import type { IndicatorRecord } from '../../../src/core/entities/types.js';

function manualClock(start = 1_000_000) {
  let now = start;
  return {
    clock: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('IndicatorSet', () => {
  it('should deduplicate values per kind', () => {
    const set = new IndicatorSet();

    expect(set.union({ upiIds: ['abc@upi', 'abc@upi'], urls: ['http://x.in'] })).toBe(2);
    expect(set.union({ upiIds: ['abc@upi', 'def@ybl'] })).toBe(1);
    expect(set.values('upiIds')).toEqual(['abc@upi', 'def@ybl']);
    expect(set.values('urls')).toEqual(['http://x.in']);
  });

  it('should skip absent kinds and non-string values', () => {
    const set = new IndicatorSet();

    expect(set.union({ phoneNumbers: [42, '', '+919876543210'], bankAccounts: 'Account: 1' })).toBe(1);
    expect(set.union(null)).toBe(0);
    expect(set.union('nothing')).toBe(0);
    expect(set.toRecord()).toEqual({
      bankAccounts: [],
      upiIds: [],
      phoneNumbers: ['+919876543210'],
      urls: [],
    });
  });

  it('should reach the same contents whatever order batches arrive in', () => {
    const batches: IndicatorRecord[] = [
      { bankAccounts: ['Account: 123456789012'], upiIds: ['abc@upi'], phoneNumbers: [], urls: [] },
      { bankAccounts: [], upiIds: ['abc@upi', 'def@ybl'], phoneNumbers: ['+919876543210'], urls: [] },
      { bankAccounts: ['IFSC: SBIN0001234'], upiIds: [], phoneNumbers: ['+919876543210'], urls: ['http://pay.example.in'] },
    ];
    const orders = [
      [0, 1, 2],
      [0, 2, 1],
      [1, 0, 2],
      [1, 2, 0],
      [2, 0, 1],
      [2, 1, 0],
    ];
    const sorted = (record: IndicatorRecord) => ({
      bankAccounts: [...record.bankAccounts].sort(),
      upiIds: [...record.upiIds].sort(),
      phoneNumbers: [...record.phoneNumbers].sort(),
      urls: [...record.urls].sort(),
    });

    for (const order of orders) {
      const set = new IndicatorSet();
      for (const index of order) set.union(batches[index]);

      expect(sorted(set.toRecord())).toEqual({
        bankAccounts: ['Account: 123456789012', 'IFSC: SBIN0001234'],
        upiIds: ['abc@upi', 'def@ybl'],
        phoneNumbers: ['+919876543210'],
        urls: ['http://pay.example.in'],
      });
    }
  });

  it('should hold a value repeated across batches once', () => {
    const set = new IndicatorSet();

    expect(set.union({ phoneNumbers: ['+919876543210'] })).toBe(1);
    expect(set.union({ phoneNumbers: ['+919876543210'] })).toBe(0);
    expect(set.union({ phoneNumbers: ['+919876543210'], urls: ['http://a.in'] })).toBe(1);
    expect(set.values('phoneNumbers')).toEqual(['+919876543210']);
  });
});

describe('MessageEntity', () => {
  it('should be immutable and serializable', () => {
    const message = new MessageEntity('counterparty', 'hello', new Date('2026-01-01T00:00:00.000Z'));

    expect(Object.isFrozen(message)).toBe(true);
    expect(message.toJSON()).toEqual({
      role: 'counterparty',
      content: 'hello',
      timestamp: '2026-01-01T00:00:00.000Z',
    });
  });
});

describe('ConversationSession', () => {
  it('should refresh activity on append', () => {
    const time = manualClock();
    const session = new ConversationSession({ id: 's-1', clock: time.clock });

    time.advance(5_000);
    session.append('counterparty', 'Your account is blocked');

    expect(session.messageCount).toBe(1);
    expect(session.lastActivityAt.getTime()).toBe(1_005_000);
    expect(session.createdAt.getTime()).toBe(1_000_000);
  });

  it('should expire only after the timeout has fully elapsed', () => {
    const time = manualClock();
    const session = new ConversationSession({ clock: time.clock });

    time.advance(1_000);
    expect(session.isExpired(1_000)).toBe(false);
    time.advance(1);
    expect(session.isExpired(1_000)).toBe(true);
  });

  it('should keep the scam flag sticky and confidence monotonic', () => {
    const session = new ConversationSession();

    session.markScam(0.8, ['otp']);
    session.markScam(0.6, ['upi', 'otp']);

    const snapshot = session.snapshot();
    expect(snapshot.scamDetected).toBe(true);
    expect(snapshot.scamConfidence).toBe(0.8);
    expect(snapshot.suspiciousKeywords).toEqual(['otp', 'upi']);
  });

  it('should render a speaker-labelled context window', () => {
    const session = new ConversationSession();
    session.append('counterparty', 'one');
    session.append('agent', 'two');
    session.append('counterparty', 'three');

    expect(session.contextWindow(2)).toBe('You: two\nScammer: three');
    expect(session.contextWindow(0)).toBe('');
  });

  it('should return snapshots that do not change with the session', () => {
    const session = new ConversationSession();
    session.append('counterparty', 'first');
    session.accumulate({ upiIds: ['abc@upi'] });

    const snapshot = session.snapshot();
    session.append('agent', 'second');
    session.accumulate({ upiIds: ['xyz@ybl'] });

    expect(snapshot.messages).toHaveLength(1);
    expect(snapshot.indicators.upiIds).toEqual(['abc@upi']);
  });

  it('should serialize dates as ISO strings', () => {
    const time = manualClock(Date.parse('2026-03-01T10:00:00.000Z'));
    const session = new ConversationSession({ id: 's-json', clock: time.clock });
    session.append('counterparty', 'hi');

    const json = session.toJSON();
    expect(json.id).toBe('s-json');
    expect(json.createdAt).toBe('2026-03-01T10:00:00.000Z');
    expect(json.messages).toEqual([
      { role: 'counterparty', content: 'hi', timestamp: '2026-03-01T10:00:00.000Z' },
    ]);
  });
});
