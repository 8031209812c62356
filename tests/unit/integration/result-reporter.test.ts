/**
 * ResultReporter - Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ResultReporter,
  buildFinalPayload,
  summarizeSession,
  toExtractedIntelligence,
} from '../../../src/integration/webhooks/ResultReporter.js';
import { ConversationSession } from '../../../src/core/entities/Session.js';
import type { SessionEndResult } from '../../../src/core/entities/types.js';

function engagedSession(): ConversationSession {
  const session = new ConversationSession({ id: 'session-42' });
  session.append('counterparty', 'Your account is blocked, pay to abc@upi');
  session.append('agent', 'Oh no, which account?');
  session.append('counterparty', 'Call 9876543210 now');
  session.accumulate({ upiIds: ['abc@upi'], phoneNumbers: ['+919876543210'] });
  session.markScam(0.85, ['account blocked', 'upi']);
  return session;
}

describe('summarizeSession', () => {
  it('should describe an engaged scam session', () => {
    expect(summarizeSession(engagedSession().snapshot())).toBe(
      'Scam confirmed (confidence 0.85). Engaged over 3 messages (2 from counterparty). ' +
        'Obtained 1 UPI id, 1 phone number. Tactics: account blocked, upi.'
    );
  });

  it('should describe an empty session', () => {
    expect(summarizeSession(new ConversationSession().snapshot())).toBe(
      'Scam not confirmed. Engaged over 0 messages (0 from counterparty). No identifying details obtained.'
    );
  });

  it('should pluralize and order indicator kinds', () => {
    const snapshot = new ConversationSession().snapshot();
    const indicators = {
      bankAccounts: ['Account: 123456789012'],
      upiIds: [],
      phoneNumbers: ['+919876543210', '+919876543211'],
      urls: ['http://a.in', 'http://b.in'],
    };

    expect(summarizeSession(snapshot, indicators)).toBe(
      'Scam not confirmed. Engaged over 0 messages (0 from counterparty). ' +
        'Obtained 1 bank detail, 2 phone numbers, 2 links.'
    );
  });
});

describe('buildFinalPayload', () => {
  it('should prefer the final indicators and rename urls to phishingLinks', () => {
    const snapshot = engagedSession().snapshot();
    const result: SessionEndResult = {
      snapshot,
      finalIndicators: { ...snapshot.indicators, urls: ['http://kyc.example.in'] },
    };

    const payload = buildFinalPayload(result);

    expect(payload.sessionId).toBe('session-42');
    expect(payload.scamDetected).toBe(true);
    expect(payload.totalMessagesExchanged).toBe(3);
    expect(payload.extractedIntelligence).toEqual({
      bankAccounts: [],
      upiIds: ['abc@upi'],
      phishingLinks: ['http://kyc.example.in'],
      phoneNumbers: ['+919876543210'],
      suspiciousKeywords: ['account blocked', 'upi'],
    });
    expect(payload.agentNotes).toContain('Obtained 1 UPI id, 1 phone number, 1 link.');
  });

  it('should copy arrays instead of sharing them', () => {
    const indicators = { bankAccounts: [], upiIds: ['x@upi'], phoneNumbers: [], urls: [] };
    const intel = toExtractedIntelligence(indicators);
    intel.upiIds.push('y@upi');
    expect(indicators.upiIds).toEqual(['x@upi']);
  });
});

describe('ResultReporter', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  it('should skip without a callback url', async () => {
    const reporter = new ResultReporter();

    expect(reporter.enabled).toBe(false);
    await expect(reporter.report({ snapshot: engagedSession().snapshot() })).resolves.toEqual({
      success: false,
      skipped: 'no-callback-url',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should skip sessions the counterparty never wrote in', async () => {
    const reporter = new ResultReporter({ url: 'http://callback.test/result' });
    const session = new ConversationSession();
    session.append('agent', 'hello?');

    await expect(reporter.report({ snapshot: session.snapshot() })).resolves.toEqual({
      success: false,
      skipped: 'no-counterparty-messages',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should post the final payload as JSON', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const reporter = new ResultReporter({ url: 'http://callback.test/result' });
    const result: SessionEndResult = { snapshot: engagedSession().snapshot() };

    const dispatch = await reporter.report(result);

    expect(dispatch.success).toBe(true);
    expect(dispatch.statusCode).toBe(200);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe('http://callback.test/result');
    expect(call?.[1]?.method).toBe('POST');
    expect(JSON.parse(String(call?.[1]?.body))).toEqual(buildFinalPayload(result));
  });

  it('should report a rejecting endpoint without throwing', async () => {
    fetchMock.mockResolvedValueOnce(new Response('nope', { status: 500 }));
    const reporter = new ResultReporter({ url: 'http://callback.test/result' });

    const dispatch = await reporter.report({ snapshot: engagedSession().snapshot() });

    expect(dispatch.success).toBe(false);
    expect(dispatch.statusCode).toBe(500);
    expect(dispatch.error).toBe('Callback endpoint responded with 500');
  });

  it('should report network failures without throwing', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const reporter = new ResultReporter({ url: 'http://callback.test/result' });

    const dispatch = await reporter.report({ snapshot: engagedSession().snapshot() });

    expect(dispatch.success).toBe(false);
    expect(dispatch.error).toBe('fetch failed');
  });

  it('should name the timeout when the endpoint is too slow', async () => {
    fetchMock.mockRejectedValueOnce(
      Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
    );
    const reporter = new ResultReporter({ url: 'http://callback.test/result', timeoutMs: 250 });

    const dispatch = await reporter.report({ snapshot: engagedSession().snapshot() });

    expect(dispatch.error).toBe('Callback timed out after 250ms');
  });
});
