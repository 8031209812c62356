/**
 * Conversation Flow - Integration Tests
 *
 * A whole engagement through the HTTP surface, and the expiry path through
 * the store. The result callback is intercepted in process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { Honeytrap } from '../../src/Honeytrap.js';
import { EXIT_REPLY } from '../../src/api/ConversationHandler.js';
import { SessionStore } from '../../src/core/session/SessionStore.js';
import type { SessionEndResult } from '../../src/core/entities/types.js';
import { IndicatorExtractor } from '../../src/detection/IndicatorExtractor.js';
import { ResultReporter, type DispatchResult } from '../../src/integration/webhooks/ResultReporter.js';
import { SCAM_DETECTOR_INSTRUCTIONS } from '../../src/detection/ScamClassifier.js';
import { createSilentLogger } from '../../src/utils/logger.js';
import { MockLLMProvider } from '../mocks/index.js';

const CALLBACK_URL = 'http://callback.test/final-result';
const API_KEY = 'test-key';
const JsonBody = z.record(z.unknown());

const realFetch = globalThis.fetch;

function interceptCallbacks() {
  const callbacks: unknown[] = [];
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    if (String(input) === CALLBACK_URL) {
      callbacks.push(JSON.parse(String(init?.body)));
      return new Response('{}', { status: 200 });
    }
    return realFetch(input, init);
  });
  vi.stubGlobal('fetch', fetchMock);
  return callbacks;
}

describe('Honeytrap conversation flow', () => {
  let honeytrap: Honeytrap;
  let provider: MockLLMProvider;
  let callbacks: unknown[];

  async function send(payload: unknown): Promise<Record<string, unknown>> {
    const response = await fetch(`http://127.0.0.1:${honeytrap.port}/honeypot`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-api-key': API_KEY },
      body: JSON.stringify(payload),
    });
    expect(response.status).toBe(200);
    return JsonBody.parse(await response.json());
  }

  function platformTurn(text: string) {
    return {
      sessionId: 'platform-conv-1',
      message: { sender: 'scammer', text, timestamp: Date.now() },
      conversationHistory: [],
      metadata: { channel: 'SMS', language: 'English', locale: 'IN' },
    };
  }

  beforeEach(async () => {
    callbacks = interceptCallbacks();

    // Verdicts for the classifier, persona lines for everything else
    provider = new MockLLMProvider().respondWith((messages) => {
      if (messages[0]?.content !== SCAM_DETECTOR_INSTRUCTIONS) {
        return 'Oh no! Which bank is this? I am very worried.';
      }
      const prompt = messages[1]?.content ?? '';
      return prompt.includes('account blocked')
        ? '1. Is it a scam? YES\n2. Confidence: 0.9\n3. Reasoning: Demands money under threat.'
        : '1. Is it a scam? NO\n2. Confidence: 0.2\n3. Reasoning: No direct demand.';
    });

    honeytrap = new Honeytrap({
      config: {
        environment: 'test',
        api: { port: 0, host: '127.0.0.1', apiKey: API_KEY },
        callback: { url: CALLBACK_URL },
        logging: { level: 'silent' },
      },
      provider,
      logger: createSilentLogger(),
    });
    await honeytrap.start();
  });

  afterEach(async () => {
    await honeytrap.stop();
  });

  it('should engage, accumulate, end on exit and deliver the final result once', async () => {
    const dispatched: DispatchResult[] = [];
    honeytrap.on('report:dispatched', (_sessionId, result) => dispatched.push(result));

    const first = await send(platformTurn('Your account blocked. Send money to fraudster@ybl now'));
    expect(first).toMatchObject({
      status: 'success',
      reply: 'Oh no! Which bank is this?',
      scamDetected: true,
      confidence: 0.9,
      reasoning: 'Demands money under threat.',
      sessionEnded: false,
    });
    const sessionId = String(first.sessionId);

    const second = await send(platformTurn('Call me on 9876543210 or visit sbi-verify.online'));
    expect(second).toMatchObject({
      sessionId,
      reply: 'Oh no! Which bank is this?',
      scamDetected: true,
      confidence: 0.9,
      extractedIntelligence: {
        bankAccounts: [],
        upiIds: ['fraudster@ybl'],
        phishingLinks: ['http://sbi-verify.online'],
        phoneNumbers: ['+919876543210'],
        suspiciousKeywords: ['account blocked', 'send money'],
      },
    });

    const last = await send(platformTurn('bye'));
    expect(last).toMatchObject({ sessionId, reply: EXIT_REPLY, sessionEnded: true });

    await honeytrap.flushReports();

    expect(callbacks).toEqual([
      {
        sessionId,
        scamDetected: true,
        totalMessagesExchanged: 5,
        extractedIntelligence: {
          bankAccounts: [],
          upiIds: ['fraudster@ybl'],
          phishingLinks: ['http://sbi-verify.online'],
          phoneNumbers: ['+919876543210'],
          suspiciousKeywords: ['account blocked', 'send money'],
        },
        agentNotes:
          'Scam confirmed (confidence 0.90). Engaged over 5 messages (3 from counterparty). ' +
          'Obtained 1 UPI id, 1 phone number, 1 link. Tactics: account blocked, send money.',
      },
    ]);
    expect(dispatched).toHaveLength(1);
    expect(dispatched[0]?.success).toBe(true);
    expect(honeytrap.getStatus().activeSessions).toBe(0);
  });

  it('should not call back for a session that is ended before anyone wrote', async () => {
    const { session } = honeytrap.store.getOrCreate();

    honeytrap.store.end(session.id);
    await honeytrap.flushReports();

    expect(callbacks).toEqual([]);
  });

  it('should report its status', () => {
    expect(honeytrap.getStatus()).toMatchObject({
      name: 'Honeytrap',
      environment: 'test',
      llm: { provider: 'google', model: 'mock-model', configured: true },
      callbackConfigured: true,
    });
  });
});

describe('Session expiry flow', () => {
  it('should finalize an idle session and deliver what it collected', async () => {
    const callbacks = interceptCallbacks();
    let now = 0;
    const store = new SessionStore({ timeoutMs: 1_000, extractor: new IndicatorExtractor(), clock: () => now });
    const reporter = new ResultReporter({ url: CALLBACK_URL });
    const reports: Array<Promise<DispatchResult>> = [];
    store.on('session:expired', (result: SessionEndResult) => reports.push(reporter.report(result)));

    const extractor = new IndicatorExtractor();
    const { session } = store.getOrCreate({ explicitId: 'S1' });
    for (const text of ['send money to a@upi', 'also call 9876543210']) {
      session.append('counterparty', text);
      session.accumulate(extractor.extract(text));
    }

    now = 1_001;
    const next = store.getOrCreate({ explicitId: 'S1' });
    await Promise.all(reports);

    expect(next.created).toBe(true);
    expect(next.id).not.toBe(session.id);
    expect(callbacks).toHaveLength(1);
    expect(callbacks[0]).toMatchObject({
      sessionId: session.id,
      scamDetected: false,
      totalMessagesExchanged: 2,
      extractedIntelligence: {
        bankAccounts: [],
        upiIds: ['a@upi'],
        phoneNumbers: ['+919876543210'],
      },
    });
  });
});
