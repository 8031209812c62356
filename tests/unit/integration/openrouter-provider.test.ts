/**
 * OpenRouterProvider - Unit Tests
 *
 * fetch is stubbed; nothing leaves the process
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OpenRouterProvider } from '../../../src/integration/providers/OpenRouterProvider.js';
import { createProviderFromConfig } from '../../../src/integration/providers/factory.js';
import { GoogleAIProvider } from '../../../src/integration/providers/GoogleAIProvider.js';
import { LLMError } from '../../../src/core/errors.js';
import { HoneytrapConfigSchema } from '../../../src/core/HoneytrapConfig.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('OpenRouterProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  it('should post a chat completion and map the response', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        id: 'gen-1',
        model: 'google/gemini-2.0-flash-001',
        choices: [
          { index: 0, message: { role: 'assistant', content: 'Which bank?' }, finish_reason: 'stop' },
        ],
        usage: { prompt_tokens: 20, completion_tokens: 3, total_tokens: 23 },
      })
    );
    const provider = new OpenRouterProvider({ apiKey: 'test-secret', baseUrl: 'http://router.test/api' });

    const completion = await provider.complete(
      [
        { role: 'system', content: 'persona' },
        { role: 'user', content: 'hello' },
      ],
      { maxTokens: 100, temperature: 0.5 }
    );

    expect(completion).toEqual({
      content: 'Which bank?',
      finishReason: 'stop',
      usage: { inputTokens: 20, outputTokens: 3 },
    });

    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('http://router.test/api/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
      'X-Title': 'Honeytrap',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'google/gemini-2.0-flash-001',
      max_tokens: 100,
      temperature: 0.5,
      messages: [
        { role: 'system', content: 'persona' },
        { role: 'user', content: 'hello' },
      ],
    });
  });

  it('should forward the caller abort signal', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ id: 'x', model: 'm', choices: [{ index: 0, message: { role: 'assistant', content: 'ok' }, finish_reason: 'length' }] })
    );
    const controller = new AbortController();
    const provider = new OpenRouterProvider({ apiKey: 'test-secret' });

    const completion = await provider.complete([{ role: 'user', content: 'hi' }], { signal: controller.signal });

    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
    expect(completion.finishReason).toBe('length');
    expect(completion.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it('should map content filtering to a safety stop', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ id: 'x', model: 'm', choices: [{ index: 0, message: { role: 'assistant', content: null }, finish_reason: 'content_filter' }] })
    );
    const provider = new OpenRouterProvider({ apiKey: 'test-secret' });

    const completion = await provider.complete([{ role: 'user', content: 'hi' }]);

    expect(completion.content).toBe('');
    expect(completion.finishReason).toBe('safety');
  });

  it('should raise an LLMError on a non-ok response', async () => {
    fetchMock.mockResolvedValueOnce(new Response('rate limited', { status: 429 }));
    const provider = new OpenRouterProvider({ apiKey: 'test-secret' });

    await expect(provider.complete([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'OpenRouter API error: 429 - rate limited'
    );
  });

  it('should raise an LLMError when no choices come back', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'x', model: 'm', choices: [] }));
    const provider = new OpenRouterProvider({ apiKey: 'test-secret' });

    await expect(provider.complete([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(LLMError);
  });

  it('should report health from the models endpoint', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: [] }));
    fetchMock.mockRejectedValueOnce(new Error('connection refused'));
    const provider = new OpenRouterProvider({ apiKey: 'test-secret' });

    await expect(provider.isHealthy()).resolves.toBe(true);
    await expect(provider.isHealthy()).resolves.toBe(false);
  });

  it('should fall back to generic model info for unknown models', () => {
    const provider = new OpenRouterProvider({ apiKey: 'test-secret', model: 'vendor/custom' });
    expect(provider.getModel()).toEqual({
      id: 'vendor/custom',
      name: 'vendor/custom',
      maxTokens: 4096,
      contextWindow: 32000,
    });
  });
});

describe('createProviderFromConfig', () => {
  const llm = HoneytrapConfigSchema.parse({}).llm;

  it('should return nothing without an api key', () => {
    expect(createProviderFromConfig({ ...llm, provider: 'google', apiKey: undefined })).toBeUndefined();
  });

  it('should return nothing when disabled', () => {
    expect(createProviderFromConfig({ ...llm, provider: 'none', apiKey: 'test-secret' })).toBeUndefined();
  });

  it('should build the configured provider', () => {
    expect(createProviderFromConfig({ ...llm, provider: 'openrouter', apiKey: 'test-secret' })).toBeInstanceOf(
      OpenRouterProvider
    );
    expect(createProviderFromConfig({ ...llm, provider: 'google', apiKey: 'test-secret' })).toBeInstanceOf(
      GoogleAIProvider
    );
  });
});
