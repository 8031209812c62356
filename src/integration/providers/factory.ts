import type { HoneytrapConfig } from '../../core/HoneytrapConfig.js';
import { GoogleAIProvider } from './GoogleAIProvider.js';
import { OpenRouterProvider } from './OpenRouterProvider.js';
import type { LLMProvider } from './index.js';

/**
 * Build the configured provider, or undefined when none is configured or the
 * key is missing. Callers fall back to heuristics without one.
 */
export function createProviderFromConfig(llm: HoneytrapConfig['llm']): LLMProvider | undefined {
  if (llm.provider === 'none' || !llm.apiKey) return undefined;

  if (llm.provider === 'openrouter') {
    return new OpenRouterProvider({
      apiKey: llm.apiKey,
      baseUrl: llm.baseUrl,
      model: llm.model,
      timeout: llm.timeoutMs,
    });
  }

  return new GoogleAIProvider({
    apiKey: llm.apiKey,
    model: llm.model,
    timeout: llm.timeoutMs,
  });
}
