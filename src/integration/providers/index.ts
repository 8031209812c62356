/**
 * AI Provider Integration - LLM providers behind one interface
 */

export interface LLMProvider {
  complete(messages: Message[], options?: CompletionOptions): Promise<Completion>;
  getModel(): ModelInfo;
  isHealthy(): Promise<boolean>;
}

export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  topK?: number;
  stopSequences?: string[];
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

export interface Completion {
  content: string;
  finishReason: 'stop' | 'length' | 'safety';
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface ModelInfo {
  id: string;
  name: string;
  maxTokens: number;
  contextWindow: number;
}

// Provider implementations
export {
  GoogleAIProvider,
  createGoogleAIProvider,
  type GoogleAIConfig,
  type GoogleAIModel,
} from './GoogleAIProvider.js';

export {
  OpenRouterProvider,
  createOpenRouterProvider,
  type OpenRouterConfig,
  type OpenRouterModel,
} from './OpenRouterProvider.js';

export { createProviderFromConfig } from './factory.js';
