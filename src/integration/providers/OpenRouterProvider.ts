/**
 * OpenRouterProvider - OpenRouter chat completions over fetch
 */

import { LLMError } from '../../core/errors.js';
import type { LLMProvider, Message, CompletionOptions, Completion, ModelInfo } from './index.js';

// ============================================================================
// Types
// ============================================================================

export interface OpenRouterConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  siteUrl?: string;
  siteName?: string;
  timeout?: number;
}

export type OpenRouterModel =
  | 'google/gemini-2.0-flash-001'
  | 'google/gemini-2.0-flash-lite-001'
  | 'google/gemini-2.5-flash'
  | 'meta-llama/llama-3.1-70b-instruct'
  | 'qwen/qwen-2.5-72b-instruct'
  | string;

interface OpenRouterMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

interface OpenRouterResponse {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: 'assistant';
      content: string | null;
    };
    finish_reason: 'stop' | 'length' | 'tool_calls' | 'content_filter' | null;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

// ============================================================================
// Model Info Registry
// ============================================================================

const MODEL_INFO: Record<string, ModelInfo> = {
  'google/gemini-2.0-flash-001': {
    id: 'google/gemini-2.0-flash-001',
    name: 'Gemini 2.0 Flash',
    maxTokens: 8192,
    contextWindow: 1000000,
  },
  'google/gemini-2.0-flash-lite-001': {
    id: 'google/gemini-2.0-flash-lite-001',
    name: 'Gemini 2.0 Flash Lite',
    maxTokens: 8192,
    contextWindow: 1000000,
  },
  'google/gemini-2.5-flash': {
    id: 'google/gemini-2.5-flash',
    name: 'Gemini 2.5 Flash',
    maxTokens: 65536,
    contextWindow: 1000000,
  },
  'meta-llama/llama-3.1-70b-instruct': {
    id: 'meta-llama/llama-3.1-70b-instruct',
    name: 'Llama 3.1 70B Instruct',
    maxTokens: 4096,
    contextWindow: 128000,
  },
  'qwen/qwen-2.5-72b-instruct': {
    id: 'qwen/qwen-2.5-72b-instruct',
    name: 'Qwen 2.5 72B Instruct',
    maxTokens: 8192,
    contextWindow: 32768,
  },
};

// ============================================================================
// OpenRouterProvider Implementation
// ============================================================================

export class OpenRouterProvider implements LLMProvider {
  private readonly config: Required<OpenRouterConfig>;
  private readonly model: OpenRouterModel;

  constructor(config: OpenRouterConfig) {
    this.config = {
      apiKey: config.apiKey,
      baseUrl: config.baseUrl ?? 'https://openrouter.ai/api',
      model: config.model ?? 'google/gemini-2.0-flash-001',
      siteUrl: config.siteUrl ?? '',
      siteName: config.siteName ?? 'Honeytrap',
      timeout: config.timeout ?? 30000,
    };
    this.model = this.config.model;
  }

  /**
   * Complete a conversation
   */
  async complete(messages: Message[], options?: CompletionOptions): Promise<Completion> {
    const modelInfo = this.getModel();
    const response = await this.makeRequest<OpenRouterResponse>(
      '/v1/chat/completions',
      {
        model: this.model,
        max_tokens: options?.maxTokens ?? modelInfo.maxTokens,
        temperature: options?.temperature ?? 1.0,
        top_p: options?.topP,
        top_k: options?.topK,
        stop: options?.stopSequences,
        messages: this.convertMessages(messages),
      },
      options?.signal
    );

    return this.convertResponse(response);
  }

  /**
   * Get model info
   */
  getModel(): ModelInfo {
    return MODEL_INFO[this.model] ?? {
      id: this.model,
      name: this.model,
      maxTokens: 4096,
      contextWindow: 32000,
    };
  }

  /**
   * Check provider health
   */
  async isHealthy(): Promise<boolean> {
    try {
      const response = await fetch(`${this.config.baseUrl}/v1/models`, {
        headers: {
          'Authorization': `Bearer ${this.config.apiKey}`,
        },
        signal: AbortSignal.timeout(this.config.timeout),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private convertMessages(messages: Message[]): OpenRouterMessage[] {
    return messages.map(msg => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private convertResponse(response: OpenRouterResponse): Completion {
    const choice = response.choices[0];
    if (!choice) {
      throw new LLMError('OpenRouter returned no choices', { model: this.model });
    }

    let finishReason: Completion['finishReason'] = 'stop';
    if (choice.finish_reason === 'length') finishReason = 'length';
    if (choice.finish_reason === 'content_filter') finishReason = 'safety';

    return {
      content: choice.message.content ?? '',
      finishReason,
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      },
    };
  }

  private async makeRequest<T>(
    endpoint: string,
    body: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    const url = `${this.config.baseUrl}${endpoint}`;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.config.apiKey}`,
    };

    if (this.config.siteUrl) {
      headers['HTTP-Referer'] = this.config.siteUrl;
    }
    if (this.config.siteName) {
      headers['X-Title'] = this.config.siteName;
    }

    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: signal ?? AbortSignal.timeout(this.config.timeout),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new LLMError(`OpenRouter API error: ${response.status} - ${error}`, {
        status: response.status,
        model: this.model,
      });
    }

    return response.json() as Promise<T>;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createOpenRouterProvider(config: OpenRouterConfig): OpenRouterProvider {
  return new OpenRouterProvider(config);
}

export default OpenRouterProvider;
