/**
 * GoogleAIProvider - Google AI (Gemini) LLM Integration
 *
 * Talks to Gemini models through the official @google/generative-ai client.
 * System messages are folded into the model's system instruction.
 */

import {
  FinishReason,
  GoogleGenerativeAI,
  type Content,
  type GenerateContentResult,
} from '@google/generative-ai';
import { LLMError } from '../../core/errors.js';
import type { LLMProvider, Message, CompletionOptions, Completion, ModelInfo } from './index.js';

// ============================================================================
// Types
// ============================================================================

export interface GoogleAIConfig {
  apiKey: string;
  model?: string;
  timeout?: number;
}

export type GoogleAIModel =
  | 'gemini-2.5-pro'
  | 'gemini-2.5-flash'
  | 'gemini-2.0-flash'
  | 'gemini-2.0-flash-lite'
  | 'gemini-1.5-pro'
  | 'gemini-1.5-flash'
  | string;

const MODEL_INFO: Record<string, ModelInfo> = {
  'gemini-2.5-pro': {
    id: 'gemini-2.5-pro',
    name: 'Gemini 2.5 Pro',
    maxTokens: 65536,
    contextWindow: 1048576,
  },
  'gemini-2.5-flash': {
    id: 'gemini-2.5-flash',
    name: 'Gemini 2.5 Flash',
    maxTokens: 65536,
    contextWindow: 1048576,
  },
  'gemini-2.0-flash': {
    id: 'gemini-2.0-flash',
    name: 'Gemini 2.0 Flash',
    maxTokens: 8192,
    contextWindow: 1048576,
  },
  'gemini-2.0-flash-lite': {
    id: 'gemini-2.0-flash-lite',
    name: 'Gemini 2.0 Flash Lite',
    maxTokens: 8192,
    contextWindow: 1048576,
  },
  'gemini-1.5-pro': {
    id: 'gemini-1.5-pro',
    name: 'Gemini 1.5 Pro',
    maxTokens: 8192,
    contextWindow: 2097152,
  },
  'gemini-1.5-flash': {
    id: 'gemini-1.5-flash',
    name: 'Gemini 1.5 Flash',
    maxTokens: 8192,
    contextWindow: 1048576,
  },
};

// ============================================================================
// GoogleAIProvider Implementation
// ============================================================================

export class GoogleAIProvider implements LLMProvider {
  private readonly client: GoogleGenerativeAI;
  private readonly modelId: GoogleAIModel;
  private readonly timeout: number;

  constructor(config: GoogleAIConfig) {
    this.client = new GoogleGenerativeAI(config.apiKey);
    this.modelId = config.model ?? 'gemini-2.0-flash';
    this.timeout = config.timeout ?? 30000;
  }

  /**
   * Complete a conversation
   */
  async complete(messages: Message[], options?: CompletionOptions): Promise<Completion> {
    const model = this.client.getGenerativeModel(
      {
        model: this.modelId,
        systemInstruction: this.extractSystemInstruction(messages),
        generationConfig: {
          temperature: options?.temperature,
          topP: options?.topP,
          topK: options?.topK,
          maxOutputTokens: options?.maxTokens ?? this.getModel().maxTokens,
          stopSequences: options?.stopSequences,
        },
      },
      { timeout: this.timeout }
    );

    let result: GenerateContentResult;
    try {
      result = await model.generateContent(
        { contents: this.convertMessages(messages) },
        { signal: options?.signal }
      );
    } catch (error) {
      throw new LLMError(
        `Google AI request failed: ${error instanceof Error ? error.message : String(error)}`,
        { model: this.modelId }
      );
    }

    const response = result.response;
    let content: string;
    try {
      content = response.text();
    } catch (error) {
      // text() throws when the candidate was blocked
      throw new LLMError(
        `Google AI returned no usable text: ${error instanceof Error ? error.message : String(error)}`,
        { model: this.modelId }
      );
    }

    return {
      content,
      finishReason: this.mapFinishReason(response.candidates?.[0]?.finishReason),
      usage: {
        inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
        outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
      },
    };
  }

  /**
   * Get model info
   */
  getModel(): ModelInfo {
    return MODEL_INFO[this.modelId] ?? {
      id: this.modelId,
      name: this.modelId,
      maxTokens: 8192,
      contextWindow: 1048576,
    };
  }

  /**
   * Check provider health
   */
  async isHealthy(): Promise<boolean> {
    try {
      const model = this.client.getGenerativeModel({ model: this.modelId }, { timeout: this.timeout });
      await model.countTokens('ping');
      return true;
    } catch {
      return false;
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private convertMessages(messages: Message[]): Content[] {
    return messages
      .filter((msg) => msg.role !== 'system')
      .map((msg) => ({
        role: msg.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: msg.content }],
      }));
  }

  private extractSystemInstruction(messages: Message[]): string | undefined {
    const system = messages
      .filter((msg) => msg.role === 'system')
      .map((msg) => msg.content)
      .join('\n\n');
    return system.length > 0 ? system : undefined;
  }

  private mapFinishReason(reason: FinishReason | undefined): Completion['finishReason'] {
    switch (reason) {
      case FinishReason.MAX_TOKENS:
        return 'length';
      case FinishReason.SAFETY:
      case FinishReason.RECITATION:
        return 'safety';
      default:
        return 'stop';
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createGoogleAIProvider(config: GoogleAIConfig): GoogleAIProvider {
  return new GoogleAIProvider(config);
}

export default GoogleAIProvider;
