/**
 * Integration Module - LLM providers and outbound callbacks
 */

export * from './providers/index.js';
export * from './webhooks/index.js';
