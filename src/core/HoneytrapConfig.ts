/**
 * Honeytrap configuration management
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Configuration Schema
// ============================================================================

export const LLMConfigSchema = z.object({
  provider: z.enum(['google', 'openrouter', 'none']).default('google'),
  model: z.string().min(1).default('gemini-2.0-flash'),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.9),
  topP: z.number().min(0).max(1).default(0.95),
  topK: z.number().int().min(1).default(50),
  maxTokens: z.number().int().min(1).max(65536).default(2048),
  timeoutMs: z.number().int().min(100).default(10000),
});

export const SessionConfigSchema = z.object({
  timeoutMinutes: z.number().min(1).default(30),
  contextWindow: z.number().int().min(1).max(50).default(10),
});

export const DetectionConfigSchema = z.object({
  threshold: z.number().min(0).max(1).default(0.5),
  // Keyword weight total at which the heuristic score saturates to 1
  keywordSaturation: z.number().positive().default(10),
});

export const APIConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
  cors: z.boolean().default(true),
  apiKey: z.string().min(1).default('honeytrap-dev-key'),
  maxBodyBytes: z.number().int().min(1024).default(1024 * 1024),
});

export const CallbackConfigSchema = z.object({
  url: z.string().url().optional(),
  timeoutMs: z.number().int().min(100).default(5000),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().default(false),
});

export const EnvironmentSchema = z.enum(['development', 'staging', 'production', 'test']);

export const HoneytrapConfigSchema = z.object({
  name: z.string().min(1).max(64).default('Honeytrap'),
  version: z.string().default('0.1.0'),
  environment: EnvironmentSchema.default('development'),

  llm: LLMConfigSchema.default({}),
  session: SessionConfigSchema.default({}),
  detection: DetectionConfigSchema.default({}),
  api: APIConfigSchema.default({}),
  callback: CallbackConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type HoneytrapConfig = z.infer<typeof HoneytrapConfigSchema>;
export type HoneytrapConfigInput = z.input<typeof HoneytrapConfigSchema>;

// ============================================================================
// Configuration Manager
// ============================================================================

export class ConfigManager {
  private readonly config: HoneytrapConfig;

  constructor(initialConfig: HoneytrapConfigInput = {}) {
    this.config = ConfigManager.parse(initialConfig);
  }

  /**
   * Get the full configuration
   */
  getConfig(): Readonly<HoneytrapConfig> {
    return Object.freeze({ ...this.config });
  }

  /**
   * Get a specific configuration section
   */
  get<K extends keyof HoneytrapConfig>(key: K): HoneytrapConfig[K] {
    return this.config[key];
  }

  /**
   * Session inactivity timeout in milliseconds
   */
  sessionTimeoutMs(): number {
    return this.config.session.timeoutMinutes * 60 * 1000;
  }

  /**
   * Load configuration from environment variables
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ConfigManager {
    const llm: Record<string, unknown> = {};
    const session: Record<string, unknown> = {};
    const detection: Record<string, unknown> = {};
    const api: Record<string, unknown> = {};
    const callback: Record<string, unknown> = {};
    const logging: Record<string, unknown> = {};
    const raw: Record<string, unknown> = {};

    // LLM configuration
    const googleKey = env.GEMINI_API_KEY || env.GOOGLE_AI_API_KEY;
    if (env.OPENROUTER_API_KEY) {
      llm.provider = 'openrouter';
      llm.apiKey = env.OPENROUTER_API_KEY;
      llm.model = 'google/gemini-2.0-flash-001';
    } else if (googleKey) {
      llm.provider = 'google';
      llm.apiKey = googleKey;
    } else {
      llm.provider = 'none';
    }
    if (env.HONEYTRAP_MODEL) llm.model = env.HONEYTRAP_MODEL;
    if (env.HONEYTRAP_LLM_TIMEOUT_MS) llm.timeoutMs = toNumber(env.HONEYTRAP_LLM_TIMEOUT_MS);

    // Session
    if (env.HONEYTRAP_SESSION_TIMEOUT_MINUTES) {
      session.timeoutMinutes = toNumber(env.HONEYTRAP_SESSION_TIMEOUT_MINUTES);
    }
    if (env.HONEYTRAP_CONTEXT_WINDOW) session.contextWindow = toNumber(env.HONEYTRAP_CONTEXT_WINDOW);

    // Detection
    if (env.HONEYTRAP_SCAM_THRESHOLD) detection.threshold = toNumber(env.HONEYTRAP_SCAM_THRESHOLD);

    // API
    if (env.HONEYTRAP_API_KEY) api.apiKey = env.HONEYTRAP_API_KEY;
    if (env.PORT) api.port = toNumber(env.PORT);
    if (env.HONEYTRAP_HOST) api.host = env.HONEYTRAP_HOST;

    // Result callback
    if (env.HONEYTRAP_CALLBACK_URL) callback.url = env.HONEYTRAP_CALLBACK_URL;
    if (env.HONEYTRAP_CALLBACK_TIMEOUT_MS) {
      callback.timeoutMs = toNumber(env.HONEYTRAP_CALLBACK_TIMEOUT_MS);
    }

    // Logging
    if (env.HONEYTRAP_LOG_LEVEL) logging.level = env.HONEYTRAP_LOG_LEVEL;
    if (env.HONEYTRAP_LOG_PRETTY) logging.pretty = env.HONEYTRAP_LOG_PRETTY === 'true';

    const environment = EnvironmentSchema.safeParse(env.NODE_ENV);
    if (environment.success) raw.environment = environment.data;

    return new ConfigManager(
      ConfigManager.parse({ ...raw, llm, session, detection, api, callback, logging })
    );
  }

  private static parse(input: unknown): HoneytrapConfig {
    const result = HoneytrapConfigSchema.safeParse(input);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new ConfigurationError(`Invalid configuration: ${errors.join(', ')}`, { errors });
    }
    return result.data;
  }
}

function toNumber(value: string): number {
  return Number(value.trim());
}
