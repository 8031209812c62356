/**
 * Honeytrap - conversational scam-engagement service
 *
 * Composition root: builds the session store, detection collaborators,
 * persona, result reporter and HTTP API from one configuration, and owns
 * their lifecycle.
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';

import { ConfigManager, type HoneytrapConfig, type HoneytrapConfigInput } from './core/HoneytrapConfig.js';
import type { SessionEndResult } from './core/entities/types.js';
import { SessionStore } from './core/session/SessionStore.js';
import { IndicatorExtractor } from './detection/IndicatorExtractor.js';
import { ScamClassifier } from './detection/ScamClassifier.js';
import { ReplyGenerator } from './persona/ReplyGenerator.js';
import { createProviderFromConfig } from './integration/providers/factory.js';
import type { LLMProvider } from './integration/providers/index.js';
import { ResultReporter, type DispatchResult } from './integration/webhooks/ResultReporter.js';
import { ConversationHandler } from './api/ConversationHandler.js';
import { ApiServer, type ServiceStatus } from './api/server.js';
import { createLogger, type Logger } from './utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface HoneytrapOptions {
  /** Explicit configuration; read from the environment when omitted */
  config?: HoneytrapConfigInput;
  /** Overrides the provider built from configuration */
  provider?: LLMProvider;
  logger?: Logger;
}

export interface HoneytrapEvents {
  ready: () => void;
  shutdown: () => void;
  'session:ended': (result: SessionEndResult) => void;
  'session:expired': (result: SessionEndResult) => void;
  'report:dispatched': (sessionId: string, result: DispatchResult) => void;
}

// ============================================================================
// Honeytrap Main Class
// ============================================================================

export class Honeytrap extends EventEmitter<HoneytrapEvents> {
  readonly id: string;
  readonly store: SessionStore;
  readonly handler: ConversationHandler;
  readonly reporter: ResultReporter;

  private readonly configManager: ConfigManager;
  private readonly logger: Logger;
  private readonly provider?: LLMProvider;
  private readonly api: ApiServer;
  private readonly pendingReports = new Set<Promise<void>>();

  private isRunning = false;
  private startTime?: Date;

  constructor(options: HoneytrapOptions = {}) {
    super();
    this.id = uuidv4();

    this.configManager = options.config
      ? new ConfigManager(options.config)
      : ConfigManager.fromEnv();
    const config = this.configManager.getConfig();

    this.logger =
      options.logger ??
      createLogger({ level: config.logging.level, pretty: config.logging.pretty, name: 'honeytrap' });

    this.provider = options.provider ?? createProviderFromConfig(config.llm);
    if (!this.provider) {
      this.logger.warn('No LLM provider configured; using keyword heuristics and canned replies');
    }

    const extractor = new IndicatorExtractor({ logger: this.logger.child({ component: 'extractor' }) });

    this.store = new SessionStore({
      timeoutMs: this.configManager.sessionTimeoutMs(),
      extractor,
      logger: this.logger.child({ component: 'session-store' }),
    });

    const generation = {
      temperature: config.llm.temperature,
      topP: config.llm.topP,
      topK: config.llm.topK,
      maxTokens: config.llm.maxTokens,
    };

    this.handler = new ConversationHandler({
      store: this.store,
      extractor,
      classifier: new ScamClassifier({
        provider: this.provider,
        threshold: config.detection.threshold,
        saturation: config.detection.keywordSaturation,
        timeoutMs: config.llm.timeoutMs,
        generation: { ...generation, temperature: Math.min(generation.temperature, 0.3) },
        logger: this.logger.child({ component: 'classifier' }),
      }),
      replyGenerator: new ReplyGenerator({
        provider: this.provider,
        timeoutMs: config.llm.timeoutMs,
        generation: { ...generation, maxTokens: Math.min(generation.maxTokens, 150) },
        logger: this.logger.child({ component: 'persona' }),
      }),
      contextWindow: config.session.contextWindow,
      logger: this.logger.child({ component: 'conversation' }),
    });

    this.reporter = new ResultReporter({
      url: config.callback.url,
      timeoutMs: config.callback.timeoutMs,
      logger: this.logger.child({ component: 'callback' }),
    });

    this.store.on('session:ended', (result) => {
      this.emit('session:ended', result);
      this.dispatchReport(result);
    });
    this.store.on('session:expired', (result) => {
      this.emit('session:expired', result);
      this.dispatchReport(result);
    });

    this.api = new ApiServer({
      handler: this.handler,
      config: config.api,
      getStatus: () => this.getStatus(),
      isReady: () => this.isRunning,
      logger: this.logger.child({ component: 'api' }),
    });

    this.logger.info({ instanceId: this.id }, 'Honeytrap instance created');
  }

  // ==========================================================================
  // Lifecycle Methods
  // ==========================================================================

  /**
   * Start the API server (when enabled)
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Honeytrap is already running');
      return;
    }

    const config = this.configManager.getConfig();
    if (config.api.enabled) {
      await this.api.start();
    }

    this.isRunning = true;
    this.startTime = new Date();
    this.logger.info({ environment: config.environment }, 'Honeytrap started');
    this.emit('ready');
  }

  /**
   * Stop serving, wait for in-flight callbacks and drop all sessions
   */
  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.logger.info('Stopping Honeytrap...');
    await this.api.stop();
    await Promise.all([...this.pendingReports]);
    this.store.clear();

    this.isRunning = false;
    this.logger.info('Honeytrap stopped');
    this.emit('shutdown');
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getConfig(): Readonly<HoneytrapConfig> {
    return this.configManager.getConfig();
  }

  /** Bound API port, once started */
  get port(): number | null {
    return this.api.port;
  }

  getStatus(): ServiceStatus {
    const config = this.configManager.getConfig();
    return {
      name: config.name,
      version: config.version,
      environment: config.environment,
      activeSessions: this.store.activeCount(),
      uptime: this.startTime ? Math.floor((Date.now() - this.startTime.getTime()) / 1000) : 0,
      llm: {
        provider: this.provider ? config.llm.provider : 'none',
        model: this.provider ? this.provider.getModel().id : 'keyword-heuristic',
        configured: Boolean(this.provider),
      },
      callbackConfigured: this.reporter.enabled,
    };
  }

  /**
   * Resolves once every callback started so far has settled
   */
  async flushReports(): Promise<void> {
    await Promise.all([...this.pendingReports]);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private dispatchReport(result: SessionEndResult): void {
    if (!this.reporter.enabled) return;

    const sessionId = result.snapshot.id;
    const task: Promise<void> = this.reporter
      .report(result)
      .then((dispatch) => {
        this.emit('report:dispatched', sessionId, dispatch);
      })
      .catch((error: unknown) => {
        this.logger.error({ err: error, sessionId }, 'Result dispatch failed');
      })
      .finally(() => {
        this.pendingReports.delete(task);
      });
    this.pendingReports.add(task);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createHoneytrap(options?: HoneytrapOptions): Honeytrap {
  return new Honeytrap(options);
}

export default Honeytrap;
