/**
 * ApiServer - HTTP surface of the honeypot on node:http
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { HoneytrapConfig } from '../core/HoneytrapConfig.js';
import {
  AuthenticationError,
  PayloadTooLargeError,
  ValidationError,
} from '../core/errors.js';
import { toExtractedIntelligence } from '../integration/webhooks/ResultReporter.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { validateApiKey } from './auth.js';
import type { ConversationHandler } from './ConversationHandler.js';
import { parseHoneypotRequest } from './schemas.js';

export interface ServiceStatus {
  name: string;
  version: string;
  environment: string;
  activeSessions: number;
  uptime: number;
  llm: { provider: string; model: string; configured: boolean };
  callbackConfigured: boolean;
}

export interface ApiServerOptions {
  handler: ConversationHandler;
  config: HoneytrapConfig['api'];
  getStatus: () => ServiceStatus;
  isReady: () => boolean;
  logger?: Logger;
}

const SESSION_PATH = /^\/api\/sessions\/([^/]+)$/;

export class ApiServer {
  private readonly handler: ConversationHandler;
  private readonly config: HoneytrapConfig['api'];
  private readonly getStatus: () => ServiceStatus;
  private readonly isReady: () => boolean;
  private readonly logger: Logger;
  private httpServer: Server | null = null;

  constructor(options: ApiServerOptions) {
    this.handler = options.handler;
    this.config = options.config;
    this.getStatus = options.getStatus;
    this.isReady = options.isReady;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Bound port once listening; useful when configured with port 0
   */
  get port(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  async start(): Promise<void> {
    const { port, host } = this.config;

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        this.logger.error({ err: error }, 'Unhandled API request error');
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ status: 'error', error: 'Internal server error' }));
        }
      });
    });
    this.httpServer = server;

    return new Promise<void>((resolve, reject) => {
      server.once('error', (err) => {
        this.logger.error({ err, port, host }, 'API server failed to start');
        reject(err);
      });

      server.listen(port, host, () => {
        this.logger.info({ port: this.port, host }, 'API server listening');
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;

    return new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.logger.debug('API server stopped');
        this.httpServer = null;
        resolve();
      });
      server.closeAllConnections();
    });
  }

  /**
   * Route and answer one request
   */
  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
    const path = url.pathname;
    const method = req.method || 'GET';

    if (this.config.cors) {
      res.setHeader('Access-Control-Allow-Origin', '*');
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, x-api-key');
    }

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const json = (status: number, data: unknown) => {
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(data));
    };

    try {
      // Health check
      if (method === 'GET' && (path === '/health' || path === '/healthz')) {
        json(200, {
          status: 'healthy',
          uptime: this.getStatus().uptime,
          timestamp: new Date().toISOString(),
        });
        return;
      }

      // Readiness check
      if (method === 'GET' && (path === '/ready' || path === '/readyz')) {
        if (this.isReady()) {
          json(200, { status: 'ready' });
        } else {
          json(503, { status: 'not ready' });
        }
        return;
      }

      // Service info
      if (method === 'GET' && path === '/') {
        const status = this.getStatus();
        json(200, {
          name: status.name,
          version: status.version,
          endpoint: '/honeypot',
          method: 'POST',
        });
        return;
      }

      // Status
      if (method === 'GET' && path === '/api/status') {
        validateApiKey(req.headers, this.config.apiKey);
        json(200, this.getStatus());
        return;
      }

      // Conversation turn
      if (method === 'POST' && (path === '/honeypot' || path === '/api/honeypot')) {
        const callerKey = validateApiKey(req.headers, this.config.apiKey);
        const turn = parseHoneypotRequest(await this.parseRequestBody(req));
        const result = await this.handler.handle(turn, callerKey);
        json(200, { status: 'success', ...result });
        return;
      }

      // Explicit end
      const sessionMatch = SESSION_PATH.exec(path);
      if (method === 'DELETE' && sessionMatch?.[1]) {
        validateApiKey(req.headers, this.config.apiKey);
        const sessionId = decodeURIComponent(sessionMatch[1]);
        const ended = await this.handler.endSession(sessionId);
        if (!ended) {
          json(404, { status: 'error', error: `Session not found: ${sessionId}` });
          return;
        }

        const { snapshot } = ended;
        json(200, {
          status: 'success',
          sessionId: snapshot.id,
          sessionEnded: true,
          totalMessagesExchanged: snapshot.messages.length,
          extractedIntelligence: toExtractedIntelligence(
            ended.finalIndicators ?? snapshot.indicators,
            snapshot.suspiciousKeywords
          ),
        });
        return;
      }

      json(404, { status: 'error', error: 'Not found' });
    } catch (error) {
      this.respondWithError(res, error);
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private respondWithError(res: ServerResponse, error: unknown): void {
    const send = (status: number, data: unknown) => {
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(data));
    };

    if (error instanceof AuthenticationError) {
      send(error.status, { status: 'error', error: error.message });
      return;
    }
    if (error instanceof ValidationError) {
      send(400, { status: 'error', error: error.message, details: error.validationErrors });
      return;
    }
    if (error instanceof PayloadTooLargeError) {
      send(413, { status: 'error', error: error.message });
      return;
    }

    this.logger.error({ err: error }, 'Error processing request');
    send(500, { status: 'error', error: 'Internal server error' });
  }

  private parseRequestBody(req: IncomingMessage): Promise<unknown> {
    const limit = this.config.maxBodyBytes;

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let rejected = false;

      req.on('data', (chunk: Buffer) => {
        if (rejected) return;
        size += chunk.length;
        if (size > limit) {
          rejected = true;
          reject(new PayloadTooLargeError(limit));
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (rejected) return;
        if (chunks.length === 0) {
          resolve(null);
          return;
        }
        try {
          resolve(JSON.parse(Buffer.concat(chunks).toString('utf-8')));
        } catch {
          reject(
            new ValidationError('Invalid JSON body', [{ field: 'body', message: 'Body is not valid JSON' }])
          );
        }
      });
      req.on('error', reject);
    });
  }
}

export function createApiServer(options: ApiServerOptions): ApiServer {
  return new ApiServer(options);
}
