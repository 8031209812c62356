/**
 * API Module - HTTP server, auth and request handling
 */

export { ApiServer, createApiServer, type ApiServerOptions, type ServiceStatus } from './server.js';
export {
  ConversationHandler,
  createConversationHandler,
  EXIT_REPLY,
  FALLBACK_REPLIES,
  type Classifier,
  type ConversationHandlerOptions,
  type ReplyWriter,
  type TurnResult,
} from './ConversationHandler.js';
export { validateApiKey, API_KEY_HEADER } from './auth.js';
export {
  parseHoneypotRequest,
  senderToRole,
  toValidationError,
  SimpleRequestSchema,
  PlatformRequestSchema,
  PlatformMessageSchema,
  MetadataSchema,
  type HistoryEntry,
  type InboundTurn,
  type PlatformMessage,
  type PlatformRequest,
  type SimpleRequest,
} from './schemas.js';
