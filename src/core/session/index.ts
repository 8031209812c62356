/**
 * Session Module - session store, lifecycle and exit detection
 */

export {
  SessionStore,
  createSessionStore,
  DEFAULT_SESSION_TIMEOUT_MS,
  type SessionStoreOptions,
  type SessionStoreEvents,
  type GetOrCreateRequest,
  type SessionLookup,
} from './SessionStore.js';
export { isExitMessage, EXIT_VOCABULARY } from './exit.js';
