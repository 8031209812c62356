/**
 * Honeytrap - conversational scam honeypot
 *
 * Engages suspected scammers with a believable persona and accumulates
 * their bank accounts, UPI ids, phone numbers and links across a
 * multi-turn conversation.
 *
 * @packageDocumentation
 */

export { Honeytrap, createHoneytrap, type HoneytrapOptions, type HoneytrapEvents } from './Honeytrap.js';

// Core
export * from './core/entities/index.js';
export * from './core/session/index.js';
export * from './core/errors.js';
export * from './core/HoneytrapConfig.js';

// Collaborators
export * from './detection/index.js';
export * from './persona/index.js';
export * from './integration/index.js';

// Outer surface
export * from './api/index.js';

// Utilities
export { createLogger, createSilentLogger, type Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
export { withTimeout } from './utils/timeout.js';
export { TurnLock } from './utils/TurnLock.js';
