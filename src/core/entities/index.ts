export { ConversationSession, type Clock, type SessionOptions } from './Session.js';
export { MessageEntity } from './Message.js';
export { IndicatorSet } from './IndicatorSet.js';
export * from './types.js';
