export {
  ReplyGenerator,
  createReplyGenerator,
  buildPersonaInstructions,
  buildReplyPrompt,
  limitSentences,
  HONEYPOT_PERSONA_INSTRUCTIONS,
  MAX_REPLY_SENTENCES,
  type ReplyGeneratorOptions,
} from './ReplyGenerator.js';
