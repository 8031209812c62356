/**
 * Exit detection - recognizes a counterparty asking to end the conversation
 */

export const EXIT_VOCABULARY: readonly string[] = [
  'exit',
  'quit',
  'bye',
  'goodbye',
  'stop',
  'end',
  'done',
  'reset',
  'restart',
  'start over',
  'end chat',
  'end session',
  'new session',
];

// Messages this short count as an exit when a term appears anywhere in them
const SHORT_MESSAGE_TOKENS = 3;

const TERMS: readonly string[][] = EXIT_VOCABULARY.map(tokenize);

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .trim()
    .split(/[^a-z0-9']+/)
    .filter((t) => t.length > 0);
}

function matchesAt(tokens: string[], term: string[], offset: number): boolean {
  if (offset < 0 || offset + term.length > tokens.length) return false;
  return term.every((t, i) => tokens[offset + i] === t);
}

/**
 * True when the text is an exit command: a vocabulary term as the whole
 * message, its leading or trailing word(s), or any whole-token occurrence in
 * a message of at most three words. Substrings of longer words never match.
 */
export function isExitMessage(text: string): boolean {
  const tokens = tokenize(text);
  if (tokens.length === 0) return false;

  return TERMS.some((term) => {
    if (matchesAt(tokens, term, 0)) return true;
    if (matchesAt(tokens, term, tokens.length - term.length)) return true;
    if (tokens.length > SHORT_MESSAGE_TOKENS) return false;
    for (let i = 1; i < tokens.length - term.length; i++) {
      if (matchesAt(tokens, term, i)) return true;
    }
    return false;
  });
}
