import { ConfigurationError } from './errors.js';

type Quote = '"' | "'";

function isQuote(ch: string): ch is Quote {
  return ch === '"' || ch === "'";
}

/**
 * Split a command line into arguments the way a POSIX shell would, minus expansion.
 * Quotes group whitespace, a backslash escapes the next character outside single quotes,
 * and `""` yields an empty argument.
 *
 * @example tokenize(`solve --root "/mnt/my packages"`) // ['solve', '--root', '/mnt/my packages']
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let started = false;
  let quote: Quote | null = null;
  let escaped = false;

  for (const ch of text) {
    if (escaped) {
      current += ch;
      escaped = false;
    } else if (ch === '\\' && quote !== "'") {
      escaped = true;
      started = true;
    } else if (quote !== null) {
      if (ch === quote) quote = null;
      else current += ch;
    } else if (isQuote(ch)) {
      quote = ch;
      started = true;
    } else if (/\s/.test(ch)) {
      if (started) tokens.push(current);
      current = '';
      started = false;
    } else {
      current += ch;
      started = true;
    }
  }

  if (quote !== null) {
    throw new ConfigurationError(`Unterminated ${quote} quote in command: ${text}`);
  }
  if (escaped) {
    throw new ConfigurationError(`Trailing backslash in command: ${text}`);
  }
  if (started) tokens.push(current);

  return tokens;
}
