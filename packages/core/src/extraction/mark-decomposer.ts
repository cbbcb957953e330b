import { MalformedMarkError } from '../exceptions.js';

export interface MarkParts {
  readonly prefix: string;
  readonly number: string;
  readonly suffix: string;
}

const TRAILING_LETTER_RE = /[A-Za-z]$/;
const TRAILING_DIGITS_RE = /\d+$/;

/**
 * Splits a specimen mark into `<prefix><digits><letter>`.
 * `20250621-45D-1A` -> `{ prefix: '20250621-45D-', number: '1', suffix: 'A' }`
 */
export function decomposeMark(token: string): MarkParts {
  if (token.length === 0) {
    throw new MalformedMarkError(token, 'empty mark');
  }
  if (!TRAILING_LETTER_RE.test(token)) {
    throw new MalformedMarkError(token, 'no trailing letter');
  }

  const suffix = token.slice(-1);
  const head = token.slice(0, -1);
  const digits = head.match(TRAILING_DIGITS_RE);
  if (!digits) {
    throw new MalformedMarkError(token, 'no sequence number before the suffix');
  }

  const number = digits[0];
  const prefix = head.slice(0, head.length - number.length);
  if (prefix.length === 0) {
    throw new MalformedMarkError(token, 'no prefix');
  }

  return { prefix, number, suffix };
}
