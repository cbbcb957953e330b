export interface SpecimenLine {
  readonly markToken: string;
  readonly strengthToken: string;
  /** 1-based line number of the line holding the mark */
  readonly lineNumber: number;
}

const REPORT_NUMBER_RE = /Report\s+(?:Number|No\.?)\s*[:#]?\s*([A-Za-z0-9][A-Za-z0-9/-]*)/gi;
const DATE_CAST_RE = /Date\s+Cast\s*:?\s*(\d{2}-[A-Za-z]{3}-\d{4})(?![0-9A-Za-z])/i;
const LOCATION_LABEL_RE = /(?:Pour\s+)?Location\s*:/i;

/** Labels that end a free-text field such as the pour location. */
const FIELD_LABEL_SOURCE =
  'Report\\s+(?:Number|No)|Date\\s+(?:Cast|Tested|Received)|(?:Pour\\s+)?Location\\s*:|Grade\\s*:';
const INLINE_LABEL_RE = new RegExp(`(?:${FIELD_LABEL_SOURCE})`, 'i');
const LEADING_LABEL_RE = new RegExp(`^(?:${FIELD_LABEL_SOURCE})`, 'i');

/** Date stamp, type code, separator, then the rest of the mark (possibly wrapped away). */
const MARK_TOKEN_RE = /^\d{8}-[0-9A-Za-z]+-[0-9A-Za-z-]*$/;
/** Date stamp and type code only; the `-<digits><letter>` tail sits on a later line. */
const TYPE_HEAD_RE = /^\d{8}-[0-9A-Za-z]+$/;
const NUMERIC_TOKEN_RE = /^\d[\d.,]*$/;

const SUFFIX_LINE_RE = /^[A-Za-z]$/;
const NUMBER_SUFFIX_LINE_RE = /^\d+[A-Za-z]$/;
const DASH_NUMBER_SUFFIX_LINE_RE = /^-\s*(\d+[A-Za-z])$/;

/**
 * First report number whose value is not another field's label. A label left
 * blank must not swallow the next line's label, e.g. `Report No.:` then `Date Cast:`.
 */
export function findReportNumber(text: string): string | undefined {
  for (const match of text.matchAll(REPORT_NUMBER_RE)) {
    const valueAt = (match.index ?? 0) + match[0].length - match[1].length;
    const rest = text.slice(valueAt);
    if (LEADING_LABEL_RE.test(rest) || /^[^\s:]+\s*:/.test(rest)) continue;
    return match[1].trim();
  }
  return undefined;
}

export function findDateCast(text: string): string | undefined {
  const match = text.match(DATE_CAST_RE);
  return match ? match[1] : undefined;
}

/**
 * Captures the pour location up to the next field label, a blank line,
 * a specimen line or the end of the block. Wrapped lines are joined by one space.
 */
export function findPourLocation(text: string): string | undefined {
  const label = LOCATION_LABEL_RE.exec(text);
  if (!label) return undefined;

  const rest = text.slice(label.index + label[0].length).split(/\r?\n/);
  const parts: string[] = [];

  for (const [i, line] of rest.entries()) {
    if (i > 0 && (line.trim().length === 0 || containsMark(line))) break;

    const labelAt = line.search(INLINE_LABEL_RE);
    const value = labelAt >= 0 ? line.slice(0, labelAt) : line;
    if (value.trim().length > 0) {
      parts.push(value.trim());
    }
    if (labelAt >= 0) break;
  }

  const location = parts.join(' ');
  return location.length > 0 ? location : undefined;
}

/**
 * Finds specimen lines: a mark token followed, on the same logical line, by a numeric token.
 * The strength is the last numeric token after the mark, which covers both
 * `MARK 82.6` and table rows that carry age and mass columns before the strength.
 * Marks wrapped onto the next one or two lines are re-joined.
 */
export function findSpecimenLines(text: string): SpecimenLine[] {
  const lines = text.split(/\r?\n/);
  const found: SpecimenLine[] = [];

  let i = 0;
  while (i < lines.length) {
    const tokens = lines[i].trim().split(/\s+/);
    const markAt = tokens.findIndex(isMarkToken);
    const strengthToken = markAt >= 0 ? lastNumericToken(tokens.slice(markAt + 1)) : undefined;

    if (markAt < 0 || strengthToken === undefined) {
      i++;
      continue;
    }

    const joined = joinWrappedMark(tokens[markAt], lines, i);
    if (!joined) {
      i++;
      continue;
    }

    found.push({ markToken: joined.mark, strengthToken, lineNumber: i + 1 });
    i += 1 + joined.consumed;
  }

  return found;
}

interface JoinedMark {
  readonly mark: string;
  /** Continuation lines consumed after the mark's own line */
  readonly consumed: number;
}

function joinWrappedMark(head: string, lines: readonly string[], at: number): JoinedMark | null {
  const next = lines[at + 1]?.trim() ?? '';

  if (TYPE_HEAD_RE.test(head)) {
    const dashed = next.match(DASH_NUMBER_SUFFIX_LINE_RE);
    if (dashed) return { mark: `${head}-${dashed[1]}`, consumed: 1 };

    const afterNext = lines[at + 2]?.trim() ?? '';
    const dashedLater = afterNext.match(DASH_NUMBER_SUFFIX_LINE_RE);
    if (dashedLater) return { mark: `${head}-${dashedLater[1]}`, consumed: 2 };

    return null;
  }

  if (/-\d+$/.test(head) && SUFFIX_LINE_RE.test(next)) {
    return { mark: `${head}${next}`, consumed: 1 };
  }
  if (head.endsWith('-') && NUMBER_SUFFIX_LINE_RE.test(next)) {
    return { mark: `${head}${next}`, consumed: 1 };
  }

  return { mark: head, consumed: 0 };
}

function lastNumericToken(tokens: readonly string[]): string | undefined {
  for (let i = tokens.length - 1; i >= 0; i--) {
    if (NUMERIC_TOKEN_RE.test(tokens[i])) return tokens[i];
  }
  return undefined;
}

function isMarkToken(token: string): boolean {
  return MARK_TOKEN_RE.test(token) || TYPE_HEAD_RE.test(token);
}

function containsMark(line: string): boolean {
  return line.trim().split(/\s+/).some(isMarkToken);
}
