/**
 * Comment Extraction Engine
 *
 * Turns the scanner's comment ranges into records that can be sent for
 * correction and later spliced back. Each record keeps enough of the
 * original (delimiters and surrounding whitespace) that
 *
 *   delimiterOpen + leading + rawInnerText + trailing + delimiterClose
 *
 * is exactly the text under its span.
 *
 * Adjacent line comments stay separate records so reinsertion restores the
 * original line boundaries.
 *
 * @module commentExtractor
 */

import { scan, type CommentKind, type Span } from './scanner.js';
import type { LanguageDescriptor } from './languageRegistry.js';
import { spanInvariantViolation } from '../errors/index.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface CommentRecord {
  span: Span;
  kind: CommentKind;
  delimiterOpen: string;
  /** '' for line comments and unterminated block comments */
  delimiterClose: string;
  /** Whitespace between the opening delimiter and the text */
  leading: string;
  /** Comment text without delimiters or surrounding whitespace */
  rawInnerText: string;
  /** Whitespace between the text and the closing delimiter (or line end) */
  trailing: string;
}

export interface CorrectedRecord extends CommentRecord {
  correctedInnerText: string;
}

/**
 * Serializable view of a record, as printed by --dry-run
 */
export interface CommentPayload {
  index: number;
  kind: CommentKind;
  /** 1-based line of the comment's first character */
  line: number;
  text: string;
}

// ASCII only: \s would also match 0xA0, a UTF-8 continuation byte in this representation
const LEADING_WS = /^[ \t\r\n\f\v]*/;
const TRAILING_WS = /[ \t\r\n\f\v]*$/;

// ============================================================================
// Extraction
// ============================================================================

/**
 * Split a comment body into leading whitespace, text, and trailing whitespace
 */
export function splitPadding(body: string): { leading: string; text: string; trailing: string } {
  const leading = LEADING_WS.exec(body)?.[0] ?? '';
  if (leading.length === body.length) {
    return { leading, text: '', trailing: '' };
  }
  const rest = body.slice(leading.length);
  const trailing = TRAILING_WS.exec(rest)?.[0] ?? '';
  return {
    leading,
    text: rest.slice(0, rest.length - trailing.length),
    trailing,
  };
}

/**
 * Extract every comment of the text, in source order
 *
 * @param text - Source text (one character per byte, see sourceText)
 * @param descriptor - Grammar of the source language
 *
 * @example
 * ```typescript
 * extractComments('x = 1  # this is mispelled\n', lookupLanguage('python'))
 * // => [{ span: { start: 7, end: 26 }, kind: 'line', delimiterOpen: '#',
 * //       delimiterClose: '', leading: ' ', rawInnerText: 'this is mispelled', trailing: '' }]
 * ```
 */
export function extractComments(text: string, descriptor: LanguageDescriptor): CommentRecord[] {
  const records: CommentRecord[] = [];

  for (const range of scan(text, descriptor)) {
    if (range.kind !== 'comment') continue;

    const { span, open, close } = range;
    const body = text.slice(span.start + open.length, span.end - close.length);
    const { leading, text: rawInnerText, trailing } = splitPadding(body);

    records.push({
      span,
      kind: range.commentKind,
      delimiterOpen: open,
      delimiterClose: close,
      leading,
      rawInnerText,
      trailing,
    });
  }

  getLogger().debug('commentExtractor', 'Extracted comments', {
    language: descriptor.id,
    count: records.length,
  });

  return records;
}

/**
 * Empty comments (a bare `#` or `//`) have nothing to correct
 */
export function isCorrectable(record: CommentRecord): boolean {
  return record.rawInnerText.length > 0;
}

/**
 * Check that spans are strictly increasing and non-overlapping
 *
 * @param textLength - When given, spans must also lie within [0, textLength]
 * @throws SpellerError SPAN_INVARIANT_VIOLATION
 */
export function assertOrderedSpans(spans: readonly Span[], textLength?: number): void {
  let previousEnd = 0;
  spans.forEach((span, i) => {
    if (span.start < 0 || span.end < span.start) {
      throw spanInvariantViolation(`span #${i} [${span.start}, ${span.end}) is malformed`);
    }
    if (i > 0 && span.start < previousEnd) {
      throw spanInvariantViolation(
        `span #${i} starts at ${span.start}, before the previous span ends at ${previousEnd}`
      );
    }
    if (textLength !== undefined && span.end > textLength) {
      throw spanInvariantViolation(
        `span #${i} ends at ${span.end}, past the end of the text (${textLength})`
      );
    }
    previousEnd = span.end;
  });
}

/**
 * 1-based line number of each offset, computed in one pass
 */
function lineNumbers(text: string, offsets: readonly number[]): number[] {
  const lines: number[] = [];
  let line = 1;
  let cursor = 0;
  for (const offset of offsets) {
    for (; cursor < offset; cursor++) {
      if (text[cursor] === '\n') line++;
    }
    lines.push(line);
  }
  return lines;
}

/**
 * Build the serializable view of records
 *
 * @param toText - Converts the stored byte-per-char text for display
 */
export function toCommentPayload(
  text: string,
  records: readonly CommentRecord[],
  toText: (raw: string) => string = (raw) => raw
): CommentPayload[] {
  const lines = lineNumbers(text, records.map((r) => r.span.start));
  return records.map((record, index) => ({
    index,
    kind: record.kind,
    line: lines[index],
    text: toText(record.rawInnerText),
  }));
}
