/**
 * Comment/String Scanner
 *
 * One left-to-right pass over the source text, driven by a language
 * descriptor, classifying every offset as code, string, or comment. The
 * result is a lazy sequence of half-open ranges that tile the input exactly.
 *
 * States: normal, string, line comment, block comment (with depth). Strings
 * mask comment markers; comment markers mask string delimiters.
 *
 * Unterminated constructs at end of text:
 * - block comment: extends to end of text, emitted without a close delimiter
 * - string: the remaining text is code
 *
 * A single-line string that hits a newline (or a body longer than the rule's
 * maxLength) was never a string: its opener is code and scanning resumes
 * right after it.
 *
 * @module scanner
 */

import type {
  BlockCommentRule,
  LanguageDescriptor,
  LineCommentRule,
  StringRule,
} from './languageRegistry.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Half-open offset range [start, end) into the source text
 */
export interface Span {
  start: number;
  end: number;
}

export type CommentKind = 'line' | 'block';

export interface CodeRange {
  kind: 'code';
  span: Span;
}

export interface StringRange {
  kind: 'string';
  span: Span;
}

export interface CommentRange {
  kind: 'comment';
  span: Span;
  commentKind: CommentKind;
  /** Opening marker as it appears in the text ('' for prose lines) */
  open: string;
  /** Closing marker, or '' for line comments and unterminated blocks */
  close: string;
}

export type ScanRange = CodeRange | StringRange | CommentRange;

type Opener =
  | { type: 'string'; rule: StringRule; length: number }
  | { type: 'block'; rule: BlockCommentRule; length: number }
  | { type: 'line'; rule: LineCommentRule; length: number };

type ScannerState =
  | { mode: 'normal' }
  | { mode: 'string'; rule: StringRule; start: number; bodyStart: number }
  | { mode: 'lineComment'; rule: LineCommentRule; start: number }
  | { mode: 'blockComment'; rule: BlockCommentRule; start: number; depth: number };

/** Characters after which a boundary-sensitive marker may open a comment */
const BOUNDARY_CHARS = new Set([' ', '\t', '\r', '\n', ';', '|', '&', '(', ')']);

// ============================================================================
// Opener matching
// ============================================================================

function atBoundary(text: string, pos: number): boolean {
  return pos === 0 || BOUNDARY_CHARS.has(text[pos - 1]);
}

/**
 * Find the construct opening at pos, if any
 *
 * Candidates are gathered strings first, then block comments, then line
 * comments, each in declared order. The longest match wins; on equal length
 * the earlier candidate does.
 */
function matchOpener(text: string, pos: number, descriptor: LanguageDescriptor): Opener | null {
  const candidates: Opener[] = [];

  for (const rule of descriptor.strings) {
    if (text.startsWith(rule.open, pos)) {
      candidates.push({ type: 'string', rule, length: rule.open.length });
    }
  }
  for (const rule of descriptor.blockComments) {
    if (text.startsWith(rule.open, pos)) {
      candidates.push({ type: 'block', rule, length: rule.open.length });
    }
  }
  for (const rule of descriptor.lineComments) {
    if (text.startsWith(rule.marker, pos) && (!rule.requiresBoundary || atBoundary(text, pos))) {
      candidates.push({ type: 'line', rule, length: rule.marker.length });
    }
  }

  let best: Opener | null = null;
  for (const candidate of candidates) {
    if (best === null || candidate.length > best.length) {
      best = candidate;
    }
  }
  return best;
}

function enter(opener: Opener, pos: number): ScannerState {
  switch (opener.type) {
    case 'string':
      return { mode: 'string', rule: opener.rule, start: pos, bodyStart: pos + opener.length };
    case 'block':
      return { mode: 'blockComment', rule: opener.rule, start: pos, depth: 1 };
    case 'line':
      return { mode: 'lineComment', rule: opener.rule, start: pos };
  }
}

// ============================================================================
// Scanner
// ============================================================================

/**
 * Classify source text into code, string, and comment ranges
 *
 * Ranges are yielded in order, never overlap, and together cover the whole
 * text. Consecutive code is always coalesced into one range. The generator
 * is single-use: scan again for a second pass.
 *
 * @param text - Source text (one character per byte, see sourceText)
 * @param descriptor - Grammar of the source language
 *
 * @example
 * ```typescript
 * [...scan('x = 1  # note\n', lookupLanguage('python'))]
 * // => code [0,7), comment [7,13) open '#', code [13,14)
 * ```
 */
export function* scan(
  text: string,
  descriptor: LanguageDescriptor
): Generator<ScanRange, void, undefined> {
  if (descriptor.kind === 'prose') {
    yield* scanProse(text);
    return;
  }

  let pos = 0;
  let codeStart = 0;
  let state: ScannerState = { mode: 'normal' };

  if (descriptor.shebang && text.startsWith('#!')) {
    const newline = text.indexOf('\n');
    pos = newline === -1 ? text.length : newline;
  }

  while (pos < text.length) {
    switch (state.mode) {
      case 'normal': {
        const opener = matchOpener(text, pos, descriptor);
        if (opener === null) {
          pos++;
          break;
        }
        state = enter(opener, pos);
        if (opener.type !== 'string') {
          // Comments never backtrack, so pending code can go out now
          if (codeStart < pos) {
            yield { kind: 'code', span: { start: codeStart, end: pos } };
          }
          codeStart = pos;
        }
        pos += opener.length;
        break;
      }

      case 'string': {
        const { rule } = state;
        if (text.startsWith(rule.close, pos)) {
          if (rule.escape === 'doubled' && text.startsWith(rule.close, pos + rule.close.length)) {
            pos += rule.close.length * 2;
            break;
          }
          pos += rule.close.length;
          if (codeStart < state.start) {
            yield { kind: 'code', span: { start: codeStart, end: state.start } };
          }
          yield { kind: 'string', span: { start: state.start, end: pos } };
          codeStart = pos;
          state = { mode: 'normal' };
          break;
        }
        const tooLong = rule.maxLength !== undefined && pos - state.bodyStart >= rule.maxLength;
        if ((!rule.multiline && text[pos] === '\n') || tooLong) {
          // Not a string after all: only the opener is consumed, as code
          pos = state.bodyStart;
          state = { mode: 'normal' };
          break;
        }
        pos += rule.escape === 'backslash' && text[pos] === '\\' ? 2 : 1;
        break;
      }

      case 'lineComment': {
        const newline = text.indexOf('\n', pos);
        const end = newline === -1 ? text.length : newline;
        yield {
          kind: 'comment',
          span: { start: state.start, end },
          commentKind: 'line',
          open: state.rule.marker,
          close: '',
        };
        pos = end;
        codeStart = end;
        state = { mode: 'normal' };
        break;
      }

      case 'blockComment': {
        const { rule } = state;
        if (text.startsWith(rule.close, pos)) {
          pos += rule.close.length;
          state.depth--;
          if (state.depth === 0) {
            yield {
              kind: 'comment',
              span: { start: state.start, end: pos },
              commentKind: 'block',
              open: rule.open,
              close: rule.close,
            };
            codeStart = pos;
            state = { mode: 'normal' };
          }
        } else if (rule.nestable && text.startsWith(rule.open, pos)) {
          pos += rule.open.length;
          state.depth++;
        } else {
          pos++;
        }
        break;
      }
    }
  }

  // End of text reached inside a construct
  switch (state.mode) {
    case 'blockComment':
      yield {
        kind: 'comment',
        span: { start: state.start, end: text.length },
        commentKind: 'block',
        open: state.rule.open,
        close: '',
      };
      return;
    case 'lineComment':
      // Marker was the last thing in the text
      yield {
        kind: 'comment',
        span: { start: state.start, end: text.length },
        commentKind: 'line',
        open: state.rule.marker,
        close: '',
      };
      return;
    case 'string':
    case 'normal':
      // An unterminated string reverts to code along with everything after it
      if (codeStart < text.length) {
        yield { kind: 'code', span: { start: codeStart, end: text.length } };
      }
      return;
  }
}

/**
 * Prose: each line's content is a delimiter-less comment, newlines are code
 */
function* scanProse(text: string): Generator<ScanRange, void, undefined> {
  let lineStart = 0;
  let codeStart = 0;

  while (lineStart <= text.length) {
    const newline = text.indexOf('\n', lineStart);
    const lineEnd = newline === -1 ? text.length : newline;

    if (lineEnd > lineStart) {
      if (codeStart < lineStart) {
        yield { kind: 'code', span: { start: codeStart, end: lineStart } };
      }
      yield {
        kind: 'comment',
        span: { start: lineStart, end: lineEnd },
        commentKind: 'line',
        open: '',
        close: '',
      };
      codeStart = lineEnd;
    }

    if (newline === -1) break;
    lineStart = newline + 1;
  }

  if (codeStart < text.length) {
    yield { kind: 'code', span: { start: codeStart, end: text.length } };
  }
}
