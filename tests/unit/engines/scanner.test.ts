/**
 * Scanner Unit Tests
 *
 * Ranges are compared as compact [kind, start, end] tuples.
 */

import { describe, it, expect } from 'vitest';
import { scan, type ScanRange } from '../../../src/engines/scanner.js';
import { lookupLanguage } from '../../../src/engines/languageRegistry.js';

type Tuple = [ScanRange['kind'], number, number];

function ranges(text: string, tag: string): Tuple[] {
  return [...scan(text, lookupLanguage(tag))].map((r): Tuple => [r.kind, r.span.start, r.span.end]);
}

function comments(text: string, tag: string): string[] {
  return [...scan(text, lookupLanguage(tag))]
    .filter((r) => r.kind === 'comment')
    .map((r) => text.slice(r.span.start, r.span.end));
}

/** Ranges must tile the text: contiguous, in order, covering [0, length) */
function expectTiling(text: string, tag: string): void {
  let cursor = 0;
  for (const range of scan(text, lookupLanguage(tag))) {
    expect(range.span.start).toBe(cursor);
    expect(range.span.end).toBeGreaterThan(range.span.start);
    cursor = range.span.end;
  }
  expect(cursor).toBe(text.length);
}

describe('Scanner', () => {
  describe('line comments', () => {
    it('should split a trailing Python comment from code', () => {
      expect(ranges('x = 1  # note\n', 'python')).toEqual([
        ['code', 0, 7],
        ['comment', 7, 13],
        ['code', 13, 14],
      ]);
    });

    it('should end a comment at end of text without a newline', () => {
      expect(ranges('// only', 'c')).toEqual([['comment', 0, 7]]);
    });

    it('should keep a CR inside a CRLF-terminated comment', () => {
      expect(ranges('// a\r\nx', 'c')).toEqual([
        ['comment', 0, 5],
        ['code', 5, 7],
      ]);
    });

    it('should emit a bare marker at end of text', () => {
      expect(ranges('x #', 'python')).toEqual([
        ['code', 0, 2],
        ['comment', 2, 3],
      ]);
    });

    it('should prefer the longest Rust doc marker', () => {
      const [range] = [...scan('/// docs\n', lookupLanguage('rust'))];
      expect(range).toMatchObject({ kind: 'comment', open: '///' });
    });

    it('should yield adjacent line comments separately', () => {
      expect(comments('# one\n# two\n', 'python')).toEqual(['# one', '# two']);
    });
  });

  describe('block comments', () => {
    it('should find a C block comment with its delimiters', () => {
      const result = [...scan('/* teh value */\nint x;', lookupLanguage('c'))];
      expect(result[0]).toEqual({
        kind: 'comment',
        span: { start: 0, end: 15 },
        commentKind: 'block',
        open: '/*',
        close: '*/',
      });
      expect(result[1]).toEqual({ kind: 'code', span: { start: 15, end: 22 } });
    });

    it('should run an unterminated block comment to end of text with no close', () => {
      const result = [...scan('/* open forever', lookupLanguage('c'))];
      expect(result).toEqual([
        {
          kind: 'comment',
          span: { start: 0, end: 15 },
          commentKind: 'block',
          open: '/*',
          close: '',
        },
      ]);
    });

    it('should not nest C block comments', () => {
      expect(comments('/* a /* b */ c */', 'c')).toEqual(['/* a /* b */']);
    });

    it('should nest Rust block comments', () => {
      expect(comments('/* a /* b */ c */ x', 'rust')).toEqual(['/* a /* b */ c */']);
    });

    it('should treat Python triple-quoted strings as block comments', () => {
      expect(comments('def f():\n    """Retrun it."""\n', 'python')).toEqual([
        '"""Retrun it."""',
      ]);
    });

    it('should prefer a Lua block comment over a line comment', () => {
      const [range] = [...scan('--[[ multi\nline ]] x', lookupLanguage('lua'))];
      expect(range).toMatchObject({ kind: 'comment', open: '--[[', close: ']]', span: { end: 18 } });
    });

    it('should find HTML comments', () => {
      expect(comments('<p>it\'s</p><!-- nto here -->', 'html')).toEqual(['<!-- nto here -->']);
    });
  });

  describe('string masking', () => {
    it('should hide comment markers inside strings', () => {
      expect(ranges('const s = "// not a comment";', 'javascript')).toEqual([
        ['code', 0, 10],
        ['string', 10, 28],
        ['code', 28, 29],
      ]);
    });

    it('should honour backslash escapes', () => {
      expect(comments('s = "a \\" # b" # real', 'python')).toEqual(['# real']);
    });

    it('should honour doubled quote escapes in SQL', () => {
      expect(comments("SELECT 'it''s -- no' -- yes", 'sql')).toEqual(['-- yes']);
    });

    it('should not treat backslash as an escape in Go raw strings', () => {
      expect(comments('s := `a\\` // real', 'go')).toEqual(['// real']);
    });

    it('should hide string delimiters inside comments', () => {
      expect(comments("// don't\nx = 'y' // ok", 'javascript')).toEqual(["// don't", '// ok']);
    });

    it('should treat a single-line string cut by a newline as code', () => {
      expect(ranges("x = 'a\n# c\n", 'python')).toEqual([
        ['code', 0, 7],
        ['comment', 7, 10],
        ['code', 10, 11],
      ]);
    });

    it('should let multi-line template literals span lines', () => {
      expect(comments('const t = `a\n// no\n`; // yes', 'typescript')).toEqual(['// yes']);
    });

    it('should read a Rust lifetime as code, not the start of a char literal', () => {
      expect(comments("fn f<'a>() {} // it's fine", 'rust')).toEqual(["// it's fine"]);
    });

    it('should still read Rust char literals as strings', () => {
      expect(ranges("let c = '\\''; // q", 'rust')).toEqual([
        ['code', 0, 8],
        ['string', 8, 12],
        ['code', 12, 14],
        ['comment', 14, 18],
      ]);
    });

    it('should turn an unterminated string and the rest of the text into code', () => {
      expect(ranges('x = `open // no', 'javascript')).toEqual([['code', 0, 15]]);
    });
  });

  describe('language specifics', () => {
    it('should keep a shebang line as code', () => {
      expect(ranges('#!/usr/bin/env python\n# hi\n', 'python')).toEqual([
        ['code', 0, 22],
        ['comment', 22, 26],
        ['code', 26, 27],
      ]);
    });

    it('should only open shell comments at a word boundary', () => {
      expect(comments('echo ${#arr} $# x#y # real', 'bash')).toEqual(['# real']);
    });

    it('should not know line comments in CSS', () => {
      expect(comments('a { background: url(http://x/y.png); } /* ok */', 'css')).toEqual([
        '/* ok */',
      ]);
    });
  });

  describe('prose', () => {
    it('should make every non-empty line a delimiter-less comment', () => {
      expect(ranges('Teh first\n\nsecond', 'text')).toEqual([
        ['comment', 0, 9],
        ['code', 9, 11],
        ['comment', 11, 17],
      ]);
    });

    it('should produce only code for empty lines', () => {
      expect(ranges('\n\n', 'text')).toEqual([['code', 0, 2]]);
    });
  });

  describe('tiling', () => {
    it.each([
      ['python', 'import os  # os\ns = "x#y"\n"""doc"""\n'],
      ['c', '#include <x.h>\n/* a */ int x; // b\nchar *s = "/*";\n'],
      ['rust', "/// d\nfn f<'a>() { let c = '\\''; /* x /* y */ */ }\n"],
      ['sql', "select 1; -- a\n/* b */ select 'c';"],
      ['text', 'line one\n\nline two\n'],
      ['bash', '#!/bin/sh\necho "$#" # n\n'],
    ])('should tile %s input exactly', (tag, text) => {
      expectTiling(text, tag);
    });

    it('should produce nothing for empty text', () => {
      expect(ranges('', 'c')).toEqual([]);
    });
  });
});
