/**
 * Language Descriptor Registry
 *
 * Static comment grammars keyed by language tag. Each descriptor is plain
 * data: line-comment markers, block-comment delimiter pairs, and string
 * literal rules. The scanner interprets them; nothing here is executable.
 *
 * The registry is built once at module load and frozen.
 *
 * @module languageRegistry
 */

import { unsupportedLanguage } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * How a string literal escapes its own closing delimiter
 */
export type EscapeRule =
  | 'backslash' // "a \" b"
  | 'doubled'   // 'it''s' (SQL)
  | 'none';     // raw literals: Go `...`, shell '...'

export interface LineCommentRule {
  marker: string;
  /**
   * Marker opens a comment only at line start or after whitespace or a
   * command separator (shell `#`, so that `$#` and `${#x}` stay code)
   */
  requiresBoundary: boolean;
}

export interface BlockCommentRule {
  open: string;
  close: string;
  /** Inner openers increase depth (Rust) */
  nestable: boolean;
}

export interface StringRule {
  open: string;
  close: string;
  escape: EscapeRule;
  /** A newline before the closer means the opener was not a string */
  multiline: boolean;
  /** Longest literal body; beyond it the opener is treated as code (Rust `'a`) */
  maxLength?: number;
}

/**
 * - `code`: comments are found through the markers below
 * - `prose`: every line of the input is correctable text
 */
export type LanguageKind = 'code' | 'prose';

export interface LanguageDescriptor {
  readonly id: string;
  readonly name: string;
  readonly aliases: readonly string[];
  readonly kind: LanguageKind;
  /** Declared priority order; the scanner prefers the longest match */
  readonly lineComments: readonly LineCommentRule[];
  readonly blockComments: readonly BlockCommentRule[];
  readonly strings: readonly StringRule[];
  /** A `#!` line at offset 0 is code, not a comment */
  readonly shebang: boolean;
}

// ============================================================================
// Shared grammar fragments
// ============================================================================

const SLASH_LINE: LineCommentRule = { marker: '//', requiresBoundary: false };
const C_BLOCK: BlockCommentRule = { open: '/*', close: '*/', nestable: false };
const HASH_LINE: LineCommentRule = { marker: '#', requiresBoundary: false };

const DOUBLE_QUOTED: StringRule = { open: '"', close: '"', escape: 'backslash', multiline: false };
const SINGLE_QUOTED: StringRule = { open: "'", close: "'", escape: 'backslash', multiline: false };

const C_FAMILY = {
  kind: 'code',
  lineComments: [SLASH_LINE],
  blockComments: [C_BLOCK],
  strings: [DOUBLE_QUOTED, SINGLE_QUOTED],
  shebang: false,
} as const satisfies Omit<LanguageDescriptor, 'id' | 'name' | 'aliases'>;

const ECMASCRIPT = {
  ...C_FAMILY,
  strings: [
    DOUBLE_QUOTED,
    SINGLE_QUOTED,
    { open: '`', close: '`', escape: 'backslash', multiline: true },
  ],
  shebang: true,
} as const satisfies Omit<LanguageDescriptor, 'id' | 'name' | 'aliases'>;

// ============================================================================
// Descriptors
// ============================================================================

const DESCRIPTORS: readonly LanguageDescriptor[] = [
  {
    id: 'text',
    name: 'Plain text',
    aliases: ['txt', 'plain'],
    kind: 'prose',
    lineComments: [],
    blockComments: [],
    strings: [],
    shebang: false,
  },
  {
    id: 'python',
    name: 'Python',
    aliases: ['py'],
    kind: 'code',
    lineComments: [HASH_LINE],
    // Docstrings are prose worth checking; the triple quote outranks a plain quote by length
    blockComments: [
      { open: '"""', close: '"""', nestable: false },
      { open: "'''", close: "'''", nestable: false },
    ],
    strings: [DOUBLE_QUOTED, SINGLE_QUOTED],
    shebang: true,
  },
  { id: 'javascript', name: 'JavaScript', aliases: ['js', 'jsx', 'mjs', 'cjs'], ...ECMASCRIPT },
  { id: 'typescript', name: 'TypeScript', aliases: ['ts', 'tsx', 'mts', 'cts'], ...ECMASCRIPT },
  {
    id: 'rust',
    name: 'Rust',
    aliases: ['rs'],
    kind: 'code',
    lineComments: [
      { marker: '///', requiresBoundary: false },
      { marker: '//!', requiresBoundary: false },
      SLASH_LINE,
    ],
    blockComments: [{ open: '/*', close: '*/', nestable: true }],
    strings: [
      { open: '"', close: '"', escape: 'backslash', multiline: true },
      // '\u{10FFFF}' is the longest char literal body
      { open: "'", close: "'", escape: 'backslash', multiline: false, maxLength: 10 },
    ],
    shebang: false,
  },
  {
    id: 'go',
    name: 'Go',
    aliases: ['golang'],
    ...C_FAMILY,
    strings: [
      DOUBLE_QUOTED,
      SINGLE_QUOTED,
      { open: '`', close: '`', escape: 'none', multiline: true },
    ],
  },
  { id: 'c', name: 'C', aliases: ['h'], ...C_FAMILY },
  { id: 'cpp', name: 'C++', aliases: ['c++', 'cc', 'cxx', 'hpp'], ...C_FAMILY },
  { id: 'java', name: 'Java', aliases: [], ...C_FAMILY },
  {
    id: 'css',
    name: 'CSS',
    aliases: [],
    kind: 'code',
    // No line comments in CSS; `//` shows up inside url(http://...)
    lineComments: [],
    blockComments: [C_BLOCK],
    strings: [DOUBLE_QUOTED, SINGLE_QUOTED],
    shebang: false,
  },
  {
    id: 'lua',
    name: 'Lua',
    aliases: [],
    kind: 'code',
    lineComments: [{ marker: '--', requiresBoundary: false }],
    blockComments: [{ open: '--[[', close: ']]', nestable: false }],
    strings: [
      DOUBLE_QUOTED,
      SINGLE_QUOTED,
      { open: '[[', close: ']]', escape: 'none', multiline: true },
    ],
    shebang: true,
  },
  {
    id: 'bash',
    name: 'Bash',
    aliases: ['sh', 'shell', 'zsh'],
    kind: 'code',
    lineComments: [{ marker: '#', requiresBoundary: true }],
    blockComments: [],
    strings: [
      { open: '"', close: '"', escape: 'backslash', multiline: true },
      { open: "'", close: "'", escape: 'none', multiline: true },
    ],
    shebang: true,
  },
  {
    id: 'sql',
    name: 'SQL',
    aliases: [],
    kind: 'code',
    lineComments: [{ marker: '--', requiresBoundary: false }],
    blockComments: [C_BLOCK],
    strings: [
      { open: "'", close: "'", escape: 'doubled', multiline: true },
      { open: '"', close: '"', escape: 'doubled', multiline: true },
    ],
    shebang: false,
  },
  {
    id: 'html',
    name: 'HTML',
    aliases: ['htm', 'xml'],
    kind: 'code',
    lineComments: [],
    blockComments: [{ open: '<!--', close: '-->', nestable: false }],
    // Text content is full of apostrophes; quotes are not tracked
    strings: [],
    shebang: false,
  },
];

// ============================================================================
// Registry
// ============================================================================

function freezeDescriptor(descriptor: LanguageDescriptor): LanguageDescriptor {
  return Object.freeze({
    ...descriptor,
    aliases: Object.freeze([...descriptor.aliases]),
    lineComments: Object.freeze(descriptor.lineComments.map((rule) => Object.freeze({ ...rule }))),
    blockComments: Object.freeze(descriptor.blockComments.map((rule) => Object.freeze({ ...rule }))),
    strings: Object.freeze(descriptor.strings.map((rule) => Object.freeze({ ...rule }))),
  });
}

const REGISTRY: readonly LanguageDescriptor[] = Object.freeze(DESCRIPTORS.map(freezeDescriptor));

const BY_TAG: ReadonlyMap<string, LanguageDescriptor> = (() => {
  const map = new Map<string, LanguageDescriptor>();
  for (const descriptor of REGISTRY) {
    for (const tag of [descriptor.id, ...descriptor.aliases]) {
      if (map.has(tag)) {
        throw new Error(`Duplicate language tag in registry: ${tag}`);
      }
      map.set(tag, descriptor);
    }
  }
  return map;
})();

function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/**
 * Resolve a language tag (id or alias, case-insensitive) to its descriptor
 *
 * @throws SpellerError UNSUPPORTED_LANGUAGE for unknown or empty tags
 *
 * @example
 * ```typescript
 * lookupLanguage('PY').id  // => 'python'
 * lookupLanguage('haskell') // throws UNSUPPORTED_LANGUAGE
 * ```
 */
export function lookupLanguage(tag: string): LanguageDescriptor {
  const descriptor = BY_TAG.get(normalizeTag(tag));
  if (!descriptor) {
    throw unsupportedLanguage(tag, REGISTRY.map((d) => d.id));
  }
  return descriptor;
}

export function isSupportedLanguage(tag: string): boolean {
  return BY_TAG.has(normalizeTag(tag));
}

/**
 * All registered descriptors in declaration order
 */
export function listLanguages(): readonly LanguageDescriptor[] {
  return REGISTRY;
}
