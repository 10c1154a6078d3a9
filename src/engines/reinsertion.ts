/**
 * Reinsertion Engine
 *
 * Rebuilds source text from the original and a list of corrected comment
 * records. Text outside the records' spans is copied verbatim; each span is
 * replaced by its delimiters, original padding, and corrected text.
 *
 * @module reinsertion
 */

import { assertOrderedSpans, type CorrectedRecord } from './commentExtractor.js';

/**
 * The text a record's span is replaced with
 */
export function renderRecord(record: CorrectedRecord): string {
  return (
    record.delimiterOpen +
    record.leading +
    record.correctedInnerText +
    record.trailing +
    record.delimiterClose
  );
}

/**
 * Splice corrected comment text back into the original source
 *
 * Records need not cover every comment, but they must be sorted by span,
 * must not overlap, and must lie inside the text.
 *
 * @throws SpellerError SPAN_INVARIANT_VIOLATION when records are out of
 *   order, overlapping, or out of range; nothing is returned in that case
 *
 * @example
 * ```typescript
 * const [record] = extractComments(source, lookupLanguage('c'));
 * rebuild(source, [{ ...record, correctedInnerText: 'the value' }]);
 * ```
 */
export function rebuild(original: string, records: readonly CorrectedRecord[]): string {
  assertOrderedSpans(
    records.map((r) => r.span),
    original.length
  );

  const parts: string[] = [];
  let cursor = 0;

  for (const record of records) {
    parts.push(original.slice(cursor, record.span.start));
    parts.push(renderRecord(record));
    cursor = record.span.end;
  }
  parts.push(original.slice(cursor));

  return parts.join('');
}
