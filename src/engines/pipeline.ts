/**
 * Comment Check Pipeline
 *
 * source bytes + language tag
 *   -> decode -> extract comments -> correct (one logical request)
 *   -> validate -> rebuild -> encode
 *
 * Output is all-or-nothing: every failure rejects before anything is
 * rebuilt, so callers never see partially corrected source.
 *
 * @module pipeline
 */

import {
  lookupLanguage,
  type BlockCommentRule,
  type LanguageDescriptor,
} from './languageRegistry.js';
import {
  extractComments,
  isCorrectable,
  type CommentRecord,
  type CorrectedRecord,
} from './commentExtractor.js';
import { rebuild } from './reinsertion.js';
import type { CommentCorrector } from './correctionClient.js';
import { decodeSource, encodeSource, fromServiceText, toServiceText } from './sourceText.js';
import { ErrorCode, correctionServiceFailure, wrapError } from '../errors/index.js';
import { getLogger } from '../utils/logger.js';

export interface CheckOptions {
  /** Registry tag, or an already resolved descriptor */
  language: string | LanguageDescriptor;
  corrector: CommentCorrector;
}

export interface CheckResult {
  output: Buffer;
  language: LanguageDescriptor;
  /** Every comment found, including empty ones */
  comments: CommentRecord[];
  /** The comments that were sent for correction, with their results */
  corrected: CorrectedRecord[];
  /** Number of comments whose text actually changed */
  changed: number;
}

function resolveLanguage(language: string | LanguageDescriptor): LanguageDescriptor {
  return typeof language === 'string' ? lookupLanguage(language) : language;
}

/**
 * Whether a corrected block comment still ends exactly where it did
 *
 * Replays the scanner's block rules over the rendered body. A closer in the
 * corrected text, or an unbalanced opener on a nestable rule, would move the
 * end of the comment and turn part of it into code.
 */
function keepsBlockBoundary(record: CorrectedRecord, rule: BlockCommentRule): boolean {
  const text =
    record.leading + record.correctedInnerText + record.trailing + record.delimiterClose;
  let depth = 1;
  let pos = 0;

  while (pos < text.length) {
    if (text.startsWith(rule.close, pos)) {
      pos += rule.close.length;
      depth--;
      if (depth === 0) {
        // An unterminated comment must stay unterminated
        return record.delimiterClose !== '' && pos === text.length;
      }
    } else if (rule.nestable && text.startsWith(rule.open, pos)) {
      pos += rule.open.length;
      depth++;
    } else {
      pos++;
    }
  }

  return record.delimiterClose === '';
}

/**
 * Pair records with service results, rejecting anything that cannot be spliced back
 */
function pairCorrections(
  language: LanguageDescriptor,
  records: readonly CommentRecord[],
  sent: readonly string[],
  results: readonly string[]
): CorrectedRecord[] {
  if (results.length !== records.length) {
    throw correctionServiceFailure(
      `sent ${records.length} comments, received ${results.length} corrections`
    );
  }

  return records.map((record, i) => {
    // Unchanged text keeps its original bytes, even if they were not valid UTF-8
    if (results[i] === sent[i]) {
      return { ...record, correctedInnerText: record.rawInnerText };
    }

    const corrected = { ...record, correctedInnerText: fromServiceText(results[i]) };
    if (record.kind === 'line') {
      if (/[\r\n]/.test(corrected.correctedInnerText)) {
        throw correctionServiceFailure(
          `single-line comment #${i} came back spanning several lines`
        );
      }
      return corrected;
    }

    const rule = language.blockComments.find((r) => r.open === record.delimiterOpen);
    if (rule !== undefined && !keepsBlockBoundary(corrected, rule)) {
      throw correctionServiceFailure(
        `block comment #${i} came back with delimiters that would move its end`
      );
    }
    return corrected;
  });
}

/**
 * Check and correct the comments of one source file
 *
 * @param input - Raw source bytes, as read from disk or stdin
 * @throws SpellerError UNSUPPORTED_LANGUAGE, CORRECTION_SERVICE_FAILURE,
 *   or SPAN_INVARIANT_VIOLATION
 *
 * @example
 * ```typescript
 * const result = await checkSource(fs.readFileSync('main.c'), {
 *   language: 'c',
 *   corrector: new OpenAICorrector({ languageName: 'C', config }),
 * });
 * process.stdout.write(result.output);
 * ```
 */
export async function checkSource(input: Buffer, options: CheckOptions): Promise<CheckResult> {
  const logger = getLogger();
  // Resolved first: an unknown tag must fail before any scanning
  const language = resolveLanguage(options.language);

  const text = decodeSource(input);
  const comments = extractComments(text, language);
  const pending = comments.filter(isCorrectable);

  logger.info('pipeline', 'Comments extracted', {
    language: language.id,
    total: comments.length,
    correctable: pending.length,
  });

  if (pending.length === 0) {
    return { output: input, language, comments, corrected: [], changed: 0 };
  }

  const sent = pending.map((record) => toServiceText(record.rawInnerText));
  const results = await options.corrector.correct(sent).catch((error: unknown) => {
    throw wrapError(error, ErrorCode.CORRECTION_SERVICE_FAILURE, 'Correction failed');
  });
  const corrected = pairCorrections(language, pending, sent, results);
  const output = encodeSource(rebuild(text, corrected));
  const changed = corrected.filter((r) => r.correctedInnerText !== r.rawInnerText).length;

  logger.info('pipeline', 'Comments corrected', { language: language.id, changed });

  return { output, language, comments, corrected, changed };
}

/**
 * checkSource for in-memory strings (UTF-8 round trip)
 */
export async function checkText(
  text: string,
  options: CheckOptions
): Promise<Omit<CheckResult, 'output'> & { output: string }> {
  const result = await checkSource(Buffer.from(text, 'utf8'), options);
  return { ...result, output: result.output.toString('utf8') };
}
