/**
 * Error Handling System
 *
 * Every failure surfaced by comment-speller carries two messages:
 * - userMessage: what went wrong, phrased for the person running the CLI
 * - developerMessage: technical details for logs and --verbose output
 *
 * Errors are fatal for the invocation that raised them; nothing here retries.
 */

import { getLogger } from '../utils/logger.js';

/**
 * Error codes for all comment-speller errors
 */
export enum ErrorCode {
  /** Language tag missing or not present in the registry */
  UNSUPPORTED_LANGUAGE = 'UNSUPPORTED_LANGUAGE',
  /** Correction service unreachable, misconfigured, or returned a bad reply */
  CORRECTION_SERVICE_FAILURE = 'CORRECTION_SERVICE_FAILURE',
  /** Reinsertion received spans that are out of order, overlapping, or out of range */
  SPAN_INVARIANT_VIOLATION = 'SPAN_INVARIANT_VIOLATION',
  /** Input file does not exist or cannot be read */
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  /** Conflicting or incomplete command-line arguments */
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
}

export interface SpellerErrorOptions {
  code: ErrorCode;
  userMessage: string;
  developerMessage: string;
  cause?: Error;
}

/**
 * Custom error class with dual messages
 *
 * The developer message doubles as Error.message so stack traces stay useful.
 * Construction logs the error at ERROR level.
 */
export class SpellerError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Message safe to print to the user */
  readonly userMessage: string;

  /** Technical message with debugging details */
  readonly developerMessage: string;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(options: SpellerErrorOptions) {
    super(options.developerMessage);

    this.code = options.code;
    this.userMessage = options.userMessage;
    this.developerMessage = options.developerMessage;
    this.cause = options.cause;

    // Set the prototype explicitly for proper instanceof checks
    Object.setPrototypeOf(this, SpellerError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SpellerError);
    }

    this.name = `SpellerError[${this.code}]`;

    this.logError();
  }

  private logError(): void {
    const logger = getLogger();
    const meta: Record<string, unknown> = {
      code: this.code,
      userMessage: this.userMessage,
    };

    if (this.cause) {
      meta.cause = {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      };
    }

    logger.error('SpellerError', this.developerMessage, meta);
  }

  /**
   * Convert error to JSON for machine-readable CLI output
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      userMessage: this.userMessage,
      developerMessage: this.developerMessage,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }

  toString(): string {
    return `${this.name}: ${this.developerMessage}`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an UNSUPPORTED_LANGUAGE error
 *
 * Raised before any scanning starts. There is no fallback grammar.
 *
 * @param tag - The tag as the user gave it (may be empty)
 * @param supported - Registered language ids, listed in the user message
 */
export function unsupportedLanguage(tag: string, supported: readonly string[]): SpellerError {
  const shown = tag.trim() === '' ? '(none)' : `"${tag}"`;
  return new SpellerError({
    code: ErrorCode.UNSUPPORTED_LANGUAGE,
    userMessage: `Language ${shown} is not supported. Use --lang with one of: ${supported.join(', ')}.`,
    developerMessage: `No language descriptor registered for tag ${shown}`,
  });
}

/**
 * Create a CORRECTION_SERVICE_FAILURE error
 *
 * @param details - Technical description of the failure
 * @param cause - Underlying transport or parse error, if any
 */
export function correctionServiceFailure(details: string, cause?: Error): SpellerError {
  return new SpellerError({
    code: ErrorCode.CORRECTION_SERVICE_FAILURE,
    userMessage:
      'The correction service did not return a usable result. Your input was left unchanged.',
    developerMessage: `Correction service failure: ${details}`,
    cause,
  });
}

/**
 * Create a CORRECTION_SERVICE_FAILURE error for a missing API credential
 *
 * @param variable - Name of the environment variable that was checked
 */
export function missingApiKey(variable: string): SpellerError {
  return new SpellerError({
    code: ErrorCode.CORRECTION_SERVICE_FAILURE,
    userMessage: `No API key found. Set the ${variable} environment variable and try again.`,
    developerMessage: `Environment variable ${variable} is not set or empty`,
  });
}

/**
 * Create a SPAN_INVARIANT_VIOLATION error
 *
 * Indicates a bug: the extractor never produces such spans.
 *
 * @param details - Which spans broke the invariant
 */
export function spanInvariantViolation(details: string): SpellerError {
  return new SpellerError({
    code: ErrorCode.SPAN_INVARIANT_VIOLATION,
    userMessage: 'Internal error while rebuilding the source. No output was written.',
    developerMessage: `Span invariant violated: ${details}`,
  });
}

/**
 * Create an INPUT_NOT_FOUND error
 *
 * @param filePath - The input path that could not be read
 * @param cause - The underlying fs error
 */
export function inputNotFound(filePath: string, cause?: Error): SpellerError {
  return new SpellerError({
    code: ErrorCode.INPUT_NOT_FOUND,
    userMessage: `Could not read input file: ${filePath}`,
    developerMessage: `Failed to read ${filePath}${cause ? `: ${cause.message}` : ''}`,
    cause,
  });
}

/**
 * Create an INVALID_ARGUMENTS error
 *
 * @param details - Which arguments conflict
 */
export function invalidArguments(details: string): SpellerError {
  return new SpellerError({
    code: ErrorCode.INVALID_ARGUMENTS,
    userMessage: details,
    developerMessage: `Invalid arguments: ${details}`,
  });
}

// ============================================================================
// Type Guards and Utilities
// ============================================================================

export function isSpellerError(error: unknown): error is SpellerError {
  return error instanceof SpellerError;
}

/**
 * Wrap an unknown error as a SpellerError if it isn't already
 *
 * @param error - The error to wrap
 * @param defaultCode - Error code to use if wrapping a non-SpellerError
 * @param context - Prefix for the developer message
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = ErrorCode.CORRECTION_SERVICE_FAILURE,
  context: string = 'An unexpected error occurred'
): SpellerError {
  if (isSpellerError(error)) {
    return error;
  }

  const originalError =
    error instanceof Error ? error : new Error(String(error));

  return new SpellerError({
    code: defaultCode,
    userMessage: 'An unexpected error occurred. Your input was left unchanged.',
    developerMessage: `${context}: ${originalError.message}`,
    cause: originalError,
  });
}
