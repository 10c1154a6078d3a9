/**
 * Correction Client
 *
 * Boundary to the external correction service. The core hands over an
 * ordered list of comment texts and expects back a list of the same length
 * and order; anything else is a failure of the whole invocation.
 *
 * OpenAICorrector talks to any OpenAI-compatible chat completions endpoint.
 * Texts are sent in batches as JSON `{ comments: [{ id, text }] }` and the
 * model is asked to answer in the same shape.
 *
 * @module correctionClient
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Config } from '../storage/config.js';
import {
  correctionServiceFailure,
  ErrorCode,
  missingApiKey,
  wrapError,
} from '../errors/index.js';
import { getLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface CommentCorrector {
  /**
   * Correct comment texts
   *
   * @returns Corrected texts, same length and order as the input
   * @throws SpellerError CORRECTION_SERVICE_FAILURE
   */
  correct(texts: readonly string[]): Promise<string[]>;
}

export interface OpenAICorrectorOptions {
  /** Human-readable language name, used in the prompt */
  languageName: string;
  config: Config;
  /** Environment to read the API key from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** HTTP client (default: a fresh axios instance) */
  client?: AxiosInstance;
}

/** Environment variable holding the API credential */
export const API_KEY_ENV = 'OPENAI_API_KEY';

const COMPONENT = 'correctionClient';

// ============================================================================
// Schemas
// ============================================================================

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

const CorrectionReplySchema = z.object({
  comments: z.array(
    z.object({
      id: z.number().int().nonnegative(),
      text: z.string(),
    })
  ),
});

const ApiErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

// ============================================================================
// Prompt
// ============================================================================

/**
 * System prompt for one language
 */
export function buildSystemPrompt(languageName: string): string {
  return [
    `You will receive JSON with comments taken from a ${languageName} source file, shaped as {"comments": [{"id": number, "text": string}]}.`,
    'Fix spelling and grammar in each text and keep it clear and concise.',
    'Reply with JSON in exactly the same shape, containing every id you received once and no other ids.',
    '',
    '- Keep list markers and decoration such as "-", "*", "+" or "=" exactly where they are.',
    '- Keep line breaks inside a text; never merge or split texts.',
    '- Do not add a trailing period unless the sentence needs one.',
    '- Leave identifiers, code, paths and URLs untouched (line_number stays line_number).',
    '- If a text needs no change, return it unchanged.',
  ].join('\n');
}

// ============================================================================
// Response parsing
// ============================================================================

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pull a JSON document out of a model reply
 *
 * Replies are normally raw JSON, whose string values may themselves contain
 * markdown fences. Models sometimes wrap the document in a fence or add prose
 * around it.
 */
export function extractJsonFromResponse(content: string): string {
  const trimmed = content.trim();

  if (isJson(trimmed)) {
    return trimmed;
  }

  // ```json {...} ```
  if (trimmed.startsWith('```')) {
    const fenced = trimmed.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/i);
    if (fenced) {
      return fenced[1].trim();
    }
  }

  // First { to last }
  const braces = trimmed.match(/\{[\s\S]*\}/);
  if (braces) {
    return braces[0];
  }

  return trimmed;
}

/**
 * Parse a correction reply into texts ordered by id
 *
 * @param content - Raw assistant message content
 * @param expected - Number of texts sent in the request
 * @throws SpellerError CORRECTION_SERVICE_FAILURE when the reply is not
 *   JSON, has the wrong shape, or its ids are not exactly 0..expected-1
 */
export function parseCorrections(content: string, expected: number): string[] {
  let json: unknown;
  try {
    json = JSON.parse(extractJsonFromResponse(content));
  } catch (error) {
    throw correctionServiceFailure(
      'reply is not valid JSON',
      error instanceof Error ? error : undefined
    );
  }

  const parsed = CorrectionReplySchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw correctionServiceFailure(`reply has an unexpected shape (${issues})`);
  }

  const { comments } = parsed.data;
  if (comments.length !== expected) {
    throw correctionServiceFailure(
      `expected ${expected} corrected comments, received ${comments.length}`
    );
  }

  const texts = new Array<string | undefined>(expected).fill(undefined);
  for (const { id, text } of comments) {
    if (id >= expected) {
      throw correctionServiceFailure(`reply contains unknown comment id ${id}`);
    }
    if (texts[id] !== undefined) {
      throw correctionServiceFailure(`reply contains comment id ${id} more than once`);
    }
    texts[id] = text;
  }

  return texts.map((text, id) => {
    if (text === undefined) {
      throw correctionServiceFailure(`reply is missing comment id ${id}`);
    }
    return text;
  });
}

function describeHttpError(error: AxiosError): string {
  const status = error.response?.status;
  const body = ApiErrorBodySchema.safeParse(error.response?.data);
  const detail = body.success ? body.data.error.message : error.message;
  return status ? `HTTP ${status}: ${detail}` : `${error.code ?? 'request failed'}: ${detail}`;
}

// ============================================================================
// Correctors
// ============================================================================

/**
 * Returns every text unchanged
 */
export class IdentityCorrector implements CommentCorrector {
  async correct(texts: readonly string[]): Promise<string[]> {
    return [...texts];
  }
}

/**
 * Corrector backed by an OpenAI-compatible chat completions API
 *
 * @example
 * ```typescript
 * const corrector = new OpenAICorrector({ languageName: 'Python', config });
 * await corrector.correct(['this is mispelled']);
 * // => ['this is misspelled']
 * ```
 */
export class OpenAICorrector implements CommentCorrector {
  private readonly apiKey: string;
  private readonly config: Config;
  private readonly client: AxiosInstance;
  private readonly systemPrompt: string;

  /**
   * @throws SpellerError CORRECTION_SERVICE_FAILURE when OPENAI_API_KEY is unset
   */
  constructor(options: OpenAICorrectorOptions) {
    const env = options.env ?? process.env;
    const apiKey = env[API_KEY_ENV]?.trim();
    if (!apiKey) {
      throw missingApiKey(API_KEY_ENV);
    }

    this.apiKey = apiKey;
    this.config = options.config;
    this.client = options.client ?? axios.create();
    this.systemPrompt = buildSystemPrompt(options.languageName);
  }

  async correct(texts: readonly string[]): Promise<string[]> {
    const corrected: string[] = [];
    const { batchSize } = this.config;

    for (let offset = 0; offset < texts.length; offset += batchSize) {
      const batch = texts.slice(offset, offset + batchSize);
      corrected.push(...(await this.correctBatch(batch)));
    }

    return corrected;
  }

  private async correctBatch(batch: readonly string[]): Promise<string[]> {
    const logger = getLogger();
    const url = `${this.config.baseUrl}/chat/completions`;
    const userContent = JSON.stringify({
      comments: batch.map((text, id) => ({ id, text })),
    });

    logger.debug(COMPONENT, 'Sending correction request', {
      url,
      model: this.config.model,
      comments: batch.length,
    });

    let content: string | null;
    try {
      const response = await this.client.post<unknown>(
        url,
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: this.systemPrompt },
            { role: 'user', content: userContent },
          ],
          temperature: this.config.temperature,
          max_completion_tokens: this.config.maxCompletionTokens,
          response_format: { type: 'json_object' },
        },
        {
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout: this.config.timeoutMs,
        }
      );

      const completion = ChatCompletionSchema.safeParse(response.data);
      if (!completion.success) {
        throw correctionServiceFailure('response is not a chat completion');
      }
      content = completion.data.choices[0].message.content;
    } catch (error) {
      if (error instanceof AxiosError) {
        throw correctionServiceFailure(describeHttpError(error), error);
      }
      throw wrapError(error, ErrorCode.CORRECTION_SERVICE_FAILURE, 'Correction request failed');
    }

    if (content === null) {
      throw correctionServiceFailure('completion has no message content');
    }

    const corrected = parseCorrections(content, batch.length);
    logger.debug(COMPONENT, 'Received corrections', { comments: corrected.length });
    return corrected;
  }
}
