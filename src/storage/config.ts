/**
 * Config Module
 *
 * Correction service settings:
 * - Zod schema validation
 * - Loading from a JSON file with defaults for anything missing or invalid
 * - Environment overrides (OPENAI_API_BASE_URL, COMMENT_SPELLER_MODEL)
 * - Generation of a documented default config file
 *
 * The API key is not part of the config: the correction client reads it
 * from OPENAI_API_KEY.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { atomicWriteJson } from '../utils/atomicWrite.js';

// ============================================================================
// Config Schema
// ============================================================================

/** File looked up in the working directory when --config is not given */
export const DEFAULT_CONFIG_FILE_NAME = '.comment-speller.json';

/**
 * Zod schema for configuration validation
 *
 * Underscore-prefixed fields (_comment, etc.) are stripped before parsing.
 */
export const ConfigSchema = z
  .object({
    /** Base URL of an OpenAI-compatible API (without /chat/completions) */
    baseUrl: z
      .string()
      .url()
      // A trailing slash would double up before /chat/completions
      .transform((url) => url.replace(/\/+$/, ''))
      .default('https://api.openai.com/v1'),

    /** Chat model used for corrections */
    model: z.string().min(1).default('gpt-4o-mini-2024-07-18'),

    /** Sampling temperature */
    temperature: z.number().min(0).max(2).default(0.5),

    /** Upper bound on tokens generated per request */
    maxCompletionTokens: z.number().int().positive().default(2000),

    /** Per-request timeout in milliseconds */
    timeoutMs: z.number().int().positive().default(60000),

    /** Comments sent per request */
    batchSize: z.number().int().positive().max(500).default(50),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Config with documentation fields for generated config files
 */
export interface ConfigWithDocs extends Config {
  _comment?: string;
  _availableOptions?: Record<string, string>;
}

export const DEFAULT_CONFIG: Config = {
  baseUrl: 'https://api.openai.com/v1',
  model: 'gpt-4o-mini-2024-07-18',
  temperature: 0.5,
  maxCompletionTokens: 2000,
  timeoutMs: 60000,
  batchSize: 50,
};

// ============================================================================
// Config I/O Functions
// ============================================================================

/**
 * Load configuration from a JSON file
 *
 * Falls back to defaults if:
 * - File doesn't exist
 * - File is not valid JSON
 * - Content fails schema validation
 *
 * @param configPath - Path to the JSON config file
 *
 * @example
 * ```typescript
 * const config = await loadConfig('.comment-speller.json');
 * console.log(config.model); // "gpt-4o-mini-2024-07-18"
 * ```
 */
export async function loadConfig(configPath: string): Promise<Config> {
  const logger = getLogger();

  try {
    if (!fs.existsSync(configPath)) {
      logger.debug('Config', 'No config file found, using defaults', { configPath });
      return { ...DEFAULT_CONFIG };
    }

    const content = await fs.promises.readFile(configPath, 'utf-8');
    const rawConfig: unknown = JSON.parse(content);

    if (typeof rawConfig !== 'object' || rawConfig === null || Array.isArray(rawConfig)) {
      logger.warn('Config', 'Config file is not a JSON object, using defaults', { configPath });
      return { ...DEFAULT_CONFIG };
    }

    const result = ConfigSchema.safeParse(stripDocumentationFields(rawConfig));

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join('; ');
      logger.warn('Config', 'Config validation failed, using defaults', {
        configPath,
        errors,
      });
      return { ...DEFAULT_CONFIG };
    }

    logger.debug('Config', 'Config loaded successfully', { configPath });
    return result.data;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('Config', 'Failed to load config, using defaults', {
      configPath,
      error: message,
    });
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Apply environment overrides on top of a loaded config
 *
 * Invalid override values are ignored with a warning.
 */
export function applyEnvOverrides(
  config: Config,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const logger = getLogger();
  const overrides: Record<string, unknown> = {};

  if (env.OPENAI_API_BASE_URL) {
    overrides.baseUrl = env.OPENAI_API_BASE_URL;
  }
  if (env.COMMENT_SPELLER_MODEL) {
    overrides.model = env.COMMENT_SPELLER_MODEL;
  }

  if (Object.keys(overrides).length === 0) {
    return config;
  }

  const result = ConfigSchema.safeParse({ ...config, ...overrides });
  if (!result.success) {
    logger.warn('Config', 'Ignoring invalid environment overrides', {
      overrides: Object.keys(overrides),
    });
    return config;
  }
  return result.data;
}

/**
 * Resolve which config file to read
 *
 * An explicit path wins; otherwise .comment-speller.json in cwd.
 */
export function resolveConfigPath(explicitPath: string | undefined, cwd: string = process.cwd()): string {
  return explicitPath
    ? path.resolve(cwd, explicitPath)
    : path.join(cwd, DEFAULT_CONFIG_FILE_NAME);
}

/**
 * Generate a default config file with documentation fields
 *
 * @param configPath - Where to write the file
 */
export async function generateDefaultConfig(configPath: string): Promise<void> {
  const logger = getLogger();

  const configWithDocs: ConfigWithDocs = {
    _comment:
      'comment-speller configuration. The API key is read from OPENAI_API_KEY, never from this file.',
    _availableOptions: {
      baseUrl: 'Base URL of an OpenAI-compatible API (default: "https://api.openai.com/v1")',
      model: 'Chat model used for corrections (default: "gpt-4o-mini-2024-07-18")',
      temperature: 'Sampling temperature, 0-2 (default: 0.5)',
      maxCompletionTokens: 'Maximum tokens generated per request (default: 2000)',
      timeoutMs: 'Per-request timeout in milliseconds (default: 60000)',
      batchSize: 'Number of comments sent per request (default: 50)',
    },
    ...DEFAULT_CONFIG,
  };

  await atomicWriteJson(configPath, configWithDocs);

  logger.info('Config', 'Generated default config file', { configPath });
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Strip underscore-prefixed documentation fields from an object
 */
function stripDocumentationFields(obj: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!key.startsWith('_')) {
      result[key] = value;
    }
  }
  return result;
}
