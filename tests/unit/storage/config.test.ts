import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  ConfigSchema,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE_NAME,
  applyEnvOverrides,
  generateDefaultConfig,
  loadConfig,
  resolveConfigPath,
} from '../../../src/storage/config.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('Config Module', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = path.join(
      os.tmpdir(),
      `comment-speller-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    await fs.promises.mkdir(testDir, { recursive: true });
    configPath = path.join(testDir, DEFAULT_CONFIG_FILE_NAME);
  });

  afterEach(async () => {
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  describe('ConfigSchema', () => {
    it('should fill every default from an empty object', () => {
      expect(ConfigSchema.parse({})).toEqual(DEFAULT_CONFIG);
    });

    it('should reject unknown keys', () => {
      expect(ConfigSchema.safeParse({ apiKey: 'test-secret' }).success).toBe(false);
    });

    it('should reject out-of-range values', () => {
      expect(ConfigSchema.safeParse({ temperature: 3 }).success).toBe(false);
      expect(ConfigSchema.safeParse({ batchSize: 0 }).success).toBe(false);
      expect(ConfigSchema.safeParse({ batchSize: 501 }).success).toBe(false);
      expect(ConfigSchema.safeParse({ baseUrl: 'not a url' }).success).toBe(false);
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when the file does not exist', async () => {
      expect(await loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
    });

    it('should merge file values over defaults', async () => {
      await fs.promises.writeFile(configPath, JSON.stringify({ model: 'local-model', batchSize: 10 }));

      const config = await loadConfig(configPath);

      expect(config).toEqual({ ...DEFAULT_CONFIG, model: 'local-model', batchSize: 10 });
    });

    it('should strip trailing slashes from a file base URL', async () => {
      await fs.promises.writeFile(configPath, JSON.stringify({ baseUrl: 'http://localhost:8080/v1/' }));

      const config = await loadConfig(configPath);

      expect(config.baseUrl).toBe('http://localhost:8080/v1');
    });

    it('should ignore underscore documentation fields', async () => {
      await fs.promises.writeFile(
        configPath,
        JSON.stringify({ _comment: 'hello', _availableOptions: {}, temperature: 0 })
      );

      const config = await loadConfig(configPath);

      expect(config.temperature).toBe(0);
    });

    it('should return defaults for invalid JSON', async () => {
      await fs.promises.writeFile(configPath, '{ not json');
      expect(await loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
    });

    it('should return defaults for a JSON array', async () => {
      await fs.promises.writeFile(configPath, '[1, 2]');
      expect(await loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
    });

    it('should return defaults when validation fails', async () => {
      await fs.promises.writeFile(configPath, JSON.stringify({ timeoutMs: -5 }));
      expect(await loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
    });

    it('should return a fresh copy of the defaults', async () => {
      const a = await loadConfig(configPath);
      a.model = 'changed';
      expect((await loadConfig(configPath)).model).toBe(DEFAULT_CONFIG.model);
    });
  });

  describe('applyEnvOverrides', () => {
    it('should return the same config when no overrides are set', () => {
      const config = { ...DEFAULT_CONFIG };
      expect(applyEnvOverrides(config, {})).toBe(config);
    });

    it('should apply base URL and model overrides', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, {
        OPENAI_API_BASE_URL: 'http://localhost:8080/v1//',
        COMMENT_SPELLER_MODEL: 'tiny-model',
      });

      expect(config.baseUrl).toBe('http://localhost:8080/v1');
      expect(config.model).toBe('tiny-model');
      expect(config.batchSize).toBe(DEFAULT_CONFIG.batchSize);
    });

    it('should ignore invalid overrides', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, { OPENAI_API_BASE_URL: 'nope' });
      expect(config).toBe(DEFAULT_CONFIG);
    });
  });

  describe('resolveConfigPath', () => {
    it('should default to the config file in cwd', () => {
      expect(resolveConfigPath(undefined, testDir)).toBe(configPath);
    });

    it('should resolve an explicit path against cwd', () => {
      expect(resolveConfigPath('conf/speller.json', testDir)).toBe(
        path.join(testDir, 'conf', 'speller.json')
      );
    });
  });

  describe('generateDefaultConfig', () => {
    it('should write a documented config that loads back as the defaults', async () => {
      await generateDefaultConfig(configPath);

      const raw: unknown = JSON.parse(await fs.promises.readFile(configPath, 'utf-8'));
      expect(raw).toMatchObject({ ...DEFAULT_CONFIG });
      expect(raw).toHaveProperty('_comment');
      expect(raw).toHaveProperty('_availableOptions.batchSize');

      expect(await loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
    });
  });
});
