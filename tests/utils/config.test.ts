import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_GENERATOR_WEIGHTS, reloadConfig, resolveConfig } from '../../src/utils/config.js';
import { ConfigurationError } from '../../src/utils/errors.js';

describe('Configuration', () => {
  describe('resolveConfig', () => {
    it('should fill in defaults', () => {
      const config = resolveConfig();

      expect(config.embedding_size).toBe(3072);
      expect(config.generator_weights).toEqual(DEFAULT_GENERATOR_WEIGHTS);
      expect(config.weight_tables.primary_key.primaryKeyExtra).toBe(15);
      expect(config.weight_tables.foreign_key.foreignKeyExtra).toBe(15);
      expect(config.sliding_window).toEqual({ decay: 0.5, radius: 1 });
      expect(config.remove_stop_words).toBe(false);
      expect(config.learned.provider).toBe('none');
    });

    it('should default unlisted generators to weight 0 once weights are given', () => {
      const config = resolveConfig({ generator_weights: { enhanced: 2 } });

      expect(config.generator_weights).toEqual({ enhanced: 2, primary_key: 0, foreign_key: 0, learned: 0 });
    });

    it('should merge partial weight table overrides', () => {
      const config = resolveConfig({ weight_tables: { enhanced: { entity: 10 } } });

      expect(config.weight_tables.enhanced.entity).toBe(10);
      expect(config.weight_tables.enhanced.base).toBe(1);
      expect(config.weight_tables.enhanced.primaryKeyExtra).toBe(5);
    });

    it('should not share state between resolved configs', () => {
      const first = resolveConfig();
      first.generator_weights.enhanced = 99;

      expect(resolveConfig().generator_weights.enhanced).toBe(0.4);
    });

    it.each([
      ['an unknown key', { embedding_sise: 16 }],
      ['an unknown generator', { generator_weights: { bogus: 1 } }],
      ['a negative weight', { generator_weights: { enhanced: -1 } }],
      ['a zero embedding size', { embedding_size: 0 }],
      ['a fractional embedding size', { embedding_size: 10.5 }],
      ['a decay above 1', { sliding_window: { decay: 1.5 } }],
      ['an unknown weight table field', { weight_tables: { primary_key: { bonus: 1 } } }],
      ['an unknown provider', { learned: { provider: 'other' } }],
    ])('should reject %s', (_label, overrides) => {
      expect(() => resolveConfig(overrides)).toThrow(ConfigurationError);
    });

    it('should name the offending path', () => {
      expect(() => resolveConfig({ sliding_window: { radius: -1 } })).toThrow(/sliding_window\.radius/);
    });
  });

  describe('loadConfig', () => {
    let dir: string | null = null;

    afterEach(() => {
      vi.unstubAllEnvs();
      if (dir) rmSync(dir, { recursive: true, force: true });
      dir = null;
    });

    function writeConfig(content: string): string {
      dir = mkdtempSync(join(tmpdir(), 'schemavec-config-'));
      const path = join(dir, 'schemavec.config.json');
      writeFileSync(path, content);
      return path;
    }

    it('should read the file named by SCHEMAVEC_CONFIG_PATH', () => {
      vi.stubEnv('SCHEMAVEC_CONFIG_PATH', writeConfig(JSON.stringify({ embedding_size: 256 })));

      expect(reloadConfig().embedding_size).toBe(256);
    });

    it('should apply environment overrides', () => {
      vi.stubEnv('SCHEMAVEC_CONFIG_PATH', writeConfig('{}'));
      vi.stubEnv('SCHEMAVEC_EMBEDDING_SIZE', '512');
      vi.stubEnv('SCHEMAVEC_LEARNED_PROVIDER', 'mock');
      vi.stubEnv('SCHEMAVEC_DB_PATH', ':memory:');

      const config = reloadConfig();

      expect(config.embedding_size).toBe(512);
      expect(config.learned.provider).toBe('mock');
      expect(config.storage.database_path).toBe(':memory:');
    });

    it('should reject invalid environment overrides', () => {
      vi.stubEnv('SCHEMAVEC_CONFIG_PATH', writeConfig('{}'));
      vi.stubEnv('SCHEMAVEC_EMBEDDING_SIZE', 'large');

      expect(() => reloadConfig()).toThrow(ConfigurationError);
    });

    it('should fail when an explicit config file is missing', () => {
      vi.stubEnv('SCHEMAVEC_CONFIG_PATH', join(tmpdir(), 'schemavec-does-not-exist.json'));

      expect(() => reloadConfig()).toThrow(ConfigurationError);
    });

    it('should fail on malformed JSON', () => {
      vi.stubEnv('SCHEMAVEC_CONFIG_PATH', writeConfig('{ not json'));

      expect(() => reloadConfig()).toThrow(/Failed to parse configuration/);
    });
  });
});
