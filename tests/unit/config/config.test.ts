import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  DEFAULT_CONFIG,
  clearConfigCache,
  ensureConfig,
  expandPath,
  getCacheDir,
  getConfig,
  getConfigPath,
  loadConfig,
  reloadConfig,
  saveConfig,
  setConfig,
} from '../../../src/config/config.js';
import { type Config } from '../../../src/types/index.js';

describe('Config', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cronstamp-config-'));
  });

  afterEach(() => {
    clearConfigCache();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function withBase(base: string): Config {
    return { ...DEFAULT_CONFIG, paths: { ...DEFAULT_CONFIG.paths, base_dir: base } };
  }

  describe('paths', () => {
    it('should expand the home directory', () => {
      expect(expandPath('~/stamps')).toBe(path.join(os.homedir(), 'stamps'));
      expect(expandPath('~')).toBe(os.homedir());
      expect(expandPath('/var/tmp')).toBe('/var/tmp');
    });

    it('should resolve relative entries under the base directory', () => {
      const config = withBase('/srv/cronstamp');
      expect(getCacheDir(config)).toBe('/srv/cronstamp/cache');
      expect(getConfigPath(config)).toBe('/srv/cronstamp/config.json');
    });

    it('should keep absolute entries as they are', () => {
      const config: Config = { ...DEFAULT_CONFIG, paths: { ...DEFAULT_CONFIG.paths, cache_dir: '/tmp/stamps' } };
      expect(getCacheDir(config)).toBe('/tmp/stamps');
    });
  });

  describe('loadConfig', () => {
    it('should return the defaults when the file is missing', () => {
      const result = loadConfig(path.join(dir, 'missing.json'));

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(DEFAULT_CONFIG);
      }
    });

    it('should merge a partial file over the defaults', () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ schedule: { lookback_days: 14, weekday_start: 'sunday' } }));

      const result = loadConfig(file);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.schedule).toEqual({
          lookback_days: 14,
          weekday_start: 'sunday',
          lock: false,
          lock_timeout_ms: 5000,
        });
        expect(result.data.logging.level).toBe('info');
      }
    });

    it('should reject values outside the schema', () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ schedule: { weekday_start: 'friday' } }));

      const result = loadConfig(file);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toContain('Invalid configuration');
      }
    });

    it('should reject a file that is not a JSON object', () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, '[1, 2]');

      const result = loadConfig(file);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(`Invalid configuration: ${file} must contain a JSON object`);
      }
    });

    it('should report malformed JSON', () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, '{ not json');

      expect(loadConfig(file).success).toBe(false);
    });
  });

  describe('saveConfig and ensureConfig', () => {
    it('should round-trip a saved configuration', () => {
      const file = path.join(dir, 'nested', 'config.json');
      const config: Config = { ...DEFAULT_CONFIG, logging: { level: 'debug' } };

      expect(saveConfig(config, file).success).toBe(true);
      const loaded = loadConfig(file);

      expect(loaded.success && loaded.data.logging.level).toBe('debug');
    });

    it('should write defaults and create directories on first use', () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ paths: { base_dir: dir } }));

      const result = ensureConfig(file);

      expect(result.success).toBe(true);
      expect(fs.existsSync(path.join(dir, 'cache'))).toBe(true);
    });
  });

  describe('singleton', () => {
    it('should return the configuration set explicitly', () => {
      const config = withBase(dir);
      setConfig(config);
      expect(getConfig()).toBe(config);
    });

    it('should replace the cached configuration on reload', () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ schedule: { lookback_days: 3 } }));
      setConfig(DEFAULT_CONFIG);

      const result = reloadConfig(file);

      expect(result.success).toBe(true);
      expect(getConfig().schedule.lookback_days).toBe(3);
    });

    it('should keep the cache empty after a failed reload', () => {
      const file = path.join(dir, 'config.json');
      fs.writeFileSync(file, JSON.stringify({ schedule: { lookback_days: 0 } }));
      const custom = withBase(dir);
      setConfig(custom);

      expect(reloadConfig(file).success).toBe(false);
      expect(getConfig()).not.toBe(custom);
    });
  });
});
