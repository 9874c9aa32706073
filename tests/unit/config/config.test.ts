/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigLoader } from '../../../src/config/productionConfig';
import { loadConfig } from '../../../src/config';
import { ConfigValidationError } from '../../../src/errors/configValidationError';

describe('ConfigLoader', () => {
  let dir: string;

  function writeConfig(name: string, content: unknown): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, typeof content === 'string' ? content : JSON.stringify(content));
    return filePath;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'resilience-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should log to file only in production', () => {
      const production = ConfigLoader.getDefaultConfig('production');
      const development = ConfigLoader.getDefaultConfig('development');

      expect(production.logging.level).toBe('info');
      expect(production.logging.console.colorize).toBe(false);
      expect(production.logging.file).toEqual({ enabled: true, path: './logs/resilience.log' });
      expect(development.logging.level).toBe('debug');
      expect(development.logging.file?.enabled).toBe(false);
    });

    it('should disable console output for tests', () => {
      expect(ConfigLoader.getDefaultConfig('test').logging.console.enabled).toBe(false);
    });

    it('should carry component defaults', () => {
      const config = ConfigLoader.getDefaultConfig('development');

      expect(config.circuitBreaker).toEqual({
        failureThreshold: 5,
        successThreshold: 3,
        openTimeoutMs: 60000,
        monitoringWindowMs: 300000,
        halfOpenMaxProbes: 1
      });
      expect(config.recovery.maxRetries).toBe(3);
      expect(config.recovery.maxHistory).toBe(1000);
      expect(config.dispatcher.maxHistory).toBe(1000);
    });
  });

  describe('loadFromFile', () => {
    it('should fail for a missing file', () => {
      const missing = path.join(dir, 'missing.json');

      expect(() => ConfigLoader.loadFromFile(missing)).toThrow(`Configuration file not found: ${missing}`);
    });

    it('should reject formats other than JSON', () => {
      const filePath = writeConfig('resilience.yaml', 'version: 1');

      expect(() => ConfigLoader.loadFromFile(filePath)).toThrow('Unsupported configuration file format: .yaml');
    });

    it('should merge a partial file over environment defaults', () => {
      const filePath = writeConfig('resilience.json', {
        environment: 'production',
        logging: { console: { enabled: false } },
        circuitBreaker: { failureThreshold: 8 }
      });

      const config = ConfigLoader.loadFromFile(filePath);

      expect(config.environment).toBe('production');
      expect(config.logging.level).toBe('info');
      expect(config.logging.console).toEqual({ enabled: false, colorize: false });
      expect(config.circuitBreaker.failureThreshold).toBe(8);
      expect(config.circuitBreaker.successThreshold).toBe(3);
    });

    it('should report the invalid field', () => {
      const filePath = writeConfig('resilience.json', { recovery: { maxRetries: 0 } });

      try {
        ConfigLoader.loadFromFile(filePath);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.field).toBe('recovery.maxRetries');
          expect(error.value).toBe(0);
        }
      }
    });

    it('should reject sections that are not objects', () => {
      const filePath = writeConfig('resilience.json', { dispatcher: 5 });

      expect(() => ConfigLoader.loadFromFile(filePath)).toThrow('dispatcher must be an object');
    });

    it('should reject unknown environments', () => {
      const filePath = writeConfig('resilience.json', { environment: 'staging' });

      expect(() => ConfigLoader.loadFromFile(filePath)).toThrow(ConfigValidationError);
    });

    it('should reject a file that is not a JSON object', () => {
      const filePath = writeConfig('resilience.json', [1, 2]);

      expect(() => ConfigLoader.loadFromFile(filePath)).toThrow('Configuration file must contain a JSON object');
    });
  });

  describe('load', () => {
    it('should use the file named by RESILIENCE_CONFIG', () => {
      const filePath = writeConfig('custom.json', { dispatcher: { maxHistory: 50 } });

      const config = ConfigLoader.load(undefined, { RESILIENCE_CONFIG: filePath });

      expect(config.dispatcher.maxHistory).toBe(50);
    });

    it('should prefer an explicit path', () => {
      const explicit = writeConfig('explicit.json', { dispatcher: { maxHistory: 10 } });
      const fromEnv = writeConfig('env.json', { dispatcher: { maxHistory: 20 } });

      const config = ConfigLoader.load(explicit, { RESILIENCE_CONFIG: fromEnv });

      expect(config.dispatcher.maxHistory).toBe(10);
    });

    it('should fall back to NODE_ENV defaults', () => {
      expect(ConfigLoader.load(undefined, { NODE_ENV: 'production' }).environment).toBe('production');
      expect(ConfigLoader.load(undefined, { NODE_ENV: 'staging' }).environment).toBe('development');
    });
  });
});

describe('loadConfig', () => {
  it('should apply environment variable overrides', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      LOG_LEVEL: 'warning',
      LOG_FILE: '/var/log/resilience-test.log',
      LOG_CONSOLE_COLORIZE: 'false',
      BREAKER_FAILURE_THRESHOLD: '9',
      BREAKER_OPEN_TIMEOUT_MS: '2500',
      RECOVERY_MAX_RETRIES: '6',
      RECOVERY_BACKOFF_MULTIPLIER: '1.5',
      DISPATCHER_MAX_HISTORY: '200'
    });

    expect(config.environment).toBe('test');
    expect(config.logging.level).toBe('warning');
    expect(config.logging.file).toEqual({ enabled: true, path: '/var/log/resilience-test.log' });
    expect(config.logging.console.colorize).toBe(false);
    expect(config.circuitBreaker.failureThreshold).toBe(9);
    expect(config.circuitBreaker.openTimeoutMs).toBe(2500);
    expect(config.circuitBreaker.successThreshold).toBe(3);
    expect(config.recovery.maxRetries).toBe(6);
    expect(config.recovery.backoffMultiplier).toBe(1.5);
    expect(config.dispatcher.maxHistory).toBe(200);
  });

  it('should ignore unknown log levels', () => {
    expect(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'verbose' }).logging.level).toBe('debug');
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', BREAKER_FAILURE_THRESHOLD: 'many' }))
      .toThrow(ConfigValidationError);
  });
});
