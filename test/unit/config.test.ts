import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigSchema, DEFAULT_SYSTEM_PROMPT, loadConfig } from '../../src/config.js';
import { ConfigurationError } from '../../src/errors.js';

describe('Config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    Object.keys(process.env).forEach((key) => {
      if (key.startsWith('FOCUS_')) {
        delete process.env[key];
      }
    });
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('ConfigSchema', () => {
    it('should provide default values when no input given', () => {
      const config = ConfigSchema.parse({});
      expect(config.logLevel).toBe('warning');
      expect(config.historyFile).toBe('.focus/history.jsonl');
      expect(config.systemPrompt).toBe(DEFAULT_SYSTEM_PROMPT);
      expect(config.maxRecent).toBe(10);
      expect(config.maxToolRounds).toBe(5);
      expect(config.toolTimeoutMs).toBe(30000);
      expect(config.ladderFile).toBeUndefined();
      expect(config.refineIntervalMinutes).toBe(0);
    });

    it('should default the cloud backend', () => {
      expect(ConfigSchema.parse({}).cloud).toEqual({
        provider: 'openrouter',
        reasoningModel: false,
        timeoutMs: 30000,
        complexTimeoutMs: 300000,
        maxAttempts: 2,
        retryDelayMs: 500,
      });
    });

    it('should default the on-device backend', () => {
      expect(ConfigSchema.parse({}).onDevice).toEqual({
        baseURL: 'http://127.0.0.1:11434/v1',
        model: 'llama3.2',
        timeoutMs: 120000,
        complexTimeoutMs: 300000,
        maxAttempts: 3,
        retryDelayMs: 1000,
      });
    });

    it('should reject a window or tool round limit below one', () => {
      expect(() => ConfigSchema.parse({ maxRecent: 0 })).toThrow();
      expect(() => ConfigSchema.parse({ maxToolRounds: 0 })).toThrow();
    });

    it('should reject unknown providers and log levels', () => {
      expect(() => ConfigSchema.parse({ cloud: { provider: 'gemini' } })).toThrow();
      expect(() => ConfigSchema.parse({ logLevel: 'verbose' })).toThrow();
    });
  });

  describe('loadConfig', () => {
    it('should load defaults from an empty environment', () => {
      expect(loadConfig({})).toEqual(ConfigSchema.parse({}));
    });

    it('should read top-level settings', () => {
      const config = loadConfig({
        FOCUS_LOG_LEVEL: 'debug',
        FOCUS_HISTORY_FILE: '/tmp/chat.jsonl',
        FOCUS_SYSTEM_PROMPT: 'Be brief.',
        FOCUS_MAX_RECENT: '4',
        FOCUS_MAX_TOOL_ROUNDS: '3',
        FOCUS_TOOL_TIMEOUT_MS: '1500',
        FOCUS_LADDER_FILE: 'ladder.json',
        FOCUS_REFINE_INTERVAL_MINUTES: '240',
      });

      expect(config.logLevel).toBe('debug');
      expect(config.historyFile).toBe('/tmp/chat.jsonl');
      expect(config.systemPrompt).toBe('Be brief.');
      expect(config.maxRecent).toBe(4);
      expect(config.maxToolRounds).toBe(3);
      expect(config.toolTimeoutMs).toBe(1500);
      expect(config.ladderFile).toBe('ladder.json');
      expect(config.refineIntervalMinutes).toBe(240);
    });

    it('should read cloud settings', () => {
      const config = loadConfig({
        FOCUS_CLOUD_PROVIDER: 'anthropic',
        FOCUS_CLOUD_MODEL: 'claude-test',
        FOCUS_CLOUD_API_KEY: 'test-secret',
        FOCUS_CLOUD_REASONING_MODEL: 'true',
        FOCUS_CLOUD_MAX_ATTEMPTS: '1',
      });

      expect(config.cloud).toMatchObject({
        provider: 'anthropic',
        model: 'claude-test',
        apiKey: 'test-secret',
        reasoningModel: true,
        maxAttempts: 1,
      });
    });

    it('should read on-device settings', () => {
      const config = loadConfig({
        FOCUS_ONDEVICE_BASE_URL: 'http://localhost:8080/v1',
        FOCUS_ONDEVICE_MODEL: 'qwen2.5',
        FOCUS_ONDEVICE_TIMEOUT_MS: '60000',
      });

      expect(config.onDevice).toMatchObject({
        baseURL: 'http://localhost:8080/v1',
        model: 'qwen2.5',
        timeoutMs: 60000,
      });
    });

    it('should parse "1" as true and anything else as false', () => {
      expect(loadConfig({ FOCUS_CLOUD_REASONING_MODEL: '1' }).cloud.reasoningModel).toBe(true);
      expect(loadConfig({ FOCUS_CLOUD_REASONING_MODEL: 'yes' }).cloud.reasoningModel).toBe(false);
    });

    it('should treat empty strings as unset', () => {
      const config = loadConfig({ FOCUS_MAX_RECENT: '', FOCUS_CLOUD_PROVIDER: '' });
      expect(config.maxRecent).toBe(10);
      expect(config.cloud.provider).toBe('openrouter');
    });

    it('should report non-numeric values instead of defaulting', () => {
      expect(() => loadConfig({ FOCUS_MAX_RECENT: 'ten' })).toThrow(
        'Invalid configuration: maxRecent: Expected number, received nan'
      );
    });

    it('should name nested settings in errors', () => {
      expect(() => loadConfig({ FOCUS_ONDEVICE_BASE_URL: 'not a url' })).toThrow('onDevice.baseURL: Invalid url');
    });

    it('should throw ConfigurationError listing every issue', () => {
      try {
        loadConfig({ FOCUS_MAX_RECENT: '0', FOCUS_CLOUD_PROVIDER: 'gemini' });
        expect.unreachable('loadConfig should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect((error as ConfigurationError).data).toEqual({
          issues: [expect.stringMatching(/^maxRecent: /), expect.stringMatching(/^cloud\.provider: /)],
        });
      }
    });
  });
});
