import { describe, it, expect } from 'vitest';
import { LOG_LEVEL_PRIORITY, LogLevelSchema, parseLogLevel } from '../../../src/logging/levels.js';

describe('log levels', () => {
  it('should order severities from emergency to debug', () => {
    const ordered = [...LogLevelSchema.options].sort((a, b) => LOG_LEVEL_PRIORITY[a] - LOG_LEVEL_PRIORITY[b]);
    expect(ordered).toEqual(['emergency', 'alert', 'critical', 'error', 'warning', 'notice', 'info', 'debug']);
  });

  describe('parseLogLevel', () => {
    it('should accept any case', () => {
      expect(parseLogLevel('DEBUG')).toBe('debug');
      expect(parseLogLevel('Notice')).toBe('notice');
    });

    it('should fall back when missing or unknown', () => {
      expect(parseLogLevel(undefined)).toBe('info');
      expect(parseLogLevel('')).toBe('info');
      expect(parseLogLevel('trace', 'warning')).toBe('warning');
    });
  });
});
