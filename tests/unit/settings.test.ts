/**
 * Unit Tests: Settings resolution
 */

import { describe, it, expect } from 'vitest';
import {
  resolveSettings,
  describeSettings,
  parsePositiveInteger,
  parseBoolean,
  parseFraction,
  DEFAULT_SETTINGS,
} from '../../src/config/settings.js';
import { InvalidSettingsError } from '../../src/registry/errors.js';

describe('resolveSettings', () => {
  it('should fall back to defaults', () => {
    const resolved = resolveSettings({}, {});

    expect(resolved.settings).toEqual({
      maxAttempts: 4,
      baseDelayMs: 500,
      maxDelayMs: 8000,
      timeoutMs: 30000,
      jitterFactor: 0,
      plainHttp: false,
    });
    expect(resolved.settings).toEqual(DEFAULT_SETTINGS);
    expect(Object.values(resolved.sources).every((source) => source === 'default')).toBe(true);
  });

  it('should read environment variables', () => {
    const resolved = resolveSettings(
      {},
      {
        IMAGE_RETAG_MAX_ATTEMPTS: '6',
        IMAGE_RETAG_BASE_DELAY_MS: '100',
        IMAGE_RETAG_TIMEOUT_MS: '5000',
        IMAGE_RETAG_JITTER: '0.25',
        IMAGE_RETAG_PLAIN_HTTP: 'yes',
      }
    );

    expect(resolved.settings).toEqual({
      maxAttempts: 6,
      baseDelayMs: 100,
      maxDelayMs: 8000,
      timeoutMs: 5000,
      jitterFactor: 0.25,
      plainHttp: true,
    });
    expect(resolved.sources).toEqual({
      maxAttempts: 'env',
      baseDelayMs: 'env',
      maxDelayMs: 'default',
      timeoutMs: 'env',
      jitterFactor: 'env',
      plainHttp: 'env',
    });
  });

  it('should let command-line options win over the environment', () => {
    const resolved = resolveSettings(
      { maxAttempts: '2', plainHttp: true },
      { IMAGE_RETAG_MAX_ATTEMPTS: '6', IMAGE_RETAG_PLAIN_HTTP: 'false' }
    );

    expect(resolved.settings.maxAttempts).toBe(2);
    expect(resolved.settings.plainHttp).toBe(true);
    expect(resolved.sources.maxAttempts).toBe('cli');
    expect(resolved.sources.plainHttp).toBe('cli');
  });

  it('should treat empty environment values as unset', () => {
    const resolved = resolveSettings({}, { IMAGE_RETAG_MAX_ATTEMPTS: '  ' });

    expect(resolved.settings.maxAttempts).toBe(4);
    expect(resolved.sources.maxAttempts).toBe('default');
  });

  it('should name the flag in command-line errors', () => {
    expect(() => resolveSettings({ maxAttempts: '0' }, {})).toThrow(
      "Invalid setting '--max-attempts': expected a positive integer, got '0'"
    );
  });

  it('should name the variable in environment errors', () => {
    expect(() => resolveSettings({}, { IMAGE_RETAG_MAX_DELAY_MS: 'soon' })).toThrow(
      "Invalid setting 'IMAGE_RETAG_MAX_DELAY_MS': expected a positive integer, got 'soon'"
    );
  });

  it('should reject a base delay above the max delay', () => {
    let caught: unknown;
    try {
      resolveSettings({ baseDelay: '9000' }, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidSettingsError);
    if (caught instanceof InvalidSettingsError) {
      expect(caught.code).toBe('INVALID_SETTINGS');
      expect(caught.setting).toBe('baseDelay');
      expect(caught.message).toBe(
        "Invalid setting 'baseDelay': base delay (9000ms) must not exceed max delay (8000ms)"
      );
    }
  });

  it('should take the jitter fraction from the command line', () => {
    const resolved = resolveSettings({ jitter: '0.1' }, { IMAGE_RETAG_JITTER: '0.3' });

    expect(resolved.settings.jitterFactor).toBe(0.1);
    expect(resolved.sources.jitterFactor).toBe('cli');
  });

  it('should name the flag in jitter errors', () => {
    expect(() => resolveSettings({ jitter: '1.5' }, {})).toThrow(
      "Invalid setting '--jitter': expected a number between 0 and 1, got '1.5'"
    );
  });

  it('should reject unknown boolean values', () => {
    expect(() => resolveSettings({}, { IMAGE_RETAG_PLAIN_HTTP: 'maybe' })).toThrow(InvalidSettingsError);
  });
});

describe('parsePositiveInteger', () => {
  it('should accept surrounding whitespace', () => {
    expect(parsePositiveInteger(' 12 ', 'n')).toBe(12);
  });

  it('should reject negatives, fractions and unsafe integers', () => {
    expect(() => parsePositiveInteger('-1', 'n')).toThrow(InvalidSettingsError);
    expect(() => parsePositiveInteger('1.5', 'n')).toThrow(InvalidSettingsError);
    expect(() => parsePositiveInteger('99999999999999999999', 'n')).toThrow(InvalidSettingsError);
  });
});

describe('parseFraction', () => {
  it('should accept zero, one and decimals in between', () => {
    expect(parseFraction('0', 'f')).toBe(0);
    expect(parseFraction(' 0.2 ', 'f')).toBe(0.2);
    expect(parseFraction('1', 'f')).toBe(1);
  });

  it('should reject negatives and malformed numbers', () => {
    expect(() => parseFraction('-0.1', 'f')).toThrow(InvalidSettingsError);
    expect(() => parseFraction('.5', 'f')).toThrow(InvalidSettingsError);
    expect(() => parseFraction('half', 'f')).toThrow(InvalidSettingsError);
  });
});

describe('parseBoolean', () => {
  it('should accept the usual spellings', () => {
    expect(parseBoolean('TRUE', 'b')).toBe(true);
    expect(parseBoolean('1', 'b')).toBe(true);
    expect(parseBoolean('no', 'b')).toBe(false);
    expect(parseBoolean('', 'b')).toBe(false);
  });
});

describe('describeSettings', () => {
  it('should list each setting with its source', () => {
    expect(describeSettings(resolveSettings({ timeout: '1000' }, {}))).toEqual([
      'maxAttempts=4 (default)',
      'baseDelayMs=500 (default)',
      'maxDelayMs=8000 (default)',
      'timeoutMs=1000 (cli)',
      'jitterFactor=0 (default)',
      'plainHttp=false (default)',
    ]);
  });
});
