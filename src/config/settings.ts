/**
 * Runtime settings resolution
 *
 * ## Resolution Order
 *
 * 1. Command-line flag (`--max-attempts`, `--base-delay`, ...)
 * 2. Environment variable (`IMAGE_RETAG_*`)
 * 3. Built-in default
 *
 * ## Environment Variables
 *
 * - IMAGE_RETAG_MAX_ATTEMPTS: Attempts per registry operation (default: 4)
 * - IMAGE_RETAG_BASE_DELAY_MS: First backoff delay (default: 500)
 * - IMAGE_RETAG_MAX_DELAY_MS: Backoff ceiling (default: 8000)
 * - IMAGE_RETAG_TIMEOUT_MS: Per-request timeout (default: 30000)
 * - IMAGE_RETAG_JITTER: Backoff jitter fraction in [0, 1], capped at 1/3 (default: 0)
 * - IMAGE_RETAG_PLAIN_HTTP: `true`/`1` to talk HTTP to the registry
 */

import { DEFAULT_RETRY_CONFIG } from '../api/retry.js';
import { InvalidSettingsError } from '../registry/errors.js';
import type { GlobalOptions } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export type SettingSource = 'cli' | 'env' | 'default';

export interface Settings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  jitterFactor: number;
  plainHttp: boolean;
}

export type SettingName = keyof Settings;

export interface ResolvedSettings {
  settings: Settings;
  /** Where each value came from (for verbose output) */
  sources: Record<SettingName, SettingSource>;
}

export type SettingsInput = Pick<
  GlobalOptions,
  'maxAttempts' | 'baseDelay' | 'maxDelay' | 'timeout' | 'jitter' | 'plainHttp'
>;

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_TIMEOUT_MS = 30_000;

export const DEFAULT_SETTINGS: Settings = {
  maxAttempts: DEFAULT_RETRY_CONFIG.maxAttempts,
  baseDelayMs: DEFAULT_RETRY_CONFIG.baseDelayMs,
  maxDelayMs: DEFAULT_RETRY_CONFIG.maxDelayMs,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  jitterFactor: DEFAULT_RETRY_CONFIG.jitterFactor,
  plainHttp: false,
};

export const ENV_VARS: Record<SettingName, string> = {
  maxAttempts: 'IMAGE_RETAG_MAX_ATTEMPTS',
  baseDelayMs: 'IMAGE_RETAG_BASE_DELAY_MS',
  maxDelayMs: 'IMAGE_RETAG_MAX_DELAY_MS',
  timeoutMs: 'IMAGE_RETAG_TIMEOUT_MS',
  jitterFactor: 'IMAGE_RETAG_JITTER',
  plainHttp: 'IMAGE_RETAG_PLAIN_HTTP',
};

const CLI_FLAGS: Record<SettingName, string> = {
  maxAttempts: '--max-attempts',
  baseDelayMs: '--base-delay',
  maxDelayMs: '--max-delay',
  timeoutMs: '--timeout',
  jitterFactor: '--jitter',
  plainHttp: '--plain-http',
};

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a strictly positive integer; `label` names the flag or variable in errors
 */
export function parsePositiveInteger(raw: string, label: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidSettingsError(label, `expected a positive integer, got '${raw}'`);
  }
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidSettingsError(label, `expected a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Parse a fraction in [0, 1]
 */
export function parseFraction(raw: string, label: string): number {
  const trimmed = raw.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed) || Number(trimmed) > 1) {
    throw new InvalidSettingsError(label, `expected a number between 0 and 1, got '${raw}'`);
  }
  return Number(trimmed);
}

/**
 * Parse a boolean environment value (`true`/`false`/`1`/`0`/`yes`/`no`)
 */
export function parseBoolean(raw: string, label: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
    case '':
      return false;
    default:
      throw new InvalidSettingsError(label, `expected true or false, got '${raw}'`);
  }
}

function resolveNumber(
  name: Exclude<SettingName, 'plainHttp'>,
  cliValue: string | undefined,
  env: NodeJS.ProcessEnv,
  parse: (raw: string, label: string) => number = parsePositiveInteger
): [number, SettingSource] {
  if (cliValue !== undefined) {
    return [parse(cliValue, CLI_FLAGS[name]), 'cli'];
  }
  const envValue = env[ENV_VARS[name]];
  if (envValue !== undefined && envValue.trim() !== '') {
    return [parse(envValue, ENV_VARS[name]), 'env'];
  }
  return [DEFAULT_SETTINGS[name], 'default'];
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Merge defaults, environment and command-line options into validated settings
 *
 * @throws InvalidSettingsError when a value is malformed or inconsistent
 */
export function resolveSettings(
  options: SettingsInput = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedSettings {
  const [maxAttempts, maxAttemptsSource] = resolveNumber('maxAttempts', options.maxAttempts, env);
  const [baseDelayMs, baseDelaySource] = resolveNumber('baseDelayMs', options.baseDelay, env);
  const [maxDelayMs, maxDelaySource] = resolveNumber('maxDelayMs', options.maxDelay, env);
  const [timeoutMs, timeoutSource] = resolveNumber('timeoutMs', options.timeout, env);
  const [jitterFactor, jitterSource] = resolveNumber('jitterFactor', options.jitter, env, parseFraction);

  let plainHttp = DEFAULT_SETTINGS.plainHttp;
  let plainHttpSource: SettingSource = 'default';
  const plainHttpEnv = env[ENV_VARS.plainHttp];
  if (options.plainHttp) {
    plainHttp = true;
    plainHttpSource = 'cli';
  } else if (plainHttpEnv !== undefined) {
    plainHttp = parseBoolean(plainHttpEnv, ENV_VARS.plainHttp);
    plainHttpSource = 'env';
  }

  if (baseDelayMs > maxDelayMs) {
    throw new InvalidSettingsError(
      'baseDelay',
      `base delay (${baseDelayMs}ms) must not exceed max delay (${maxDelayMs}ms)`
    );
  }

  return {
    settings: { maxAttempts, baseDelayMs, maxDelayMs, timeoutMs, jitterFactor, plainHttp },
    sources: {
      maxAttempts: maxAttemptsSource,
      baseDelayMs: baseDelaySource,
      maxDelayMs: maxDelaySource,
      timeoutMs: timeoutSource,
      jitterFactor: jitterSource,
      plainHttp: plainHttpSource,
    },
  };
}

/**
 * One line per setting with its origin, for verbose output
 */
export function describeSettings(resolved: ResolvedSettings): string[] {
  const names: SettingName[] = [
    'maxAttempts',
    'baseDelayMs',
    'maxDelayMs',
    'timeoutMs',
    'jitterFactor',
    'plainHttp',
  ];
  return names.map((name) => `${name}=${String(resolved.settings[name])} (${resolved.sources[name]})`);
}
