/**
 * JSON logging with secret redaction for registry traffic
 *
 * Security requirements:
 * - Never log registry passwords, identity tokens or bearer tokens in plaintext
 * - Redact sensitive headers (Authorization, WWW-Authenticate is kept)
 * - Support structured JSON logging for CI/automation
 *
 * All log output goes to stderr: stdout carries only the retag report.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Where formatted lines are written (default: stderr) */
  sink?: (line: string) => void;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // Bearer and Basic credentials
  /Bearer\s+[a-zA-Z0-9._~+/=-]+/gi,
  /Basic\s+[a-zA-Z0-9+/=]{8,}/gi,

  // JWT tokens (registry bearer tokens are usually JWTs)
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // Personal access tokens for the common hosted registries
  /ghp_[a-zA-Z0-9]{20,}/g,
  /glpat-[a-zA-Z0-9_-]{20,}/g,
  /dckr_pat_[a-zA-Z0-9_-]{20,}/g,

  // Credentials embedded in URLs
  /(?<=:\/\/)[^/\s:@]+:[^/\s@]+(?=@)/g,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'x-registry-auth',
]);

/**
 * Object keys that should have their values redacted (compared lowercased)
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'identitytoken',
  'registrytoken',
  'authorization',
  'auth',
  'credentials',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_REDACTION_DEPTH = 10;

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('Bearer abc123xyz789') // 'Bear...z789'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    // Reset lastIndex for global patterns
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values in an arbitrary value (deep copy with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_REDACTION_DEPTH) {
    return '[MAX_DEPTH]';
  }

  if (typeof value === 'string') {
    return redactPatterns(value);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Error) {
    return { name: value.name, message: redactPatterns(value.message) };
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = redactEntry(key, entry, depth);
  }
  return result;
}

function redactEntry(key: string, value: unknown, depth: number): unknown {
  const lowerKey = key.toLowerCase();
  if (!SENSITIVE_KEYS.has(lowerKey) && !SENSITIVE_HEADERS.has(lowerKey)) {
    return redactValue(value, depth + 1);
  }
  if (typeof value === 'string' && value.length > 0) {
    return redactString(value);
  }
  if (value !== null && value !== undefined) {
    return '[REDACTED]';
  }
  return value;
}

/**
 * Redact a log context record
 */
export function redactContext(
  context: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = redactEntry(key, value, 0);
  }
  return result;
}

/**
 * Redact sensitive headers from a Headers object or plain object
 */
export function redactHeaders(
  headers: Headers | Record<string, string>
): Record<string, string> {
  const result: Record<string, string> = {};

  const entries: Array<[string, string]> = [];
  if (headers instanceof Headers) {
    headers.forEach((value, key) => entries.push([key, value]));
  } else {
    entries.push(...Object.entries(headers));
  }

  for (const [key, value] of entries) {
    if (SENSITIVE_HEADERS.has(key.toLowerCase())) {
      result[key] = redactString(value);
    } else {
      result[key] = redactPatterns(value);
    }
  }

  return result;
}

/**
 * Parse a log level from an environment value, ignoring unknown levels
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return undefined;
  }
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger with JSON output and automatic secret redaction
 */
export class RetagLogger {
  private readonly config: Required<LoggerConfig>;
  private readonly bindings: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, bindings: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      sink: config.sink ?? ((line: string) => process.stderr.write(line + '\n')),
    };
    this.bindings = bindings;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.bindings, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactContext(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  private formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    // Human-readable format
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    this.config.sink(this.formatEntry(this.createEntry(level, message, context, error)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(
    method: string,
    url: string,
    options?: { headers?: Headers | Record<string, string> }
  ): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: options?.headers ? redactHeaders(options.headers) : undefined,
    });
  }

  /**
   * Log an HTTP response; 4xx/5xx are logged at warn except expected 401 challenges and 404s
   */
  response(
    status: number,
    url: string,
    options?: { durationMs?: number; expected?: boolean }
  ): void {
    const level: LogLevel = status >= 400 && !options?.expected ? 'warn' : 'debug';
    this.log(level, `HTTP Response ${status}: ${redactPatterns(url)}`, {
      status,
      durationMs: options?.durationMs,
    });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): RetagLogger {
    return new RetagLogger(this.config, { ...this.bindings, ...context });
  }

  /**
   * Update logger configuration
   */
  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Default logger instance, configured from IMAGE_RETAG_LOG_LEVEL / IMAGE_RETAG_LOG_JSON
 */
export const logger = new RetagLogger({
  level: parseLogLevel(process.env.IMAGE_RETAG_LOG_LEVEL) ?? 'warn',
  json: process.env.IMAGE_RETAG_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): RetagLogger {
  return new RetagLogger(config);
}
