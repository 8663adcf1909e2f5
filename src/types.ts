/**
 * Shared types and interfaces for the image-retag CLI
 */

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Options accepted on the command line
 */
export interface GlobalOptions {
  /** Don't write the tag, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** Maximum attempts per registry operation */
  maxAttempts?: string;
  /** Initial backoff delay in milliseconds */
  baseDelay?: string;
  /** Backoff ceiling in milliseconds */
  maxDelay?: string;
  /** Per-request timeout in milliseconds */
  timeout?: string;
  /** Backoff jitter as a fraction of each delay */
  jitter?: string;
  /** Talk plain HTTP to the registry */
  plainHttp?: boolean;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Cancellation signal wired to process signals */
  signal?: AbortSignal;
}
