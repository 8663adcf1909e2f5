/**
 * Error types for registry access and the retag protocol
 *
 * Every fatal condition is a RetagError with a stable code, the reference it
 * concerns, the underlying cause and, where an action helps, a suggestion.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type RetagErrorCode =
  | 'INVALID_REFERENCE'
  | 'INVALID_SETTINGS'
  | 'SOURCE_NOT_FOUND'
  | 'TRANSIENT_FAILURE'
  | 'PERMANENT_FAILURE'
  | 'WRITE_FAILED'
  | 'CANCELLED';

/**
 * How a failed registry call should be treated
 */
export type FailureKind = 'transient' | 'permanent';

/**
 * Classification of any thrown value from a registry call
 */
export type ErrorClass = 'not-found' | FailureKind;

/**
 * Registry error codes meaning "this reference does not exist"
 * (OCI distribution spec, section "Error Codes")
 */
const NOT_FOUND_CODES = new Set(['MANIFEST_UNKNOWN', 'NAME_UNKNOWN', 'BLOB_UNKNOWN']);

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

// =============================================================================
// Base Error
// =============================================================================

export interface RetagErrorOptions {
  suggestion?: string;
  reference?: string;
  cause?: unknown;
}

/**
 * Base class for all fatal retag errors
 */
export class RetagError extends Error {
  public readonly code: RetagErrorCode;
  public readonly suggestion?: string;
  public readonly reference?: string;

  constructor(message: string, code: RetagErrorCode, options: RetagErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RetagError';
    this.code = code;
    this.suggestion = options.suggestion;
    this.reference = options.reference;
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = this.message;
    if (this.cause !== undefined) {
      msg += `: ${describeCause(this.cause)}`;
    }
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * The source string is not `[registry/]repository[:tag|@digest]`, or the tag is invalid
 */
export class InvalidReferenceError extends RetagError {
  constructor(input: string, reason: string) {
    super(`Invalid image reference '${input}': ${reason}`, 'INVALID_REFERENCE', {
      reference: input,
    });
    this.name = 'InvalidReferenceError';
  }
}

/**
 * A setting from the environment or the command line is unusable
 */
export class InvalidSettingsError extends RetagError {
  constructor(
    public readonly setting: string,
    reason: string
  ) {
    super(`Invalid setting '${setting}': ${reason}`, 'INVALID_SETTINGS');
    this.name = 'InvalidSettingsError';
  }
}

/**
 * The source reference does not exist on the registry
 */
export class SourceNotFoundError extends RetagError {
  constructor(reference: string, cause?: unknown) {
    super(`Source image '${reference}' not found`, 'SOURCE_NOT_FOUND', {
      reference,
      cause,
      suggestion: 'Check that the image was pushed and that the tag or digest is spelled correctly',
    });
    this.name = 'SourceNotFoundError';
  }
}

/**
 * A metadata lookup failed for a reason other than "not found"
 */
export class RegistryOperationError extends RetagError {
  constructor(
    public readonly kind: FailureKind,
    operation: string,
    reference: string,
    cause: unknown
  ) {
    super(
      `Failed to ${operation} '${reference}'${kind === 'transient' ? ' after retries' : ''}`,
      kind === 'transient' ? 'TRANSIENT_FAILURE' : 'PERMANENT_FAILURE',
      { reference, cause, suggestion: suggestionFor(cause) }
    );
    this.name = 'RegistryOperationError';
  }
}

/**
 * The tag write failed; the destination tag's state cannot be asserted
 */
export class TagWriteError extends RetagError {
  constructor(
    reference: string,
    cause: unknown,
    public readonly attempts: number
  ) {
    super(
      `Failed to point tag '${reference}' at the source image after ${attempts} attempt(s); ` +
        'the destination tag state is unknown and should be verified',
      'WRITE_FAILED',
      { reference, cause, suggestion: suggestionFor(cause) }
    );
    this.name = 'TagWriteError';
  }
}

/**
 * The invocation was cancelled by an external signal
 */
export class CancelledError extends RetagError {
  constructor(reason?: unknown) {
    super('Operation cancelled', 'CANCELLED', { cause: reason });
    this.name = 'CancelledError';
  }
}

// =============================================================================
// Transport-level Errors
// =============================================================================

/**
 * A single error entry from a registry error response body
 */
export interface RegistryErrorDetail {
  code: string;
  message?: string;
}

/**
 * Error for a non-success HTTP response from the registry
 */
export class RegistryRequestError extends Error {
  public readonly status: number;
  public readonly errors: RegistryErrorDetail[];
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options: { errors?: RegistryErrorDetail[]; retryAfter?: number } = {}
  ) {
    super(message);
    this.name = 'RegistryRequestError';
    this.status = status;
    this.errors = options.errors ?? [];
    this.retryAfter = options.retryAfter;
  }

  isNotFound(): boolean {
    return this.status === 404 || this.errors.some((e) => NOT_FOUND_CODES.has(e.code));
  }

  isAuthFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }

  isRateLimited(): boolean {
    return this.status === 429 || this.errors.some((e) => e.code === 'TOOMANYREQUESTS');
  }
}

/**
 * The token realm refused or failed a token request
 *
 * Kept apart from RegistryRequestError: a 404 from the auth server says
 * nothing about whether the repository or tag exists.
 */
export class TokenRequestError extends Error {
  public readonly status: number;
  public readonly retryAfter?: number;

  constructor(message: string, status: number, retryAfter?: number) {
    super(message);
    this.name = 'TokenRequestError';
    this.status = status;
    this.retryAfter = retryAfter;
  }
}

/**
 * A single attempt exceeded its timeout
 */
export class RequestTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * The registry answered with something that is not a usable manifest or config
 */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

// =============================================================================
// Classification
// =============================================================================

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Check whether an error is a low-level network failure (including undici's "fetch failed")
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }

  if (error.name === 'TypeError' && error.message.includes('fetch failed')) {
    return true;
  }

  const message = error.message.toLowerCase();
  return message.includes('socket hang up') || message.includes('network');
}

/**
 * Classify a thrown value from a registry call
 */
export function classifyError(error: unknown): ErrorClass {
  if (error instanceof RegistryRequestError) {
    if (error.isNotFound()) return 'not-found';
    if (error.isRateLimited() || TRANSIENT_STATUSES.has(error.status)) return 'transient';
    return 'permanent';
  }

  if (error instanceof TokenRequestError) {
    return TRANSIENT_STATUSES.has(error.status) ? 'transient' : 'permanent';
  }

  if (error instanceof RequestTimeoutError) {
    return 'transient';
  }

  if (error instanceof CancelledError || error instanceof MalformedResponseError) {
    return 'permanent';
  }

  return isNetworkError(error) ? 'transient' : 'permanent';
}

export function isTransientError(error: unknown): boolean {
  return classifyError(error) === 'transient';
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Render an underlying cause as a single line
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof RegistryRequestError) {
    const details = cause.errors
      .map((e) => (e.message ? `${e.code}: ${e.message}` : e.code))
      .join('; ');
    return details ? `${cause.message} (${details})` : cause.message;
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

function suggestionFor(cause: unknown): string | undefined {
  if (cause instanceof TokenRequestError && (cause.status === 401 || cause.status === 403)) {
    return 'Check registry credentials: run `docker login <registry>` or set IMAGE_RETAG_USERNAME and IMAGE_RETAG_PASSWORD';
  }
  if (cause instanceof RegistryRequestError && cause.isAuthFailure()) {
    return (
      'Check registry credentials: run `docker login <registry>` or set ' +
      'IMAGE_RETAG_USERNAME and IMAGE_RETAG_PASSWORD, and make sure they allow push to the repository'
    );
  }
  if (cause instanceof RegistryRequestError && cause.isRateLimited()) {
    return 'The registry is rate limiting requests; authenticate or raise --max-attempts / --max-delay';
  }
  return undefined;
}
