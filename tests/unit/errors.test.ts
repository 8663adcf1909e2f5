/**
 * Unit Tests: Error classification and messages
 */

import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  InvalidSettingsError,
  MalformedResponseError,
  RegistryOperationError,
  RegistryRequestError,
  RequestTimeoutError,
  SourceNotFoundError,
  TagWriteError,
  TokenRequestError,
  classifyError,
  describeCause,
  isNetworkError,
} from '../../src/registry/errors.js';

describe('classifyError', () => {
  it('should classify 404 and unknown-manifest codes as not-found', () => {
    expect(classifyError(new RegistryRequestError('x', 404))).toBe('not-found');
    expect(
      classifyError(new RegistryRequestError('x', 400, { errors: [{ code: 'NAME_UNKNOWN' }] }))
    ).toBe('not-found');
  });

  it('should classify throttling and server errors as transient', () => {
    for (const status of [408, 425, 429, 500, 502, 503, 504]) {
      expect(classifyError(new RegistryRequestError('x', status))).toBe('transient');
    }
    expect(
      classifyError(new RegistryRequestError('x', 400, { errors: [{ code: 'TOOMANYREQUESTS' }] }))
    ).toBe('transient');
  });

  it('should classify auth failures and other client errors as permanent', () => {
    expect(classifyError(new RegistryRequestError('x', 401))).toBe('permanent');
    expect(classifyError(new RegistryRequestError('x', 403))).toBe('permanent');
    expect(classifyError(new RegistryRequestError('x', 400))).toBe('permanent');
  });

  it('should never classify token endpoint failures as not-found', () => {
    expect(classifyError(new TokenRequestError('x', 404))).toBe('permanent');
    expect(classifyError(new TokenRequestError('x', 401))).toBe('permanent');
    expect(classifyError(new TokenRequestError('x', 503))).toBe('transient');
  });

  it('should classify timeouts and network errors as transient', () => {
    expect(classifyError(new RequestTimeoutError('https://r/v2/', 100))).toBe('transient');
    const fetchFailed = new TypeError('fetch failed', {
      cause: Object.assign(new Error('reset'), { code: 'ECONNRESET' }),
    });
    expect(classifyError(fetchFailed)).toBe('transient');
  });

  it('should classify malformed responses and cancellation as permanent', () => {
    expect(classifyError(new MalformedResponseError('bad json'))).toBe('permanent');
    expect(classifyError(new CancelledError())).toBe('permanent');
    expect(classifyError('something odd')).toBe('permanent');
  });
});

describe('isNetworkError', () => {
  it('should read the code from the cause', () => {
    const error = new Error('request failed', {
      cause: Object.assign(new Error('dns'), { code: 'ENOTFOUND' }),
    });
    expect(isNetworkError(error)).toBe(true);
  });

  it('should not treat plain errors as network errors', () => {
    expect(isNetworkError(new Error('boom'))).toBe(false);
    expect(isNetworkError('ECONNRESET')).toBe(false);
  });
});

describe('describeCause', () => {
  it('should include registry error details', () => {
    const error = new RegistryRequestError('Registry returned 403', 403, {
      errors: [{ code: 'DENIED', message: 'requested access to the resource is denied' }],
    });
    expect(describeCause(error)).toBe(
      'Registry returned 403 (DENIED: requested access to the resource is denied)'
    );
  });

  it('should stringify non-errors', () => {
    expect(describeCause(42)).toBe('42');
  });
});

describe('RetagError messages', () => {
  it('should render a source-not-found error with its suggestion', () => {
    const error = new SourceNotFoundError('ghcr.io/acme/app:v1');
    expect(error.code).toBe('SOURCE_NOT_FOUND');
    expect(error.reference).toBe('ghcr.io/acme/app:v1');
    expect(error.toUserMessage()).toBe(
      "Source image 'ghcr.io/acme/app:v1' not found\n\n" +
        'Suggestion: Check that the image was pushed and that the tag or digest is spelled correctly'
    );
  });

  it('should suggest docker login for auth failures', () => {
    const error = new RegistryOperationError(
      'permanent',
      'read source image',
      'ghcr.io/acme/app:v1',
      new RegistryRequestError('Registry returned 401', 401)
    );
    expect(error.code).toBe('PERMANENT_FAILURE');
    expect(error.message).toBe("Failed to read source image 'ghcr.io/acme/app:v1'");
    expect(error.suggestion).toMatch(/^Check registry credentials: run `docker login <registry>`/);
  });

  it('should mention retries for transient failures', () => {
    const error = new RegistryOperationError('transient', 'read destination tag', 'r/x:y', new Error('503'));
    expect(error.code).toBe('TRANSIENT_FAILURE');
    expect(error.toUserMessage()).toBe("Failed to read destination tag 'r/x:y' after retries: 503");
  });

  it('should describe a write failure as leaving the tag in an unknown state', () => {
    const error = new TagWriteError('r/x:y', new Error('reset'), 4);
    expect(error.code).toBe('WRITE_FAILED');
    expect(error.attempts).toBe(4);
    expect(error.message).toContain('the destination tag state is unknown');
  });

  it('should name the invalid setting', () => {
    const error = new InvalidSettingsError('--max-attempts', "expected a positive integer, got 'x'");
    expect(error.message).toBe(
      "Invalid setting '--max-attempts': expected a positive integer, got 'x'"
    );
  });
});
