/**
 * Registry transport over the OCI distribution API
 *
 * Provides the three calls retagging needs:
 * - resolve a manifest (raw bytes, digest, media type)
 * - read a blob (the image config; never layers)
 * - put a manifest under a tag
 *
 * Authentication follows the registry's WWW-Authenticate challenge: Bearer
 * tokens are fetched from the advertised realm and cached per scope, Basic
 * challenges are answered directly.
 */

import { createHash } from 'node:crypto';
import type { HttpMethod, RegistryResponse } from '../api/types.js';
import { logger as defaultLogger, type RetagLogger } from '../api/logger.js';
import { parseRetryAfter } from '../api/retry.js';
import {
  CancelledError,
  RegistryRequestError,
  RequestTimeoutError,
  MalformedResponseError,
  TokenRequestError,
  type RegistryErrorDetail,
} from './errors.js';
import type { Credential, CredentialProvider } from './credentials.js';
import {
  isLocalRegistry,
  registryApiHost,
  type ImageReference,
} from './reference.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A manifest as served by the registry
 */
export interface ManifestResponse {
  /** Content digest of the exact bytes below */
  digest: string;
  mediaType: string;
  body: Buffer;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Network operations against a registry; implemented over HTTP here and by fakes in tests
 */
export interface RegistryTransport {
  getManifest(ref: ImageReference, options?: RequestOptions): Promise<ManifestResponse>;
  getBlob(ref: ImageReference, digest: string, options?: RequestOptions): Promise<Buffer>;
  /** Store the manifest bytes under `tag`; resolves to the digest the registry recorded */
  putManifest(
    ref: ImageReference,
    tag: string,
    manifest: { body: Buffer; mediaType: string },
    options?: RequestOptions
  ): Promise<string>;
}

export interface TransportConfig {
  credentials: CredentialProvider;
  /** Use http:// for every registry (loopback registries always use it) */
  plainHttp?: boolean;
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  logger?: RetagLogger;
  /** fetch implementation (injected by tests) */
  fetch?: typeof fetch;
  userAgent?: string;
}

/**
 * Parsed WWW-Authenticate challenge
 */
export interface AuthChallenge {
  scheme: string;
  params: Record<string, string>;
}

// =============================================================================
// Constants
// =============================================================================

export const MediaTypes = {
  OciManifest: 'application/vnd.oci.image.manifest.v1+json',
  OciIndex: 'application/vnd.oci.image.index.v1+json',
  DockerManifest: 'application/vnd.docker.distribution.manifest.v2+json',
  DockerManifestList: 'application/vnd.docker.distribution.manifest.list.v2+json',
} as const;

export const MANIFEST_ACCEPT = [
  MediaTypes.OciManifest,
  MediaTypes.OciIndex,
  MediaTypes.DockerManifest,
  MediaTypes.DockerManifestList,
].join(', ');

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_USER_AGENT = 'image-retag';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse a WWW-Authenticate header value
 *
 * @example
 * parseAuthChallenge('Bearer realm="https://auth.example.com/token",service="registry"')
 * // { scheme: 'bearer', params: { realm: 'https://auth.example.com/token', service: 'registry' } }
 */
export function parseAuthChallenge(header: string | null): AuthChallenge | undefined {
  if (!header) return undefined;

  const match = header.trim().match(/^([A-Za-z]+)\s*(.*)$/);
  if (!match) return undefined;

  const scheme = (match[1] ?? '').toLowerCase();
  const params: Record<string, string> = {};
  const paramPattern = /([A-Za-z_]+)=(?:"([^"]*)"|([^,\s]*))/g;
  for (const param of (match[2] ?? '').matchAll(paramPattern)) {
    const key = param[1];
    if (key) params[key.toLowerCase()] = param[2] ?? param[3] ?? '';
  }

  return { scheme, params };
}

/**
 * sha256 digest of raw bytes
 */
export function computeDigest(body: Buffer): string {
  return `sha256:${createHash('sha256').update(body).digest('hex')}`;
}

function contentType(headers: Headers): string | undefined {
  const value = headers.get('content-type');
  return value ? value.split(';')[0]?.trim() : undefined;
}

/**
 * Media type declared inside the manifest JSON, if any
 */
export function embeddedMediaType(body: Buffer): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body.toString('utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'mediaType' in parsed) {
      return typeof parsed.mediaType === 'string' ? parsed.mediaType : undefined;
    }
  } catch {
    throw new MalformedResponseError('Registry returned a manifest that is not valid JSON');
  }
  return undefined;
}

function parseErrorBody(body: Buffer): RegistryErrorDetail[] {
  if (body.length === 0) return [];
  try {
    const parsed: unknown = JSON.parse(body.toString('utf-8'));
    if (typeof parsed !== 'object' || parsed === null || !('errors' in parsed)) return [];
    const errors = parsed.errors;
    if (!Array.isArray(errors)) return [];

    const details: RegistryErrorDetail[] = [];
    for (const entry of errors) {
      if (typeof entry !== 'object' || entry === null || !('code' in entry)) continue;
      if (typeof entry.code !== 'string') continue;
      const message = 'message' in entry && typeof entry.message === 'string' ? entry.message : undefined;
      details.push({ code: entry.code, message });
    }
    return details;
  } catch {
    return [];
  }
}

/**
 * Token endpoints answer with `token` (Docker) or `access_token` (OAuth2)
 */
function extractToken(parsed: unknown): string | undefined {
  if (typeof parsed !== 'object' || parsed === null) return undefined;
  if ('token' in parsed && typeof parsed.token === 'string' && parsed.token.length > 0) {
    return parsed.token;
  }
  if ('access_token' in parsed && typeof parsed.access_token === 'string' && parsed.access_token.length > 0) {
    return parsed.access_token;
  }
  return undefined;
}

function basicHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

function repositoryScope(ref: ImageReference, actions: string[]): string {
  return `repository:${ref.repository}:${actions.join(',')}`;
}

// =============================================================================
// Transport Implementation
// =============================================================================

/**
 * Create an HTTP transport for the distribution API
 */
export function createRegistryTransport(config: TransportConfig): RegistryTransport {
  const fetchImpl = config.fetch ?? fetch;
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const log = config.logger ?? defaultLogger;
  const userAgent = config.userAgent ?? DEFAULT_USER_AGENT;

  /** Authorization header values keyed by host and scope */
  const authCache = new Map<string, string>();
  const credentialCache = new Map<string, Promise<Credential | undefined>>();

  function baseUrl(ref: ImageReference): string {
    const scheme = config.plainHttp || isLocalRegistry(ref.registry) ? 'http' : 'https';
    return `${scheme}://${registryApiHost(ref.registry)}`;
  }

  function credentialsFor(registry: string, signal?: AbortSignal): Promise<Credential | undefined> {
    let pending = credentialCache.get(registry);
    if (!pending) {
      pending = config.credentials.resolve(registry, signal);
      credentialCache.set(registry, pending);
    }
    return pending;
  }

  /**
   * One fetch with a timeout, linked to the caller's signal
   */
  async function send(
    method: string,
    url: string,
    init: { headers: Record<string, string>; body?: Buffer | string; signal?: AbortSignal },
    expectedStatuses: number[] = []
  ): Promise<RegistryResponse> {
    if (init.signal?.aborted) {
      throw new CancelledError(init.signal.reason);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();
    init.signal?.addEventListener('abort', onAbort, { once: true });

    log.request(method, url, { headers: init.headers });
    const startTime = Date.now();

    try {
      const response = await fetchImpl(url, {
        method,
        headers: init.headers,
        body: init.body,
        signal: controller.signal,
      });
      const body = Buffer.from(await response.arrayBuffer());

      log.response(response.status, url, {
        durationMs: Date.now() - startTime,
        expected: expectedStatuses.includes(response.status),
      });

      return { status: response.status, headers: response.headers, body };
    } catch (error) {
      if (init.signal?.aborted) {
        throw new CancelledError(init.signal.reason);
      }
      if (timedOut) {
        throw new RequestTimeoutError(url, timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      init.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Obtain an Authorization header value answering a challenge
   */
  async function authorize(
    ref: ImageReference,
    scope: string,
    challenge: AuthChallenge,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    const credential = await credentialsFor(ref.registry, signal);

    if (challenge.scheme === 'basic') {
      return credential?.kind === 'basic'
        ? basicHeader(credential.username, credential.password)
        : undefined;
    }

    if (challenge.scheme !== 'bearer') {
      throw new MalformedResponseError(`Unsupported authentication scheme '${challenge.scheme}'`);
    }

    if (credential?.kind === 'registry-token') {
      return `Bearer ${credential.token}`;
    }

    const realm = challenge.params.realm;
    if (!realm) {
      throw new MalformedResponseError('Bearer challenge is missing a realm');
    }

    const service = challenge.params.service;
    const headers: Record<string, string> = { 'User-Agent': userAgent, Accept: 'application/json' };
    let response: RegistryResponse;

    if (credential?.kind === 'identity-token') {
      // OAuth2 refresh-token grant
      const form = new URLSearchParams({
        grant_type: 'refresh_token',
        refresh_token: credential.token,
        client_id: userAgent,
        scope,
      });
      if (service) form.set('service', service);
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      response = await send('POST', realm, { headers, body: form.toString(), signal });
    } else {
      const url = new URL(realm);
      if (service) url.searchParams.set('service', service);
      url.searchParams.set('scope', scope);
      if (credential?.kind === 'basic') {
        headers['Authorization'] = basicHeader(credential.username, credential.password);
      }
      response = await send('GET', url.toString(), { headers, signal });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new TokenRequestError(
        `Token request to ${realm} failed with status ${response.status}`,
        response.status,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body.toString('utf-8'));
    } catch {
      throw new MalformedResponseError(`Token response from ${realm} is not valid JSON`);
    }
    const token = extractToken(parsed);
    if (!token) {
      throw new MalformedResponseError(`Token response from ${realm} is missing a token`);
    }
    return `Bearer ${token}`;
  }

  /**
   * Make an authenticated request against the repository
   */
  async function request(
    method: HttpMethod,
    ref: ImageReference,
    path: string,
    options: {
      actions: string[];
      headers?: Record<string, string>;
      body?: Buffer;
      signal?: AbortSignal;
    }
  ): Promise<RegistryResponse> {
    const url = `${baseUrl(ref)}/v2/${ref.repository}/${path}`;
    const scope = repositoryScope(ref, options.actions);
    const cacheKey = `${registryApiHost(ref.registry)}|${scope}`;

    const buildHeaders = (authorization?: string): Record<string, string> => {
      const headers: Record<string, string> = { 'User-Agent': userAgent, ...options.headers };
      if (authorization) headers['Authorization'] = authorization;
      return headers;
    };

    let authorization = authCache.get(cacheKey);
    let response = await send(
      method,
      url,
      { headers: buildHeaders(authorization), body: options.body, signal: options.signal },
      [401, 404]
    );

    if (response.status === 401) {
      const challenge = parseAuthChallenge(response.headers.get('www-authenticate'));
      if (challenge) {
        authorization = await authorize(ref, scope, challenge, options.signal);
        if (authorization) {
          authCache.set(cacheKey, authorization);
          response = await send(
            method,
            url,
            { headers: buildHeaders(authorization), body: options.body, signal: options.signal },
            [404]
          );
        }
      }
    }

    if (response.status < 200 || response.status >= 300) {
      if (response.status === 401) authCache.delete(cacheKey);
      const errors = parseErrorBody(response.body);
      throw new RegistryRequestError(
        `Registry returned ${response.status} for ${method} ${url}`,
        response.status,
        { errors, retryAfter: parseRetryAfter(response.headers.get('retry-after')) }
      );
    }

    return response;
  }

  return {
    async getManifest(ref, options = {}): Promise<ManifestResponse> {
      const response = await request('GET', ref, `manifests/${ref.identifier.value}`, {
        actions: ['pull'],
        headers: { Accept: MANIFEST_ACCEPT },
        signal: options.signal,
      });

      const computed = computeDigest(response.body);
      const headerDigest = response.headers.get('docker-content-digest') ?? undefined;
      let digest = headerDigest ?? computed;

      if (ref.identifier.kind === 'digest') {
        const requested = ref.identifier.value;
        if (requested.startsWith('sha256:') && computed !== requested) {
          throw new MalformedResponseError(
            `Manifest content does not match requested digest ${requested} (got ${computed})`
          );
        }
        digest = requested;
      }

      const mediaType = embeddedMediaType(response.body) ?? contentType(response.headers);
      if (!mediaType) {
        throw new MalformedResponseError('Registry returned a manifest without a media type');
      }

      return { digest, mediaType, body: response.body };
    },

    async getBlob(ref, digest, options = {}): Promise<Buffer> {
      const response = await request('GET', ref, `blobs/${digest}`, {
        actions: ['pull'],
        signal: options.signal,
      });
      return response.body;
    },

    async putManifest(ref, tag, manifest, options = {}): Promise<string> {
      const response = await request('PUT', ref, `manifests/${tag}`, {
        actions: ['pull', 'push'],
        headers: { 'Content-Type': manifest.mediaType },
        body: manifest.body,
        signal: options.signal,
      });
      return response.headers.get('docker-content-digest') ?? computeDigest(manifest.body);
    },
  };
}
