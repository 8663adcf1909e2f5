/**
 * Registry metadata client
 *
 * Resolves a reference to its manifest digest and image creation time. Reads
 * manifests and the image config blob only; layers are never requested.
 * For an image index the digest is the index's own digest (what the tag
 * points at) and the creation time comes from the default platform's image.
 */

import { logger as defaultLogger, type RetagLogger } from '../api/logger.js';
import { withRetry, type RetryOptions } from '../api/retry.js';
import { InvalidReferenceError, MalformedResponseError, classifyError } from './errors.js';
import { formatReference, withDigest, type ImageReference } from './reference.js';
import { MediaTypes, type RegistryTransport, type RequestOptions } from './transport.js';
import {
  DEFAULT_PLATFORM,
  type FetchOutcome,
  type ImageMetadata,
  type Platform,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface MetadataClient {
  fetch(ref: ImageReference, options?: RequestOptions): Promise<FetchOutcome>;
}

export interface MetadataClientOptions {
  retry?: Omit<RetryOptions, 'signal' | 'logger'>;
  platform?: Platform;
  logger?: RetagLogger;
}

interface IndexEntry {
  digest: string;
  platform?: Partial<Platform>;
}

// =============================================================================
// Manifest Parsing
// =============================================================================

const INDEX_MEDIA_TYPES = new Set<string>([MediaTypes.OciIndex, MediaTypes.DockerManifestList]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(body: Buffer, what: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf-8'));
  } catch {
    throw new MalformedResponseError(`${what} is not valid JSON`);
  }
  if (!isRecord(parsed)) {
    throw new MalformedResponseError(`${what} is not a JSON object`);
  }
  return parsed;
}

export function isIndexManifest(mediaType: string, manifest: Record<string, unknown>): boolean {
  return INDEX_MEDIA_TYPES.has(mediaType) || (Array.isArray(manifest.manifests) && !('config' in manifest));
}

/**
 * Digest of the config blob referenced by an image manifest
 */
export function configDigestOf(manifest: Record<string, unknown>): string {
  const config = manifest.config;
  if (!isRecord(config) || typeof config.digest !== 'string') {
    throw new MalformedResponseError('Image manifest has no config descriptor');
  }
  return config.digest;
}

function indexEntries(manifest: Record<string, unknown>): IndexEntry[] {
  const entries: IndexEntry[] = [];
  if (!Array.isArray(manifest.manifests)) return entries;

  for (const entry of manifest.manifests) {
    if (!isRecord(entry) || typeof entry.digest !== 'string') continue;
    const platform = isRecord(entry.platform)
      ? {
          os: typeof entry.platform.os === 'string' ? entry.platform.os : undefined,
          architecture:
            typeof entry.platform.architecture === 'string' ? entry.platform.architecture : undefined,
          variant: typeof entry.platform.variant === 'string' ? entry.platform.variant : undefined,
        }
      : undefined;
    entries.push({ digest: entry.digest, platform });
  }
  return entries;
}

/**
 * Pick the index entry for a platform, falling back to the first entry
 */
export function selectPlatformEntry(
  manifest: Record<string, unknown>,
  platform: Platform
): IndexEntry | undefined {
  const entries = indexEntries(manifest);
  const match = entries.find(
    (entry) =>
      entry.platform?.os === platform.os &&
      entry.platform.architecture === platform.architecture &&
      (platform.variant === undefined || entry.platform.variant === platform.variant)
  );
  return match ?? entries[0];
}

/**
 * Secondary reads that cost only the timestamp when they fail
 */
function isUnreadable(error: unknown): boolean {
  return (
    classifyError(error) === 'not-found' ||
    error instanceof MalformedResponseError ||
    error instanceof InvalidReferenceError
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Creation time from an image config; zero or unparseable values count as absent
 */
export function parseCreatedAt(config: Record<string, unknown>): Date | undefined {
  if (typeof config.created !== 'string') return undefined;
  // Configs carry nanosecond precision; keep milliseconds
  const time = Date.parse(config.created.replace(/(\.\d{3})\d+/, '$1'));
  if (Number.isNaN(time)) return undefined;
  const date = new Date(time);
  // 0001-01-01 marks an unset timestamp
  return date.getUTCFullYear() <= 1 ? undefined : date;
}

// =============================================================================
// Client Implementation
// =============================================================================

export function createMetadataClient(
  transport: RegistryTransport,
  options: MetadataClientOptions = {}
): MetadataClient {
  const log = options.logger ?? defaultLogger;
  const platform = options.platform ?? DEFAULT_PLATFORM;

  /**
   * Creation time from an image's config blob; a missing or unreadable config is absent
   */
  async function readConfigCreatedAt(
    ref: ImageReference,
    imageRef: ImageReference,
    configDigest: string,
    requestOptions: RequestOptions
  ): Promise<Date | undefined> {
    try {
      const blob = await transport.getBlob(imageRef, configDigest, requestOptions);
      return parseCreatedAt(parseJson(blob, `Image config ${configDigest}`));
    } catch (error) {
      if (!isUnreadable(error)) {
        throw error;
      }
      // Artifacts and broken uploads may lack a readable image config
      log.warn('Image config unavailable; creation time unknown', {
        reference: formatReference(ref),
        config: configDigest,
        error: describeError(error),
      });
      return undefined;
    }
  }

  async function readCreatedAt(
    ref: ImageReference,
    mediaType: string,
    manifest: Record<string, unknown>,
    requestOptions: RequestOptions
  ): Promise<Date | undefined> {
    if (!isIndexManifest(mediaType, manifest)) {
      return readConfigCreatedAt(ref, ref, configDigestOf(manifest), requestOptions);
    }

    const entry = selectPlatformEntry(manifest, platform);
    if (!entry) {
      log.debug('Image index has no manifests; creation time unknown', {
        reference: formatReference(ref),
      });
      return undefined;
    }

    // The index itself exists; a missing child only loses the timestamp
    let childRef: ImageReference;
    let configDigest: string;
    try {
      childRef = withDigest(ref, entry.digest);
      const child = await transport.getManifest(childRef, requestOptions);
      configDigest = configDigestOf(parseJson(child.body, `Manifest ${entry.digest}`));
    } catch (error) {
      if (!isUnreadable(error)) {
        throw error;
      }
      log.warn('Platform manifest unavailable; creation time unknown', {
        reference: formatReference(ref),
        manifest: entry.digest,
        error: describeError(error),
      });
      return undefined;
    }

    return readConfigCreatedAt(ref, childRef, configDigest, requestOptions);
  }

  async function resolve(ref: ImageReference, requestOptions: RequestOptions): Promise<ImageMetadata> {
    const manifest = await transport.getManifest(ref, requestOptions);
    const parsed = parseJson(manifest.body, `Manifest for ${formatReference(ref)}`);
    const createdAt = await readCreatedAt(ref, manifest.mediaType, parsed, requestOptions);
    return { digest: manifest.digest, mediaType: manifest.mediaType, createdAt };
  }

  return {
    async fetch(ref, requestOptions = {}): Promise<FetchOutcome> {
      const reference = formatReference(ref);
      log.debug('Fetching image metadata', { reference });

      const result = await withRetry(() => resolve(ref, requestOptions), {
        ...options.retry,
        logger: log.child({ reference }),
        signal: requestOptions.signal,
      });

      if (result.success) {
        return { kind: 'found', metadata: result.data };
      }

      switch (classifyError(result.error)) {
        case 'not-found':
          return { kind: 'not-found', cause: result.error };
        case 'transient':
          return { kind: 'transient-failure', cause: result.error, attempts: result.attempts };
        case 'permanent':
          return { kind: 'permanent-failure', cause: result.error, attempts: result.attempts };
      }
    },
  };
}
