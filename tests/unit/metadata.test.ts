/**
 * Unit Tests: Registry Metadata Client
 *
 * Runs against the in-memory registry; no network.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  createMetadataClient,
  parseCreatedAt,
  selectPlatformEntry,
  isIndexManifest,
} from '../../src/registry/metadata.js';
import { createLogger } from '../../src/api/logger.js';
import { parseReference, withDigest, withTag } from '../../src/registry/reference.js';
import { MalformedResponseError, RegistryRequestError } from '../../src/registry/errors.js';
import { MediaTypes } from '../../src/registry/transport.js';
import { FakeRegistry, recordingSleep, unavailable } from '../fakes/registry.js';

const silent = createLogger({ level: 'error', sink: () => {} });
const repo = parseReference('registry.example.com/acme/app:v1');

describe('createMetadataClient', () => {
  let registry: FakeRegistry;

  beforeEach(() => {
    registry = new FakeRegistry();
  });

  function client(maxAttempts = 4) {
    const { sleep } = recordingSleep();
    return createMetadataClient(registry, { logger: silent, retry: { maxAttempts, sleep } });
  }

  it('should return digest, media type and creation time', async () => {
    const digest = registry.pushImage(repo, 'v1', { created: '2026-10-19T09:00:00Z' });

    const outcome = await client().fetch(repo);

    expect(outcome).toEqual({
      kind: 'found',
      metadata: {
        digest,
        mediaType: MediaTypes.OciManifest,
        createdAt: new Date('2026-10-19T09:00:00Z'),
      },
    });
  });

  it('should report not-found for a missing tag without retrying', async () => {
    const outcome = await client().fetch(withTag(repo, 'missing'));

    expect(outcome.kind).toBe('not-found');
    expect(registry.calls.getManifest).toBe(1);
  });

  it('should leave createdAt undefined when the config has no created field', async () => {
    registry.pushImage(repo, 'v1');
    const outcome = await client().fetch(repo);

    expect(outcome.kind).toBe('found');
    if (outcome.kind === 'found') {
      expect(outcome.metadata.createdAt).toBeUndefined();
    }
  });

  it('should treat the zero timestamp as absent', async () => {
    registry.pushImage(repo, 'v1', { created: '0001-01-01T00:00:00Z' });
    const outcome = await client().fetch(repo);

    if (outcome.kind !== 'found') throw new Error(`unexpected ${outcome.kind}`);
    expect(outcome.metadata.createdAt).toBeUndefined();
  });

  it('should still find the image when its config blob is missing', async () => {
    const digest = registry.pushImage(repo, 'v1', { created: '2026-10-19T09:00:00Z' });
    const manifest = await registry.getManifest(repo);
    const parsed: { config: { digest: string } } = JSON.parse(manifest.body.toString('utf-8'));
    registry.deleteBlob(parsed.config.digest);

    const outcome = await client().fetch(repo);

    expect(outcome).toEqual({
      kind: 'found',
      metadata: { digest, mediaType: MediaTypes.OciManifest, createdAt: undefined },
    });
  });

  it('should use the index digest and the linux/amd64 creation time for an index', async () => {
    const arm = registry.pushImage(repo, undefined, {
      created: '2026-10-01T00:00:00Z',
      architecture: 'arm64',
      label: 'arm',
    });
    const amd = registry.pushImage(repo, undefined, {
      created: '2026-10-02T00:00:00Z',
      label: 'amd',
    });
    const index = registry.pushIndex(repo, 'v1', [
      { digest: arm, os: 'linux', architecture: 'arm64' },
      { digest: amd, os: 'linux', architecture: 'amd64' },
    ]);

    const outcome = await client().fetch(repo);

    expect(outcome).toEqual({
      kind: 'found',
      metadata: {
        digest: index,
        mediaType: MediaTypes.OciIndex,
        createdAt: new Date('2026-10-02T00:00:00Z'),
      },
    });
  });

  it('should keep an index found when its platform manifest is missing', async () => {
    const missing = 'sha256:' + 'd'.repeat(64);
    const index = registry.pushIndex(repo, 'v1', [
      { digest: missing, os: 'linux', architecture: 'amd64' },
    ]);

    const outcome = await client().fetch(repo);

    expect(outcome).toEqual({
      kind: 'found',
      metadata: { digest: index, mediaType: MediaTypes.OciIndex, createdAt: undefined },
    });
    expect(registry.calls.getManifest).toBe(2);
  });

  it('should keep an index found when its platform manifest is malformed', async () => {
    const child = registry.storeManifest(repo, undefined, Buffer.from('not json'), MediaTypes.OciManifest);
    registry.pushIndex(repo, 'v1', [{ digest: child, os: 'linux', architecture: 'amd64' }]);

    const outcome = await client().fetch(repo);

    expect(outcome.kind).toBe('found');
  });

  it('should still fail when the platform manifest read fails transiently', async () => {
    const amd = registry.pushImage(repo, undefined, { created: '2026-10-02T00:00:00Z' });
    registry.pushIndex(repo, 'v1', [{ digest: amd, os: 'linux', architecture: 'amd64' }]);
    registry.failNext('getBlob', unavailable(), 10);

    const outcome = await client(2).fetch(repo);

    expect(outcome).toMatchObject({ kind: 'transient-failure', attempts: 2 });
  });

  it('should resolve a digest reference', async () => {
    const digest = registry.pushImage(repo, 'v1', { created: '2026-10-19T09:00:00Z' });
    const outcome = await client().fetch(withDigest(repo, digest));

    expect(outcome.kind).toBe('found');
  });

  it('should retry transient failures and then succeed', async () => {
    registry.pushImage(repo, 'v1');
    registry.failNext('getManifest', unavailable(), 2);

    const outcome = await client().fetch(repo);

    expect(outcome.kind).toBe('found');
    expect(registry.calls.getManifest).toBe(3);
  });

  it('should report a transient failure after exhausting attempts', async () => {
    registry.pushImage(repo, 'v1');
    registry.failNext('getManifest', unavailable(), 10);

    const outcome = await client(3).fetch(repo);

    expect(outcome).toMatchObject({ kind: 'transient-failure', attempts: 3 });
    expect(registry.calls.getManifest).toBe(3);
  });

  it('should apply the configured jitter to backoff delays', async () => {
    registry.pushImage(repo, 'v1');
    registry.failNext('getManifest', unavailable(), 10);
    const { sleep, delays } = recordingSleep();
    const jittered = createMetadataClient(registry, {
      logger: silent,
      retry: { maxAttempts: 3, jitterFactor: 0.2, random: () => 0, sleep },
    });

    await jittered.fetch(repo);

    // random() = 0 takes the full downward jitter: 500 - 100, then 1000 - 200
    expect(delays).toEqual([400, 800]);
  });

  it('should report a permanent failure on auth errors without retrying', async () => {
    registry.failNext('getManifest', new RegistryRequestError('Registry returned 401', 401));

    const outcome = await client().fetch(repo);

    expect(outcome).toMatchObject({ kind: 'permanent-failure', attempts: 1 });
  });

  it('should report malformed manifests as permanent failures', async () => {
    registry.storeManifest(repo, 'v1', Buffer.from('not json'), MediaTypes.OciManifest);

    const outcome = await client().fetch(repo);

    expect(outcome.kind).toBe('permanent-failure');
    if (outcome.kind === 'permanent-failure') {
      expect(outcome.cause).toBeInstanceOf(MalformedResponseError);
    }
  });

  it('should never request anything but manifests and config blobs', async () => {
    registry.pushImage(repo, 'v1', { created: '2026-10-19T09:00:00Z' });
    await client().fetch(repo);

    expect(registry.calls).toEqual({ getManifest: 1, getBlob: 1, putManifest: 0 });
  });
});

// =============================================================================
// Parsing helpers
// =============================================================================

describe('parseCreatedAt', () => {
  it('should parse RFC 3339 timestamps with fractional seconds', () => {
    expect(parseCreatedAt({ created: '2026-10-19T09:00:00.123456789Z' })?.toISOString()).toBe(
      '2026-10-19T09:00:00.123Z'
    );
  });

  it('should ignore non-string and unparseable values', () => {
    expect(parseCreatedAt({ created: 12 })).toBeUndefined();
    expect(parseCreatedAt({ created: 'yesterday' })).toBeUndefined();
  });
});

describe('selectPlatformEntry', () => {
  const manifest = {
    manifests: [
      { digest: 'sha256:1', platform: { os: 'linux', architecture: 'arm64' } },
      { digest: 'sha256:2', platform: { os: 'windows', architecture: 'amd64' } },
    ],
  };

  it('should fall back to the first entry when no platform matches', () => {
    expect(selectPlatformEntry(manifest, { os: 'linux', architecture: 'amd64' })?.digest).toBe(
      'sha256:1'
    );
  });

  it('should return undefined for an empty index', () => {
    expect(selectPlatformEntry({ manifests: [] }, { os: 'linux', architecture: 'amd64' })).toBeUndefined();
  });
});

describe('isIndexManifest', () => {
  it('should recognise indexes by media type or shape', () => {
    expect(isIndexManifest(MediaTypes.DockerManifestList, {})).toBe(true);
    expect(isIndexManifest('application/json', { manifests: [] })).toBe(true);
    expect(isIndexManifest(MediaTypes.OciManifest, { config: {} })).toBe(false);
  });
});
