/**
 * Image reference parsing
 *
 * Supports formats:
 * - registry.example.com/team/app:build-123
 * - registry.example.com:5000/app@sha256:<hex>
 * - team/app:1.0 (Docker Hub)
 * - nginx (Docker Hub, library/nginx:latest)
 */

import { InvalidReferenceError } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The component that identifies a manifest within a repository
 */
export type ReferenceIdentifier =
  | { readonly kind: 'tag'; readonly value: string }
  | { readonly kind: 'digest'; readonly value: string };

/**
 * Parsed, immutable image reference
 */
export interface ImageReference {
  /** Registry host as addressed by users (docker.io for Docker Hub) */
  readonly registry: string;
  /** Repository path within the registry (e.g. library/nginx) */
  readonly repository: string;
  readonly identifier: ReferenceIdentifier;
}

/**
 * Source and destination of one retag invocation
 */
export interface ResolvedReferences {
  source: ImageReference;
  destination: ImageReference;
}

// =============================================================================
// Constants
// =============================================================================

export const DOCKER_HUB_REGISTRY = 'docker.io';
export const DOCKER_HUB_API_HOST = 'registry-1.docker.io';
export const DEFAULT_TAG = 'latest';

const DOCKER_HUB_ALIASES = new Set(['docker.io', 'index.docker.io', 'registry-1.docker.io']);

const PATTERNS = {
  // host, host:port, or [ipv6]:port
  registry: /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?)*|\[[0-9a-fA-F:]+\])(?::[0-9]+)?$/,
  // one path component: lowercase alphanumerics joined by ., _, __ or runs of -
  pathComponent: /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/,
  tag: /^[a-zA-Z0-9_][a-zA-Z0-9._-]{0,127}$/,
  digest: /^[a-z0-9]+(?:[+._-][a-z0-9]+)*:[a-fA-F0-9]{32,}$/,
};

const MAX_REPOSITORY_LENGTH = 255;

// =============================================================================
// Validation
// =============================================================================

/**
 * Check whether a string is a valid tag name
 */
export function isValidTag(tag: string): boolean {
  return PATTERNS.tag.test(tag);
}

export function isValidDigest(digest: string): boolean {
  return PATTERNS.digest.test(digest);
}

function looksLikeRegistry(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

function validateRepository(input: string, repository: string): void {
  if (repository.length === 0) {
    throw new InvalidReferenceError(input, 'repository name is empty');
  }
  if (repository.length > MAX_REPOSITORY_LENGTH) {
    throw new InvalidReferenceError(
      input,
      `repository name must be ${MAX_REPOSITORY_LENGTH} characters or less`
    );
  }
  for (const component of repository.split('/')) {
    if (!PATTERNS.pathComponent.test(component)) {
      throw new InvalidReferenceError(
        input,
        `invalid repository component '${component}' (lowercase letters, digits and separators . _ - only)`
      );
    }
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse `[registry/]repository[:tag|@digest]` into an ImageReference
 *
 * Docker conventions apply: a registry is only recognised when the first path
 * component contains `.` or `:` or is `localhost`; Docker Hub repositories
 * without a namespace live under `library/`; the default tag is `latest`.
 */
export function parseReference(input: string): ImageReference {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new InvalidReferenceError(input, 'reference is empty');
  }
  if (/\s/.test(trimmed)) {
    throw new InvalidReferenceError(input, 'reference must not contain whitespace');
  }

  let remainder = trimmed;
  let digest: string | undefined;

  const atIndex = remainder.indexOf('@');
  if (atIndex !== -1) {
    digest = remainder.substring(atIndex + 1);
    remainder = remainder.substring(0, atIndex);
    if (!isValidDigest(digest)) {
      throw new InvalidReferenceError(input, `invalid digest '${digest}' (expected <algorithm>:<hex>)`);
    }
  }

  let registry = DOCKER_HUB_REGISTRY;
  const firstSlash = remainder.indexOf('/');
  if (firstSlash !== -1) {
    const candidate = remainder.substring(0, firstSlash);
    if (looksLikeRegistry(candidate)) {
      if (!PATTERNS.registry.test(candidate)) {
        throw new InvalidReferenceError(input, `invalid registry host '${candidate}'`);
      }
      registry = DOCKER_HUB_ALIASES.has(candidate) ? DOCKER_HUB_REGISTRY : candidate;
      remainder = remainder.substring(firstSlash + 1);
    }
  }

  let tag: string | undefined;
  const lastColon = remainder.lastIndexOf(':');
  if (lastColon > remainder.lastIndexOf('/')) {
    tag = remainder.substring(lastColon + 1);
    remainder = remainder.substring(0, lastColon);
    if (!isValidTag(tag)) {
      throw new InvalidReferenceError(input, `invalid tag '${tag}'`);
    }
  }

  let repository = remainder;
  validateRepository(input, repository);
  if (registry === DOCKER_HUB_REGISTRY && !repository.includes('/')) {
    repository = `library/${repository}`;
  }

  // name:tag@digest identifies the manifest by digest
  const identifier: ReferenceIdentifier = digest
    ? { kind: 'digest', value: digest }
    : { kind: 'tag', value: tag ?? DEFAULT_TAG };

  return freeze({ registry, repository, identifier });
}

/**
 * Resolve the source image string and destination tag into references that
 * share the source's registry and repository
 */
export function resolveReferences(source: string, destinationTag: string): ResolvedReferences {
  const sourceRef = parseReference(source);
  return {
    source: sourceRef,
    destination: withTag(sourceRef, destinationTag),
  };
}

// =============================================================================
// Derivation & Formatting
// =============================================================================

function freeze(ref: ImageReference): ImageReference {
  return Object.freeze({ ...ref, identifier: Object.freeze({ ...ref.identifier }) });
}

/**
 * Same repository, identified by the given tag
 */
export function withTag(ref: ImageReference, tag: string): ImageReference {
  if (!isValidTag(tag)) {
    throw new InvalidReferenceError(
      tag,
      'tag must start with a letter, digit or underscore and contain at most 128 of [A-Za-z0-9_.-]'
    );
  }
  return freeze({ ...ref, identifier: { kind: 'tag', value: tag } });
}

/**
 * Same repository, pinned to the given digest
 */
export function withDigest(ref: ImageReference, digest: string): ImageReference {
  if (!isValidDigest(digest)) {
    throw new InvalidReferenceError(digest, 'invalid digest');
  }
  return freeze({ ...ref, identifier: { kind: 'digest', value: digest } });
}

/**
 * Canonical string form: registry/repository:tag or registry/repository@digest
 */
export function formatReference(ref: ImageReference): string {
  const separator = ref.identifier.kind === 'tag' ? ':' : '@';
  return `${ref.registry}/${ref.repository}${separator}${ref.identifier.value}`;
}

/**
 * Host serving the distribution API for a registry
 */
export function registryApiHost(registry: string): string {
  return registry === DOCKER_HUB_REGISTRY ? DOCKER_HUB_API_HOST : registry;
}

/**
 * Whether a registry is addressed over plain HTTP by default (loopback registries)
 */
export function isLocalRegistry(registry: string): boolean {
  const host = registry.replace(/:[0-9]+$/, '');
  return host === 'localhost' || host === '127.0.0.1' || host === '[::1]';
}
