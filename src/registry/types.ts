/**
 * Registry lookup types
 */

/**
 * What a reference currently resolves to
 */
export interface ImageMetadata {
  /** Content digest of the manifest the reference points at */
  digest: string;
  /** Manifest media type (image manifest or index) */
  mediaType: string;
  /** Creation time from the image config; absent when the config has none */
  createdAt?: Date;
}

/**
 * Result of one metadata lookup; "not found" is a normal outcome, not a failure
 */
export type FetchOutcome =
  | { kind: 'found'; metadata: ImageMetadata }
  | { kind: 'not-found'; cause: unknown }
  | { kind: 'transient-failure'; cause: unknown; attempts: number }
  | { kind: 'permanent-failure'; cause: unknown; attempts: number };

/**
 * Platform selector for reading metadata out of an image index
 */
export interface Platform {
  os: string;
  architecture: string;
  variant?: string;
}

export const DEFAULT_PLATFORM: Platform = { os: 'linux', architecture: 'amd64' };
