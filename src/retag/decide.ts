/**
 * Idempotency evaluation
 *
 * Compares the source digest with whatever the destination tag points at.
 * Digests are compared as canonical strings; creation times are audit data
 * and never influence the decision.
 */

import type { ImageMetadata } from '../registry/types.js';
import type { DestinationOutcome, RetagDecision } from './types.js';

/**
 * Canonical digest form: algorithm and hex are case-insensitive on the wire
 */
export function canonicalDigest(digest: string): string {
  return digest.trim().toLowerCase();
}

export function sameDigest(a: string, b: string): boolean {
  return canonicalDigest(a) === canonicalDigest(b);
}

/**
 * Decide what retagging has to do
 *
 * @param source - Metadata of the source image
 * @param destination - Lookup result for the destination tag
 * @param dryRun - Produce preview decisions instead of live ones
 */
export function decide(
  source: ImageMetadata,
  destination: DestinationOutcome,
  dryRun: boolean
): RetagDecision {
  switch (destination.kind) {
    case 'not-found':
      return dryRun ? { kind: 'would-create' } : { kind: 'create' };
    case 'found': {
      const previous = destination.metadata;
      if (sameDigest(previous.digest, source.digest)) {
        return { kind: 'noop' };
      }
      return dryRun ? { kind: 'would-overwrite', previous } : { kind: 'overwrite', previous };
    }
  }
}

/**
 * Whether a decision requires the tag writer
 */
export function requiresWrite(decision: RetagDecision): boolean {
  switch (decision.kind) {
    case 'create':
    case 'overwrite':
      return true;
    case 'noop':
    case 'would-create':
    case 'would-overwrite':
      return false;
  }
}
