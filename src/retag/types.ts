/**
 * Retag protocol types
 *
 * Dry-run and live decisions come out of the same evaluator; only the live
 * variants (`create`, `overwrite`) lead to a tag write.
 */

import type { RetagError } from '../registry/errors.js';
import type { ImageReference } from '../registry/reference.js';
import type { FetchOutcome, ImageMetadata } from '../registry/types.js';

/**
 * Destination lookups that let the protocol continue
 */
export type DestinationOutcome = Extract<FetchOutcome, { kind: 'found' } | { kind: 'not-found' }>;

export type RetagDecision =
  | { kind: 'noop' }
  | { kind: 'would-create' }
  | { kind: 'would-overwrite'; previous: ImageMetadata }
  | { kind: 'create' }
  | { kind: 'overwrite'; previous: ImageMetadata };

export type RetagDecisionKind = RetagDecision['kind'];

/**
 * Orchestrator states, in the order an invocation can pass through them
 */
export type RetagState =
  | 'resolving-references'
  | 'fetching-source'
  | 'fetching-destination'
  | 'deciding'
  | 'dry-run-reporting'
  | 'writing'
  | 'final-reporting'
  | 'succeeded'
  | 'failed';

export interface RetagRequest {
  /** Source image, `[registry/]repository[:tag|@digest]` */
  source: string;
  /** Destination tag name in the source's repository */
  tag: string;
  dryRun?: boolean;
  signal?: AbortSignal;
}

/**
 * Rendered outcome line
 */
export interface RetagReport {
  status: 'ok' | 'dry-run' | 'fail';
  message: string;
}

export type RetagOutcome =
  | {
      success: true;
      source: ImageReference;
      destination: ImageReference;
      sourceMetadata: ImageMetadata;
      /** What the destination pointed at before, absent when the tag did not exist */
      previous?: ImageMetadata;
      decision: RetagDecision;
      /** Whether a tag write was issued */
      wrote: boolean;
      states: RetagState[];
      report: RetagReport;
    }
  | {
      success: false;
      error: RetagError;
      source?: ImageReference;
      destination?: ImageReference;
      sourceMetadata?: ImageMetadata;
      decision?: RetagDecision;
      wrote: boolean;
      states: RetagState[];
      report: RetagReport;
    };
