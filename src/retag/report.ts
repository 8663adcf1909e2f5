/**
 * Retag report rendering
 *
 * Pure formatting of the outcome line. Digests are shortened for reading;
 * timestamps show a relative time plus the absolute UTC time for audit logs.
 */

import { RetagError, TagWriteError } from '../registry/errors.js';
import { formatReference, type ImageReference } from '../registry/reference.js';
import type { ImageMetadata } from '../registry/types.js';
import type { RetagDecision, RetagReport } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Hex characters kept when shortening a digest */
export const SHORT_DIGEST_LENGTH = 12;

export const UNKNOWN_TIME = 'unknown';

const RELATIVE_TIME = new Intl.RelativeTimeFormat('en', { numeric: 'always' });

// =============================================================================
// Formatting Helpers
// =============================================================================

/**
 * Shorten a digest to its algorithm and first hex characters
 *
 * @example
 * shortDigest('sha256:4f3c2b1a0e9d8c7b...') // 'sha256:4f3c2b1a0e9d'
 */
export function shortDigest(digest: string, length = SHORT_DIGEST_LENGTH): string {
  const separator = digest.indexOf(':');
  if (separator === -1) {
    return digest.substring(0, length);
  }
  return digest.substring(0, separator + 1 + length);
}

/**
 * Human relative time ("3 hours ago", "in 2 minutes", "just now")
 */
export function formatRelativeTime(date: Date, now: Date): string {
  const diffMs = date.getTime() - now.getTime();
  const sign = diffMs < 0 ? -1 : 1;

  const seconds = Math.round(Math.abs(diffMs) / 1000);
  if (seconds < 45) {
    return 'just now';
  }

  const minutes = Math.round(seconds / 60);
  if (minutes < 45) {
    return RELATIVE_TIME.format(sign * Math.max(minutes, 1), 'minute');
  }

  const hours = Math.round(seconds / 3600);
  if (hours < 24) {
    return RELATIVE_TIME.format(sign * Math.max(hours, 1), 'hour');
  }

  const days = Math.round(seconds / 86400);
  if (days < 30) {
    return RELATIVE_TIME.format(sign * days, 'day');
  }

  const months = Math.round(days / 30);
  if (months < 12) {
    return RELATIVE_TIME.format(sign * months, 'month');
  }

  return RELATIVE_TIME.format(sign * Math.max(Math.round(days / 365), 1), 'year');
}

/**
 * ISO 8601 UTC time without milliseconds
 */
export function formatAbsoluteTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * "3 hours ago, 2026-10-19T09:00:00Z", or "unknown" when absent
 */
export function formatTimestamp(date: Date | undefined, now: Date): string {
  if (!date) {
    return UNKNOWN_TIME;
  }
  return `${formatRelativeTime(date, now)}, ${formatAbsoluteTime(date)}`;
}

function describeImage(metadata: ImageMetadata, now: Date): string {
  return `${shortDigest(metadata.digest)} (created ${formatTimestamp(metadata.createdAt, now)})`;
}

// =============================================================================
// Report Rendering
// =============================================================================

export interface DecisionReportInput {
  destination: ImageReference;
  source: ImageReference;
  sourceMetadata: ImageMetadata;
  decision: RetagDecision;
  now?: Date;
}

/**
 * Render the report line for a decision
 */
export function renderDecisionReport(input: DecisionReportInput): RetagReport {
  const now = input.now ?? new Date();
  const tag = formatReference(input.destination);
  const image = describeImage(input.sourceMetadata, now);

  switch (input.decision.kind) {
    case 'noop':
      return {
        status: 'ok',
        message: `Tag '${tag}' already points to ${image}. No action needed.`,
      };
    case 'would-create':
      return {
        status: 'dry-run',
        message: `Would create tag '${tag}' pointing to ${image}.`,
      };
    case 'would-overwrite':
      return {
        status: 'dry-run',
        message:
          `Would move tag '${tag}' from ${describeImage(input.decision.previous, now)} ` +
          `to ${image}.`,
      };
    case 'create':
      return {
        status: 'ok',
        message: `Created tag '${tag}' pointing to ${image}.`,
      };
    case 'overwrite':
      return {
        status: 'ok',
        message:
          `Pointed tag '${tag}' to ${image}, ` +
          `was ${describeImage(input.decision.previous, now)}.`,
      };
  }
}

/**
 * Render the report line for a failed invocation
 *
 * Failures before the write guarantee the destination is untouched; a failed
 * write leaves it in a registry-defined state, which the error itself states.
 */
export function renderFailureReport(error: RetagError): RetagReport {
  const message = error.toUserMessage();
  if (error instanceof TagWriteError) {
    return { status: 'fail', message };
  }
  const [headline, ...rest] = message.split('\n');
  return {
    status: 'fail',
    message: [`${headline ?? ''}. The destination tag was not modified.`, ...rest].join('\n'),
  };
}
