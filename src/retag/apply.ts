/**
 * Retag orchestration
 *
 * Drives one invocation through resolve → fetch source → fetch destination →
 * decide → (report | write → report). The tag writer is only reached for
 * `create` and `overwrite` decisions; everything before it is read-only.
 *
 * Read-decide-write is not atomic: a concurrent writer can move the
 * destination tag between the lookup and the write. The write is pinned to
 * the source digest so at least the promoted image is the one decided on.
 */

import { logger as defaultLogger, type RetagLogger } from '../api/logger.js';
import {
  CancelledError,
  RegistryOperationError,
  RetagError,
  SourceNotFoundError,
} from '../registry/errors.js';
import type { MetadataClient } from '../registry/metadata.js';
import {
  formatReference,
  resolveReferences,
  withDigest,
  type ImageReference,
} from '../registry/reference.js';
import type { FetchOutcome, ImageMetadata } from '../registry/types.js';
import type { TagWriter } from '../registry/writer.js';
import { decide, requiresWrite } from './decide.js';
import { renderDecisionReport, renderFailureReport } from './report.js';
import type {
  DestinationOutcome,
  RetagDecision,
  RetagOutcome,
  RetagRequest,
  RetagState,
} from './types.js';

export interface RetagDependencies {
  metadata: MetadataClient;
  writer: TagWriter;
  logger?: RetagLogger;
  /** Clock used for relative timestamps in the report */
  now?: () => Date;
}

/**
 * Partial progress carried into a failure outcome
 */
interface Progress {
  source?: ImageReference;
  destination?: ImageReference;
  sourceMetadata?: ImageMetadata;
  decision?: RetagDecision;
  wrote: boolean;
}

/**
 * Turn a failed lookup into the error that ends the invocation
 */
function lookupFailure(
  outcome: Extract<FetchOutcome, { kind: 'transient-failure' | 'permanent-failure' }>,
  operation: string,
  reference: string
): RetagError {
  if (outcome.cause instanceof CancelledError) {
    return outcome.cause;
  }
  const kind = outcome.kind === 'transient-failure' ? 'transient' : 'permanent';
  return new RegistryOperationError(kind, operation, reference, outcome.cause);
}

/**
 * Point a tag at the source image unless it already points there
 *
 * Never throws for registry or reference problems: those end in a failure
 * outcome carrying the error and a rendered report.
 */
export async function retag(
  request: RetagRequest,
  deps: RetagDependencies
): Promise<RetagOutcome> {
  const log = deps.logger ?? defaultLogger;
  const now = deps.now ?? ((): Date => new Date());
  const dryRun = request.dryRun ?? false;
  const requestOptions = { signal: request.signal };

  const states: RetagState[] = [];
  const progress: Progress = { wrote: false };

  const enter = (state: RetagState): void => {
    states.push(state);
    log.debug(`State: ${state}`);
  };

  const fail = (error: RetagError): RetagOutcome => {
    enter('failed');
    log.debug('Retag failed', { code: error.code, reference: error.reference });
    return {
      success: false,
      error,
      ...progress,
      states,
      report: renderFailureReport(error),
    };
  };

  try {
    enter('resolving-references');
    const { source, destination } = resolveReferences(request.source, request.tag);
    progress.source = source;
    progress.destination = destination;
    log.debug('Resolved references', {
      source: formatReference(source),
      destination: formatReference(destination),
    });

    if (request.signal?.aborted) {
      return fail(new CancelledError(request.signal.reason));
    }

    enter('fetching-source');
    const sourceOutcome = await deps.metadata.fetch(source, requestOptions);
    if (sourceOutcome.kind === 'not-found') {
      return fail(new SourceNotFoundError(formatReference(source), sourceOutcome.cause));
    }
    if (sourceOutcome.kind !== 'found') {
      return fail(lookupFailure(sourceOutcome, 'read source image', formatReference(source)));
    }
    const sourceMetadata = sourceOutcome.metadata;
    progress.sourceMetadata = sourceMetadata;

    enter('fetching-destination');
    const destinationOutcome = await deps.metadata.fetch(destination, requestOptions);
    if (
      destinationOutcome.kind === 'transient-failure' ||
      destinationOutcome.kind === 'permanent-failure'
    ) {
      return fail(
        lookupFailure(destinationOutcome, 'read destination tag', formatReference(destination))
      );
    }
    // Destination not found is the normal "create" path
    const current: DestinationOutcome = destinationOutcome;

    enter('deciding');
    const decision = decide(sourceMetadata, current, dryRun);
    progress.decision = decision;
    log.debug('Decision', { decision: decision.kind });

    if (requiresWrite(decision)) {
      enter('writing');
      const pinned = withDigest(source, sourceMetadata.digest);
      const written = await deps.writer.write(pinned, destination.identifier.value, requestOptions);
      progress.wrote = true;
      if (!written.success) {
        return fail(written.error);
      }
      enter('final-reporting');
    } else {
      enter(dryRun ? 'dry-run-reporting' : 'final-reporting');
    }

    const report = renderDecisionReport({
      source,
      destination,
      sourceMetadata,
      decision,
      now: now(),
    });
    enter('succeeded');

    return {
      success: true,
      source,
      destination,
      sourceMetadata,
      previous: current.kind === 'found' ? current.metadata : undefined,
      decision,
      wrote: progress.wrote,
      states,
      report,
    };
  } catch (error) {
    if (error instanceof RetagError) {
      return fail(error);
    }
    throw error;
  }
}
