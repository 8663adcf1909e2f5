/**
 * Tag writer
 *
 * Points a tag at the manifest of a source reference by re-putting the
 * source's exact manifest bytes under the new tag. Creates the tag when
 * absent and overwrites it unconditionally when present: registries offer no
 * compare-and-swap for tags.
 */

import { logger as defaultLogger, type RetagLogger } from '../api/logger.js';
import { withRetry, type RetryOptions } from '../api/retry.js';
import { MalformedResponseError, TagWriteError } from './errors.js';
import { formatReference, withTag, type ImageReference } from './reference.js';
import type { RegistryTransport, RequestOptions } from './transport.js';

// =============================================================================
// Types
// =============================================================================

export type TagWriteResult =
  | { success: true; digest: string; attempts: number }
  | { success: false; error: TagWriteError; attempts: number };

export interface TagWriter {
  write(sourceRef: ImageReference, tag: string, options?: RequestOptions): Promise<TagWriteResult>;
}

export interface TagWriterOptions {
  retry?: Omit<RetryOptions, 'signal' | 'logger'>;
  logger?: RetagLogger;
}

// =============================================================================
// Implementation
// =============================================================================

export function createTagWriter(
  transport: RegistryTransport,
  options: TagWriterOptions = {}
): TagWriter {
  const log = options.logger ?? defaultLogger;

  async function pointTag(
    sourceRef: ImageReference,
    tag: string,
    requestOptions: RequestOptions
  ): Promise<string> {
    const manifest = await transport.getManifest(sourceRef, requestOptions);
    const recorded = await transport.putManifest(sourceRef, tag, manifest, requestOptions);

    if (recorded !== manifest.digest) {
      throw new MalformedResponseError(
        `Registry recorded digest ${recorded} for tag '${tag}' but the source manifest is ${manifest.digest}`
      );
    }
    return recorded;
  }

  return {
    async write(sourceRef, tag, requestOptions = {}): Promise<TagWriteResult> {
      const destination = formatReference(withTag(sourceRef, tag));
      log.debug('Writing tag', { source: formatReference(sourceRef), destination });

      const result = await withRetry(() => pointTag(sourceRef, tag, requestOptions), {
        ...options.retry,
        logger: log.child({ destination }),
        signal: requestOptions.signal,
      });

      if (result.success) {
        return { success: true, digest: result.data, attempts: result.attempts };
      }

      return {
        success: false,
        error: new TagWriteError(destination, result.error, result.attempts),
        attempts: result.attempts,
      };
    },
  };
}
