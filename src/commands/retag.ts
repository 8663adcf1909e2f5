/**
 * retag command - Point a tag at the image a source reference resolves to
 */

import type { CommandContext, CommandResult } from '../types.js';
import { success, dryRun, error as printError, verbose } from '../utils/output.js';
import { logger as defaultLogger, type RetagLogger } from '../api/logger.js';
import { describeSettings, resolveSettings, type ResolvedSettings } from '../config/index.js';
import { createDefaultKeychain, type CredentialProvider } from '../registry/credentials.js';
import { RetagError, type RetagErrorCode } from '../registry/errors.js';
import { createMetadataClient } from '../registry/metadata.js';
import { formatReference } from '../registry/reference.js';
import { createRegistryTransport, type RegistryTransport } from '../registry/transport.js';
import { createTagWriter } from '../registry/writer.js';
import {
  retag,
  renderFailureReport,
  type RetagDecisionKind,
  type RetagOutcome,
  type RetagState,
} from '../retag/index.js';

export interface RetagCommandOptions {
  /** Source image reference */
  source: string;
  /** Destination tag in the source repository */
  tag: string;
}

/**
 * Collaborators that can be swapped out (tests, embedding)
 */
export interface RetagCommandDeps {
  transport?: RegistryTransport;
  credentials?: CredentialProvider;
  logger?: RetagLogger;
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
}

/**
 * JSON-friendly summary of one invocation
 */
export interface RetagResultData {
  source?: string;
  destination?: string;
  dryRun: boolean;
  decision?: RetagDecisionKind;
  digest?: string;
  createdAt?: string;
  previousDigest?: string;
  previousCreatedAt?: string;
  wrote: boolean;
  states: RetagState[];
  errorCode?: RetagErrorCode;
}

function toResultData(outcome: RetagOutcome, isDryRun: boolean): RetagResultData {
  const decision = outcome.decision;
  const previous =
    decision?.kind === 'overwrite' || decision?.kind === 'would-overwrite'
      ? decision.previous
      : undefined;

  return {
    source: outcome.source ? formatReference(outcome.source) : undefined,
    destination: outcome.destination ? formatReference(outcome.destination) : undefined,
    dryRun: isDryRun,
    decision: decision?.kind,
    digest: outcome.sourceMetadata?.digest,
    createdAt: outcome.sourceMetadata?.createdAt?.toISOString(),
    previousDigest: previous?.digest,
    previousCreatedAt: previous?.createdAt?.toISOString(),
    wrote: outcome.wrote,
    states: outcome.states,
    errorCode: outcome.success ? undefined : outcome.error.code,
  };
}

/**
 * Execute the retag command
 */
export async function retagCommand(
  ctx: CommandContext,
  options: RetagCommandOptions,
  deps: RetagCommandDeps = {}
): Promise<CommandResult<RetagResultData>> {
  const { options: globalOpts, outputFormat } = ctx;
  const log = deps.logger ?? defaultLogger;
  const isDryRun = globalOpts.dryRun;

  verbose(`Executing retag command`, globalOpts.verbose);
  verbose(`Source: ${options.source}`, globalOpts.verbose);
  verbose(`Tag: ${options.tag}`, globalOpts.verbose);

  let resolved: ResolvedSettings;
  try {
    resolved = resolveSettings(globalOpts, deps.env ?? process.env);
  } catch (err) {
    if (!(err instanceof RetagError)) throw err;
    const report = renderFailureReport(err);
    if (outputFormat === 'human') {
      printError(report.message);
    }
    return {
      success: false,
      message: report.message,
      data: { dryRun: isDryRun, wrote: false, states: [], errorCode: err.code },
    };
  }

  for (const line of describeSettings(resolved)) {
    verbose(`Setting ${line}`, globalOpts.verbose);
  }

  const { settings } = resolved;
  const retry = {
    maxAttempts: settings.maxAttempts,
    baseDelayMs: settings.baseDelayMs,
    maxDelayMs: settings.maxDelayMs,
    jitterFactor: settings.jitterFactor,
  };

  const transport =
    deps.transport ??
    createRegistryTransport({
      credentials: deps.credentials ?? createDefaultKeychain({ env: deps.env, logger: log }),
      plainHttp: settings.plainHttp,
      timeoutMs: settings.timeoutMs,
      logger: log,
    });

  const outcome = await retag(
    { source: options.source, tag: options.tag, dryRun: isDryRun, signal: ctx.signal },
    {
      metadata: createMetadataClient(transport, { retry, logger: log }),
      writer: createTagWriter(transport, { retry, logger: log }),
      logger: log,
      now: deps.now,
    }
  );

  verbose(`States: ${outcome.states.join(' -> ')}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    switch (outcome.report.status) {
      case 'ok':
        success(outcome.report.message);
        break;
      case 'dry-run':
        dryRun(outcome.report.message);
        break;
      case 'fail':
        printError(outcome.report.message);
        break;
    }
  }

  return {
    success: outcome.success,
    message: outcome.report.message,
    data: toResultData(outcome, isDryRun),
  };
}
