/**
 * image-retag CLI - Point a registry tag at an existing image
 *
 * Usage: image-retag <source-image> <new-tag>
 *
 * The new tag lives in the source image's repository. Re-running with the
 * same arguments is a no-op once the tag points at the source digest.
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext } from './types.js';
import { retagCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { logger } from './api/logger.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions, signal: AbortSignal): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    signal,
  };
}

/**
 * Abort in-flight registry calls on SIGINT/SIGTERM
 */
function createShutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals): void => {
    logger.warn(`Received ${name}, cancelling`);
    controller.abort(new Error(`Received ${name}`));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return controller.signal;
}

/**
 * Build the CLI program; exactly two positional arguments are accepted
 */
export function createProgram(): Command {
  const program = new Command()
    .name('image-retag')
    .description('Point a tag at the image a source reference resolves to, without pulling it')
    .version(VERSION)
    .argument('<source-image>', 'Source image, [registry/]repository[:tag|@digest]')
    .argument('<new-tag>', 'Tag to point at the source image, in the same repository')
    .allowExcessArguments(false)
    .addOption(
      new Option('--dry-run', 'Show what would happen without writing the tag')
        .default(false)
    )
    .addOption(
      new Option('--json', 'Output JSON for CI/automation')
        .default(false)
    )
    .addOption(
      new Option('-v, --verbose', 'Enable verbose logging')
        .default(false)
    )
    .addOption(
      new Option('--max-attempts <n>', 'Attempts per registry operation (default: 4)')
    )
    .addOption(
      new Option('--base-delay <ms>', 'First retry delay in milliseconds (default: 500)')
    )
    .addOption(
      new Option('--max-delay <ms>', 'Retry delay ceiling in milliseconds (default: 8000)')
    )
    .addOption(
      new Option('--timeout <ms>', 'Per-request timeout in milliseconds (default: 30000)')
    )
    .addOption(
      new Option('--jitter <factor>', 'Randomize retry delays by up to this fraction, capped at 1/3 (default: 0)')
    )
    .addOption(
      new Option('--plain-http', 'Talk plain HTTP to the registry')
    );

  program.action(async (source: string, tag: string) => {
    const globalOpts = program.opts<GlobalOptions>();
    const ctx = createContext(globalOpts, createShutdownSignal());

    try {
      const result = await retagCommand(ctx, { source, tag });

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Retag failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

  return program;
}

/**
 * Parse and execute
 */
export function run(argv: string[] = process.argv): void {
  createProgram()
    .parseAsync(argv)
    .catch((err: unknown) => {
      error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
}
