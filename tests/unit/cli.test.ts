/**
 * Unit Tests: CLI argument parsing
 */

import { describe, it, expect, vi } from 'vitest';
import { CommanderError } from 'commander';

vi.mock('../../src/commands/index.js', () => ({
  retagCommand: vi.fn(),
}));

import { createProgram } from '../../src/cli.js';
import { retagCommand } from '../../src/commands/index.js';

function quietProgram() {
  return createProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
}

async function parseError(args: string[]): Promise<unknown> {
  try {
    await quietProgram().parseAsync(['node', 'image-retag', ...args]);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('image-retag arguments', () => {
  it('should reject a third positional argument', async () => {
    const error = await parseError(['reg.example.com/a/b:1', 'prod', 'extra']);

    expect(error).toBeInstanceOf(CommanderError);
    if (error instanceof CommanderError) {
      expect(error.code).toBe('commander.excessArguments');
    }
    expect(retagCommand).not.toHaveBeenCalled();
  });

  it('should require the new tag', async () => {
    const error = await parseError(['reg.example.com/a/b:1']);

    expect(error).toBeInstanceOf(CommanderError);
    if (error instanceof CommanderError) {
      expect(error.code).toBe('commander.missingArgument');
    }
    expect(retagCommand).not.toHaveBeenCalled();
  });
});
