/**
 * Command exports
 */

export {
  retagCommand,
  type RetagCommandOptions,
  type RetagCommandDeps,
  type RetagResultData,
} from './retag.js';
