/**
 * Retag protocol exports
 */

export type {
  DestinationOutcome,
  RetagDecision,
  RetagDecisionKind,
  RetagState,
  RetagRequest,
  RetagReport,
  RetagOutcome,
} from './types.js';

export { canonicalDigest, sameDigest, decide, requiresWrite } from './decide.js';

export {
  SHORT_DIGEST_LENGTH,
  UNKNOWN_TIME,
  shortDigest,
  formatRelativeTime,
  formatAbsoluteTime,
  formatTimestamp,
  renderDecisionReport,
  renderFailureReport,
  type DecisionReportInput,
} from './report.js';

export { retag, type RetagDependencies } from './apply.js';
