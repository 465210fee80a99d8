/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  StageProgressDisplay,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  formatDryRunPlan,
  formatRunStatusLine,
  formatRunState,
  formatTimingBreakdown,
} from './run-summary.js';
