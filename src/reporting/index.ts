/**
 * Reporting module exports
 */

export {
  Reporter,
  formatSummary,
  MAX_NEXT_PRIORITIES,
  type SessionSummary,
  type SessionSnapshot,
  type SummaryOptions,
  type BlockerEntry,
  type PriorityEntry,
  type ValidationNote,
} from './reporter.js';
