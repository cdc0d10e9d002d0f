export { aggregate, aggregateRecord, firstNameOnly, FIRST_NAME_PLACEHOLDER } from './aggregator.js';
export {
  buildConfidentialText,
  recentLogs,
  CONFIDENTIAL_BEGIN,
  CONFIDENTIAL_END,
  RECENT_LOG_LIMIT,
  LOG_NOTE_LIMIT
} from './full-context.js';
export { buildSupportSummary, SUMMARY_NOTE_LIMIT } from './support-summary.js';
export { findLeaks, type LeakFinding } from './leaks.js';
export { parseTagField, foldTags, type ParsedTags } from './tags.js';
export { StudentRecordSchema } from './schema.js';
