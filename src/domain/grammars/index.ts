export type {
  ClockContext,
  FailureReason,
  GrammarName,
  GrammarResult,
  ParsedMessage,
  ParseFailure,
} from './types.js';
export { parseFailure } from './types.js';
export { extractPri, parseRfcBase, type PriToken } from './rfc-base.js';
export { parseRfc3164 } from './rfc3164.js';
export { parseRfc5424 } from './rfc5424.js';
export {
  escapeParamValue,
  formatStructuredData,
  parseStructuredData,
  type StructuredDataResult,
} from './structured-data.js';
export {
  HEADER_TIMESTAMP_FORMATS,
  inferYear,
  parseLeadingTimestamp,
  parseRfc3339,
  parseUtcOffset,
  type LeadingTimestamp,
  type TimestampFormat,
} from './timestamp.js';
