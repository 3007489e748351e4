import type { RecordHeader } from '../record.js';

export type GrammarName = 'rfc_base' | 'rfc3164' | 'rfc5424';

export type FailureReason =
  | 'empty_input'
  | 'missing_pri'
  | 'unsupported_version'
  | 'truncated_header'
  | 'unterminated_structured_data';

/** Complete unparsability for one grammar. No partial record exists. */
export interface ParseFailure {
  readonly grammar: GrammarName;
  readonly reason: FailureReason;
  readonly detail: string;
}

/** Header fields and free-text remainder recovered by a grammar. */
export interface ParsedMessage {
  readonly header: RecordHeader;
  readonly message: string;
}

/**
 * Result of running a grammar over raw text.
 *
 * `ok === false` is a hard failure; soft failures travel inside
 * `header.diagnostics`.
 */
export type GrammarResult =
  | { readonly ok: true; readonly value: ParsedMessage }
  | { readonly ok: false; readonly failure: ParseFailure };

/**
 * Caller-supplied clock used to complete timestamps that carry no year or
 * zone. Grammars never read the system clock themselves.
 */
export interface ClockContext {
  /** Epoch milliseconds the message is assumed to have been received at. */
  readonly referenceTime: number;
  /** Offset of the sending device's local time from UTC, in minutes. */
  readonly utcOffsetMinutes: number;
}

export function parseFailure(
  grammar: GrammarName,
  reason: FailureReason,
  detail: string,
): GrammarResult {
  return { ok: false, failure: { grammar, reason, detail } };
}
