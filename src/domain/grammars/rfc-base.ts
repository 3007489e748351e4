import { decodePriority, type Priority } from '../priority.js';
import type { DecodeDiagnostic } from '../record.js';
import { parseFailure, type GrammarResult } from './types.js';

/**
 * Outcome of looking for `<PRI>` at the start of a message.
 *
 * `invalid` means the angle-bracket framing was present but the digits were
 * not a valid priority; the token is still consumed.
 */
export type PriToken =
  | { readonly kind: 'absent' }
  | { readonly kind: 'valid'; readonly priority: Priority; readonly rest: string }
  | { readonly kind: 'invalid'; readonly token: string; readonly rest: string };

const PRI_FRAME = /^<([^<>\s]{0,5})>/;

export function extractPri(text: string): PriToken {
  const match = PRI_FRAME.exec(text);
  if (!match) return { kind: 'absent' };

  const digits = match[1] ?? '';
  const rest = text.slice(match[0].length);
  const priority = decodePriority(digits);

  return priority === null
    ? { kind: 'invalid', token: match[0], rest }
    : { kind: 'valid', priority, rest };
}

export function invalidPriDiagnostic(token: string): DecodeDiagnostic {
  return {
    kind: 'invalid_pri',
    message: `Ignoring malformed priority ${token}`,
    subject: token,
  };
}

/**
 * `<PRI>MSG` with nothing else parsed. The message starts at the first
 * non-space character after `>`.
 */
export function parseRfcBase(text: string): GrammarResult {
  if (text === '') return parseFailure('rfc_base', 'empty_input', 'Message is empty');

  const pri = extractPri(text);
  switch (pri.kind) {
    case 'absent':
      return parseFailure('rfc_base', 'missing_pri', 'Message does not start with <PRI>');
    case 'invalid':
      return {
        ok: true,
        value: {
          header: { diagnostics: [invalidPriDiagnostic(pri.token)] },
          message: pri.rest.trimStart(),
        },
      };
    case 'valid':
      return {
        ok: true,
        value: {
          header: { facility: pri.priority.facility, severity: pri.priority.severity },
          message: pri.rest.trimStart(),
        },
      };
  }
}
