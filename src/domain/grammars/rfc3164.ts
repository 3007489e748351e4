import type { DecodeDiagnostic, RecordHeader } from '../record.js';
import { extractPri, invalidPriDiagnostic } from './rfc-base.js';
import { parseLeadingTimestamp } from './timestamp.js';
import { parseFailure, type ClockContext, type GrammarResult } from './types.js';

/** `TAG:` or `TAG[PID]:` as a single whitespace-free token. */
const TAG_TOKEN = /^([^\s[\]:]+)(?:\[([^\]\s]*)\])?:$/;

interface Tag {
  readonly app_name: string;
  readonly proc_id: string | null;
}

function matchTag(token: string): Tag | null {
  const match = TAG_TOKEN.exec(token);
  if (!match) return null;
  const pid = match[2];
  return { app_name: match[1] ?? token, proc_id: pid === undefined || pid === '' ? null : pid };
}

/** Split off the first space-delimited token. */
function nextToken(text: string): { token: string; rest: string } {
  const space = text.indexOf(' ');
  if (space === -1) return { token: text, rest: '' };
  return { token: text.slice(0, space), rest: text.slice(space + 1).replace(/^ +/, '') };
}

/**
 * BSD syslog (RFC3164).
 *
 * Every part is optional: a message without PRI or timestamp comes back
 * whole in `message` with an empty header. Only empty input fails.
 * Hostnames are lower-cased.
 */
export function parseRfc3164(text: string, clock: ClockContext): GrammarResult {
  if (text === '') return parseFailure('rfc3164', 'empty_input', 'Message is empty');

  const diagnostics: DecodeDiagnostic[] = [];
  const header: RecordHeader = { diagnostics };

  const pri = extractPri(text);
  let rest = text;
  if (pri.kind !== 'absent') {
    rest = pri.rest.replace(/^ +/, '');
    if (pri.kind === 'valid') {
      header.facility = pri.priority.facility;
      header.severity = pri.priority.severity;
    } else {
      diagnostics.push(invalidPriDiagnostic(pri.token));
    }
  }

  const leading = parseLeadingTimestamp(rest, clock);
  if (leading) {
    header.timestamp = leading.timestamp;
    rest = leading.rest;
  }

  if (pri.kind === 'absent' && !leading) {
    return { ok: true, value: { header, message: text } };
  }

  const first = nextToken(rest);
  const firstTag = matchTag(first.token);
  if (firstTag) {
    return {
      ok: true,
      value: { header: { ...header, ...firstTag }, message: first.rest },
    };
  }

  const second = nextToken(first.rest);
  const secondTag = first.rest === '' ? null : matchTag(second.token);
  if (secondTag) {
    return {
      ok: true,
      value: {
        header: { ...header, hostname: first.token.toLowerCase(), ...secondTag },
        message: second.rest,
      },
    };
  }

  return { ok: true, value: { header, message: rest } };
}
