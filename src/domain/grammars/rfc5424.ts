import type { DecodeDiagnostic, RecordHeader } from '../record.js';
import { extractPri, invalidPriDiagnostic } from './rfc-base.js';
import { parseStructuredData } from './structured-data.js';
import { parseRfc3339 } from './timestamp.js';
import { parseFailure, type GrammarResult } from './types.js';

const NIL = '-';
const BOM = '\uFEFF';
const HEADER_FIELDS = 6;

function nilable(value: string): string | null {
  return value === NIL ? null : value;
}

/**
 * Split VERSION through MSGID off the text after PRI.
 *
 * `next` is where STRUCTURED-DATA starts, or null when the input ended
 * right after MSGID.
 */
function splitHeader(text: string): { fields: string[]; next: number | null } {
  const fields: string[] = [];
  let pos = 0;
  while (fields.length < HEADER_FIELDS) {
    const space = text.indexOf(' ', pos);
    if (space === -1) {
      fields.push(text.slice(pos));
      return { fields, next: null };
    }
    fields.push(text.slice(pos, space));
    pos = space + 1;
  }
  return { fields, next: pos };
}

/**
 * RFC5424:
 * `<PRI>VERSION SP TIMESTAMP SP HOSTNAME SP APP-NAME SP PROCID SP MSGID [SP STRUCTURED-DATA [SP MSG]]`
 */
export function parseRfc5424(text: string): GrammarResult {
  if (text === '') return parseFailure('rfc5424', 'empty_input', 'Message is empty');

  const pri = extractPri(text);
  if (pri.kind === 'absent') {
    return parseFailure('rfc5424', 'missing_pri', 'Message does not start with <PRI>');
  }

  const diagnostics: DecodeDiagnostic[] = [];
  const header: RecordHeader = { diagnostics };
  if (pri.kind === 'valid') {
    header.facility = pri.priority.facility;
    header.severity = pri.priority.severity;
  } else {
    diagnostics.push(invalidPriDiagnostic(pri.token));
  }

  const { fields, next } = splitHeader(pri.rest);
  const [version, timestamp, hostname, appName, procId, msgId] = fields;

  if (version !== '1') {
    return parseFailure('rfc5424', 'unsupported_version', `Unsupported version "${version ?? ''}"`);
  }
  if (
    timestamp === undefined ||
    hostname === undefined ||
    appName === undefined ||
    procId === undefined ||
    msgId === undefined ||
    fields.some((field) => field === '')
  ) {
    return parseFailure(
      'rfc5424',
      'truncated_header',
      `Expected ${HEADER_FIELDS} header fields, got ${fields.filter((f) => f !== '').length}`,
    );
  }

  if (timestamp !== NIL) {
    header.timestamp = parseRfc3339(timestamp);
    if (header.timestamp === null) {
      diagnostics.push({
        kind: 'invalid_timestamp',
        message: `Ignoring unparsable timestamp "${timestamp}"`,
        subject: timestamp,
      });
    }
  }
  header.hostname = nilable(hostname);
  header.app_name = nilable(appName);
  header.proc_id = nilable(procId);
  header.msg_id = nilable(msgId);

  if (next === null) {
    return { ok: true, value: { header, message: '' } };
  }

  const sd = parseStructuredData(pri.rest, next);
  if (!sd.ok) return parseFailure('rfc5424', 'unterminated_structured_data', sd.detail);

  header.structured_data = sd.elements;
  diagnostics.push(...sd.diagnostics);

  let message = pri.rest.slice(pri.rest[sd.end] === ' ' ? sd.end + 1 : sd.end);
  if (message.startsWith(BOM)) message = message.slice(BOM.length);

  return { ok: true, value: { header, message } };
}
