import type {
  DecodeDiagnostic,
  StructuredDataElement,
  StructuredDataParam,
} from '../record.js';

/**
 * RFC5424 STRUCTURED-DATA.
 *
 * `-` means no elements. Otherwise one or more `[SD-ID PARAM="VALUE" ...]`
 * with `"`, `\` and `]` backslash-escaped inside values.
 */

export type StructuredDataResult =
  | {
      readonly ok: true;
      readonly elements: StructuredDataElement[];
      readonly diagnostics: DecodeDiagnostic[];
      /** Index just past the last character belonging to STRUCTURED-DATA. */
      readonly end: number;
    }
  | { readonly ok: false; readonly detail: string };

type ElementScan =
  | { readonly kind: 'element'; readonly element: StructuredDataElement; readonly end: number }
  | { readonly kind: 'broken'; readonly id: string; readonly reason: string; readonly at: number }
  | { readonly kind: 'unterminated'; readonly detail: string };

const ESCAPABLE = new Set(['"', '\\', ']']);

/** SD-NAME: printable US-ASCII except `=`, space, `]` and `"`. */
function isNameChar(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code >= 33 && code <= 126 && ch !== '=' && ch !== ']' && ch !== '"';
}

function readName(text: string, start: number): number {
  let i = start;
  while (i < text.length && isNameChar(text.charAt(i))) i++;
  return i;
}

function scanElement(text: string, start: number): ElementScan {
  let i = start + 1;
  const idEnd = readName(text, i);
  const id = text.slice(i, idEnd);
  i = idEnd;
  if (id === '') return { kind: 'broken', id, reason: 'empty SD-ID', at: i };

  const params: StructuredDataParam[] = [];
  for (;;) {
    const ch = text[i];
    if (ch === undefined) {
      return { kind: 'unterminated', detail: `Element "${id}" is never closed` };
    }
    if (ch === ']') return { kind: 'element', element: { id, params }, end: i + 1 };
    if (ch !== ' ') return { kind: 'broken', id, reason: `unexpected "${ch}"`, at: i };
    i++;

    const nameEnd = readName(text, i);
    const name = text.slice(i, nameEnd);
    if (name === '') return { kind: 'broken', id, reason: 'empty PARAM-NAME', at: nameEnd };
    if (text[nameEnd] !== '=') {
      return { kind: 'broken', id, reason: `missing "=" after ${name}`, at: nameEnd };
    }
    if (text[nameEnd + 1] !== '"') {
      return { kind: 'broken', id, reason: `missing opening quote for ${name}`, at: nameEnd + 1 };
    }
    i = nameEnd + 2;

    let value = '';
    for (;;) {
      const c = text[i];
      if (c === undefined) {
        return { kind: 'unterminated', detail: `Value of ${id} ${name} is never closed` };
      }
      if (c === '"') {
        i++;
        break;
      }
      if (c === ']') return { kind: 'broken', id, reason: `unescaped "]" in ${name}`, at: i };
      if (c === '\\') {
        const next = text[i + 1];
        if (next === undefined) {
          return { kind: 'unterminated', detail: `Value of ${id} ${name} is never closed` };
        }
        value += ESCAPABLE.has(next) ? next : c + next;
        i += 2;
        continue;
      }
      value += c;
      i++;
    }
    params.push({ name, value });
  }
}

/**
 * Index after the next unescaped `]` that can close an element, i.e. one
 * followed by `[`, a space or the end of input. -1 when there is none.
 */
function findResumePoint(text: string, from: number): number {
  let i = from;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === ']') {
      const next = text[i + 1];
      if (next === undefined || next === '[' || next === ' ') return i + 1;
    }
    i++;
  }
  return -1;
}

/**
 * Parse STRUCTURED-DATA starting at `start`.
 *
 * A broken element is dropped with a diagnostic and parsing continues with
 * the next one. Input that ends inside a value or element is a failure.
 * Text that is neither `-` nor `[` holds no structured data.
 */
export function parseStructuredData(text: string, start: number): StructuredDataResult {
  const elements: StructuredDataElement[] = [];
  const diagnostics: DecodeDiagnostic[] = [];

  if (text[start] === '-') return { ok: true, elements, diagnostics, end: start + 1 };

  let i = start;
  while (text[i] === '[') {
    const scan = scanElement(text, i);
    switch (scan.kind) {
      case 'element':
        elements.push(scan.element);
        i = scan.end;
        break;
      case 'unterminated':
        return { ok: false, detail: scan.detail };
      case 'broken': {
        const resume = findResumePoint(text, scan.at);
        if (resume === -1) {
          return { ok: false, detail: `Element "${scan.id}" is never closed` };
        }
        diagnostics.push({
          kind: 'structured_data_element',
          message: `Dropped structured data element: ${scan.reason}`,
          ...(scan.id === '' ? {} : { subject: scan.id }),
        });
        i = resume;
        break;
      }
    }
  }

  return { ok: true, elements, diagnostics, end: i };
}

export function escapeParamValue(value: string): string {
  return value.replace(/["\\\]]/g, '\\$&');
}

/** Render elements as RFC5424 STRUCTURED-DATA; `-` when there are none. */
export function formatStructuredData(elements: readonly StructuredDataElement[]): string {
  if (elements.length === 0) return '-';
  return elements
    .map((element) => {
      const params = element.params
        .map((param) => ` ${param.name}="${escapeParamValue(param.value)}"`)
        .join('');
      return `[${element.id}${params}]`;
    })
    .join('');
}
