import { applyLabelAliases, splitPipeHeader, unescapeExtensionValue } from './pipe-header.js';

/**
 * IBM Log Event Extended Format.
 *
 * 1.0: `LEEF:1.0|Vendor|Product|Version|EventID|Extension`
 * 2.0: `LEEF:2.0|Vendor|Product|Version|EventID|[Delimiter|]Extension`
 */
export interface LeefMessage {
  readonly leef_version: string;
  readonly vendor: string;
  readonly product: string;
  readonly product_version: string;
  readonly event_id: string;
  /** Attribute delimiter used by the extension. */
  readonly delimiter: string;
  /** Header fields, then extension attributes. */
  readonly fields: ReadonlyMap<string, string>;
}

const LEEF_PREFIX = 'LEEF:';
const HEADER_FIELD_COUNT = 5;
const TAB = '\t';

function parseAttributes(
  extension: string,
  delimiter: string,
  trim: boolean,
): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const pair of extension.split(delimiter)) {
    const equals = pair.indexOf('=');
    if (equals <= 0) continue;

    const key = pair.slice(0, equals).trim();
    const raw = pair.slice(equals + 1);
    if (key === '') continue;
    attributes.set(key, unescapeExtensionValue(trim ? raw.trim() : raw));
  }
  return attributes;
}

/**
 * Decode a LEEF 2.0 delimiter field: a single character, or its code point
 * as `xHH` / `0xHH`. An empty field means tab. Null when `text` is not a
 * delimiter field at all.
 */
export function decodeLeefDelimiter(text: string): string | null {
  if (text === '') return TAB;
  if (text.length === 1) return text === '=' ? null : text;

  const hex = /^0?[xX]([0-9a-fA-F]{1,4})$/.exec(text);
  if (!hex) return null;
  const delimiter = String.fromCharCode(Number.parseInt(hex[1] ?? '', 16));
  return delimiter === '=' ? null : delimiter;
}

function splitHeader(message: string): string[] | null {
  if (!message.startsWith(LEEF_PREFIX)) return null;
  return splitPipeHeader(message.slice(LEEF_PREFIX.length), HEADER_FIELD_COUNT);
}

function buildMessage(
  header: readonly string[],
  delimiter: string,
  attributes: Map<string, string>,
): LeefMessage {
  const [leef_version = '', vendor = '', product = '', product_version = '', event_id = ''] = header;
  const fields = new Map<string, string>([
    ['leef_version', leef_version],
    ['vendor', vendor],
    ['product', product],
    ['product_version', product_version],
    ['event_id', event_id],
  ]);
  for (const [key, value] of attributes) fields.set(key, value);

  return { leef_version, vendor, product, product_version, event_id, delimiter, fields };
}

/** LEEF 1.0 attributes are tab-delimited; without any tab, spaces are used. */
export function parseLeef1(message: string): LeefMessage | null {
  if (!message.startsWith(`${LEEF_PREFIX}1.`)) return null;
  const parts = splitHeader(message);
  if (parts === null) return null;

  const extension = parts[HEADER_FIELD_COUNT] ?? '';
  const delimiter = extension.includes(TAB) ? TAB : ' ';
  return buildMessage(parts, delimiter, parseAttributes(extension, delimiter, true));
}

export function parseLeef2(message: string): LeefMessage | null {
  if (!message.startsWith(`${LEEF_PREFIX}2.`)) return null;
  const parts = splitHeader(message);
  if (parts === null) return null;

  let extension = parts[HEADER_FIELD_COUNT] ?? '';
  let delimiter = TAB;
  const pipe = extension.indexOf('|');
  if (pipe !== -1) {
    const declared = decodeLeefDelimiter(extension.slice(0, pipe));
    if (declared !== null) {
      delimiter = declared;
      extension = extension.slice(pipe + 1);
    }
  }

  const attributes = parseAttributes(extension, delimiter, false);
  applyLabelAliases(attributes);
  return buildMessage(parts, delimiter, attributes);
}
