import { applyLabelAliases, splitPipeHeader, unescapeExtensionValue } from './pipe-header.js';

/**
 * ArcSight Common Event Format.
 *
 * `CEF:Version|Device Vendor|Device Product|Device Version|Signature ID|Name|Severity|Extension`
 */
export interface CefHeader {
  readonly cef_version: string;
  readonly device_vendor: string;
  readonly device_product: string;
  readonly device_version: string;
  readonly signature_id: string;
  readonly name: string;
  readonly severity: string;
}

export interface CefMessage {
  readonly header: CefHeader;
  /** Header fields, then extension pairs, then `*Label` aliases. */
  readonly fields: ReadonlyMap<string, string>;
}

const CEF_PREFIX = 'CEF:';
const HEADER_FIELD_COUNT = 7;

/** A key starts a token and runs up to an unescaped `=`. */
const EXTENSION_KEY = /(?<=^|\s)([^\s=\\]+)=/g;

export function parseCefExtension(extension: string): Map<string, string> {
  const fields = new Map<string, string>();
  const keys = [...extension.matchAll(EXTENSION_KEY)];

  keys.forEach((match, index) => {
    const key = match[1];
    if (key === undefined) return;
    const valueStart = (match.index ?? 0) + match[0].length;
    const valueEnd = keys[index + 1]?.index ?? extension.length;
    fields.set(key, unescapeExtensionValue(extension.slice(valueStart, valueEnd).trimEnd()));
  });

  return fields;
}

export function parseCef(message: string): CefMessage | null {
  if (!message.startsWith(CEF_PREFIX)) return null;

  const parts = splitPipeHeader(message.slice(CEF_PREFIX.length), HEADER_FIELD_COUNT);
  if (parts === null) return null;

  const [cef_version = '', device_vendor = '', device_product = '', device_version = '',
    signature_id = '', name = '', severity = '', extension = ''] = parts;

  const header: CefHeader = {
    cef_version,
    device_vendor,
    device_product,
    device_version,
    signature_id,
    name,
    severity,
  };

  const fields = new Map<string, string>(Object.entries(header));
  for (const [key, value] of parseCefExtension(extension)) {
    fields.set(key, value);
  }
  applyLabelAliases(fields);

  return { header, fields };
}
