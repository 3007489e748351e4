export { parseKeyValue, type KeyValuePairs } from './kv.js';
export { parseCef, parseCefExtension, type CefHeader, type CefMessage } from './cef.js';
export { decodeLeefDelimiter, parseLeef1, parseLeef2, type LeefMessage } from './leef.js';
export { jsonObjectSchema, parseJsonObject, quoteUnsafeIntegers } from './json.js';
export { applyLabelAliases, splitPipeHeader, unescapeExtensionValue } from './pipe-header.js';
