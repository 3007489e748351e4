import { applyFieldMapping } from '../field-mapping.js';
import { cachedCef } from './cache-keys.js';
import type { DecoderPlugin } from './types.js';

const PLUGIN_ID = 'generic-cef';
const SUPPORTED_VERSIONS = new Set(['0', '1']);

/**
 * ArcSight CEF. Classification comes from the header: device vendor,
 * device product and event name, lower-cased.
 */
export function createCefPlugin(): DecoderPlugin {
  return {
    id: PLUGIN_ID,
    name: 'Common Event Format',
    description: 'Decodes CEF:0 and CEF:1 messages',
    stage: 'UNPROCESSED_STRUCTURED',
    variants: ['envelope'],

    tryDecode(record, cache) {
      if (!record.message.startsWith('CEF:')) return false;

      const cef = cachedCef(cache, record.message);
      if (cef === null || !SUPPORTED_VERSIONS.has(cef.header.cef_version)) return false;

      applyFieldMapping(
        record,
        [...cef.fields.keys()],
        [...cef.fields.values()],
        {
          vendor: cef.header.device_vendor.toLowerCase(),
          product: cef.header.device_product.toLowerCase(),
          msgclass: cef.header.name.toLowerCase(),
        },
        PLUGIN_ID,
      );
      return true;
    },
  };
}
