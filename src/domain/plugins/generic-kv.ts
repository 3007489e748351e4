import { applyFieldMapping } from '../field-mapping.js';
import { cachedKeyValue } from './cache-keys.js';
import type { DecoderPlugin } from './types.js';

const PLUGIN_ID = 'generic-kv';

/**
 * Last-resort key=value decoder. Declines once any earlier plugin has
 * classified the message.
 */
export function createGenericKvPlugin(): DecoderPlugin {
  return {
    id: PLUGIN_ID,
    name: 'Generic Key=Value',
    description: 'Decodes unclassified key=value messages',
    stage: 'UNPROCESSED_MESSAGES',
    variants: ['envelope'],

    tryDecode(record, cache) {
      if (record.message === '' || record.structure_classification !== null) return false;

      const pairs = cachedKeyValue(cache, record.message);
      if (pairs === null) return false;

      applyFieldMapping(
        record,
        [...pairs.keys()],
        [...pairs.values()],
        { vendor: 'generic', product: 'unknown_kv', msgclass: 'unknown' },
        PLUGIN_ID,
      );
      return true;
    },
  };
}
