import { applyEventData } from '../field-mapping.js';
import { cachedJson } from './cache-keys.js';
import type { DecoderPlugin } from './types.js';

const PLUGIN_ID = 'generic-json';

export function createJsonPlugin(): DecoderPlugin {
  return {
    id: PLUGIN_ID,
    name: 'Generic JSON',
    description: 'Decodes messages that are a JSON object',
    stage: 'UNPROCESSED_STRUCTURED',
    variants: ['envelope'],

    tryDecode(record, cache) {
      if (!record.message.trimStart().startsWith('{')) return false;

      const data = cachedJson(cache, record.message);
      if (data === null) return false;

      applyEventData(
        record,
        data,
        { vendor: 'generic', product: 'unknown_json', msgclass: 'unknown' },
        PLUGIN_ID,
      );
      return true;
    },
  };
}
