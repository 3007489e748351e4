import { applyFieldMapping } from '../field-mapping.js';
import type { LeefMessage } from '../parsers/leef.js';
import type { CanonicalRecord } from '../record.js';
import { cachedLeef1, cachedLeef2 } from './cache-keys.js';
import type { DecoderPlugin, ParsingCache } from './types.js';

function applyLeef(record: CanonicalRecord, leef: LeefMessage, pluginId: string): void {
  applyFieldMapping(
    record,
    [...leef.fields.keys()],
    [...leef.fields.values()],
    {
      vendor: leef.vendor.toLowerCase(),
      product: leef.product.toLowerCase(),
      msgclass: leef.event_id.toLowerCase(),
    },
    pluginId,
  );
}

function createLeefPlugin(
  id: string,
  version: '1' | '2',
  parse: (cache: ParsingCache, message: string) => LeefMessage | null,
): DecoderPlugin {
  const prefix = `LEEF:${version}.`;
  return {
    id,
    name: `Log Event Extended Format ${version}.0`,
    description: `Decodes ${prefix}x messages`,
    stage: 'UNPROCESSED_STRUCTURED',
    variants: ['envelope'],

    tryDecode(record, cache) {
      if (!record.message.startsWith(prefix)) return false;

      const leef = parse(cache, record.message);
      if (leef === null) return false;

      applyLeef(record, leef, id);
      return true;
    },
  };
}

/** LEEF 1.0: tab-delimited attributes, space-delimited when there is no tab. */
export function createLeef1Plugin(): DecoderPlugin {
  return createLeefPlugin('generic-leef1', '1', cachedLeef1);
}

/** LEEF 2.0: optional delimiter field after the event id. */
export function createLeef2Plugin(): DecoderPlugin {
  return createLeefPlugin('generic-leef2', '2', cachedLeef2);
}
