import { mergeEventData, recordHandler } from '../field-mapping.js';
import type { EventDataValue, StructureClassification } from '../record.js';
import type { DecoderPlugin } from './types.js';

const PLUGIN_ID = 'rfc5424-structured-data';

const HANDLER_CLASSIFICATION: StructureClassification = {
  vendor: 'ietf',
  product: 'rfc5424',
  msgclass: 'structured_data',
};

/**
 * Flattens RFC5424 structured data into `event_data` as `<SD-ID>.<PARAM>`.
 * A key that occurs more than once holds every value, in wire order.
 *
 * Leaves `structure_classification` untouched.
 */
export function createStructuredDataPlugin(): DecoderPlugin {
  return {
    id: PLUGIN_ID,
    name: 'RFC5424 Structured Data',
    description: 'Copies SD-ELEMENT parameters into event_data as sdid.param',
    stage: 'FIRST_PASS',
    variants: ['rfc5424'],

    tryDecode(record) {
      if (record.structured_data.length === 0) return false;

      const grouped = new Map<string, string[]>();
      for (const element of record.structured_data) {
        for (const param of element.params) {
          const name = `${element.id}.${param.name}`;
          const values = grouped.get(name);
          if (values) values.push(param.value);
          else grouped.set(name, [param.value]);
        }
      }

      const names = [...grouped.keys()];
      const values: EventDataValue[] = [...grouped.values()].map((list) =>
        list.length === 1 ? (list[0] ?? '') : list,
      );
      mergeEventData(record, names, values);
      recordHandler(record, PLUGIN_ID, HANDLER_CLASSIFICATION, names);
      return true;
    },
  };
}
