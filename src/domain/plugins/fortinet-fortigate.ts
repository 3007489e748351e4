import { applyFieldMapping } from '../field-mapping.js';
import { cachedKeyValue } from './cache-keys.js';
import type { DecoderPlugin } from './types.js';

const PLUGIN_ID = 'fortinet-fortigate-kv';
const LOGID_LENGTH = 10;

/**
 * Fortinet FortiGate key=value logs carried over syslog.
 *
 * A FortiGate line always has `eventtime`, `type`, `subtype` and a
 * ten-digit `logid`. The message class is `<type>_<subtype>`, e.g.
 * `traffic_forward`.
 */
export function createFortiGatePlugin(): DecoderPlugin {
  return {
    id: PLUGIN_ID,
    name: 'Fortinet FortiGate',
    description: 'Decodes FortiGate key=value syslog messages',
    stage: 'SECOND_PASS',
    variants: ['syslog_base'],

    tryDecode(record, cache) {
      if (record.message === '') return false;

      const pairs = cachedKeyValue(cache, record.message);
      if (pairs === null) return false;

      const type = pairs.get('type');
      const subtype = pairs.get('subtype');
      const logid = pairs.get('logid');
      if (
        !pairs.has('eventtime') ||
        type === undefined ||
        subtype === undefined ||
        logid?.length !== LOGID_LENGTH
      ) {
        return false;
      }

      applyFieldMapping(
        record,
        [...pairs.keys()],
        [...pairs.values()],
        { vendor: 'fortinet', product: 'fortigate', msgclass: `${type}_${subtype}` },
        PLUGIN_ID,
      );
      return true;
    },
  };
}
