import { describe, it, expect } from 'vitest';
import { createFortiGatePlugin } from '../../src/domain/plugins/fortinet-fortigate.js';
import { makeCache, makeRecord } from '../helpers.js';

const TRAFFIC =
  'date=2023-05-11 time=10:24:05 eventtime=1683800645 logid="0000000013" type="traffic" subtype="forward" srcip=10.1.1.1';

describe('fortinet-fortigate-kv plugin', () => {
  const plugin = createFortiGatePlugin();

  it('classifies by type and subtype', () => {
    const record = makeRecord(TRAFFIC, 'syslog_base');

    expect(plugin.tryDecode(record, makeCache())).toBe(true);
    expect(record.structure_classification).toEqual({
      vendor: 'fortinet',
      product: 'fortigate',
      msgclass: 'traffic_forward',
    });
    expect(record.event_data).toEqual({
      date: '2023-05-11',
      time: '10:24:05',
      eventtime: '1683800645',
      logid: '0000000013',
      type: 'traffic',
      subtype: 'forward',
      srcip: '10.1.1.1',
    });
    expect(record.handler_data['fortinet-fortigate-kv']?.msgclass).toBe('traffic_forward');
  });

  it('stores the key=value parse in the cache', () => {
    const cache = makeCache();
    plugin.tryDecode(makeRecord(TRAFFIC, 'syslog_base'), cache);
    expect(cache.keys()).toEqual(['kv']);
  });

  it('declines without eventtime', () => {
    const record = makeRecord('logid="0000000013" type="traffic" subtype="forward"', 'syslog_base');
    expect(plugin.tryDecode(record, makeCache())).toBe(false);
    expect(record.event_data).toEqual({});
  });

  it('declines a logid of the wrong length', () => {
    const record = makeRecord('eventtime=1 logid=123 type=traffic subtype=forward', 'syslog_base');
    expect(plugin.tryDecode(record, makeCache())).toBe(false);
  });

  it('declines an empty message without parsing', () => {
    const cache = makeCache();
    expect(plugin.tryDecode(makeRecord('', 'syslog_base'), cache)).toBe(false);
    expect(cache.size).toBe(0);
  });
});
