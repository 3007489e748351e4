import { describe, it, expect } from 'vitest';
import {
  createRecord,
  freezeRecord,
  satisfiedVariants,
  satisfiesVariant,
} from '../../src/domain/record.js';

describe('createRecord', () => {
  it('defaults every header field to null, never to zero or now', () => {
    const record = createRecord('envelope', 'hello');

    expect(record).toEqual({
      variant: 'envelope',
      timestamp: null,
      facility: null,
      severity: null,
      hostname: null,
      app_name: null,
      proc_id: null,
      msg_id: null,
      structured_data: [],
      message: 'hello',
      structure_classification: null,
      event_data: {},
      handler_data: {},
      diagnostics: [],
    });
  });

  it('copies supplied header fields', () => {
    const record = createRecord('rfc3164', 'm', { facility: 4, severity: 2, hostname: 'host1' });
    expect(record.facility).toBe(4);
    expect(record.severity).toBe(2);
    expect(record.hostname).toBe('host1');
  });
});

describe('variant satisfaction', () => {
  it('orders satisfied variants from most specific', () => {
    expect(satisfiedVariants('rfc5424')).toEqual(['rfc5424', 'syslog_base', 'envelope']);
    expect(satisfiedVariants('envelope')).toEqual(['envelope']);
  });

  it('lets syslog variants satisfy syslog_base and envelope', () => {
    expect(satisfiesVariant('rfc3164', 'syslog_base')).toBe(true);
    expect(satisfiesVariant('rfc5424', 'envelope')).toBe(true);
    expect(satisfiesVariant('syslog_base', 'envelope')).toBe(true);
  });

  it('does not let a general variant satisfy a specific one', () => {
    expect(satisfiesVariant('envelope', 'syslog_base')).toBe(false);
    expect(satisfiesVariant('syslog_base', 'rfc3164')).toBe(false);
    expect(satisfiesVariant('rfc3164', 'rfc5424')).toBe(false);
  });
});

describe('freezeRecord', () => {
  it('freezes the record and its nested containers', () => {
    const record = createRecord('rfc5424', 'm', {
      structured_data: [{ id: 'a', params: [{ name: 'x', value: '1' }] }],
    });
    record.event_data['k'] = { nested: ['v'] };

    const frozen = freezeRecord(record);

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Object.isFrozen(frozen.event_data)).toBe(true);
    expect(Object.isFrozen(frozen.event_data['k'])).toBe(true);
    expect(Object.isFrozen(frozen.structured_data[0]?.params)).toBe(true);
    expect(Object.isFrozen(frozen.diagnostics)).toBe(true);
  });

  it('rejects writes after hand-off', () => {
    const frozen = freezeRecord(createRecord('envelope', 'm'));
    expect(() => {
      frozen.event_data['late'] = 'value';
    }).toThrow(TypeError);
  });
});
