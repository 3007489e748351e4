import { describe, it, expect, vi } from 'vitest';
import { MessageDecoder } from '../../src/application/decoder.js';
import { createPluginRegistry } from '../../src/application/plugin-registry.js';
import {
  KV_CACHE_KEY,
  applyFieldMapping,
  parseKeyValue,
  type DecoderPlugin,
  type RecordVariant,
} from '../../src/domain/index.js';
import { FIXED_NOW, makeLogger, stubPlugin } from '../helpers.js';

function makeDecoder(plugins: readonly DecoderPlugin[] = []) {
  const { log, logger } = makeLogger();
  const decoder = new MessageDecoder({
    registry: createPluginRegistry(plugins),
    log: logger,
    nowFn: () => FIXED_NOW,
  });
  return { decoder, log };
}

function decodeOk(decoder: MessageDecoder, raw: string) {
  const result = decoder.decode(raw);
  if (!result.ok) throw new Error(`expected a record for ${raw}`);
  return result.record;
}

describe('MessageDecoder', () => {
  describe('grammar selection', () => {
    it.each<[string, RecordVariant]>([
      ['<34>1 - host app - - - msg', 'rfc5424'],
      ['<34>Feb 18 11:00:00 host app: msg', 'rfc3164'],
      ['<34>hello', 'syslog_base'],
      ['hello', 'envelope'],
    ])('decodes %j as %s', (raw, variant) => {
      const { decoder } = makeDecoder();
      expect(decodeOk(decoder, raw).variant).toBe(variant);
    });

    it('wraps empty input in an envelope', () => {
      const { decoder } = makeDecoder();
      const record = decodeOk(decoder, '');
      expect(record.variant).toBe('envelope');
      expect(record.message).toBe('');
    });

    it('fills in the year from the reference clock', () => {
      const { decoder } = makeDecoder();
      expect(decodeOk(decoder, '<34>Dec 31 23:00:00 host app: msg').timestamp).toEqual(
        new Date('2025-12-31T23:00:00.000Z'),
      );
    });

    it('reports a failure when a requested grammar does not apply', () => {
      const { decoder, log } = makeDecoder();

      expect(decoder.decode('hello', 'rfc5424')).toEqual({
        ok: false,
        failure: {
          grammar: 'rfc5424',
          reason: 'missing_pri',
          detail: 'Message does not start with <PRI>',
        },
      });
      expect(log.debug).toHaveBeenCalledWith(
        expect.objectContaining({ sample: 'hello' }),
        'Grammar rejected message',
      );
    });

    it('tags an explicit rfc_base decode as syslog_base', () => {
      const { decoder } = makeDecoder();
      const result = decoder.decode('<34>1 - h a - - - hi', 'rfc_base');

      expect(result.ok && result.record.variant).toBe('syslog_base');
      expect(result.ok && result.record.message).toBe('1 - h a - - - hi');
    });
  });

  describe('plugin chain', () => {
    it('runs stages in order whatever the registration order', () => {
      const calls: string[] = [];
      const { decoder } = makeDecoder([
        stubPlugin('last', 'UNPROCESSED_MESSAGES', () => {
          calls.push('last');
          return false;
        }),
        stubPlugin('first', 'FIRST_PASS', () => {
          calls.push('first');
          return false;
        }),
      ]);

      decoder.decode('hello');
      expect(calls).toEqual(['first', 'last']);
    });

    it('keeps going after a match and accumulates fields', () => {
      const { decoder } = makeDecoder([
        stubPlugin('one', 'FIRST_PASS', (record) => {
          applyFieldMapping(record, ['a'], ['1'], { vendor: 'v1', product: 'p1', msgclass: 'm1' }, 'one');
          return true;
        }),
        stubPlugin('two', 'SECOND_PASS', (record) => {
          applyFieldMapping(record, ['b'], ['2'], { vendor: 'v2', product: 'p2', msgclass: 'm2' }, 'two');
          return true;
        }),
      ]);

      const record = decodeOk(decoder, 'hello');

      expect(record.event_data).toEqual({ a: '1', b: '2' });
      expect(record.structure_classification).toEqual({ vendor: 'v1', product: 'p1', msgclass: 'm1' });
      expect(Object.keys(record.handler_data)).toEqual(['one', 'two']);
      expect(record.diagnostics).toEqual([
        {
          kind: 'classification_conflict',
          message: 'Keeping classification v1/p1/m1 over v2/p2/m2',
          subject: 'two',
        },
      ]);
    });

    it('skips plugins whose variant does not apply', () => {
      const tryDecode = vi.fn(() => true);
      const { decoder } = makeDecoder([stubPlugin('5424-only', 'FIRST_PASS', tryDecode, ['rfc5424'])]);

      decoder.decode('<34>Feb 18 11:00:00 host app: msg');
      expect(tryDecode).not.toHaveBeenCalled();
    });

    it('isolates a plugin that throws', () => {
      const after = vi.fn(() => false);
      const { decoder, log } = makeDecoder([
        stubPlugin('boom', 'FIRST_PASS', () => {
          throw new Error('kaput');
        }),
        stubPlugin('after', 'FIRST_PASS', after),
      ]);

      const record = decodeOk(decoder, 'hello');

      expect(after).toHaveBeenCalledTimes(1);
      expect(record.diagnostics).toEqual([{ kind: 'plugin_error', message: 'kaput', subject: 'boom' }]);
      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ plugin: 'boom', stage: 'FIRST_PASS', sample: 'hello' }),
        'Plugin failed',
      );
    });

    it('shares one parsing cache between plugins', () => {
      const compute = vi.fn(parseKeyValue);
      const reader = (id: string) =>
        stubPlugin(id, 'SECOND_PASS', (record, cache) => {
          cache.getOrCompute(KV_CACHE_KEY, record.message, compute);
          return false;
        });
      const { decoder } = makeDecoder([reader('r1'), reader('r2')]);

      decoder.decode('a=1 b=2');
      decoder.decode('a=1 b=2');

      expect(compute).toHaveBeenCalledTimes(2);
    });
  });

  it('freezes the returned record', () => {
    const { decoder } = makeDecoder();
    const record = decodeOk(decoder, '<34>1 - h a - - [x y="1"] msg');

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.event_data)).toBe(true);
    expect(Object.isFrozen(record.structured_data)).toBe(true);
  });

  it('gives the same record for the same input', () => {
    const { decoder } = makeDecoder([
      stubPlugin('kv', 'UNPROCESSED_MESSAGES', (record) => {
        applyFieldMapping(record, ['n'], [record.message.length], { vendor: 'v', product: 'p', msgclass: 'm' });
        return true;
      }),
    ]);

    expect(decodeOk(decoder, 'same input')).toEqual(decodeOk(decoder, 'same input'));
  });

  it('truncates the logged sample', () => {
    const { log, logger } = makeLogger();
    const decoder = new MessageDecoder({
      registry: createPluginRegistry([
        stubPlugin('boom', 'FIRST_PASS', () => {
          throw new Error('kaput');
        }),
      ]),
      log: logger,
      messageSampleLength: 4,
    });

    decoder.decode('abcdefgh');
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ sample: 'abcd' }), 'Plugin failed');
  });
});
