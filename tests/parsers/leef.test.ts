import { describe, it, expect } from 'vitest';
import { decodeLeefDelimiter, parseLeef1, parseLeef2 } from '../../src/domain/parsers/leef.js';

describe('parseLeef1', () => {
  it('parses a tab-delimited message', () => {
    const leef = parseLeef1(
      'LEEF:1.0|Microsoft|MSExchange|4.0 SP1|15345|src=10.50.1.1\tdst=10.50.1.2\tusrName=joe',
    );

    expect(leef?.delimiter).toBe('\t');
    expect(leef === null ? null : [...leef.fields.entries()]).toEqual([
      ['leef_version', '1.0'],
      ['vendor', 'Microsoft'],
      ['product', 'MSExchange'],
      ['product_version', '4.0 SP1'],
      ['event_id', '15345'],
      ['src', '10.50.1.1'],
      ['dst', '10.50.1.2'],
      ['usrName', 'joe'],
    ]);
  });

  it('falls back to spaces and trims values', () => {
    const leef = parseLeef1('LEEF:1.0|V|P|1|E|a=1 b=2');
    expect(leef?.delimiter).toBe(' ');
    expect(leef?.fields.get('a')).toBe('1');
    expect(leef?.fields.get('b')).toBe('2');

    expect(parseLeef1('LEEF:1.0|V|P|1|E|a= 1 \tb=2')?.fields.get('a')).toBe('1');
  });

  it('rejects LEEF 2.0 and short headers', () => {
    expect(parseLeef1('LEEF:2.0|V|P|1|E|a=1')).toBeNull();
    expect(parseLeef1('LEEF:1.0|V|P|1')).toBeNull();
  });
});

describe('parseLeef2', () => {
  it('uses the declared delimiter', () => {
    const leef = parseLeef2('LEEF:2.0|Lancope|StealthWatch|1.0|41|^|src=10.0.6.1^dst=10.0.6.2');

    expect(leef?.delimiter).toBe('^');
    expect(leef?.event_id).toBe('41');
    expect(leef?.fields.get('src')).toBe('10.0.6.1');
    expect(leef?.fields.get('dst')).toBe('10.0.6.2');
  });

  it('accepts a hex delimiter', () => {
    const leef = parseLeef2('LEEF:2.0|V|P|1|E|x5E|a=1^b=2');
    expect(leef?.delimiter).toBe('^');
    expect(leef?.fields.get('b')).toBe('2');
  });

  it('defaults to tab without a delimiter field', () => {
    const leef = parseLeef2('LEEF:2.0|V|P|1|E|a=x|y\tb=2');
    expect(leef?.delimiter).toBe('\t');
    expect(leef?.fields.get('a')).toBe('x|y');
  });

  it('treats an empty delimiter field as tab', () => {
    const leef = parseLeef2('LEEF:2.0|V|P|1|E||a=1\tb=2');
    expect(leef?.delimiter).toBe('\t');
    expect(leef?.fields.get('a')).toBe('1');
  });

  it('applies label aliases over header names', () => {
    const leef = parseLeef2('LEEF:2.0|V|P|1|E|^|cs1=abc^cs1Label=vendor');
    expect(leef?.fields.get('vendor')).toBe('abc');
    expect(leef?.vendor).toBe('V');
  });

  it('keeps value whitespace', () => {
    expect(parseLeef2('LEEF:2.0|V|P|1|E|^|a= 1 ^b=2')?.fields.get('a')).toBe(' 1 ');
  });
});

describe('decodeLeefDelimiter', () => {
  it.each<[string, string | null]>([
    ['', '\t'],
    ['^', '^'],
    ['x5E', '^'],
    ['0x09', '\t'],
    ['=', null],
    ['x3D', null],
    ['ab', null],
  ])('decodes %j', (text, expected) => {
    expect(decodeLeefDelimiter(text)).toBe(expected);
  });
});
