import { describe, it, expect } from 'vitest';
import { createPluginRegistry } from '../../src/application/plugin-registry.js';
import { builtinPlugins, registerBuiltinPlugins } from '../../src/infrastructure/plugins/builtin-plugins.js';

const ALL_IDS = [
  'rfc5424-structured-data',
  'fortinet-fortigate-kv',
  'generic-cef',
  'generic-leef1',
  'generic-leef2',
  'generic-json',
  'generic-kv',
];

describe('builtinPlugins', () => {
  it('lists the bundled plugins in registration order', () => {
    expect(builtinPlugins().map((plugin) => plugin.id)).toEqual(ALL_IDS);
  });
});

describe('registerBuiltinPlugins', () => {
  it('registers everything by default', () => {
    const registry = createPluginRegistry();
    expect(registerBuiltinPlugins(registry)).toEqual(ALL_IDS);
    expect(registry.size).toBe(7);
  });

  it('leaves out disabled plugins', () => {
    const registry = createPluginRegistry();
    const registered = registerBuiltinPlugins(registry, { disabled: ['generic-kv', 'generic-json'] });

    expect(registered).toEqual(ALL_IDS.slice(0, 5));
    expect(registry.has('generic-kv')).toBe(false);
  });

  it('rejects unknown ids before registering anything', () => {
    const registry = createPluginRegistry();
    expect(() => registerBuiltinPlugins(registry, { disabled: ['generic-kv', 'nope'] })).toThrow(
      'Unknown built-in plugin id(s): nope',
    );
    expect(registry.size).toBe(0);
  });
});
