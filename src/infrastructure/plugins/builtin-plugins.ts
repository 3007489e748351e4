import type { PluginRegistry } from '../../application/index.js';
import {
  createCefPlugin,
  createFortiGatePlugin,
  createGenericKvPlugin,
  createJsonPlugin,
  createLeef1Plugin,
  createLeef2Plugin,
  createStructuredDataPlugin,
  type DecoderPlugin,
} from '../../domain/index.js';

/** Bundled plugins in registration order. */
export function builtinPlugins(): DecoderPlugin[] {
  return [
    createStructuredDataPlugin(),
    createFortiGatePlugin(),
    createCefPlugin(),
    createLeef1Plugin(),
    createLeef2Plugin(),
    createJsonPlugin(),
    createGenericKvPlugin(),
  ];
}

export interface RegisterBuiltinOptions {
  /** Built-in plugin ids to leave out. */
  readonly disabled?: readonly string[];
}

/**
 * Register the bundled plugins, minus any disabled ones.
 * Returns the ids that were registered.
 *
 * @throws when a disabled id names no built-in plugin
 */
export function registerBuiltinPlugins(
  registry: PluginRegistry,
  options: RegisterBuiltinOptions = {},
): string[] {
  const plugins = builtinPlugins();
  const disabled = new Set(options.disabled ?? []);

  const known = new Set(plugins.map((plugin) => plugin.id));
  const unknown = [...disabled].filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new Error(`Unknown built-in plugin id(s): ${unknown.join(', ')}`);
  }

  const registered: string[] = [];
  for (const plugin of plugins) {
    if (disabled.has(plugin.id)) continue;
    registry.register(plugin);
    registered.push(plugin.id);
  }
  return registered;
}
