import {
  PLUGIN_STAGES,
  RECORD_VARIANTS,
  satisfiesVariant,
  type DecoderPlugin,
  type PluginStage,
  type RecordVariant,
} from '../domain/index.js';

function tableKey(variant: RecordVariant, stage: PluginStage): string {
  return `${variant}:${stage}`;
}

/**
 * Table of decoder plugins by (record variant, stage).
 *
 * Two phases: plugins are registered while the registry is open, then
 * `freeze()` builds the lookup table and the registry becomes read-only.
 * Lookups are only allowed once frozen.
 */
export class PluginRegistry {
  // Map iteration order is registration order
  private readonly plugins: Map<string, DecoderPlugin> = new Map();
  private readonly table: Map<string, readonly DecoderPlugin[]> = new Map();
  private frozen = false;

  /** @throws after freeze(), on a duplicate id, or for a plugin with no variants */
  register(plugin: DecoderPlugin): void {
    if (this.frozen) {
      throw new Error(`Cannot register plugin "${plugin.id}": registry is frozen`);
    }
    if (this.plugins.has(plugin.id)) {
      throw new Error(`Plugin "${plugin.id}" is already registered`);
    }
    if (plugin.variants.length === 0) {
      throw new Error(`Plugin "${plugin.id}" declares no record variants`);
    }
    this.plugins.set(plugin.id, plugin);
  }

  /** Close registration. Calling it again is a no-op. */
  freeze(): void {
    if (this.frozen) return;

    const registered = [...this.plugins.values()];
    for (const variant of RECORD_VARIANTS) {
      for (const stage of PLUGIN_STAGES) {
        const applicable = registered.filter(
          (plugin) =>
            plugin.stage === stage &&
            plugin.variants.some((required) => satisfiesVariant(variant, required)),
        );
        this.table.set(tableKey(variant, stage), Object.freeze(applicable));
      }
    }
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Plugins that apply to a record of `variant` in `stage`, in registration
   * order. A plugin declaring several satisfied variants appears once.
   */
  pluginsFor(variant: RecordVariant, stage: PluginStage): readonly DecoderPlugin[] {
    if (!this.frozen) {
      throw new Error('Plugin registry must be frozen before lookups');
    }
    return this.table.get(tableKey(variant, stage)) ?? [];
  }

  has(id: string): boolean {
    return this.plugins.has(id);
  }

  /** All registered plugins, in registration order. */
  list(): DecoderPlugin[] {
    return [...this.plugins.values()];
  }

  get size(): number {
    return this.plugins.size;
  }
}

export function createPluginRegistry(plugins: readonly DecoderPlugin[] = []): PluginRegistry {
  const registry = new PluginRegistry();
  for (const plugin of plugins) registry.register(plugin);
  return registry;
}

/** Process-wide registry. Register at startup, before the first decoder is built. */
export const pluginRegistry = createPluginRegistry();
