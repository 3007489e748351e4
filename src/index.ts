import type { Logger } from 'pino';
import { MessageDecoder, createPluginRegistry, type PluginRegistry } from './application/index.js';
import type { DecoderPlugin } from './domain/index.js';
import {
  createLogger,
  loadDecoderConfig,
  registerBuiltinPlugins,
  type DecoderConfig,
} from './infrastructure/index.js';

export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';

export interface CreateDecoderOptions {
  /** Defaults to `loadDecoderConfig()` over `process.env`. */
  readonly config?: DecoderConfig;
  /** Defaults to a pino logger at `config.logLevel`. */
  readonly log?: Logger;
  /** Registry to fill and freeze. Defaults to a new, private one. */
  readonly registry?: PluginRegistry;
  /** Extra plugins, registered after the built-ins. */
  readonly plugins?: readonly DecoderPlugin[];
  /** Set to false to register only `plugins`. */
  readonly builtins?: boolean;
  readonly nowFn?: () => number;
}

/**
 * Build a ready-to-use decoder: configuration, logger, built-in plugins and
 * any extra plugins, with the registry frozen.
 *
 * @example
 * const decoder = createDecoder();
 * const result = decoder.decode('<34>Oct 11 22:14:15 mymachine su: su root failed');
 */
export function createDecoder(options: CreateDecoderOptions = {}): MessageDecoder {
  const config = options.config ?? loadDecoderConfig();
  const log = options.log ?? createLogger(config);
  const registry = options.registry ?? createPluginRegistry();

  if (options.builtins !== false) {
    registerBuiltinPlugins(registry, { disabled: config.disabledPlugins });
  }
  for (const plugin of options.plugins ?? []) {
    registry.register(plugin);
  }

  log.debug({ plugins: registry.list().map((plugin) => plugin.id) }, 'Decoder plugins registered');

  return new MessageDecoder({
    registry,
    log,
    utcOffsetMinutes: config.utcOffsetMinutes,
    messageSampleLength: config.messageSampleLength,
    nowFn: options.nowFn,
  });
}
