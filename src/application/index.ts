export { MessageParsingCache, createParsingCache } from './parsing-cache.js';
export { PluginRegistry, createPluginRegistry, pluginRegistry } from './plugin-registry.js';
export { MessageDecoder } from './decoder.js';
export type { DecodeFormat, DecodeResult, MessageDecoderOptions } from './decoder.js';
