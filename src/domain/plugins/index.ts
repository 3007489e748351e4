export {
  PLUGIN_STAGES,
  createCacheKey,
  type CacheKey,
  type DecoderPlugin,
  type ParsingCache,
  type PluginStage,
} from './types.js';
export {
  CEF_CACHE_KEY,
  JSON_CACHE_KEY,
  KV_CACHE_KEY,
  LEEF1_CACHE_KEY,
  LEEF2_CACHE_KEY,
} from './cache-keys.js';
export { createStructuredDataPlugin } from './structured-data.js';
export { createFortiGatePlugin } from './fortinet-fortigate.js';
export { createCefPlugin } from './generic-cef.js';
export { createLeef1Plugin, createLeef2Plugin } from './generic-leef.js';
export { createJsonPlugin } from './generic-json.js';
export { createGenericKvPlugin } from './generic-kv.js';
