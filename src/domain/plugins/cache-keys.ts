import { parseCef, type CefMessage } from '../parsers/cef.js';
import { parseJsonObject } from '../parsers/json.js';
import { parseKeyValue, type KeyValuePairs } from '../parsers/kv.js';
import { parseLeef1, parseLeef2, type LeefMessage } from '../parsers/leef.js';
import type { EventData } from '../record.js';
import { createCacheKey, type CacheKey, type ParsingCache } from './types.js';

// Plugins that read the same parser output share one of these keys.
export const KV_CACHE_KEY: CacheKey<KeyValuePairs | null> = createCacheKey('kv');
export const CEF_CACHE_KEY: CacheKey<CefMessage | null> = createCacheKey('cef');
export const LEEF1_CACHE_KEY: CacheKey<LeefMessage | null> = createCacheKey('leef1');
export const LEEF2_CACHE_KEY: CacheKey<LeefMessage | null> = createCacheKey('leef2');
export const JSON_CACHE_KEY: CacheKey<EventData | null> = createCacheKey('json');

export function cachedKeyValue(cache: ParsingCache, message: string): KeyValuePairs | null {
  return cache.getOrCompute(KV_CACHE_KEY, message, parseKeyValue);
}

export function cachedCef(cache: ParsingCache, message: string): CefMessage | null {
  return cache.getOrCompute(CEF_CACHE_KEY, message, parseCef);
}

export function cachedLeef1(cache: ParsingCache, message: string): LeefMessage | null {
  return cache.getOrCompute(LEEF1_CACHE_KEY, message, parseLeef1);
}

export function cachedLeef2(cache: ParsingCache, message: string): LeefMessage | null {
  return cache.getOrCompute(LEEF2_CACHE_KEY, message, parseLeef2);
}

export function cachedJson(cache: ParsingCache, message: string): EventData | null {
  return cache.getOrCompute(JSON_CACHE_KEY, message, parseJsonObject);
}
