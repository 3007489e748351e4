import type { CanonicalRecord, RecordVariant } from '../record.js';

/** Plugin stages in execution order. */
export const PLUGIN_STAGES = [
  'FIRST_PASS',
  'SECOND_PASS',
  'UNPROCESSED_STRUCTURED',
  'UNPROCESSED_MESSAGES',
] as const;

export type PluginStage = (typeof PLUGIN_STAGES)[number];

/**
 * Typed identity of one parser's output in a parsing cache.
 *
 * The value slot lives on the key, keyed by cache instance, so a lookup
 * gives back a `T` without any cast.
 */
export interface CacheKey<T> {
  readonly id: string;
  readonly slots: WeakMap<ParsingCache, { readonly value: T }>;
}

export function createCacheKey<T>(id: string): CacheKey<T> {
  return { id, slots: new WeakMap() };
}

/**
 * Per-message memo of parser output, shared by every plugin in one decode.
 *
 * Keys are not content-addressed: one cache only ever sees one message.
 */
export interface ParsingCache {
  /**
   * Return the stored value for `key`, computing it from `rawMessage` on
   * the first call. A stored `null` or `undefined` counts as computed.
   */
  getOrCompute<T>(key: CacheKey<T>, rawMessage: string, compute: (rawMessage: string) => T): T;
  has<T>(key: CacheKey<T>): boolean;
  /** Ids of the computed keys, in computation order. */
  keys(): string[];
  readonly size: number;
}

/**
 * A decoder plugin is one capability: look at a record and, when it
 * recognises the message, enrich the record in place.
 *
 * `tryDecode` returns true only after it has written its contribution.
 * It must not throw for input it does not recognise; a throw is treated
 * as a bug and isolated by the orchestrator.
 */
export interface DecoderPlugin {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly stage: PluginStage;
  /** Record variants this plugin applies to. */
  readonly variants: readonly RecordVariant[];
  tryDecode(record: CanonicalRecord, cache: ParsingCache): boolean;
}
