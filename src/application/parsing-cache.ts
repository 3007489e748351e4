import type { CacheKey, ParsingCache } from '../domain/index.js';

/**
 * Parsing cache for a single decode call.
 *
 * The orchestrator creates one per message and drops it when the decode
 * returns, so entries never outlive the text they were computed from.
 */
export class MessageParsingCache implements ParsingCache {
  private readonly computed: string[] = [];

  getOrCompute<T>(key: CacheKey<T>, rawMessage: string, compute: (rawMessage: string) => T): T {
    const slot = key.slots.get(this);
    if (slot) return slot.value;

    const value = compute(rawMessage);
    key.slots.set(this, { value });
    this.computed.push(key.id);
    return value;
  }

  has<T>(key: CacheKey<T>): boolean {
    return key.slots.has(this);
  }

  keys(): string[] {
    return [...this.computed];
  }

  get size(): number {
    return this.computed.length;
  }
}

export function createParsingCache(): ParsingCache {
  return new MessageParsingCache();
}
