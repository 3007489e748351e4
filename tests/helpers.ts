import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createParsingCache } from '../src/application/parsing-cache.js';
import {
  createRecord,
  type CanonicalRecord,
  type ClockContext,
  type DecoderPlugin,
  type ParsingCache,
  type PluginStage,
  type RecordHeader,
  type RecordVariant,
} from '../src/domain/index.js';

/** Fixed reference time: 2026-02-18T12:00:00Z. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

export const UTC_CLOCK: ClockContext = { referenceTime: FIXED_NOW, utcOffsetMinutes: 0 };

/** Record with sensible defaults; override the variant, message or header. */
export function makeRecord(
  message: string,
  variant: RecordVariant = 'rfc3164',
  header: RecordHeader = {},
): CanonicalRecord {
  return createRecord(variant, message, header);
}

export function makeCache(): ParsingCache {
  return createParsingCache();
}

/** pino-shaped logger whose methods are spies. */
export function makeLogger() {
  const log = {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  };
  return { log, logger: log as unknown as Logger };
}

/** Plugin stub whose tryDecode is supplied by the test. */
export function stubPlugin(
  id: string,
  stage: PluginStage,
  tryDecode: DecoderPlugin['tryDecode'],
  variants: readonly RecordVariant[] = ['envelope'],
): DecoderPlugin {
  return { id, name: id, description: `stub ${id}`, stage, variants, tryDecode };
}
