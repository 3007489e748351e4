import type { Logger } from 'pino';
import {
  PLUGIN_STAGES,
  createRecord,
  extractPri,
  freezeRecord,
  parseRfc3164,
  parseRfc5424,
  parseRfcBase,
  type CanonicalRecord,
  type ClockContext,
  type GrammarResult,
  type ParsedMessage,
  type ParseFailure,
  type ParsingCache,
  type RecordVariant,
} from '../domain/index.js';
import { createParsingCache } from './parsing-cache.js';
import type { PluginRegistry } from './plugin-registry.js';

export type DecodeFormat = 'auto' | 'rfc5424' | 'rfc3164' | 'rfc_base';

/**
 * Result of decoding one message.
 *
 * `ok === false` only when an explicitly requested grammar cannot parse the
 * text at all; `auto` always produces a record.
 */
export type DecodeResult =
  | { readonly ok: true; readonly record: Readonly<CanonicalRecord> }
  | { readonly ok: false; readonly failure: ParseFailure };

type GrammarSelection =
  | { readonly ok: true; readonly variant: RecordVariant; readonly parsed: ParsedMessage }
  | { readonly ok: false; readonly failure: ParseFailure };

export interface MessageDecoderOptions {
  readonly registry: PluginRegistry;
  readonly log: Logger;
  /** Reference clock for timestamps without a year. */
  readonly nowFn?: () => number;
  /** UTC offset assumed for timestamps without a zone. */
  readonly utcOffsetMinutes?: number;
  /** Raw text longer than this is truncated in log lines. */
  readonly messageSampleLength?: number;
}

const DEFAULT_SAMPLE_LENGTH = 100;

/**
 * MessageDecoder: runs a grammar over raw text, then the staged plugin
 * chain over the resulting record.
 *
 * Every plugin applicable to the record is attempted in stage order; a
 * match never ends the chain. A plugin that throws is logged, recorded as
 * a `plugin_error` diagnostic and otherwise treated as "no match".
 *
 * Holds no per-message state: each `decode()` gets its own record and
 * parsing cache.
 */
export class MessageDecoder {
  private readonly registry: PluginRegistry;
  private readonly log: Logger;
  private readonly nowFn: () => number;
  private readonly utcOffsetMinutes: number;
  private readonly sampleLength: number;

  constructor(options: MessageDecoderOptions) {
    this.registry = options.registry;
    this.log = options.log;
    this.nowFn = options.nowFn ?? Date.now;
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? 0;
    this.sampleLength = options.messageSampleLength ?? DEFAULT_SAMPLE_LENGTH;

    // no registrations once decoding can start
    this.registry.freeze();
  }

  decode(raw: string, format: DecodeFormat = 'auto'): DecodeResult {
    const selection = this.selectGrammar(raw, format);
    if (!selection.ok) {
      this.log.debug(
        { failure: selection.failure, sample: this.sample(raw) },
        'Grammar rejected message',
      );
      return selection;
    }

    const { variant, parsed } = selection;
    this.log.debug({ format, variant }, 'Grammar selected');

    const record = createRecord(variant, parsed.message, parsed.header);
    this.runPlugins(record, createParsingCache(), raw);
    return { ok: true, record: freezeRecord(record) };
  }

  private clock(): ClockContext {
    return { referenceTime: this.nowFn(), utcOffsetMinutes: this.utcOffsetMinutes };
  }

  private selectGrammar(raw: string, format: DecodeFormat): GrammarSelection {
    switch (format) {
      case 'rfc5424':
        return this.tagged(parseRfc5424(raw), 'rfc5424');
      case 'rfc3164':
        return this.tagged(parseRfc3164(raw, this.clock()), 'rfc3164');
      case 'rfc_base':
        return this.tagged(parseRfcBase(raw), 'syslog_base');
      case 'auto':
        return this.autoDetect(raw);
    }
  }

  private tagged(result: GrammarResult, variant: RecordVariant): GrammarSelection {
    return result.ok ? { ok: true, variant, parsed: result.value } : result;
  }

  /**
   * RFC5424 first, then the tolerant RFC3164 grammar. The variant reflects
   * how much header the RFC3164 pass actually found.
   */
  private autoDetect(raw: string): GrammarSelection {
    const rfc5424 = parseRfc5424(raw);
    if (rfc5424.ok) return { ok: true, variant: 'rfc5424', parsed: rfc5424.value };

    const rfc3164 = parseRfc3164(raw, this.clock());
    if (!rfc3164.ok) {
      return { ok: true, variant: 'envelope', parsed: { header: {}, message: raw } };
    }

    const { header } = rfc3164.value;
    let variant: RecordVariant = 'envelope';
    if ((header.timestamp ?? null) !== null || (header.app_name ?? null) !== null) {
      variant = 'rfc3164';
    } else if (extractPri(raw).kind !== 'absent') {
      variant = 'syslog_base';
    }
    return { ok: true, variant, parsed: rfc3164.value };
  }

  private runPlugins(record: CanonicalRecord, cache: ParsingCache, raw: string): void {
    for (const stage of PLUGIN_STAGES) {
      for (const plugin of this.registry.pluginsFor(record.variant, stage)) {
        const diagnosticsBefore = record.diagnostics.length;

        let matched: boolean;
        try {
          matched = plugin.tryDecode(record, cache);
        } catch (err: unknown) {
          this.log.warn(
            { err, plugin: plugin.id, stage, sample: this.sample(raw) },
            'Plugin failed',
          );
          record.diagnostics.push({
            kind: 'plugin_error',
            message: err instanceof Error ? err.message : String(err),
            subject: plugin.id,
          });
          continue;
        }

        if (matched) {
          this.log.debug({ plugin: plugin.id, stage }, 'Plugin matched');
        }
        for (const diagnostic of record.diagnostics.slice(diagnosticsBefore)) {
          if (diagnostic.kind === 'field_collision' || diagnostic.kind === 'classification_conflict') {
            this.log.debug({ plugin: plugin.id, diagnostic }, 'Plugin output conflicted');
          }
        }
      }
    }
  }

  private sample(raw: string): string {
    return raw.length > this.sampleLength ? raw.slice(0, this.sampleLength) : raw;
  }
}
