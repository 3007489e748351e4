/**
 * Canonical event record.
 *
 * Every grammar produces one of these and every plugin enriches it in
 * place. A record belongs to exactly one decode call; the orchestrator
 * freezes it before handing it to the caller.
 */

/**
 * Record variants plugins can declare applicability against.
 *
 * `rfc3164` and `rfc5424` are both syslog records, so they also satisfy
 * `syslog_base`. Every variant satisfies `envelope`.
 */
export type RecordVariant = 'envelope' | 'syslog_base' | 'rfc3164' | 'rfc5424';

export const RECORD_VARIANTS: readonly RecordVariant[] = ['envelope', 'syslog_base', 'rfc3164', 'rfc5424'];

/** JSON-compatible value stored in `event_data`. */
export type EventDataValue =
  | string
  | number
  | boolean
  | null
  | EventDataValue[]
  | { [key: string]: EventDataValue };

export type EventData = Record<string, EventDataValue>;

export interface StructuredDataParam {
  readonly name: string;
  readonly value: string;
}

/** One RFC5424 SD-ELEMENT. Params keep wire order, repeated names included. */
export interface StructuredDataElement {
  readonly id: string;
  readonly params: readonly StructuredDataParam[];
}

/** Which format family most specifically matched a message. */
export interface StructureClassification {
  readonly vendor: string;
  readonly product: string;
  readonly msgclass: string;
}

/** Trace entry left by every plugin that matched. */
export interface HandlerEntry extends StructureClassification {
  readonly fields: readonly string[];
}

export type DiagnosticKind =
  | 'invalid_pri'
  | 'invalid_timestamp'
  | 'structured_data_element'
  | 'field_collision'
  | 'classification_conflict'
  | 'plugin_error';

/** Non-fatal finding recorded while decoding. */
export interface DecodeDiagnostic {
  readonly kind: DiagnosticKind;
  readonly message: string;
  /** Plugin id, field name or SD-ID the finding is about. */
  readonly subject?: string;
}

export interface CanonicalRecord {
  variant: RecordVariant;
  timestamp: Date | null;
  facility: number | null;
  severity: number | null;
  hostname: string | null;
  app_name: string | null;
  proc_id: string | null;
  msg_id: string | null;
  structured_data: StructuredDataElement[];
  message: string;
  structure_classification: StructureClassification | null;
  event_data: EventData;
  handler_data: Record<string, HandlerEntry>;
  diagnostics: DecodeDiagnostic[];
}

/** Header fields a grammar may fill in. */
export type RecordHeader = Partial<
  Pick<
    CanonicalRecord,
    | 'timestamp'
    | 'facility'
    | 'severity'
    | 'hostname'
    | 'app_name'
    | 'proc_id'
    | 'msg_id'
    | 'structured_data'
    | 'diagnostics'
  >
>;

/** Build a fresh record. Absent header fields default to null, never to zero or "now". */
export function createRecord(
  variant: RecordVariant,
  message: string,
  header: RecordHeader = {},
): CanonicalRecord {
  return {
    variant,
    timestamp: header.timestamp ?? null,
    facility: header.facility ?? null,
    severity: header.severity ?? null,
    hostname: header.hostname ?? null,
    app_name: header.app_name ?? null,
    proc_id: header.proc_id ?? null,
    msg_id: header.msg_id ?? null,
    structured_data: header.structured_data ?? [],
    message,
    structure_classification: null,
    event_data: {},
    handler_data: {},
    diagnostics: header.diagnostics ?? [],
  };
}

const VARIANT_PARENTS: Record<RecordVariant, readonly RecordVariant[]> = {
  envelope: ['envelope'],
  syslog_base: ['syslog_base', 'envelope'],
  rfc3164: ['rfc3164', 'syslog_base', 'envelope'],
  rfc5424: ['rfc5424', 'syslog_base', 'envelope'],
};

/** Variants a record of `variant` satisfies, most specific first. */
export function satisfiedVariants(variant: RecordVariant): readonly RecordVariant[] {
  return VARIANT_PARENTS[variant];
}

export function satisfiesVariant(variant: RecordVariant, required: RecordVariant): boolean {
  return VARIANT_PARENTS[variant].includes(required);
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  // setTime() still works on a frozen Date
  if (value instanceof Date) return;
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
}

/** Freeze a finished record so adapters cannot mutate it after hand-off. */
export function freezeRecord(record: CanonicalRecord): Readonly<CanonicalRecord> {
  deepFreeze(record);
  return record;
}
