import type {
  CanonicalRecord,
  EventData,
  EventDataValue,
  StructureClassification,
} from './record.js';

/**
 * Outcome of merging one plugin's fields into a record.
 *
 * `collisions` lists names that were already present and kept their
 * earlier value.
 */
export interface FieldMappingResult {
  readonly inserted: number;
  readonly collisions: readonly string[];
  readonly classificationConflict: boolean;
}

function sameClassification(a: StructureClassification, b: StructureClassification): boolean {
  return a.vendor === b.vendor && a.product === b.product && a.msgclass === b.msgclass;
}

function describe(classification: StructureClassification): string {
  return `${classification.vendor}/${classification.product}/${classification.msgclass}`;
}

/**
 * Set the classification if unset. Returns true when a different one was
 * already in place; the existing one is kept.
 */
function assignClassification(
  record: CanonicalRecord,
  classification: StructureClassification,
  handlerId: string | undefined,
): boolean {
  const current = record.structure_classification;
  if (current === null) {
    record.structure_classification = { ...classification };
    return false;
  }
  if (sameClassification(current, classification)) return false;

  record.diagnostics.push({
    kind: 'classification_conflict',
    message: `Keeping classification ${describe(current)} over ${describe(classification)}`,
    ...(handlerId === undefined ? {} : { subject: handlerId }),
  });
  return true;
}

/**
 * Insert name/value pairs into `event_data`, first writer wins.
 * Does not touch the classification or the handler trace.
 */
export function mergeEventData(
  record: CanonicalRecord,
  fieldNames: readonly string[],
  fieldValues: readonly EventDataValue[],
): Pick<FieldMappingResult, 'inserted' | 'collisions'> {
  if (fieldNames.length !== fieldValues.length) {
    throw new Error(
      `Field mapping length mismatch: ${fieldNames.length} names, ${fieldValues.length} values`,
    );
  }

  let inserted = 0;
  const collisions: string[] = [];
  fieldNames.forEach((name, index) => {
    const value = fieldValues[index];
    if (value === undefined) return;

    if (Object.hasOwn(record.event_data, name)) {
      collisions.push(name);
      record.diagnostics.push({
        kind: 'field_collision',
        message: `Field "${name}" is already set; keeping the first value`,
        subject: name,
      });
      return;
    }

    // defineProperty so that a "__proto__" field stays a plain key
    Object.defineProperty(record.event_data, name, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
    inserted++;
  });

  return { inserted, collisions };
}

/** Record that `handlerId` matched, with the fields it offered. */
export function recordHandler(
  record: CanonicalRecord,
  handlerId: string,
  classification: StructureClassification,
  fieldNames: readonly string[],
): void {
  record.handler_data[handlerId] = { ...classification, fields: [...fieldNames] };
}

/**
 * Merge a plugin's extracted fields into the record and claim the
 * classification.
 *
 * Zero-length inputs leave `event_data` alone but still set the
 * classification and the handler trace: the plugin did recognise the
 * format.
 *
 * @throws when the name and value lists differ in length
 */
export function applyFieldMapping(
  record: CanonicalRecord,
  fieldNames: readonly string[],
  fieldValues: readonly EventDataValue[],
  classification: StructureClassification,
  handlerId?: string,
): FieldMappingResult {
  if (fieldNames.length !== fieldValues.length) {
    throw new Error(
      `Field mapping length mismatch: ${fieldNames.length} names, ${fieldValues.length} values`,
    );
  }

  const classificationConflict = assignClassification(record, classification, handlerId);
  const { inserted, collisions } = mergeEventData(record, fieldNames, fieldValues);
  if (handlerId !== undefined) recordHandler(record, handlerId, classification, fieldNames);

  return { inserted, collisions, classificationConflict };
}

/** `applyFieldMapping` over an object's own entries, in insertion order. */
export function applyEventData(
  record: CanonicalRecord,
  data: EventData,
  classification: StructureClassification,
  handlerId?: string,
): FieldMappingResult {
  return applyFieldMapping(record, Object.keys(data), Object.values(data), classification, handlerId);
}
