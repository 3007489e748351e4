export type {
  CanonicalRecord,
  DecodeDiagnostic,
  DiagnosticKind,
  EventData,
  EventDataValue,
  HandlerEntry,
  RecordHeader,
  RecordVariant,
  StructureClassification,
  StructuredDataElement,
  StructuredDataParam,
} from './record.js';
export {
  RECORD_VARIANTS,
  createRecord,
  freezeRecord,
  satisfiedVariants,
  satisfiesVariant,
} from './record.js';
export {
  FACILITY_NAMES,
  MAX_PRIORITY,
  SEVERITY_NAMES,
  decodePriority,
  encodePriority,
  facilityName,
  severityName,
} from './priority.js';
export type { FacilityName, Priority, SeverityName } from './priority.js';
export {
  applyEventData,
  applyFieldMapping,
  mergeEventData,
  recordHandler,
} from './field-mapping.js';
export type { FieldMappingResult } from './field-mapping.js';
export * from './grammars/index.js';
export * from './parsers/index.js';
export * from './plugins/index.js';
