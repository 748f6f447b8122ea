/**
 * Error taxonomy shared by every stage of the export pipeline.
 */

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  malformedRecord: 2,
  validation: 3,
  serialization: 4,
  write: 5,
  usage: 64,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type ViolationCode =
  | 'entry_count'
  | 'entry_id_format'
  | 'entry_id_missing'
  | 'entry_id_duplicate'
  | 'entry_self_reference'
  | 'mitigations_empty'
  | 'attack_scenarios_empty'
  | 'attack_scenario_duplicate'
  | 'mapping_unknown_entry'
  | 'mapping_empty'
  | 'incident_unknown_entry';

export interface Violation {
  code: ViolationCode;
  subject: string; // e.g. "mappings[2] (ASI99)" or "incidents[0] (EchoLeak)"
  message: string;
  reference?: string; // the offending id, where there is one
}

export class DatasetExportError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = EXIT_CODES.unexpected, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DatasetExportError';
    this.exitCode = exitCode;
  }
}

export interface MalformedRecord {
  record: string; // e.g. "entries[3] (ASI04)" or "metadata.json"
  issues: readonly string[];
}

/** One or more source records are missing a required field or have the wrong type. */
export class MalformedRecordError extends DatasetExportError {
  readonly records: readonly MalformedRecord[];

  constructor(records: readonly MalformedRecord[]) {
    super(describeMalformed(records), EXIT_CODES.malformedRecord);
    this.name = 'MalformedRecordError';
    this.records = records;
  }
}

function describeMalformed(records: readonly MalformedRecord[]): string {
  if (records.length === 1) {
    return `Malformed record ${records[0].record}: ${records[0].issues.join('; ')}`;
  }
  return (
    `${records.length} malformed records:\n` +
    records.map((r) => `  - ${r.record}: ${r.issues.join('; ')}`).join('\n')
  );
}

export class ValidationError extends DatasetExportError {
  readonly violations: readonly Violation[];

  constructor(violations: readonly Violation[]) {
    const noun = violations.length === 1 ? 'violation' : 'violations';
    super(
      `Dataset failed validation with ${violations.length} ${noun}:\n` +
        violations.map((v) => `  - [${v.code}] ${v.subject}: ${v.message}`).join('\n'),
      EXIT_CODES.validation,
    );
    this.name = 'ValidationError';
    this.violations = violations;
  }
}

export class SerializationError extends DatasetExportError {
  readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super(`Cannot serialize value at ${path}: ${reason}`, EXIT_CODES.serialization, options);
    this.name = 'SerializationError';
    this.path = path;
  }
}

export class IOWriteError extends DatasetExportError {
  readonly path: string;
  readonly written: readonly string[];

  constructor(path: string, reason: string, written: readonly string[] = [], options?: ErrorOptions) {
    super(`Failed to write ${path}: ${reason}`, EXIT_CODES.write, options);
    this.name = 'IOWriteError';
    this.path = path;
    this.written = written;
  }
}

export class ConfigError extends DatasetExportError {
  constructor(message: string) {
    super(message, EXIT_CODES.usage);
    this.name = 'ConfigError';
  }
}

export class EntryNotFoundError extends DatasetExportError {
  readonly entryId: string;

  constructor(entryId: string) {
    super(`Entry not found: ${entryId}`);
    this.name = 'EntryNotFoundError';
    this.entryId = entryId;
  }
}

export class UnknownComponentError extends DatasetExportError {
  readonly componentType: string;

  constructor(componentType: string, validTypes: readonly string[]) {
    super(`Unknown component type: '${componentType}'. Valid types: ${validTypes.join(', ')}`);
    this.name = 'UnknownComponentError';
    this.componentType = componentType;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
