/**
 * Dataset Builder
 *
 * Turns raw source definitions into the immutable in-memory dataset. Every
 * record is shape-checked as it is built; cross-record rules are left to the
 * validator.
 */
import type { z } from 'zod';
import { MalformedRecordError } from '../models/errors.js';
import type { MalformedRecord } from '../models/errors.js';
import { describeIssues, entrySchema, incidentSchema, mappingSchema, metadataSchema } from '../models/schema.js';
import type { Dataset, SourceDefinitions } from '../models/dataset.js';
import { log } from '../utils/log.js';
import type { Logger } from '../utils/log.js';

function labelFor(collection: string, index: number, raw: unknown): string {
  if (typeof raw === 'object' && raw !== null) {
    const key = 'id' in raw ? raw.id : 'entry_id' in raw ? raw.entry_id : 'name' in raw ? raw.name : undefined;
    if (typeof key === 'string' && key.length > 0) {
      return `${collection}[${index}] (${key})`;
    }
  }
  return `${collection}[${index}]`;
}

// Failed records are appended to `failures` instead of thrown, so one pass
// reports every malformed record.
function buildRecord<T>(schema: z.ZodType<T>, raw: unknown, label: string, failures: MalformedRecord[]): T | undefined {
  const result = schema.safeParse(raw);
  if (!result.success) {
    failures.push({ record: label, issues: describeIssues(result.error) });
    return undefined;
  }
  return result.data;
}

function buildCollection<T>(
  schema: z.ZodType<T>,
  collection: string,
  raws: readonly unknown[],
  failures: MalformedRecord[],
): T[] {
  const built: T[] = [];
  raws.forEach((raw, index) => {
    const record = buildRecord(schema, raw, labelFor(collection, index, raw), failures);
    if (record !== undefined) built.push(record);
  });
  return built;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build the dataset once per run. Every record is checked before anything is
 * thrown; a single MalformedRecordError then lists each record whose required
 * fields are missing or mistyped.
 */
export function buildDataset(source: SourceDefinitions, logger: Logger = log): Dataset {
  const failures: MalformedRecord[] = [];
  const metadata = buildRecord(metadataSchema, source.metadata, 'metadata', failures);
  const entries = buildCollection(entrySchema, 'entries', source.entries, failures);
  const mappings = buildCollection(mappingSchema, 'mappings', source.mappings, failures);
  const incidents = buildCollection(incidentSchema, 'incidents', source.incidents, failures);

  if (metadata === undefined || failures.length > 0) {
    throw new MalformedRecordError(failures);
  }

  const dataset: Dataset = { metadata, entries, mappings, incidents };
  logger(
    `Built dataset: ${entries.length} entries, ${mappings.length} mappings, ${incidents.length} incidents`,
    'builder',
    'debug',
  );
  return deepFreeze(dataset);
}
