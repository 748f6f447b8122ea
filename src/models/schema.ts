import { z } from 'zod';
import type { DatasetMetadata, Entry, Incident, Mapping } from './dataset.js';

const text = z.string().min(1);

export const attackScenarioSchema = z.object({
  name: text,
  description: text,
});

export const referenceSchema = z.object({
  title: text,
  url: z.string().url(),
});

// Shape only. Id format, cardinality and cross-record rules belong to the validator.
export const entrySchema: z.ZodType<Entry> = z.object({
  id: text,
  title: text,
  description: text,
  related_threats: z.array(text),
  related_llm_entries: z.array(text),
  aivss_core_risk: text,
  common_examples: z.array(text),
  attack_scenarios: z.array(attackScenarioSchema),
  mitigations: z.array(text),
  references: z.array(referenceSchema),
});

export const mappingSchema: z.ZodType<Mapping> = z.object({
  entry_id: text,
  llm_top10: z.array(text),
  aivss: z.array(text),
  nhi_top10: z.array(text),
  agentic_threats: z.array(text),
});

export const incidentSchema: z.ZodType<Incident> = z.object({
  name: text,
  affected_system: text,
  date: text,
  description: text,
  related_entries: z.array(text),
  source: text,
});

export const metadataSchema: z.ZodType<DatasetMetadata> = z.object({
  title: text,
  version: text,
  publisher: text,
  source_url: z.string().url(),
  license: text,
});

// Shapes of previously exported views, used when reading them back.
export const fullViewSchema = z.object({
  metadata: metadataSchema,
  entries: z.array(entrySchema),
  mappings: z.array(mappingSchema),
  incidents: z.array(incidentSchema),
});

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export const entriesViewSchema = z.object({
  entries: z.array(entrySchema),
});

export const mappingsViewSchema = z.object({
  mappings: z.array(mappingSchema),
});
