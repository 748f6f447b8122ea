/**
 * Dataset queries for consumers of the exported files: entry lookup,
 * component threat analysis, framework mappings and incident tracking.
 */
import fs from 'node:fs';
import type { z } from 'zod';
import { EntryNotFoundError, MalformedRecordError, UnknownComponentError, errorMessage } from '../models/errors.js';
import { ASI_IDS } from '../models/dataset.js';
import type { AsiId, AttackScenario, Dataset, Entry, Incident, Mapping } from '../models/dataset.js';
import { describeIssues, entriesViewSchema, fullViewSchema, mappingsViewSchema } from '../models/schema.js';
import { deepFreeze } from './dataset-builder.js';

// Architecture component types and the entries that threaten them.
export const COMPONENT_THREAT_MAP = {
  llm_agent: ['ASI01', 'ASI05', 'ASI06', 'ASI10'],
  tool_integration: ['ASI02', 'ASI04'],
  multi_agent: ['ASI07', 'ASI08'],
  user_interface: ['ASI09'],
  identity_system: ['ASI03'],
  memory_store: ['ASI06'],
  code_executor: ['ASI05'],
  orchestrator: ['ASI01', 'ASI08', 'ASI10'],
  external_api: ['ASI02', 'ASI04'],
  communication_layer: ['ASI07'],
  supply_chain: ['ASI04'],
  rag_system: ['ASI01', 'ASI06'],
} as const satisfies Record<string, readonly AsiId[]>;

export type ComponentType = keyof typeof COMPONENT_THREAT_MAP;

export interface NhiMapping {
  entry_id: string;
  nhi_top10: readonly string[];
}

function isComponentType(value: string): value is ComponentType {
  return Object.hasOwn(COMPONENT_THREAT_MAP, value);
}

function readViewFile<T>(filePath: string, schema: z.ZodType<T>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err: unknown) {
    throw new MalformedRecordError([{ record: filePath, issues: [errorMessage(err)] }]);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError([{ record: filePath, issues: describeIssues(parsed.error) }]);
  }
  return deepFreeze(parsed.data);
}

/** Read an exported full view back into a frozen dataset. */
export function loadDataset(filePath: string): Dataset {
  return readViewFile(filePath, fullViewSchema);
}

/** Read the entries from an exported entries (or full) view. */
export function loadEntries(filePath: string): readonly Entry[] {
  return readViewFile(filePath, entriesViewSchema).entries;
}

/** Read the mappings from an exported mappings (or full) view. */
export function loadMappings(filePath: string): readonly Mapping[] {
  return readViewFile(filePath, mappingsViewSchema).mappings;
}

export function getEntry(dataset: Dataset, id: string): Entry | undefined {
  const wanted = id.toUpperCase();
  return dataset.entries.find((entry) => entry.id === wanted);
}

function requireEntry(dataset: Dataset, id: string): Entry {
  const entry = getEntry(dataset, id);
  if (!entry) {
    throw new EntryNotFoundError(id);
  }
  return entry;
}

/** Case-insensitive partial match on the title; first match wins. */
export function getEntryByTitle(dataset: Dataset, title: string): Entry | undefined {
  const needle = title.toLowerCase();
  return dataset.entries.find((entry) => entry.title.toLowerCase().includes(needle));
}

export function listEntryIds(): string[] {
  return [...ASI_IDS];
}

export function listEntryTitles(dataset: Dataset): Record<string, string> {
  return Object.fromEntries(dataset.entries.map((entry) => [entry.id, entry.title]));
}

export function getThreatsForComponent(dataset: Dataset, componentType: string): Entry[] {
  const key = componentType.toLowerCase();
  if (!isComponentType(key)) {
    throw new UnknownComponentError(componentType, Object.keys(COMPONENT_THREAT_MAP).sort());
  }
  const relevant: readonly string[] = COMPONENT_THREAT_MAP[key];
  return dataset.entries.filter((entry) => relevant.includes(entry.id));
}

export function getMitigations(dataset: Dataset, id: string): readonly string[] {
  return requireEntry(dataset, id).mitigations;
}

export function getAttackScenarios(dataset: Dataset, id: string): readonly AttackScenario[] {
  return requireEntry(dataset, id).attack_scenarios;
}

export function getRelatedLlmEntries(dataset: Dataset, id: string): readonly string[] {
  return requireEntry(dataset, id).related_llm_entries;
}

export function getAsiToLlmMapping(dataset: Dataset): Record<string, readonly string[]> {
  return Object.fromEntries(dataset.entries.map((entry) => [entry.id, entry.related_llm_entries]));
}

export function getNhiMappings(dataset: Dataset): NhiMapping[] {
  return dataset.mappings
    .filter((mapping) => mapping.nhi_top10.length > 0)
    .map((mapping) => ({ entry_id: mapping.entry_id, nhi_top10: mapping.nhi_top10 }));
}

export function getIncidents(dataset: Dataset): readonly Incident[] {
  return dataset.incidents;
}

export function getIncidentsByAsi(dataset: Dataset, id: string): Incident[] {
  const wanted = id.toUpperCase();
  return dataset.incidents.filter((incident) => incident.related_entries.includes(wanted));
}
