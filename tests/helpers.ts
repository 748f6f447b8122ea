/**
 * Test helpers: minimal valid source records and scratch directories.
 */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ASI_IDS } from '../src/models/dataset.js';
import type { SourceDefinitions } from '../src/models/dataset.js';
import type { ExportConfig } from '../src/config.js';
import { OUTPUT_FORMATS, VIEW_NAMES } from '../src/models/views.js';

export type RawRecord = Record<string, unknown>;

export const TEST_METADATA: RawRecord = {
  title: 'Test Agentic Top 10',
  version: '0.0.1',
  publisher: 'Test Publisher',
  source_url: 'https://example.com/agentic',
  license: 'CC-BY-SA-4.0',
};

export function minimalEntry(id: string, overrides: RawRecord = {}): RawRecord {
  return {
    id,
    title: `Risk ${id}`,
    description: `Description of ${id}. More detail follows.`,
    related_threats: [],
    related_llm_entries: [],
    aivss_core_risk: 'Test Risk',
    common_examples: [],
    attack_scenarios: [{ name: 'S1', description: '...' }],
    mitigations: ['Do X'],
    references: [],
    ...overrides,
  };
}

export function minimalMapping(entryId: string, overrides: RawRecord = {}): RawRecord {
  return {
    entry_id: entryId,
    llm_top10: ['LLM01:2025'],
    aivss: [],
    nhi_top10: [],
    agentic_threats: [],
    ...overrides,
  };
}

export function minimalIncident(name: string, relatedEntries: string[], overrides: RawRecord = {}): RawRecord {
  return {
    name,
    affected_system: 'Test System',
    date: '2025-01',
    description: `${name} happened.`,
    related_entries: relatedEntries,
    source: 'Test report',
    ...overrides,
  };
}

/** Ten valid entries ASI01..ASI10, one mapping each, one incident. */
export function minimalSource(overrides: Partial<SourceDefinitions> = {}): SourceDefinitions {
  return {
    metadata: TEST_METADATA,
    entries: ASI_IDS.map((id) => minimalEntry(id)),
    mappings: ASI_IDS.map((id) => minimalMapping(id)),
    incidents: [minimalIncident('Test Incident', ['ASI01'])],
    ...overrides,
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'agentic-top10-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(outputDir: string, overrides: Partial<ExportConfig> = {}): ExportConfig {
  return {
    outputDir,
    definitionsDir: path.join(outputDir, 'unused-definitions'),
    views: [...VIEW_NAMES],
    formats: [...OUTPUT_FORMATS],
    logLevel: 'error',
    ...overrides,
  };
}
