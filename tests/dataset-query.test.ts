/**
 * Dataset queries
 *
 * Lookups, component threat analysis, framework mappings and incidents over
 * the curated dataset.
 */
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { buildDataset } from '../src/services/dataset-builder.js';
import { loadSourceDefinitions } from '../src/services/source-definitions.js';
import { serializeView } from '../src/services/serializer.js';
import { projectView } from '../src/services/view-projector.js';
import { writeOutput } from '../src/services/writer.js';
import * as query from '../src/services/dataset-query.js';
import { ASI_IDS } from '../src/models/dataset.js';
import { EntryNotFoundError, MalformedRecordError, UnknownComponentError } from '../src/models/errors.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('Dataset queries', () => {
  const dataset = buildDataset(loadSourceDefinitions());

  // ─── Entry lookup ────────────────────────────────────────────

  it('finds an entry by id, ignoring case', () => {
    expect(query.getEntry(dataset, 'asi01')?.title).toBe('Agent Goal Hijack');
    expect(query.getEntry(dataset, 'ASI42')).toBeUndefined();
  });

  it('finds an entry by partial title', () => {
    expect(query.getEntryByTitle(dataset, 'goal hijack')?.id).toBe('ASI01');
    expect(query.getEntryByTitle(dataset, 'cascading')?.id).toBe('ASI08');
    expect(query.getEntryByTitle(dataset, 'quantum')).toBeUndefined();
  });

  it('lists ids as a fresh array and titles by id', () => {
    const ids = query.listEntryIds();
    ids.pop();

    expect(query.listEntryIds()).toEqual([...ASI_IDS]);
    expect(query.listEntryTitles(dataset).ASI05).toBe('Unexpected Code Execution (RCE)');
  });

  // ─── Component threats ───────────────────────────────────────

  it('returns the entries threatening a component type', () => {
    const ids = query.getThreatsForComponent(dataset, 'llm_agent').map((e) => e.id);

    expect(ids).toEqual(['ASI01', 'ASI05', 'ASI06', 'ASI10']);
    expect(query.getThreatsForComponent(dataset, 'RAG_SYSTEM').map((e) => e.id)).toEqual(['ASI01', 'ASI06']);
  });

  it('rejects an unknown component type and lists the valid ones', () => {
    expect(() => query.getThreatsForComponent(dataset, 'toaster')).toThrow(UnknownComponentError);
    expect(() => query.getThreatsForComponent(dataset, 'toaster')).toThrow(
      "Unknown component type: 'toaster'. Valid types: code_executor, communication_layer, external_api, " +
        'identity_system, llm_agent, memory_store, multi_agent, orchestrator, rag_system, supply_chain, ' +
        'tool_integration, user_interface',
    );
  });

  it('maps components only to known entry ids', () => {
    for (const ids of Object.values(query.COMPONENT_THREAT_MAP)) {
      for (const id of ids) {
        expect(query.getEntry(dataset, id)).toBeDefined();
      }
    }
  });

  // ─── Entry details ───────────────────────────────────────────

  it('returns mitigations, attack scenarios and related LLM entries', () => {
    expect(query.getMitigations(dataset, 'ASI01')).toHaveLength(4);
    expect(query.getAttackScenarios(dataset, 'asi02').map((s) => s.name)).toEqual([
      'Repository exfiltration via issue tracker',
      'Runaway cloud provisioning',
    ]);
    expect(query.getRelatedLlmEntries(dataset, 'ASI01')).toEqual([
      'LLM01:2025 Prompt Injection',
      'LLM06:2025 Excessive Agency',
    ]);
  });

  it('throws EntryNotFoundError for unknown ids', () => {
    expect(() => query.getMitigations(dataset, 'ASI99')).toThrow(EntryNotFoundError);
    expect(() => query.getRelatedLlmEntries(dataset, 'ASI99')).toThrow('Entry not found: ASI99');
  });

  // ─── Framework mappings and incidents ────────────────────────

  it('builds the ASI to LLM Top 10 mapping', () => {
    const mapping = query.getAsiToLlmMapping(dataset);

    expect(Object.keys(mapping)).toEqual([...ASI_IDS]);
    expect(mapping.ASI04).toEqual(['LLM03:2025 Supply Chain', 'LLM04:2025 Data and Model Poisoning']);
  });

  it('lists NHI Top 10 mappings for entries that have them', () => {
    const nhi = query.getNhiMappings(dataset);

    expect(nhi.map((m) => m.entry_id)).toEqual(['ASI02', 'ASI03', 'ASI04', 'ASI07', 'ASI09', 'ASI10']);
    expect(nhi[1]).toEqual({ entry_id: 'ASI03', nhi_top10: ['NHI2', 'NHI5', 'NHI7', 'NHI9'] });
  });

  it('filters incidents by related entry', () => {
    expect(query.getIncidents(dataset)).toHaveLength(7);
    expect(query.getIncidentsByAsi(dataset, 'asi04').map((i) => i.name)).toEqual([
      'Amazon Q Developer extension tampering',
      'Malicious postmark-mcp package',
    ]);
    expect(query.getIncidentsByAsi(dataset, 'ASI07')).toEqual([]);
  });
});

describe('loadDataset', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('reads an exported full view back into an equal frozen dataset', () => {
    const dataset = buildDataset(loadSourceDefinitions());
    const file = writeOutput(dir, {
      fileName: 'full.json',
      content: serializeView(projectView(dataset, 'full'), 'json'),
    });

    const loaded = query.loadDataset(file);

    expect(loaded).toEqual(dataset);
    expect(Object.isFrozen(loaded.entries[0])).toBe(true);
  });

  it('rejects files that are not a full view', () => {
    const file = writeOutput(dir, { fileName: 'entries.json', content: '{"entries": []}\n' });

    expect(() => query.loadDataset(file)).toThrow(MalformedRecordError);
    expect(() => query.loadDataset(path.join(dir, 'missing.json'))).toThrow(MalformedRecordError);
  });

  it('reads entries from an exported entries view', () => {
    const dataset = buildDataset(loadSourceDefinitions());
    const file = writeOutput(dir, {
      fileName: 'entries.json',
      content: serializeView(projectView(dataset, 'entries'), 'json'),
    });

    const entries = query.loadEntries(file);

    expect(entries).toEqual(dataset.entries);
    expect(Object.isFrozen(entries)).toBe(true);
  });

  it('reads mappings from an exported mappings view', () => {
    const dataset = buildDataset(loadSourceDefinitions());
    const file = writeOutput(dir, {
      fileName: 'mappings.json',
      content: serializeView(projectView(dataset, 'mappings'), 'json'),
    });

    expect(query.loadMappings(file)).toEqual(dataset.mappings);
  });

  it('names the file and the bad field when an exported view is malformed', () => {
    const file = writeOutput(dir, { fileName: 'mappings.json', content: '{"mappings": [{"entry_id": "ASI01"}]}\n' });

    let caught: unknown;
    try {
      query.loadMappings(file);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MalformedRecordError);
    if (caught instanceof MalformedRecordError) {
      expect(caught.records).toHaveLength(1);
      expect(caught.records[0].record).toBe(file);
      expect(caught.records[0].issues[0]).toBe('mappings.0.llm_top10: Required');
    }
    expect(() => query.loadEntries(file)).toThrow(MalformedRecordError);
  });
});
