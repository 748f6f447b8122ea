/**
 * Validator
 *
 * Structural and referential checks over a built dataset. Every rule runs on
 * every record so one run reports the complete defect list.
 */
import { ValidationError } from '../models/errors.js';
import type { Violation } from '../models/errors.js';
import { ASI_IDS, ENTRY_ID_PATTERN } from '../models/dataset.js';
import type { Dataset, Entry, Incident, Mapping } from '../models/dataset.js';

export interface ValidationResult {
  valid: boolean;
  violations: Violation[];
}

const ENTRY_REFERENCE = /\bASI\d{2}\b/g;

function entrySubject(entry: Entry, index: number): string {
  return `entries[${index}] (${entry.id})`;
}

function checkEntryIds(entries: readonly Entry[]): Violation[] {
  const violations: Violation[] = [];

  if (entries.length !== ASI_IDS.length) {
    violations.push({
      code: 'entry_count',
      subject: 'entries',
      message: `expected exactly ${ASI_IDS.length} entries, found ${entries.length}`,
    });
  }

  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (!ENTRY_ID_PATTERN.test(entry.id)) {
      violations.push({
        code: 'entry_id_format',
        subject: entrySubject(entry, index),
        message: `id "${entry.id}" does not match ASI followed by two digits`,
        reference: entry.id,
      });
    }
    if (seen.has(entry.id)) {
      violations.push({
        code: 'entry_id_duplicate',
        subject: entrySubject(entry, index),
        message: `duplicate id "${entry.id}"`,
        reference: entry.id,
      });
    }
    seen.add(entry.id);
  });

  for (const id of ASI_IDS) {
    if (!seen.has(id)) {
      violations.push({
        code: 'entry_id_missing',
        subject: 'entries',
        message: `no entry with id "${id}"`,
        reference: id,
      });
    }
  }

  return violations;
}

function checkEntryContent(entry: Entry, index: number): Violation[] {
  const violations: Violation[] = [];
  const subject = entrySubject(entry, index);

  if (entry.mitigations.length === 0) {
    violations.push({ code: 'mitigations_empty', subject, message: 'entry has no mitigations' });
  }

  if (entry.attack_scenarios.length === 0) {
    violations.push({ code: 'attack_scenarios_empty', subject, message: 'entry has no attack scenarios' });
  }

  const names = new Set<string>();
  for (const scenario of entry.attack_scenarios) {
    if (names.has(scenario.name)) {
      violations.push({
        code: 'attack_scenario_duplicate',
        subject,
        message: `attack scenario name "${scenario.name}" appears more than once`,
      });
    }
    names.add(scenario.name);
  }

  const related = [...entry.related_threats, ...entry.related_llm_entries];
  const selfReferences = related.filter((ref) => ref.match(ENTRY_REFERENCE)?.includes(entry.id) ?? false);
  for (const ref of selfReferences) {
    violations.push({
      code: 'entry_self_reference',
      subject,
      message: `entry lists itself as related: "${ref}"`,
      reference: entry.id,
    });
  }

  return violations;
}

function checkMapping(mapping: Mapping, index: number, ids: ReadonlySet<string>): Violation[] {
  const violations: Violation[] = [];
  const subject = `mappings[${index}] (${mapping.entry_id})`;

  if (!ids.has(mapping.entry_id)) {
    violations.push({
      code: 'mapping_unknown_entry',
      subject,
      message: `references unknown entry "${mapping.entry_id}"`,
      reference: mapping.entry_id,
    });
  }

  const identifiers =
    mapping.llm_top10.length + mapping.aivss.length + mapping.nhi_top10.length + mapping.agentic_threats.length;
  if (identifiers === 0) {
    violations.push({ code: 'mapping_empty', subject, message: 'mapping names no framework identifiers' });
  }

  return violations;
}

function checkIncident(incident: Incident, index: number, ids: ReadonlySet<string>): Violation[] {
  const subject = `incidents[${index}] (${incident.name})`;
  return incident.related_entries
    .filter((id) => !ids.has(id))
    .map((id) => ({
      code: 'incident_unknown_entry' as const,
      subject,
      message: `references unknown entry "${id}"`,
      reference: id,
    }));
}

export function validateDataset(dataset: Dataset): ValidationResult {
  const ids = new Set(dataset.entries.map((entry) => entry.id));

  const violations: Violation[] = [
    ...checkEntryIds(dataset.entries),
    ...dataset.entries.flatMap((entry, index) => checkEntryContent(entry, index)),
    ...dataset.mappings.flatMap((mapping, index) => checkMapping(mapping, index, ids)),
    ...dataset.incidents.flatMap((incident, index) => checkIncident(incident, index, ids)),
  ];

  return { valid: violations.length === 0, violations };
}

export function assertValidDataset(dataset: Dataset): void {
  const result = validateDataset(dataset);
  if (!result.valid) {
    throw new ValidationError(result.violations);
  }
}
