/**
 * OWASP Top 10 for Agentic Applications — Record Types
 *
 * Property order in these interfaces is the key order of every emitted file.
 * Consumers read these names directly, so renaming a field is a breaking change.
 */

export interface AttackScenario {
  name: string;
  description: string;
}

export interface Reference {
  title: string;
  url: string;
}

export interface Entry {
  id: string; // ASI01..ASI10
  title: string;
  description: string;
  related_threats: readonly string[]; // e.g. "T6 Intent Breaking & Goal Manipulation"
  related_llm_entries: readonly string[]; // e.g. "LLM01:2025 Prompt Injection"
  aivss_core_risk: string;
  common_examples: readonly string[];
  attack_scenarios: readonly AttackScenario[];
  mitigations: readonly string[];
  references: readonly Reference[];
}

export interface Mapping {
  entry_id: string;
  llm_top10: readonly string[];
  aivss: readonly string[];
  nhi_top10: readonly string[];
  agentic_threats: readonly string[];
}

export interface Incident {
  name: string;
  affected_system: string;
  date: string; // a date or a period, kept as published
  description: string;
  related_entries: readonly string[]; // empty when unclassified
  source: string;
}

export interface DatasetMetadata {
  title: string;
  version: string;
  publisher: string;
  source_url: string;
  license: string;
}

export interface Dataset {
  readonly metadata: DatasetMetadata;
  readonly entries: readonly Entry[];
  readonly mappings: readonly Mapping[];
  readonly incidents: readonly Incident[];
}

/** Raw, unchecked source records as read from the definition files. */
export interface SourceDefinitions {
  metadata: unknown;
  entries: readonly unknown[];
  mappings: readonly unknown[];
  incidents: readonly unknown[];
}

export const ENTRY_ID_PATTERN = /^ASI\d{2}$/;

export const ASI_IDS = [
  'ASI01', 'ASI02', 'ASI03', 'ASI04', 'ASI05',
  'ASI06', 'ASI07', 'ASI08', 'ASI09', 'ASI10',
] as const;

export type AsiId = (typeof ASI_IDS)[number];
