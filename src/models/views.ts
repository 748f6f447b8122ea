/**
 * Output views and encodings — Types
 */
import type { DatasetMetadata, Entry, Incident, Mapping } from './dataset.js';

export const VIEW_NAMES = ['full', 'entries', 'mappings', 'simplified'] as const;
export type ViewName = (typeof VIEW_NAMES)[number];

export const OUTPUT_FORMATS = ['json', 'yaml'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface FullView {
  metadata: DatasetMetadata;
  entries: readonly Entry[];
  mappings: readonly Mapping[];
  incidents: readonly Incident[];
}

export interface EntriesView {
  entries: readonly Entry[];
}

export interface MappingsView {
  mappings: readonly Mapping[];
}

export interface SimplifiedEntry {
  id: string;
  title: string;
  summary: string;
}

export interface SimplifiedView {
  entries: readonly SimplifiedEntry[];
}

export interface ViewByName {
  full: FullView;
  entries: EntriesView;
  mappings: MappingsView;
  simplified: SimplifiedView;
}

export type View = ViewByName[ViewName];

export interface RenderedFile {
  view: ViewName;
  format: OutputFormat;
  fileName: string;
  content: string;
}
