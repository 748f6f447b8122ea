/**
 * Reads the hand-curated definition files. The files stay untyped here; the
 * dataset builder owns every shape check.
 */
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, MalformedRecordError, errorMessage } from '../models/errors.js';
import type { SourceDefinitions } from '../models/dataset.js';
import { log } from '../utils/log.js';
import type { Logger } from '../utils/log.js';

// src/services and dist/services both sit two levels below the package root.
export const DEFAULT_DEFINITIONS_DIR = fileURLToPath(new URL('../../definitions/', import.meta.url));

const DEFINITION_FILES = {
  metadata: 'metadata.json',
  entries: 'entries.json',
  mappings: 'mappings.json',
  incidents: 'incidents.json',
} as const;

function readJson(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read definition file ${filePath}: ${errorMessage(err)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    throw new MalformedRecordError([
      { record: path.basename(filePath), issues: [`invalid JSON: ${errorMessage(err)}`] },
    ]);
  }
}

function readList(filePath: string): unknown[] {
  const parsed = readJson(filePath);
  if (!Array.isArray(parsed)) {
    throw new MalformedRecordError([{ record: path.basename(filePath), issues: ['expected a top-level array'] }]);
  }
  return parsed;
}

export function loadSourceDefinitions(dir: string = DEFAULT_DEFINITIONS_DIR, logger: Logger = log): SourceDefinitions {
  logger(`Reading definitions from ${dir}`, 'source', 'debug');
  return {
    metadata: readJson(path.join(dir, DEFINITION_FILES.metadata)),
    entries: readList(path.join(dir, DEFINITION_FILES.entries)),
    mappings: readList(path.join(dir, DEFINITION_FILES.mappings)),
    incidents: readList(path.join(dir, DEFINITION_FILES.incidents)),
  };
}
