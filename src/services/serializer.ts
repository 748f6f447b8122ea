/**
 * Serializer
 *
 * Renders a view as JSON or YAML text. Key order is whatever the record was
 * built with, never sorted; both encodings end with a single newline.
 */
import yaml from 'js-yaml';
import type { DumpOptions } from 'js-yaml';
import { SerializationError, errorMessage } from '../models/errors.js';
import type { OutputFormat, View } from '../models/views.js';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export const YAML_DUMP_OPTIONS: DumpOptions = {
  indent: 2,
  lineWidth: -1, // no folding: long descriptions stay on one line
  noRefs: true,
  sortKeys: false,
  quotingType: '"',
};

/** Reject anything that has no faithful JSON and YAML encoding. */
export function assertSerializable(value: unknown, path = '$'): void {
  if (value === null || typeof value === 'boolean') return;

  if (typeof value === 'string') {
    if (LONE_SURROGATE.test(value)) {
      throw new SerializationError(path, 'string is not valid UTF-8 (unpaired surrogate)');
    }
    return;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(path, `non-finite number ${value}`);
    }
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => assertSerializable(item, `${path}[${index}]`));
    return;
  }

  if (typeof value === 'object') {
    for (const [key, child] of Object.entries(value)) {
      assertSerializable(child, `${path}.${key}`);
    }
    return;
  }

  throw new SerializationError(path, `unsupported ${typeof value} value`);
}

export function toJson(view: View): string {
  assertSerializable(view);
  return `${JSON.stringify(view, null, 2)}\n`;
}

export function toYaml(view: View): string {
  assertSerializable(view);
  try {
    return yaml.dump(view, YAML_DUMP_OPTIONS);
  } catch (err: unknown) {
    throw new SerializationError('$', errorMessage(err), { cause: err });
  }
}

export function serializeView(view: View, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return toJson(view);
    case 'yaml':
      return toYaml(view);
  }
}

export function parseSerialized(text: string, format: OutputFormat): unknown {
  return format === 'json' ? JSON.parse(text) : yaml.load(text);
}
