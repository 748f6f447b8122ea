/**
 * Export pipeline: Build → Validate → Project → Serialize → Write.
 *
 * Nothing touches the output directory until every view has been rendered, so
 * build, validation and serialization failures leave it untouched.
 */
import type { ExportConfig } from '../config.js';
import type { Dataset, SourceDefinitions } from '../models/dataset.js';
import type { RenderedFile } from '../models/views.js';
import { createLogger } from '../utils/log.js';
import { buildDataset } from './dataset-builder.js';
import { serializeView } from './serializer.js';
import { loadSourceDefinitions } from './source-definitions.js';
import { assertValidDataset } from './validator.js';
import { projectView } from './view-projector.js';
import type { ProjectionOptions } from './view-projector.js';
import { outputFileName, writeOutputs } from './writer.js';

export interface ExportReport {
  outputDir: string;
  written: string[];
}

export interface ExportOptions extends ProjectionOptions {
  /** Use these definitions instead of reading them from config.definitionsDir. */
  source?: SourceDefinitions;
}

export function renderFiles(
  dataset: Dataset,
  config: Pick<ExportConfig, 'views' | 'formats'>,
  options: ProjectionOptions = {},
): RenderedFile[] {
  const files: RenderedFile[] = [];
  for (const view of config.views) {
    const projected = projectView(dataset, view, options);
    for (const format of config.formats) {
      files.push({
        view,
        format,
        fileName: outputFileName(view, format),
        content: serializeView(projected, format),
      });
    }
  }
  return files;
}

export function runExport(config: ExportConfig, options: ExportOptions = {}): ExportReport {
  const logger = createLogger(config.logLevel);
  const source = options.source ?? loadSourceDefinitions(config.definitionsDir, logger);

  const dataset = buildDataset(source, logger);
  assertValidDataset(dataset);
  logger(`Validated ${dataset.entries.length} entries`, 'exporter');

  const files = renderFiles(dataset, config, options);
  const written = writeOutputs(config.outputDir, files, logger);

  logger(`Export complete: ${written.length} files in ${config.outputDir}`, 'exporter');
  return { outputDir: config.outputDir, written };
}
