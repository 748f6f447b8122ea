export * from './models/dataset.js';
export * from './models/views.js';
export * from './models/errors.js';
export { entrySchema, mappingSchema, incidentSchema, metadataSchema, fullViewSchema } from './models/schema.js';
export { loadConfig, DEFAULT_OUTPUT_DIR } from './config.js';
export type { ExportConfig } from './config.js';
export { loadSourceDefinitions, DEFAULT_DEFINITIONS_DIR } from './services/source-definitions.js';
export { buildDataset, deepFreeze } from './services/dataset-builder.js';
export { validateDataset, assertValidDataset } from './services/validator.js';
export type { ValidationResult } from './services/validator.js';
export { projectView, firstSentence, createSentenceSummarizer } from './services/view-projector.js';
export type { ProjectionOptions, Summarizer } from './services/view-projector.js';
export { serializeView, parseSerialized } from './services/serializer.js';
export { outputFileName, writeOutput, writeOutputs } from './services/writer.js';
export { runExport, renderFiles } from './services/exporter.js';
export type { ExportOptions, ExportReport } from './services/exporter.js';
export * from './services/dataset-query.js';
export { createLogger, log } from './utils/log.js';
export type { Logger, LogLevel } from './utils/log.js';
