export * from "./core/types/domain.js";
export * from "./core/errors.js";
export { entityCatalog, relationshipTypeFor } from "./core/entity-types.js";
export { loadPipelineConfig } from "./core/config.js";
export { pipelineConfigSchema, registryRowSchema } from "./core/types/schemas.js";
export type { PipelineConfig, PipelineConfigInput, RegistryRow } from "./core/types/schemas.js";
export {
  SchemaRegistry,
  createSchemaRegistry,
  fallbackRule,
  loadSchemaRegistry
} from "./core/registry/schema-registry.js";
export { cleanRecord } from "./core/services/column-cleaner.js";
export type { CleanContext, CleanResult } from "./core/services/column-cleaner.js";
export { SheetNormalizer } from "./core/services/sheet-normalizer.js";
export type { NormalizeResult, SheetNormalizerOptions, Strictness } from "./core/services/sheet-normalizer.js";
export { RelationshipExtractor, listFrameworks } from "./core/services/relationship-extractor.js";
export { evaluateIntegrity, summarizeViolations, validate } from "./core/services/integrity-validator.js";
export {
  DocumentAssembler,
  assembleControlDocument,
  normalizeFrameworkFilter
} from "./core/services/document-assembler.js";
export { createPipelineContext } from "./core/services/pipeline-context.js";
export type { PipelineContext, PipelineContextOptions } from "./core/services/pipeline-context.js";
export { runPipeline } from "./core/services/pipeline-runner.js";
export type { RunPipelineOptions } from "./core/services/pipeline-runner.js";
export { readWorkbook } from "./core/sources/workbook-source.js";
export { readCsvDirectory } from "./core/sources/csv-source.js";
export { loadExtraction } from "./core/sources/load-extraction.js";
export { MemoryOutputSink } from "./core/sinks/output-sink.js";
export type { OutputSink } from "./core/sinks/output-sink.js";
export { FileOutputSink, readManifest } from "./core/sinks/file-output-sink.js";
export { createLogger } from "./lib/logger.js";
