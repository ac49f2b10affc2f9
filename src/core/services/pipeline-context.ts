import { createLogger, type Logger } from "../../lib/logger.js";
import { loadPipelineConfig } from "../config.js";
import { loadSchemaRegistry, type SchemaRegistry } from "../registry/schema-registry.js";
import type { PipelineConfig, PipelineConfigInput } from "../types/schemas.js";
import { RelationshipExtractor } from "./relationship-extractor.js";
import { SheetNormalizer } from "./sheet-normalizer.js";

export interface PipelineContext {
  config: PipelineConfig;
  logger: Logger;
  registry: SchemaRegistry;
  sheetNormalizer: SheetNormalizer;
  relationshipExtractor: RelationshipExtractor;
}

export interface PipelineContextOptions {
  env?: NodeJS.ProcessEnv | undefined;
  config?: PipelineConfigInput | undefined;
  /** Skips reading config.registryPath. */
  registry?: SchemaRegistry | undefined;
  logger?: Logger | undefined;
}

export function createPipelineContext(options?: PipelineContextOptions): PipelineContext {
  const config = loadPipelineConfig(options?.env ?? process.env, options?.config ?? {});
  const logger = options?.logger ?? createLogger({ level: config.logLevel, format: config.logFormat });
  const registry = options?.registry ?? loadSchemaRegistry(config.registryPath);
  logger.debug("schema registry loaded", { digest: registry.digest, relationships: registry.relationships().length });

  const sheetNormalizer = new SheetNormalizer(registry, {
    strictness: config.strictness,
    ignoreSheets: config.ignoreSheets,
    sheetAliases: config.sheetAliases,
    logger
  });
  const relationshipExtractor = new RelationshipExtractor(registry, {
    domainIdLength: config.domainIdLength,
    logger
  });

  return {
    config,
    logger,
    registry,
    sheetNormalizer,
    relationshipExtractor
  };
}
