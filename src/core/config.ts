import { ZodError } from "zod";
import { ConfigurationError } from "./errors.js";
import { pipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from "./types/schemas.js";

const envKeys: Record<keyof PipelineConfigInput, string> = {
  registryPath: "CONTROL_DOCS_REGISTRY_PATH",
  outputDir: "CONTROL_DOCS_OUTPUT_DIR",
  outputFormat: "CONTROL_DOCS_OUTPUT_FORMAT",
  strictness: "CONTROL_DOCS_STRICTNESS",
  concurrency: "CONTROL_DOCS_CONCURRENCY",
  frameworkFilter: "CONTROL_DOCS_FRAMEWORKS",
  failOnIntegrityError: "CONTROL_DOCS_FAIL_ON_INTEGRITY_ERROR",
  maxIntegrityWarnings: "CONTROL_DOCS_MAX_INTEGRITY_WARNINGS",
  domainIdLength: "CONTROL_DOCS_DOMAIN_ID_LENGTH",
  ignoreSheets: "CONTROL_DOCS_IGNORE_SHEETS",
  headerRows: "CONTROL_DOCS_HEADER_ROWS",
  sheetAliases: "CONTROL_DOCS_SHEET_ALIASES",
  logLevel: "CONTROL_DOCS_LOG_LEVEL",
  logFormat: "CONTROL_DOCS_LOG_FORMAT"
};

export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, name] of Object.entries(envKeys)) {
    const value = env[name];
    if (value !== undefined && value.trim().length > 0) {
      out[key] = value.trim();
    }
  }
  return out;
}

/** Environment first, then explicit overrides (undefined overrides are ignored). */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: PipelineConfigInput = {}
): PipelineConfig {
  const merged: Record<string, unknown> = configFromEnv(env);
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  try {
    return pipelineConfigSchema.parse(merged);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        "Invalid pipeline configuration.",
        error.issues.map((issue) => {
          const name = Object.entries(envKeys).find(([key]) => key === issue.path[0])?.[1];
          return `${name ?? issue.path.join(".")}: ${issue.message}`;
        }),
        { cause: error }
      );
    }
    throw error;
  }
}
