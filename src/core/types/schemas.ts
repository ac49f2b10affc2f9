import { z } from "zod";

function blankToUndefined(value: unknown): unknown {
  if (typeof value === "string" && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

function trimLowerOrUndefined(value: unknown): unknown {
  return typeof value === "string" ? blankToUndefined(value.trim().toLowerCase()) : value;
}

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

export const registryRowSchema = z.object({
  raw_column: z.string().trim().min(1),
  entity_type: z.string().trim().toLowerCase().min(1),
  target_field: z
    .string()
    .trim()
    .regex(/^[a-z_][a-z0-9_]*$/, "target_field must be snake_case"),
  value_type: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["string", "boolean", "enum", "number", "list"])
  ),
  delimiter: optionalText,
  blank_policy: z.preprocess(trimLowerOrUndefined, z.enum(["absent", "empty"]).default("absent")),
  casing: z.preprocess(trimLowerOrUndefined, z.enum(["preserve", "lower", "upper"]).default("preserve")),
  role: z.preprocess(
    trimLowerOrUndefined,
    z.enum(["identifier", "attribute", "entity_link", "framework_link", "control_link", "remove"]).default("attribute")
  ),
  target_entity: z.preprocess(trimLowerOrUndefined, z.string().optional()),
  enum_values: optionalText,
  fill: z.preprocess(trimLowerOrUndefined, z.enum(["none", "forward"]).default("none")),
  group: z.preprocess(
    trimLowerOrUndefined,
    z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/, "group must be snake_case")
      .optional()
  )
});

export type RegistryRow = z.output<typeof registryRowSchema>;

export const requiredRegistryColumns = [
  "raw_column",
  "entity_type",
  "target_field",
  "value_type",
  "delimiter",
  "blank_policy"
] as const;

const commaList = z.preprocess(
  (value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0)
      : value,
  z.array(z.string().min(1))
);

// "Threat Catalog=6,Risk Catalog=6"
const keyValueList = <T extends z.ZodTypeAny>(valueSchema: T) =>
  z.preprocess((value) => {
    if (typeof value !== "string") {
      return value;
    }
    const out: Record<string, string> = {};
    for (const pair of value.split(",")) {
      const index = pair.indexOf("=");
      if (index <= 0) {
        continue;
      }
      out[pair.slice(0, index).trim()] = pair.slice(index + 1).trim();
    }
    return out;
  }, z.record(z.string(), valueSchema));

const booleanFlag = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
}, z.boolean());

export const pipelineConfigSchema = z.object({
  registryPath: z.string().min(1).default("config/schema-registry.csv"),
  outputDir: z.string().min(1).default("output"),
  outputFormat: z.enum(["csv", "json", "both"]).default("both"),
  strictness: z.enum(["collect", "fail_fast"]).default("collect"),
  concurrency: z.coerce.number().int().min(1).max(64).default(8),
  frameworkFilter: commaList.default([]),
  failOnIntegrityError: booleanFlag.default(true),
  maxIntegrityWarnings: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional()),
  domainIdLength: z.coerce.number().int().min(1).max(16).default(3),
  ignoreSheets: commaList.default(["Lists"]),
  headerRows: keyValueList(z.coerce.number().int().min(1)).default({ "Threat Catalog": 6, "Risk Catalog": 6 }),
  sheetAliases: keyValueList(z.string().min(1)).default({}),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  logFormat: z.enum(["pretty", "json"]).default("pretty")
});

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type PipelineConfig = z.output<typeof pipelineConfigSchema>;
