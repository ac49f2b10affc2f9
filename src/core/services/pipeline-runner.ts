import { nowIso } from "../../lib/time.js";
import { IntegrityGateError } from "../errors.js";
import type { OutputSink } from "../sinks/output-sink.js";
import type { IntegrityPolicy, LinkTable, PipelineReport, RawExtraction } from "../types/domain.js";
import { DocumentAssembler, normalizeFrameworkFilter } from "./document-assembler.js";
import { evaluateIntegrity, validate } from "./integrity-validator.js";
import type { PipelineContext } from "./pipeline-context.js";

export interface RunPipelineOptions {
  /** Overrides config.frameworkFilter. */
  frameworkFilter?: readonly string[] | undefined;
  integrityPolicy?: IntegrityPolicy | undefined;
  now?: (() => string) | undefined;
}

function includeLinkTable(table: LinkTable, filter: ReadonlySet<string>): boolean {
  if (table.kind !== "framework" || filter.size === 0) {
    return true;
  }
  return table.frameworkKey !== null && filter.has(table.frameworkKey);
}

export async function runPipeline(
  context: PipelineContext,
  extraction: RawExtraction,
  sink: OutputSink,
  options?: RunPipelineOptions
): Promise<PipelineReport> {
  const { config, logger } = context;
  const filter = normalizeFrameworkFilter(options?.frameworkFilter ?? config.frameworkFilter);
  const policy: IntegrityPolicy = options?.integrityPolicy ?? {
    failOnError: config.failOnIntegrityError,
    maxWarnings: config.maxIntegrityWarnings
  };

  try {
    const normalized = context.sheetNormalizer.normalize(extraction);
    const extracted = context.relationshipExtractor.extract(normalized.tables);

    const knownFrameworks = new Set(context.registry.frameworkKeys());
    const unknownFilterKeys = [...filter].filter((key) => !knownFrameworks.has(key));
    if (unknownFilterKeys.length > 0) {
      logger.warn("framework filter names unknown frameworks", { frameworks: unknownFilterKeys });
    }

    const violations = validate(normalized.tables, extracted.links);
    const decision = evaluateIntegrity(violations, policy);
    logger.info("integrity validated", { errors: decision.summary.errors, warnings: decision.summary.warnings });
    if (!decision.open) {
      throw new IntegrityGateError(decision.summary, decision.reasons);
    }

    const assembler = new DocumentAssembler(normalized.tables, extracted.links);
    const assembled = await assembler.assembleAll(assembler.controlIds(), {
      concurrency: config.concurrency,
      frameworkFilter: [...filter]
    });
    logger.info("documents assembled", { documents: assembled.documents.length, failures: assembled.failures.length });

    const entities: Record<string, number> = {};
    for (const table of normalized.tables.values()) {
      entities[table.entityType] = table.records.length;
      await sink.writeEntityTable(table);
    }
    const linkCounts: Record<string, number> = {};
    for (const table of extracted.links.values()) {
      if (!includeLinkTable(table, filter)) {
        continue;
      }
      linkCounts[table.relationshipType] = table.links.length;
      await sink.writeLinkTable(table);
    }
    await sink.writeDocuments(assembled.documents);

    const report: PipelineReport = {
      generatedAt: options?.now ? options.now() : nowIso(),
      registryDigest: context.registry.digest,
      frameworkFilter: [...filter],
      counts: {
        entities,
        links: linkCounts,
        documents: assembled.documents.length
      },
      issues: [...normalized.issues, ...extracted.issues],
      violations,
      integrity: decision.summary,
      assemblyFailures: assembled.failures
    };
    await sink.writeReport(report);
    await sink.commit();
    return report;
  } catch (error) {
    await sink.abort();
    logger.error("pipeline run failed", { error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
}
