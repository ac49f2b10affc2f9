import { FileOutputSink } from "../src/core/sinks/file-output-sink.js";
import { loadExtraction } from "../src/core/sources/load-extraction.js";
import { createPipelineContext } from "../src/core/services/pipeline-context.js";
import { runPipeline } from "../src/core/services/pipeline-runner.js";

function readArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const item = process.argv.find((entry) => entry.startsWith(prefix));
  return item ? item.slice(prefix.length) : undefined;
}

async function main(): Promise<void> {
  const input = readArg("input") ?? process.env.CONTROL_DOCS_INPUT;
  if (!input) {
    throw new Error("Usage: run-pipeline --input=<workbook.xlsx|csv dir> [--output=dir] [--frameworks=a,b] [--strict]");
  }

  const context = createPipelineContext({
    env: { ...process.env, CONTROL_DOCS_OUTPUT_FORMAT: readArg("format") ?? process.env.CONTROL_DOCS_OUTPUT_FORMAT },
    config: {
      registryPath: readArg("registry"),
      outputDir: readArg("output"),
      frameworkFilter: readArg("frameworks"),
      strictness: process.argv.includes("--strict") ? "fail_fast" : undefined
    }
  });
  const { config, logger } = context;

  const extraction = await loadExtraction(input, { ignoreSheets: config.ignoreSheets, headerRows: config.headerRows });
  logger.info("input read", { input, sheets: extraction.sheets.length });

  const sink = new FileOutputSink(config.outputDir, { format: config.outputFormat, logger });
  const report = await runPipeline(context, extraction, sink);

  const warnings = report.issues.filter((issue) => issue.severity !== "info").length;
  process.stdout.write(
    `${JSON.stringify(
      {
        outputDir: config.outputDir,
        documents: report.counts.documents,
        entities: report.counts.entities,
        issues: report.issues.length,
        warnings,
        integrity: { errors: report.integrity.errors, warnings: report.integrity.warnings },
        assemblyFailures: report.assemblyFailures.length
      },
      null,
      2
    )}\n`
  );
}

void main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Pipeline run failed.";
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
});
