import { loadExtraction } from "../src/core/sources/load-extraction.js";
import { createPipelineContext } from "../src/core/services/pipeline-context.js";

function readArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const item = process.argv.find((entry) => entry.startsWith(prefix));
  return item ? item.slice(prefix.length) : undefined;
}

async function main(): Promise<void> {
  const input = readArg("input") ?? process.env.CONTROL_DOCS_INPUT;
  if (!input) {
    throw new Error("Usage: registry-check --input=<workbook.xlsx|csv dir> [--registry=path]");
  }
  const context = createPipelineContext({ config: { registryPath: readArg("registry") } });
  const extraction = await loadExtraction(input, {
    ignoreSheets: context.config.ignoreSheets,
    headerRows: context.config.headerRows
  });

  const result: Array<{ sheet: string; entityType: string; unregistered: string[] }> = [];
  for (const sheet of extraction.sheets) {
    const entityType = context.sheetNormalizer.resolveSheet(sheet.name);
    if (entityType === null || entityType === "ignored") {
      continue;
    }
    const headers = new Set(sheet.rows.flatMap((row) => Object.keys(row)));
    const unregistered = context.registry.unregisteredColumns(entityType, headers);
    if (unregistered.length > 0) {
      result.push({ sheet: sheet.name, entityType, unregistered });
    }
  }

  process.stdout.write(`${JSON.stringify({ registryDigest: context.registry.digest, sheets: result }, null, 2)}\n`);
  if (result.length > 0) {
    process.exitCode = 2;
  }
}

void main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Registry check failed.";
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
});
