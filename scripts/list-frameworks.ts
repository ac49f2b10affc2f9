import { loadExtraction } from "../src/core/sources/load-extraction.js";
import { createPipelineContext } from "../src/core/services/pipeline-context.js";
import { listFrameworks } from "../src/core/services/relationship-extractor.js";

function readArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const item = process.argv.find((entry) => entry.startsWith(prefix));
  return item ? item.slice(prefix.length) : undefined;
}

async function main(): Promise<void> {
  const context = createPipelineContext({ config: { registryPath: readArg("registry") } });
  const input = readArg("input");

  if (!input) {
    // Without input only the registry's framework keys are known.
    for (const key of context.registry.frameworkKeys()) {
      process.stdout.write(`${key}\n`);
    }
    return;
  }

  const extraction = await loadExtraction(input, {
    ignoreSheets: context.config.ignoreSheets,
    headerRows: context.config.headerRows
  });
  const { tables } = context.sheetNormalizer.normalize(extraction);
  const { links } = context.relationshipExtractor.extract(tables);
  process.stdout.write(`${JSON.stringify(listFrameworks(links, tables), null, 2)}\n`);
}

void main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Listing frameworks failed.";
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
});
