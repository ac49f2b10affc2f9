import { createWriteStream, existsSync } from "node:fs";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { once } from "node:events";
import { basename, dirname, join } from "node:path";
import Papa from "papaparse";
import { sha256Hex } from "../../lib/hash.js";
import { createId } from "../../lib/id.js";
import { createLogger, type Logger } from "../../lib/logger.js";
import type { ControlDocument, EntityTable, FieldValue, LinkTable, PipelineReport } from "../types/domain.js";
import { tableFileName, type OutputSink } from "./output-sink.js";

export type OutputFormat = "csv" | "json" | "both";

export interface FileOutputSinkOptions {
  format?: OutputFormat | undefined;
  logger?: Logger | undefined;
}

export interface OutputManifest {
  files: Array<{ path: string; sha256: string; bytes: number }>;
}

/** Header row plus data rows; every file ends in CRLF, including a header-only one. */
function toCsv(fields: string[], data: string[][]): string {
  return `${Papa.unparse([fields, ...data])}\r\n`;
}

function csvValue(value: FieldValue | undefined): string {
  if (value === undefined) return "";
  if (Array.isArray(value)) return value.join("\n");
  return String(value);
}

/**
 * Writes one run below `outputDir`. Files are staged in a sibling directory and swapped in on commit,
 * so readers see either the previous run or the complete new one.
 */
export class FileOutputSink implements OutputSink {
  private readonly format: OutputFormat;
  private readonly logger: Logger;
  private readonly stagingDir: string;
  private readonly digests = new Map<string, { sha256: string; bytes: number }>();
  private state: "open" | "committed" | "aborted" = "open";

  constructor(
    private readonly outputDir: string,
    options: FileOutputSinkOptions = {}
  ) {
    this.format = options.format ?? "both";
    this.logger = options.logger ?? createLogger();
    this.stagingDir = join(dirname(outputDir), `.${basename(outputDir)}.${createId("staging")}`);
  }

  async writeEntityTable(table: EntityTable): Promise<void> {
    const name = tableFileName(table.entityType);
    const fields: string[] = [];
    for (const record of table.records) {
      for (const field of Object.keys(record)) {
        if (!fields.includes(field)) fields.push(field);
      }
    }
    if (fields.length === 0) {
      fields.push(table.identifierField);
    }
    if (this.format !== "json") {
      const data = table.records.map((record) => fields.map((field) => csvValue(record[field])));
      await this.writeText(`tables/${name}.csv`, toCsv(fields, data));
    }
    if (this.format !== "csv") {
      await this.writeText(`tables/${name}.json`, JSON.stringify(table.records, null, 2));
    }
  }

  async writeLinkTable(table: LinkTable): Promise<void> {
    const folder = table.kind === "framework" ? "framework_relationships" : "scf_relationships";
    const fields = [table.sourceColumn, table.targetColumn];
    if (this.format !== "json") {
      const data = table.links.map((link) => [link.sourceId, link.targetId]);
      await this.writeText(`${folder}/${table.relationshipType}.csv`, toCsv(fields, data));
    }
    if (this.format !== "csv") {
      const rows = table.links.map((link) => ({
        [table.sourceColumn]: link.sourceId,
        [table.targetColumn]: link.targetId
      }));
      await this.writeText(`${folder}/${table.relationshipType}.json`, JSON.stringify(rows, null, 2));
    }
  }

  async writeDocuments(documents: readonly ControlDocument[]): Promise<void> {
    await this.writeText("documents/control_documents.json", JSON.stringify(documents, null, 2));

    const relative = "documents/control_documents.ndjson";
    const target = await this.prepare(relative);
    const stream = createWriteStream(target, { encoding: "utf8" });
    const lines: string[] = [];
    for (const document of documents) {
      const line = `${JSON.stringify(document)}\n`;
      lines.push(line);
      if (!stream.write(line)) {
        await once(stream, "drain");
      }
    }
    stream.end();
    await once(stream, "finish");
    this.record(relative, lines.join(""));
  }

  async writeReport(report: PipelineReport): Promise<void> {
    await this.writeText("report.json", JSON.stringify(report, null, 2));
  }

  async commit(): Promise<void> {
    this.assertOpen();
    const manifest: OutputManifest = {
      files: [...this.digests.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([path, digest]) => ({ path, ...digest }))
    };
    await mkdir(this.stagingDir, { recursive: true });
    await writeFile(join(this.stagingDir, "manifest.json"), JSON.stringify(manifest, null, 2), "utf8");

    const previous = `${this.stagingDir}.previous`;
    const hadPrevious = existsSync(this.outputDir);
    if (hadPrevious) {
      await rename(this.outputDir, previous);
    }
    await rename(this.stagingDir, this.outputDir);
    if (hadPrevious) {
      await rm(previous, { recursive: true, force: true });
    }
    this.state = "committed";
    this.logger.info("output committed", { outputDir: this.outputDir, files: manifest.files.length + 1 });
  }

  async abort(): Promise<void> {
    if (this.state !== "open") {
      return;
    }
    this.state = "aborted";
    await rm(this.stagingDir, { recursive: true, force: true });
    this.logger.warn("output aborted", { outputDir: this.outputDir });
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new Error(`Output sink is already ${this.state}.`);
    }
  }

  private async prepare(relative: string): Promise<string> {
    this.assertOpen();
    const target = join(this.stagingDir, relative);
    await mkdir(dirname(target), { recursive: true });
    return target;
  }

  private record(relative: string, content: string): void {
    this.digests.set(relative, { sha256: sha256Hex(content), bytes: Buffer.byteLength(content, "utf8") });
  }

  private async writeText(relative: string, content: string): Promise<void> {
    const target = await this.prepare(relative);
    await writeFile(target, content, "utf8");
    this.record(relative, content);
    this.logger.debug("output staged", { path: relative });
  }
}

export async function readManifest(outputDir: string): Promise<OutputManifest> {
  const parsed: unknown = JSON.parse(await readFile(join(outputDir, "manifest.json"), "utf8"));
  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("files" in parsed) ||
    !Array.isArray(parsed.files)
  ) {
    throw new Error(`Malformed manifest in ${outputDir}.`);
  }
  const entries: unknown[] = parsed.files;
  const files: OutputManifest["files"] = [];
  for (const entry of entries) {
    if (
      typeof entry === "object" &&
      entry !== null &&
      "path" in entry &&
      "sha256" in entry &&
      "bytes" in entry &&
      typeof entry.path === "string" &&
      typeof entry.sha256 === "string" &&
      typeof entry.bytes === "number"
    ) {
      files.push({ path: entry.path, sha256: entry.sha256, bytes: entry.bytes });
    }
  }
  return { files };
}
