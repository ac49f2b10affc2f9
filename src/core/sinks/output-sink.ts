import type { ControlDocument, EntityTable, EntityType, LinkTable, PipelineReport } from "../types/domain.js";

/**
 * Destination of one pipeline run. Nothing written becomes visible until commit();
 * abort() discards everything staged so far.
 */
export interface OutputSink {
  writeEntityTable(table: EntityTable): Promise<void>;
  writeLinkTable(table: LinkTable): Promise<void>;
  writeDocuments(documents: readonly ControlDocument[]): Promise<void>;
  writeReport(report: PipelineReport): Promise<void>;
  commit(): Promise<void>;
  abort(): Promise<void>;
}

export function tableFileName(entityType: EntityType): string {
  return entityType.replace(":", "_");
}

export class MemoryOutputSink implements OutputSink {
  readonly entityTables = new Map<EntityType, EntityTable>();
  readonly linkTables = new Map<string, LinkTable>();
  documents: ControlDocument[] = [];
  report: PipelineReport | null = null;
  state: "open" | "committed" | "aborted" = "open";

  async writeEntityTable(table: EntityTable): Promise<void> {
    this.assertOpen();
    this.entityTables.set(table.entityType, table);
  }

  async writeLinkTable(table: LinkTable): Promise<void> {
    this.assertOpen();
    this.linkTables.set(table.relationshipType, table);
  }

  async writeDocuments(documents: readonly ControlDocument[]): Promise<void> {
    this.assertOpen();
    this.documents = [...documents];
  }

  async writeReport(report: PipelineReport): Promise<void> {
    this.assertOpen();
    this.report = report;
  }

  async commit(): Promise<void> {
    this.assertOpen();
    this.state = "committed";
  }

  async abort(): Promise<void> {
    if (this.state === "open") {
      this.state = "aborted";
    }
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new Error(`Output sink is already ${this.state}.`);
    }
  }
}
