import type { IntegritySummary } from "./types/domain.js";

export type PipelineErrorCode =
  | "configuration_error"
  | "sheet_not_found"
  | "value_conversion_error"
  | "missing_control"
  | "integrity_gate_closed"
  | "source_read_error";

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    public readonly details: string[] = [],
    options?: { cause?: unknown }
  ) {
    super("configuration_error", details.length > 0 ? `${message}\n  - ${details.join("\n  - ")}` : message, options);
  }
}

export class SheetNotFoundError extends PipelineError {
  constructor(
    public readonly entityType: string,
    public readonly availableSheets: string[]
  ) {
    super(
      "sheet_not_found",
      `No sheet found for mandatory entity type "${entityType}". Sheets present: ${
        availableSheets.length > 0 ? availableSheets.join(", ") : "(none)"
      }.`
    );
  }
}

export interface ValueConversionContext {
  entityType: string;
  rowNumber: number;
  column: string;
  field: string;
  rawValue: string;
  identifier?: string | undefined;
}

export class ValueConversionError extends PipelineError {
  readonly entityType: string;
  readonly rowNumber: number;
  readonly column: string;
  readonly field: string;
  readonly rawValue: string;
  readonly identifier: string | undefined;

  constructor(context: ValueConversionContext, reason: string) {
    super(
      "value_conversion_error",
      `${context.entityType} row ${context.rowNumber}${context.identifier ? ` (${context.identifier})` : ""}, column "${
        context.column
      }": ${reason} (raw value: ${JSON.stringify(context.rawValue)}).`
    );
    this.entityType = context.entityType;
    this.rowNumber = context.rowNumber;
    this.column = context.column;
    this.field = context.field;
    this.rawValue = context.rawValue;
    this.identifier = context.identifier;
  }
}

export class MissingControlError extends PipelineError {
  constructor(public readonly controlId: string) {
    super("missing_control", `Control not found: ${controlId}`);
  }
}

export class IntegrityGateError extends PipelineError {
  constructor(
    public readonly summary: IntegritySummary,
    reasons: string[]
  ) {
    super("integrity_gate_closed", `Integrity gate closed: ${reasons.join("; ")}`);
  }
}

export class SourceReadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("source_read_error", message, options);
  }
}
