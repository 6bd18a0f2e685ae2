/**
 * Module: Error Types
 * Purpose: The few failures the core raises. Validation findings, parse
 * fallbacks and catalog misses are returned as data and never appear here.
 */
export type ErrorCode = "ROW_SHAPE" | "CONFIG_ERROR" | "FILE_ERROR";

export class MetadataCoreError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "MetadataCoreError";
    this.code = code;
    this.details = details;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/** A caller passed something that is not a mapping of strings as a row. */
export class RowShapeError extends MetadataCoreError {
  constructor(message: string, readonly field?: string, readonly rowIndex?: number) {
    super(message, "ROW_SHAPE", {
      ...(field !== undefined ? { field } : {}),
      ...(rowIndex !== undefined ? { rowIndex } : {}),
    });
    this.name = "RowShapeError";
  }
}

export class ConfigValidationError extends MetadataCoreError {
  constructor(readonly section: string, readonly problems: string[]) {
    super(
      `Configuration validation failed for ${section}:\n${problems.map((p) => `  - ${p}`).join("\n")}`,
      "CONFIG_ERROR",
      { section, problems }
    );
    this.name = "ConfigValidationError";
  }
}

export class UnsupportedFileError extends MetadataCoreError {
  constructor(message: string, readonly filename: string) {
    super(message, "FILE_ERROR", { filename });
    this.name = "UnsupportedFileError";
  }
}
