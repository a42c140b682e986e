import type { ZodIssue } from "zod";

/**
 * Base class for the errors raised while loading and normalizing
 * transactions. `code` is stable and safe to branch on.
 */
export abstract class FifoError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** The source table is too narrow or lacks a mapped column. Fatal. */
export class SchemaError extends FifoError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid table: ${reason}`, "SCHEMA_ERROR", details);
  }
}

/** The run configuration failed validation. Fatal. */
export class ConfigError extends FifoError {
  constructor(public readonly issues: ZodIssue[]) {
    const message = issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    super(
      `Configuration validation failed with the following issues:\n${message}`,
      "CONFIG_ERROR",
      { issueCount: issues.length },
    );
  }
}

/** A selected column is empty on a row. The row is skipped. */
export class MissingValueError extends FifoError {
  constructor(
    public readonly rowNumber: number,
    public readonly columns: string[],
  ) {
    super(
      `Row ${rowNumber}: missing value in ${columns.join(", ")}`,
      "MISSING_VALUE",
      { rowNumber, columns },
    );
  }
}

/** Quantity or price is not a number. The row is skipped. */
export class RowParseError extends FifoError {
  constructor(
    public readonly rowNumber: number,
    public readonly field: "quantity" | "price",
    public readonly value: unknown,
  ) {
    super(
      `Row ${rowNumber}: invalid ${field} ${JSON.stringify(value)}`,
      "ROW_PARSE_ERROR",
      { rowNumber, field, value },
    );
  }
}

/** The date could not be parsed. The row is kept with an invalid date. */
export class DateParseError extends FifoError {
  constructor(
    public readonly rowNumber: number,
    public readonly value: unknown,
  ) {
    super(
      `Row ${rowNumber}: could not parse date ${JSON.stringify(value)}`,
      "DATE_PARSE_ERROR",
      { rowNumber, value },
    );
  }
}

export class FileLoadError extends FifoError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(
      `Failed to load ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      "FILE_LOAD_ERROR",
      { filePath },
    );
  }
}
