export type ImportErrorKind = "file" | "format" | "row" | "database" | "config";

export class ImportError extends Error {
  readonly kind: ImportErrorKind;

  constructor(kind: ImportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImportError";
    this.kind = kind;
  }
}

export class FileError extends ImportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("file", message, options);
    this.name = "FileError";
  }
}

export class FormatError extends ImportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("format", message, options);
    this.name = "FormatError";
  }
}

/** A single CSV row that cannot be imported. The run continues without it. */
export class RowError extends ImportError {
  readonly line: number;
  readonly location: string;

  constructor(line: number, location: string, reason: string, options?: { cause?: unknown }) {
    super("row", `line ${line}${location ? ` (${location})` : ""}: ${reason}`, options);
    this.name = "RowError";
    this.line = line;
    this.location = location;
  }
}

export class DatabaseError extends ImportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("database", message, options);
    this.name = "DatabaseError";
  }
}

export class ConfigError extends ImportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
