export class ParseFailure extends Error {
  readonly dialect: string;
  readonly line: number | null;
  readonly column: number | null;

  constructor(message: string, dialect: string, line: number | null = null, column: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseFailure";
    this.dialect = dialect;
    this.line = line;
    this.column = column;
  }
}

export class StatementProcessingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StatementProcessingError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
