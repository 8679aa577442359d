// ─── Error taxonomy: every error is fatal to the run that raises it ─────────

export type ForecastErrorCode =
  | "SCHEMA"
  | "PARSE"
  | "EMPTY_PARTITION"
  | "UNSEEN_ENTITY"
  | "INSUFFICIENT_HISTORY"
  | "CONFIGURATION";

export class ForecastError extends Error {
  readonly code: ForecastErrorCode;

  constructor(code: ForecastErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or duplicate keys, missing target values, unsorted panels. */
export class SchemaError extends ForecastError {
  constructor(message: string) {
    super("SCHEMA", message);
  }
}

export class ParseError extends ForecastError {
  constructor(message: string) {
    super("PARSE", message);
  }
}

export class EmptyPartitionError extends ForecastError {
  constructor(message: string) {
    super("EMPTY_PARTITION", message);
  }
}

export class UnseenEntityError extends ForecastError {
  readonly column: string;
  readonly value: string;

  constructor(column: string, value: string) {
    super("UNSEEN_ENTITY", `${column} "${value}" was not seen at training time`);
    this.column = column;
    this.value = value;
  }
}

/** No predictable rows survived feature engineering. */
export class InsufficientHistoryError extends ForecastError {
  constructor(message: string) {
    super("INSUFFICIENT_HISTORY", message);
  }
}

export class ConfigurationError extends ForecastError {
  constructor(message: string) {
    super("CONFIGURATION", message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof ForecastError) return `${err.name}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
