export type ExtractionField = "observedAt" | "capturedAt" | "locationName" | "imageUrl";

export interface ValueRange {
  min: number;
  max: number;
}

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or non-success status for the page or the image. */
export class FetchError extends PipelineError {
  readonly url: string;

  readonly status: number | null;

  constructor(url: string, reason: string, status: number | null = null, cause?: unknown) {
    super(`Fetch failed for ${url}: ${reason}`, { cause });
    this.url = url;
    this.status = status;
  }
}

export class ExtractionError extends PipelineError {
  readonly field: ExtractionField;

  constructor(field: ExtractionField, detail?: string) {
    super(`Mandatory field "${field}" not found in station page${detail ? ` (${detail})` : ""}`);
    this.field = field;
  }
}

export class ValidationError extends PipelineError {
  readonly field: string;

  readonly reason: string;

  readonly value: unknown;

  readonly range: ValueRange | null;

  constructor(
    field: string,
    reason: string,
    details: { value?: unknown; range?: ValueRange } = {}
  ) {
    const rangeText = details.range ? ` [${details.range.min}, ${details.range.max}]` : "";
    const valueText = "value" in details ? ` (got ${JSON.stringify(details.value)})` : "";
    super(`Invalid ${field}: ${reason}${rangeText}${valueText}`);
    this.field = field;
    this.reason = reason;
    this.value = details.value;
    this.range = details.range ?? null;
  }
}

export class PersistenceError extends PipelineError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Storage operation "${operation}" failed: ${describeError(cause)}`, { cause });
    this.operation = operation;
  }
}

export class StoreInitializationError extends PipelineError {
  readonly databasePath: string;

  constructor(databasePath: string, cause: unknown) {
    super(`Could not open observation store at ${databasePath}: ${describeError(cause)}`, {
      cause
    });
    this.databasePath = databasePath;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
