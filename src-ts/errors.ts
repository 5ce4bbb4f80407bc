// Error kinds raised across a batch run. Only SpreadsheetReadError and
// ValidationRuntimeError are recovered from; the rest abort the run.

export class BatchValidationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class DiscoveryError extends BatchValidationError {}

export class ExtractionError extends BatchValidationError {}

export class SpreadsheetReadError extends BatchValidationError {
  constructor(readonly file: string, cause?: unknown) {
    super(`Error with ${file}: ${getErrorMessage(cause)}`, cause);
  }
}

export class EmptyInputError extends BatchValidationError {
  constructor() {
    super("No rows were read from any spreadsheet; nothing to validate");
  }
}

export class ValidationRuntimeError extends BatchValidationError {
  constructor(
    readonly column: string,
    readonly tableIndex: number,
    readonly value: unknown,
    cause?: unknown
  ) {
    super(
      `Exception during '${column}' validation at index: ${tableIndex}, value: ${String(
        value
      )}, Exception: ${getErrorMessage(cause)}`,
      cause
    );
  }
}

export class LogWriteError extends BatchValidationError {}

export class ExportWriteError extends BatchValidationError {}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return "Unknown error occurred";
}
