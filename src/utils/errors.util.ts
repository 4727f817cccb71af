/**
 * Error taxonomy for ingestion and reporting runs.
 * `statusCode` and `isOperational` are read by the Express error handler.
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;
  }
}

/**
 * Invalid or expired source credentials. Aborts the run.
 */
export class AuthError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
  }
}

export class SourceApiError extends AppError {
  readonly status: number | null;
  readonly transient: boolean;
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    details: { status: number | null; transient: boolean; retryAfterMs?: number | null; cause?: unknown }
  ) {
    super(message, 502, { cause: details.cause });
    this.status = details.status;
    this.transient = details.transient;
    this.retryAfterMs = details.retryAfterMs ?? null;
  }
}

/**
 * A task payload that could not be read at all. Recovered per task.
 */
export class ParseError extends AppError {
  readonly taskId: string | null;

  constructor(message: string, taskId: string | null) {
    super(message, 422);
    this.taskId = taskId;
  }
}

/**
 * Upsert failure. Fatal for the run; earlier upserts stay committed.
 */
export class StoreWriteError extends AppError {
  readonly taskId: string;

  constructor(taskId: string, cause: unknown) {
    super(`Failed to upsert task ${taskId}: ${errorMessage(cause)}`, 500, { cause });
    this.taskId = taskId;
  }
}

export class ExportWriteError extends AppError {
  readonly tab: string;
  readonly attempts: number;

  constructor(tab: string, attempts: number, cause: unknown) {
    super(`Failed to write tab '${tab}' after ${attempts} attempt(s): ${errorMessage(cause)}`, 502, { cause });
    this.tab = tab;
    this.attempts = attempts;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Summary-friendly form of a run-ending error. Retry wrappers are unwrapped to their last failure.
 */
export function toRunError(error: unknown): { kind: string; message: string; taskId?: string } {
  const root =
    typeof error === 'object' && error !== null && 'lastError' in error && error.lastError !== undefined
      ? error.lastError
      : error;

  return {
    kind: root instanceof Error ? root.name : 'Error',
    message: errorMessage(root),
    ...(root instanceof StoreWriteError && { taskId: root.taskId }),
  };
}
