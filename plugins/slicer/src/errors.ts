/**
 * Error taxonomy for a slicer run.
 *
 * Every failure the runner surfaces is a `SlicerError` with a stable `code`,
 * so the CLI can map it to an exit status and callers can branch on it
 * without matching message text.
 */

export type SlicerErrorCode =
  | 'INVALID_REQUEST'
  | 'ENVIRONMENT'
  | 'FORM_INTERACTION'
  | 'JOB_FAILED'
  | 'JOB_TIMED_OUT'
  | 'ARTIFACT_NOT_FOUND'
  | 'CANCELLED';

export class SlicerError extends Error {
  readonly code: SlicerErrorCode;

  constructor(code: SlicerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class JobRequestValidationError extends SlicerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_REQUEST', `Invalid job request: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** The browser binary is missing or could not be launched. */
export class EnvironmentError extends SlicerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ENVIRONMENT', message, options);
  }
}

export class FormInteractionError extends SlicerError {
  readonly field: string;
  readonly selector: string;
  readonly timeoutMs: number;

  constructor(field: string, selector: string, timeoutMs: number) {
    super(
      'FORM_INTERACTION',
      `Form field "${field}" (${selector}) was not ready within ${timeoutMs}ms`,
    );
    this.field = field;
    this.selector = selector;
    this.timeoutMs = timeoutMs;
  }
}

/** The server marked the job as failed. */
export class JobFailedError extends SlicerError {
  readonly serverMessage: string;
  readonly elapsedMs: number;

  constructor(serverMessage: string, elapsedMs: number) {
    super('JOB_FAILED', `Job failed after ${elapsedMs}ms: ${serverMessage || '(no message on page)'}`);
    this.serverMessage = serverMessage;
    this.elapsedMs = elapsedMs;
  }
}

/**
 * The job was still pending when the deadline passed. Kept apart from
 * `JobFailedError` so a caller can re-run with a longer timeout.
 */
export class JobTimedOutError extends SlicerError {
  readonly elapsedMs: number;
  readonly timeoutMs: number;

  constructor(elapsedMs: number, timeoutMs: number) {
    super(
      'JOB_TIMED_OUT',
      `Job still pending after ${elapsedMs}ms (timeout ${timeoutMs}ms); try a longer --timeout`,
    );
    this.elapsedMs = elapsedMs;
    this.timeoutMs = timeoutMs;
  }
}

/** The job completed on the server but no file landed in the download directory. */
export class ArtifactNotFoundError extends SlicerError {
  readonly directory: string;
  readonly pattern: string;
  readonly waitedMs: number;

  constructor(directory: string, pattern: string, waitedMs: number) {
    super(
      'ARTIFACT_NOT_FOUND',
      `Job completed but no file matching ${pattern} settled in ${directory} within ${waitedMs}ms`,
    );
    this.directory = directory;
    this.pattern = pattern;
    this.waitedMs = waitedMs;
  }
}

export class JobCancelledError extends SlicerError {
  constructor(stage: string) {
    super('CANCELLED', `Cancelled while ${stage}`);
  }
}

const EXIT_CODES: Record<SlicerErrorCode, number> = {
  INVALID_REQUEST: 2,
  ENVIRONMENT: 3,
  FORM_INTERACTION: 4,
  JOB_FAILED: 5,
  JOB_TIMED_OUT: 6,
  ARTIFACT_NOT_FOUND: 7,
  CANCELLED: 130,
};

export function exitCodeFor(err: unknown): number {
  return err instanceof SlicerError ? EXIT_CODES[err.code] : 1;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
