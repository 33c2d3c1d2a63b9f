/**
 * Error types and pure error-classification predicates.
 *
 * Kept in lib/ so stores, the executor and the fetch client can depend on
 * them without creating a lib → services dependency cycle.
 */

/** Failure kinds a bar fetcher can report. */
export type FetchErrorKind = 'rate-limited' | 'not-found' | 'transient' | 'malformed';

/**
 * `retryable` failures are throttling or infrastructure signals and widen the
 * rate-limit delay. `permanent` failures only count against the ticker.
 */
export type FetchFailureClass = 'retryable' | 'permanent';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly httpStatus: number | null;

  constructor(kind: FetchErrorKind, message: string, options: { httpStatus?: number | null; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.httpStatus = options.httpStatus ?? null;
  }

  get failureClass(): FetchFailureClass {
    return classifyFetchErrorKind(this.kind);
  }
}

export function classifyFetchErrorKind(kind: FetchErrorKind): FetchFailureClass {
  return kind === 'rate-limited' || kind === 'transient' ? 'retryable' : 'permanent';
}

/**
 * A store could not be read or written. Fatal to the current pass: the run
 * stops rather than continue with bookkeeping that may not match the disk.
 */
export class PersistenceError extends Error {
  readonly path: string | null;

  constructor(message: string, options: { path?: string | null; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PersistenceError';
    this.path = options.path ?? null;
  }
}

/** Thrown by startPass when an incomplete cursor for the same pass is on disk. */
export class ActivePassExistsError extends Error {
  readonly passId: string;

  constructor(passId: string) {
    super(`Pass ${passId} has an incomplete cursor on disk; resume it instead of starting a new one`);
    this.name = 'ActivePassExistsError';
    this.passId = passId;
  }
}

/** True for an AbortError by name, or an error whose message says it was aborted. */
export function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === 'AbortError' || /aborted|aborterror/i.test(err.message);
}

export function buildRequestAbortError(message = 'Request aborted'): Error {
  const err = new Error(message);
  err.name = 'AbortError';
  return err;
}

export class TaskTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'TaskTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function isTaskTimeoutError(err: unknown): err is TaskTimeoutError {
  return err instanceof TaskTimeoutError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
