/**
 * RunState — status and stop control for one scheduler run.
 *
 * All mutable fields are private. Strategies interact through the public API
 * (beginRun, setStatus, updateProgress, markCompleted, cleanup, …); signal
 * handlers only ever call requestStop().
 */

export type RunStatus = 'idle' | 'running' | 'stopping' | 'stopped' | 'completed' | 'completed-with-errors' | 'failed';

/** Status fields maintained by a RunState instance. */
export interface RunStatusFields {
  running: boolean;
  status: RunStatus;
  strategy: string | null;
  currentInterval: string | null;
  totalItems: number;
  processedItems: number;
  errorItems: number;
  startedAt: string | null;
  finishedAt: string | null;
}

export class RunState {
  readonly name: string;

  private _running = false;
  private _stopRequested = false;
  private _abortController: AbortController | null = null;
  private _status: RunStatusFields;

  constructor(name: string) {
    this.name = name;
    this._status = {
      running: false,
      status: 'idle',
      strategy: null,
      currentInterval: null,
      totalItems: 0,
      processedItems: 0,
      errorItems: 0,
      startedAt: null,
      finishedAt: null,
    };
  }

  // ---------------------------------------------------------------------------
  // Read-only accessors
  // ---------------------------------------------------------------------------

  /** True while a run owns this state object. */
  get isRunning(): boolean {
    return this._running;
  }

  /** True if requestStop() was called and the run has not yet acknowledged it. */
  get isStopping(): boolean {
    return this._stopRequested;
  }

  /** True if stop was requested OR the AbortController signal was aborted. */
  get shouldStop(): boolean {
    return this._stopRequested || Boolean(this._abortController?.signal.aborted);
  }

  /** The AbortSignal for the current run, or null if not running. */
  get signal(): AbortSignal | null {
    return this._abortController?.signal ?? null;
  }

  /** Returns a shallow-copy snapshot of the current status fields. */
  readStatus(): RunStatusFields {
    return { ...this._status };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle methods
  // ---------------------------------------------------------------------------

  /**
   * Begin a new run. Creates a fresh AbortController and resets the counters.
   * Throws if a run already owns this state.
   */
  beginRun(strategy: string, startedAt: Date = new Date()): AbortController {
    if (this._running) {
      throw new Error(`${this.name} is already running`);
    }
    this._running = true;
    this._stopRequested = false;
    this._abortController = new AbortController();
    this._status = {
      running: true,
      status: 'running',
      strategy,
      currentInterval: null,
      totalItems: 0,
      processedItems: 0,
      errorItems: 0,
      startedAt: startedAt.toISOString(),
      finishedAt: null,
    };
    return this._abortController;
  }

  /**
   * Signal the running job to stop at the next item boundary. Aborts the
   * AbortController. Returns false if not currently running.
   */
  requestStop(): boolean {
    if (!this._running) return false;
    this._stopRequested = true;
    this._status = { ...this._status, status: 'stopping' };
    if (this._abortController && !this._abortController.signal.aborted) {
      this._abortController.abort();
    }
    return true;
  }

  /** Merge fields into the current status (non-destructive). */
  setStatus(fields: Partial<RunStatusFields>): void {
    this._status = { ...this._status, ...fields };
  }

  /** Add to the running counters; keeps status at 'stopping' once a stop was requested. */
  updateProgress(delta: { total?: number; processed?: number; errors?: number }): void {
    this._status = {
      ...this._status,
      totalItems: this._status.totalItems + (delta.total ?? 0),
      processedItems: this._status.processedItems + (delta.processed ?? 0),
      errorItems: this._status.errorItems + (delta.errors ?? 0),
      status: this._stopRequested ? 'stopping' : this._status.status,
    };
  }

  /** Transition to the 'stopped' terminal state and clear the stop-requested flag. */
  markStopped(finishedAt: Date = new Date()): void {
    this._stopRequested = false;
    this._status = { ...this._status, running: false, status: 'stopped', finishedAt: finishedAt.toISOString() };
  }

  /** Transition to 'completed', or 'completed-with-errors' when any item failed. */
  markCompleted(finishedAt: Date = new Date()): void {
    this._stopRequested = false;
    this._status = {
      ...this._status,
      running: false,
      status: this._status.errorItems > 0 ? 'completed-with-errors' : 'completed',
      currentInterval: null,
      finishedAt: finishedAt.toISOString(),
    };
  }

  /** Transition to the 'failed' terminal state. */
  markFailed(finishedAt: Date = new Date()): void {
    this._stopRequested = false;
    this._status = { ...this._status, running: false, status: 'failed', finishedAt: finishedAt.toISOString() };
  }

  /**
   * Clear the running flag and, if the provided AbortController reference matches
   * the stored one, clear it too. Always call this in a finally block.
   */
  cleanup(abortRef?: AbortController): void {
    if (!abortRef || this._abortController === abortRef) {
      this._abortController = null;
    }
    this._running = false;
  }
}
