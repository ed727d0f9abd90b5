/**
 * Cooperative cancellation plus a one-shot completion signal for one
 * connection's receive loop.
 *
 * `cancel()` only aborts `signal`; the loop notices at its next receive.
 * `completed` resolves once, when the loop calls `complete()` on its way out.
 */

export class ShutdownCoordinator {
  private _controller = new AbortController();
  private _resolveCompleted: () => void = () => {};
  private _completed = false;

  readonly completed: Promise<void> = new Promise<void>((resolve) => {
    this._resolveCompleted = resolve;
  });

  get signal(): AbortSignal {
    return this._controller.signal;
  }

  get isCompleted(): boolean {
    return this._completed;
  }

  cancel(): void {
    this._controller.abort();
  }

  /**
   * Fulfil the completion signal. Returns false if it was already fulfilled.
   */
  complete(): boolean {
    if (this._completed) return false;
    this._completed = true;
    this._resolveCompleted();
    return true;
  }
}
