/**
 * One-way stop request shared between the listener and the run loop.
 *
 * Backed by an AbortController: `abort()` is a single false-to-true
 * transition and the signal never resets.
 */
export class StopFlag {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isRequested(): boolean {
    return this.controller.signal.aborted;
  }

  /** Returns true only for the call that actually set the flag. */
  request(): boolean {
    if (this.controller.signal.aborted) {
      return false;
    }
    this.controller.abort();
    return true;
  }
}
