/**
 * Read-only view of a cancellation request.
 * Tokens only observe; the owning {@link CancellationSource} is the sole writer.
 */
export class CancellationToken {
  /** A token that is not tied to any source and never reports a stop */
  static readonly none = new CancellationToken(() => false, false);

  private constructor(
    private readonly read: () => boolean,
    /** True if this token is associated with something that can request a stop */
    readonly stopPossible: boolean,
  ) {}

  get stopRequested(): boolean {
    return this.read();
  }

  /** Observe an AbortSignal: the token reports a stop once the signal has aborted */
  static fromAbortSignal(signal: AbortSignal): CancellationToken {
    return new CancellationToken(() => signal.aborted, true);
  }
}

/** Owns the stop flag and hands out tokens observing it */
export class CancellationSource {
  private readonly controller = new AbortController();
  readonly token: CancellationToken = CancellationToken.fromAbortSignal(this.controller.signal);

  get stopRequested(): boolean {
    return this.controller.signal.aborted;
  }

  /** Request a stop for every token of this source. Returns false if one was already requested. */
  requestStop(): boolean {
    if (this.controller.signal.aborted) return false;
    this.controller.abort();
    return true;
  }
}
