// Shared cancellation token primitives for long-running engine work.
//
// Position exploration is cooperative: the explorer checks its token between
// worklist items, so a host can stop an enumeration from a timeout or a
// shutdown hook without the engine knowing about timers.

export type CancellationReason = unknown;

/**
 * Error thrown by {@link CancellationToken.throwIfCanceled}. Carries the
 * reason supplied by the canceller.
 */
export class CanceledError extends Error {
  readonly cancellationReason: CancellationReason;

  constructor(message: string, reason: CancellationReason) {
    super(message);
    this.name = 'CanceledError';
    this.cancellationReason = reason;
    Object.setPrototypeOf(this, CanceledError.prototype);
  }
}

export function isCanceledError(error: unknown): error is CanceledError {
  return error instanceof CanceledError;
}

/**
 * Read-only view of a cancellation token.
 */
export interface CancellationToken {
  /** True once cancel() has been invoked on the associated source. */
  readonly isCanceled: boolean;
  /** Optional reason supplied by the canceller (for logging/diagnostics). */
  readonly reason?: CancellationReason;

  /**
   * Throws a {@link CanceledError} if the token has been canceled.
   *
   *   token.throwIfCanceled('before expanding depth 3');
   */
  throwIfCanceled(contextMessage?: string): void;
}

/**
 * Mutable source for a {@link CancellationToken}.
 *
 * The typical pattern is:
 *   const source = createCancellationSource();
 *   const explorer = new PositionExplorer(root, { maxDepth: 3, token: source.token });
 *   // later, perhaps from a timeout:
 *   source.cancel(new Error('exploration timed out'));
 */
export interface CancellationSource {
  readonly token: CancellationToken;
  /**
   * Marks the token as canceled. Subsequent calls are no-ops.
   *
   * The optional `reason` is preserved on the token for diagnostics.
   */
  cancel(reason?: CancellationReason): void;
}

export function createCancellationSource(): CancellationSource {
  let canceled = false;
  let reason: CancellationReason | undefined;

  const token: CancellationToken = {
    get isCanceled() {
      return canceled;
    },
    get reason() {
      return reason;
    },
    throwIfCanceled(contextMessage?: string): void {
      if (!canceled) return;
      const detail = contextMessage ? ` (${contextMessage})` : '';
      throw new CanceledError(`Operation canceled${detail}`, reason);
    },
  };

  return {
    token,
    cancel(nextReason?: CancellationReason): void {
      if (canceled) return;
      canceled = true;
      reason = nextReason;
    },
  };
}
