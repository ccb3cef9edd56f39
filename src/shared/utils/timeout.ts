// Shared timeout helpers for async operations.
//
// These utilities provide a small, typed wrapper around Promise-based
// operations so that callers can:
//   - Enforce explicit time budgets for long enumerations.
//   - Record durations in milliseconds for observability.
//   - Distinguish between successful completion, timeout, and cancellation.
//
// They are designed to be used alongside the cancellation primitives in
// src/shared/utils/cancellation.ts.

import type { CancellationReason, CancellationToken } from './cancellation';
import { isCanceledError } from './cancellation';

export type TimedOperationOutcome = 'ok' | 'timeout' | 'canceled';

export interface TimedOperationResult<T> {
  /** Outcome of the operation. */
  kind: TimedOperationOutcome;
  /**
   * Wall-clock duration in milliseconds between start and resolution
   * (success, timeout, or cancellation observation).
   */
  durationMs: number;
  /** Present when kind === 'ok'. */
  value?: T;
  /** Present when kind === 'canceled'. */
  cancellationReason?: CancellationReason;
}

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds. */
  timeoutMs: number;
  /** Optional cancellation token for cooperative cancellation. */
  token?: CancellationToken;
  /** Called once when the time budget runs out, before the result settles. */
  onTimeout?: () => void;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
}

class TimeoutError extends Error {
  constructor() {
    super('Timed operation exceeded timeoutMs');
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Run an async operation with an upper time bound, returning a structured
 * result instead of throwing on timeout.
 *
 * Notes on cancellation integration:
 * - If a CancellationToken is provided and is already canceled before the
 *   operation starts, the function returns `kind: 'canceled'` immediately.
 * - If the underlying operation throws a CanceledError (as produced by
 *   `CancellationToken.throwIfCanceled`), the result is mapped to
 *   `kind: 'canceled'`.
 * - This helper does **not** forcibly abort in-flight work; `onTimeout` is
 *   the hook for cancelling a token the operation checks.
 */
export async function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  const { timeoutMs, token, onTimeout, now = Date.now } = options;
  const start = now();

  if (token?.isCanceled) {
    return {
      kind: 'canceled',
      durationMs: 0,
      cancellationReason: token.reason,
    };
  }

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError());
    }, timeoutMs);
  });

  try {
    const value = await Promise.race([operation(), timeoutPromise]);
    return {
      kind: 'ok',
      durationMs: now() - start,
      value,
    };
  } catch (error) {
    const durationMs = now() - start;

    if (error instanceof TimeoutError) {
      return {
        kind: 'timeout',
        durationMs,
      };
    }

    if (isCanceledError(error)) {
      return {
        kind: 'canceled',
        durationMs,
        cancellationReason: error.cancellationReason,
      };
    }

    // For all other errors, rethrow and let callers handle domain-specific
    // failures.
    throw error;
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
  }
}
