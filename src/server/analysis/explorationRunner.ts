import { PositionExplorer } from '../../shared/engine/exploration';
import type { ExplorationResult } from '../../shared/engine/exploration';
import type { Position } from '../../shared/engine/position';
import type { CancellationReason, CancellationToken } from '../../shared/utils/cancellation';
import { createCancellationSource, isCanceledError } from '../../shared/utils/cancellation';
import { runWithTimeout } from '../../shared/utils/timeout';
import { config } from '../config';
import { logger } from '../utils/logger';

/**
 * Node host for position exploration.
 *
 * The explorer runs in slices of `sliceSize` worklist items with an event
 * loop turn between slices, so timers (the wall-clock budget) and external
 * cancellation are observed while a large enumeration is in progress.
 */

export type ExplorationOutcome = 'complete' | 'truncated' | 'timeout' | 'canceled';

export interface ExplorationRunOptions {
  /** Defaults to `config.exploration.maxDepth`. */
  maxDepth?: number;
  maxPositions?: number;
  timeoutMs?: number;
  sliceSize?: number;
  /** External cancellation, observed between slices. */
  token?: CancellationToken;
}

export interface ExplorationRunReport {
  outcome: ExplorationOutcome;
  /** Positions found before the run ended; partial unless `outcome` is 'complete'. */
  result: ExplorationResult;
  durationMs: number;
  cancellationReason?: CancellationReason;
}

const yieldToEventLoop = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

export async function runExploration(
  root: Position,
  options: ExplorationRunOptions = {}
): Promise<ExplorationRunReport> {
  const maxDepth = options.maxDepth ?? config.exploration.maxDepth;
  const maxPositions = options.maxPositions ?? config.exploration.maxPositions;
  const timeoutMs = options.timeoutMs ?? config.exploration.timeoutMs;
  const sliceSize = options.sliceSize ?? config.exploration.sliceSize;
  const external = options.token;

  const source = createCancellationSource();
  const explorer = new PositionExplorer(root, { maxDepth, maxPositions, token: source.token });

  const drive = async (): Promise<ExplorationResult> => {
    while (explorer.step(sliceSize)) {
      await yieldToEventLoop();
      if (external?.isCanceled) {
        source.cancel(external.reason);
      }
    }
    return explorer.result();
  };

  // Started inside the timed operation: a token canceled up front expands nothing.
  const running: { work?: Promise<ExplorationResult> } = {};
  const timed = await runWithTimeout(
    () => {
      running.work = drive();
      return running.work;
    },
    {
      timeoutMs,
      token: external,
      onTimeout: () => source.cancel(new Error(`exploration exceeded ${timeoutMs}ms`)),
    }
  );

  if (timed.kind !== 'ok' && running.work) {
    // Wait for the worklist to stop at its next cancellation check.
    source.cancel(timed.cancellationReason ?? new Error('exploration stopped'));
    await running.work.then(
      () => undefined,
      (error: unknown) => {
        if (!isCanceledError(error)) throw error;
      }
    );
  }

  const result = timed.value ?? explorer.result();
  const outcome: ExplorationOutcome =
    timed.kind === 'ok' ? (result.truncated ? 'truncated' : 'complete') : timed.kind;

  const summary = {
    outcome,
    maxDepth,
    maxPositions,
    discovered: result.positions.length,
    countsByDepth: result.countsByDepth,
    durationMs: timed.durationMs,
  };
  if (outcome === 'complete') {
    logger.info('Position exploration finished', summary);
  } else {
    logger.warn('Position exploration stopped early', summary);
  }

  return {
    outcome,
    result,
    durationMs: timed.durationMs,
    ...(timed.cancellationReason !== undefined ? { cancellationReason: timed.cancellationReason } : {}),
  };
}
