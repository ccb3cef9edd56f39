import { createEmptyPosition, createStartingPosition } from '../../../src/shared/engine';
import { createCancellationSource } from '../../../src/shared/utils/cancellation';
import { runExploration } from '../../../src/server/analysis/explorationRunner';
import { logger } from '../../../src/server/utils/logger';

jest.mock('../../../src/server/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('runExploration', () => {
  const start = createStartingPosition();

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('completes a bounded exploration and logs a summary', async () => {
    const report = await runExploration(start, { maxDepth: 1, sliceSize: 8, timeoutMs: 10_000 });

    expect(report.outcome).toBe('complete');
    expect(report.result.countsByDepth).toEqual([30]);
    expect(report.cancellationReason).toBeUndefined();
    expect(logger.info).toHaveBeenCalledWith(
      'Position exploration finished',
      expect.objectContaining({ outcome: 'complete', maxDepth: 1, discovered: 30, countsByDepth: [30] })
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('falls back to configured limits', async () => {
    const report = await runExploration(createEmptyPosition());

    expect(report.outcome).toBe('complete');
    expect(report.result.countsByDepth).toEqual([0, 0]);
    expect(logger.info).toHaveBeenCalledWith(
      'Position exploration finished',
      expect.objectContaining({ maxDepth: 2, maxPositions: 1_000_000 })
    );
  });

  it('reports truncation at maxPositions', async () => {
    const report = await runExploration(start, { maxDepth: 2, maxPositions: 40, sliceSize: 4, timeoutMs: 10_000 });

    expect(report.outcome).toBe('truncated');
    expect(report.result.positions).toHaveLength(40);
    expect(logger.warn).toHaveBeenCalledWith(
      'Position exploration stopped early',
      expect.objectContaining({ outcome: 'truncated', discovered: 40 })
    );
  });

  it('expands nothing when the external token is already canceled', async () => {
    const source = createCancellationSource();
    source.cancel('shutdown');

    const report = await runExploration(start, { maxDepth: 2, sliceSize: 1, token: source.token, timeoutMs: 10_000 });

    expect(report.outcome).toBe('canceled');
    expect(report.cancellationReason).toBe('shutdown');
    expect(report.result.positions).toHaveLength(0);
    expect(report.result.countsByDepth).toEqual([0, 0]);
  });

  it('stops between slices when canceled during the run', async () => {
    const source = createCancellationSource();
    const pending = runExploration(start, { maxDepth: 2, sliceSize: 1, token: source.token, timeoutMs: 10_000 });
    source.cancel('user');

    const report = await pending;

    expect(report.outcome).toBe('canceled');
    expect(report.cancellationReason).toBe('user');
    expect(report.result.countsByDepth).toEqual([30, 0]);
  });

  it('gives up when the time budget runs out', async () => {
    const report = await runExploration(start, { maxDepth: 3, sliceSize: 1, timeoutMs: 1 });

    expect(report.outcome).toBe('timeout');
    expect(report.result.truncated).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      'Position exploration stopped early',
      expect.objectContaining({ outcome: 'timeout', maxDepth: 3 })
    );
  });
});
