import { createCancellationSource } from '../../../src/shared/utils/cancellation';
import { runWithTimeout } from '../../../src/shared/utils/timeout';

describe('runWithTimeout', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns the value and duration of a fast operation', async () => {
    let clock = 100;
    const result = await runWithTimeout(
      async () => {
        clock += 25;
        return 'done';
      },
      { timeoutMs: 1000, now: () => clock }
    );
    expect(result).toEqual({ kind: 'ok', durationMs: 25, value: 'done' });
  });

  it('reports a timeout and calls onTimeout once', async () => {
    jest.useFakeTimers();
    const onTimeout = jest.fn();
    const pending = runWithTimeout(() => new Promise<string>(() => undefined), {
      timeoutMs: 50,
      onTimeout,
    });

    jest.advanceTimersByTime(50);
    const result = await pending;

    expect(result.kind).toBe('timeout');
    expect(result.value).toBeUndefined();
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('short-circuits an already canceled token', async () => {
    const source = createCancellationSource();
    source.cancel('stop');
    const operation = jest.fn(async () => 1);

    const result = await runWithTimeout(operation, { timeoutMs: 1000, token: source.token });

    expect(result).toEqual({ kind: 'canceled', durationMs: 0, cancellationReason: 'stop' });
    expect(operation).not.toHaveBeenCalled();
  });

  it('maps a CanceledError from the operation to canceled', async () => {
    const source = createCancellationSource();
    const result = await runWithTimeout(
      async () => {
        source.cancel('midway');
        source.token.throwIfCanceled();
        return 1;
      },
      { timeoutMs: 1000 }
    );
    expect(result.kind).toBe('canceled');
    expect(result.cancellationReason).toBe('midway');
  });

  it('rethrows other errors', async () => {
    await expect(
      runWithTimeout(
        async () => {
          throw new Error('boom');
        },
        { timeoutMs: 1000 }
      )
    ).rejects.toThrow('boom');
  });
});
