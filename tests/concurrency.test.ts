import { processPooled, sleep } from '../src/utils/concurrency';
import { InterruptedError } from '../src/errors/BackupError';

describe('processPooled', () => {
  it('should keep input order when work finishes out of order', async () => {
    const delays = [30, 5, 15, 0];

    const results = await processPooled(delays, async (delay, index) => {
      await sleep(delay);
      return `${index}:${delay}`;
    }, 4);

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('should never exceed the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    await processPooled([1, 2, 3, 4, 5, 6], async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    }, 2);

    expect(peak).toBe(2);
  });

  it('should handle an empty list', async () => {
    await expect(processPooled([], async () => 1, 3)).resolves.toEqual([]);
  });
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it('should reject when the signal aborts', async () => {
    const controller = new AbortController();
    const waiting = sleep(10_000, controller.signal);

    controller.abort();

    await expect(waiting).rejects.toThrow(InterruptedError);
  });

  it('should reject immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(10_000, controller.signal)).rejects.toThrow('Wait interrupted');
  });
});
