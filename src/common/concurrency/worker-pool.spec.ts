import { runPool } from './worker-pool';

describe('runPool', () => {
  const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

  it('should return results in input order', async () => {
    const delays = [3, 0, 1];

    const results = await runPool(delays, 2, async (delay, index) => {
      for (let i = 0; i < delay; i++) {
        await tick();
      }
      return index * 10;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 0 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 20 },
    ]);
  });

  it('should keep going after a rejected call', async () => {
    const failure = new Error('lookup failed');

    const results = await runPool(['AKBNK', 'BAD', 'SISE'], 2, async (symbol) => {
      if (symbol === 'BAD') {
        throw failure;
      }
      return symbol.toLowerCase();
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 'akbnk' },
      { status: 'rejected', reason: failure },
      { status: 'fulfilled', value: 'sise' },
    ]);
  });

  it('should never run more than the pool size at once', async () => {
    let inFlight = 0;
    let peak = 0;

    await runPool([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
    });

    expect(peak).toBe(2);
  });

  it('should resolve immediately for no items', async () => {
    const worker = jest.fn();

    expect(await runPool([], 4, worker)).toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });
});
