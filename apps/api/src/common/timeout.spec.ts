import { withTimeout } from './timeout';

describe('withTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(withTimeout(async () => 42, 1000, () => new Error('late'))).resolves.toBe(42);
  });

  it('rejects at the deadline even when the task ignores the signal', async () => {
    let aborted = false;
    const started = Date.now();

    await expect(
      withTimeout(
        (signal) => {
          signal.addEventListener('abort', () => {
            aborted = true;
          });
          return new Promise<never>(() => undefined);
        },
        50,
        () => new Error('late'),
      ),
    ).rejects.toThrow('late');

    expect(aborted).toBe(true);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('passes task failures through before the deadline', async () => {
    await expect(
      withTimeout(
        async () => {
          throw new Error('task failed');
        },
        1000,
        () => new Error('late'),
      ),
    ).rejects.toThrow('task failed');
  });
});
