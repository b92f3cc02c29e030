/**
 * Runs `task` with an AbortSignal that fires after `ms`. The returned promise
 * settles with `onTimeout()` at the deadline even if the task ignores the
 * signal, so callers never wait past the bound.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, ms);
  });
  try {
    return await Promise.race([task(controller.signal), deadline]);
  } catch (err) {
    if (controller.signal.aborted) throw onTimeout();
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
