/**
 * Runs an abortable operation against a deadline. When the deadline passes
 * first, the operation's signal is aborted and the result rejects with a
 * TimeoutError. The timer is always cleaned up.
 */
export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label = "Operation",
): Promise<T> {
  const controller = new AbortController();
  if (ms <= 0) return run(controller.signal);
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
    }, ms);
    timer.unref();
  });
  return Promise.race([run(controller.signal), timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
