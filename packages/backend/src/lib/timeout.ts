export class TimeoutError extends Error {
  readonly timeout_ms: number;

  constructor(label: string, timeout_ms: number) {
    super(`${label} timed out after ${timeout_ms}ms`);
    this.name = 'TimeoutError';
    this.timeout_ms = timeout_ms;
  }
}

/**
 * Runs `fn` with an AbortSignal that fires after `timeout_ms`. Rejects with
 * TimeoutError when the deadline passes first; the timer is always cleared.
 */
export async function with_timeout<T>(
  label: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeout_ms: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeout_promise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(label, timeout_ms));
      }, timeout_ms);
    });

    return await Promise.race([fn(controller.signal), timeout_promise]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
