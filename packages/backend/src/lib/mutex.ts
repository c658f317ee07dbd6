export interface Mutex {
  run<T>(fn: () => Promise<T> | T): Promise<T>;
}

// FIFO lock: each run starts after the previous one settles, whatever its outcome
export function create_mutex(): Mutex {
  let chain: Promise<void> = Promise.resolve();
  return {
    run<T>(fn: () => Promise<T> | T): Promise<T> {
      const next = chain.then(fn, fn);
      chain = next.then(
        () => undefined,
        () => undefined,
      );
      return next;
    },
  };
}
