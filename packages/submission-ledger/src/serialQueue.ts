export type SerialQueue = {
  run: <T>(task: () => Promise<T>) => Promise<T>;
  /** Tasks accepted but not yet settled, including the running one. */
  readonly pending: number;
};

/**
 * FIFO executor: each task starts only after the previous one settled, whatever
 * its outcome. A rejected task rejects its own caller and nothing else.
 */
export const createSerialQueue = (): SerialQueue => {
  let tail: Promise<unknown> = Promise.resolve();
  let pending = 0;

  const run = <T>(task: () => Promise<T>) => {
    pending += 1;
    const result = tail.then(task).finally(() => {
      pending -= 1;
    });
    tail = result.catch(() => undefined);
    return result;
  };

  return {
    run,
    get pending() {
      return pending;
    }
  };
};
