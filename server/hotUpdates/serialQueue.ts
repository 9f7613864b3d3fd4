export interface SerialQueue {
  runExclusive<T>(operation: () => Promise<T> | T): Promise<T>;
  isBusy(): boolean;
}

/** Promise-chain lock: operations run one at a time in submission order. */
export function createSerialQueue(): SerialQueue {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
      pending += 1;
      const run = tail.then(() => operation());
      tail = run.then(
        () => undefined,
        () => undefined
      );
      return run.finally(() => {
        pending -= 1;
      });
    },
    isBusy() {
      return pending > 0;
    }
  };
}
