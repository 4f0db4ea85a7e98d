export interface Deferred<T> {
  readonly promise: Promise<T>;
  /** Settles the promise; calls after the first are ignored */
  resolve(value: T): void;
  readonly settled: boolean;
}

/**
 * One-shot hand-off between an event source and a waiter that may arrive before or after the event
 */
export function createDeferred<T>(): Deferred<T> {
  let settled = false;
  let settle: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });

  return {
    promise,
    resolve(value: T) {
      if (settled) {
        return;
      }
      settled = true;
      settle(value);
    },
    get settled() {
      return settled;
    },
  };
}
