/**
 * Waits for every promise to settle, then resolves to `result` or rejects
 * with the first rejection reason observed.
 */
export function resolveAfterAll<T>(
  result: T,
  promises: ReadonlyArray<Promise<void>>,
): Promise<T> {
  return new Promise((resolve, reject) => {
    if (promises.length === 0) {
      resolve(result);
      return;
    }

    let rejected = false;
    let reason: unknown;
    let numPromises = promises.length;

    const onFulfilled = () => {
      numPromises--;

      if (!numPromises) {
        if (rejected) {
          reject(reason);
          return;
        }

        resolve(result);
      }
    };

    const onRejected = (_reason: unknown) => {
      if (!rejected) {
        rejected = true;
        reason = _reason;
      }

      numPromises--;

      if (!numPromises) {
        reject(reason);
      }
    };

    for (const promise of promises) {
      promise.then(onFulfilled, onRejected);
    }
  });
}
