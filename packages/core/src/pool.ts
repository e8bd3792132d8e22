export interface WorkItem<T> {
  readonly value: T;
  readonly index: number;
}

export type WorkFn<T> = (item: WorkItem<T>) => Promise<void>;

export interface QueueOptions {
  readonly concurrency?: number;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Items are started in order; each item is handed to exactly one call.
 * The first rejection rejects the whole run.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  worker: WorkFn<T>,
  options: QueueOptions = {}
): Promise<void> {
  const concurrency = Math.max(1, options.concurrency ?? 1);
  let cursor = 0;
  let active = 0;
  let failed = false;

  await new Promise<void>((resolve, reject) => {
    const maybeStartNext = () => {
      if (failed) return;

      if (cursor >= items.length) {
        if (active === 0) {
          resolve();
        }
        return;
      }

      while (active < concurrency && cursor < items.length) {
        const index = cursor++;
        const value = items[index];
        active += 1;

        worker({ value, index })
          .then(() => {
            active -= 1;
            maybeStartNext();
          })
          .catch((error: unknown) => {
            failed = true;
            reject(error);
          });
      }
    };

    maybeStartNext();
  });
}
