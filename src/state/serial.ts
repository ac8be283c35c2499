export type KeyedSerializer = {
  run: <T>(key: string, task: () => Promise<T>) => Promise<T>;
  pending: (key: string) => boolean;
};

/** Runs tasks sharing a key one after another; tasks under different keys run concurrently. */
export function createKeyedSerializer(): KeyedSerializer {
  const tails = new Map<string, Promise<unknown>>();
  return {
    run<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const next = previous.then(task, task);
      const tail: Promise<void> = next
        .then(
          () => undefined,
          () => undefined,
        )
        .then(() => {
          if (tails.get(key) === tail) {
            tails.delete(key);
          }
        });
      tails.set(key, tail);
      return next;
    },
    pending(key: string) {
      return tails.has(key);
    },
  };
}
