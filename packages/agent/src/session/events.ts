export type EventChannel<T> = {
  readonly emit: (event: T) => void;
  readonly complete: () => void;
  /** Drops buffered events, ends the iterator and runs `onCancel` once. */
  readonly cancel: () => void;
  readonly closed: () => boolean;
  readonly iterator: () => AsyncIterable<T>;
};

/**
 * An ordered, single-consumer queue between a producer task and an async
 * iterator. Events emitted after completion or cancellation are dropped.
 */
export function createEventChannel<T>(onCancel: () => void = () => {}): EventChannel<T> {
  // Entries are boxed so an emitted `undefined` stays distinguishable from an empty queue
  const buffer: Array<{ readonly value: T }> = [];
  let waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  let done = false;

  const wake = (result: IteratorResult<T, undefined>): boolean => {
    if (!waiter) {
      return false;
    }
    const w = waiter;
    waiter = null;
    w(result);
    return true;
  };

  const cancel = (): void => {
    if (done) {
      return;
    }
    done = true;
    buffer.length = 0;
    wake({ done: true, value: undefined });
    onCancel();
  };

  const asyncIterator: AsyncIterator<T, undefined> = {
    next: async (): Promise<IteratorResult<T, undefined>> => {
      const entry = buffer.shift();
      if (entry) {
        return { value: entry.value, done: false };
      }

      if (done) {
        return { done: true, value: undefined };
      }

      return new Promise<IteratorResult<T, undefined>>((resolve) => {
        waiter = resolve;
      });
    },

    return: async (): Promise<IteratorResult<T, undefined>> => {
      cancel();
      return { done: true, value: undefined };
    },
  };

  return {
    emit: (event: T) => {
      if (done) {
        return;
      }
      if (!wake({ value: event, done: false })) {
        buffer.push({ value: event });
      }
    },

    complete: () => {
      if (done) {
        return;
      }
      done = true;
      wake({ done: true, value: undefined });
    },

    cancel,

    closed: () => done,

    iterator: () => ({
      [Symbol.asyncIterator]: () => asyncIterator,
    }),
  };
}
