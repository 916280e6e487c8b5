/**
 * TaskQueue: async FIFO queue.
 *
 * Producers push synchronously; a single consumer awaits the next item.
 * Nothing polls: an empty queue parks the consumer on a promise.
 */

export interface TaskQueue<T> {
  push(item: T): void;
  pull(): Promise<T>;
  clear(): void;
  size(): number;
}

export function createTaskQueue<T>(): TaskQueue<T> {
  const buffer: T[] = [];
  let resolver: ((item: T) => void) | null = null;

  return {
    push(item: T): void {
      if (resolver) {
        // Consumer is waiting, hand over directly
        const resolve = resolver;
        resolver = null;
        resolve(item);
      } else {
        buffer.push(item);
      }
    },

    pull(): Promise<T> {
      if (buffer.length > 0) {
        const [next] = buffer.splice(0, 1);
        return Promise.resolve(next);
      }
      return new Promise<T>((resolve) => {
        resolver = resolve;
      });
    },

    clear(): void {
      buffer.length = 0;
      resolver = null;
    },

    size(): number {
      return buffer.length;
    },
  };
}
