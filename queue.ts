// @filename: queue.ts
/**
 * FIFO queue used for replay buffers.
 *
 * A bounded queue is a ring over a fixed array, so evicting the oldest entry
 * and appending a new one never moves the rest. An unbounded queue
 * (`capacity = Infinity`) is a growing array.
 *
 * The API is a set of functions over a plain {@link Queue} record.
 *
 * @example
 * ```ts
 * const buffer = createQueue<string>(2);
 * enqueue(buffer, "a");
 * enqueue(buffer, "b");
 * if (isFull(buffer)) dequeue(buffer); // drops "a"
 * enqueue(buffer, "c");
 * toArray(buffer); // ["b", "c"]
 * ```
 *
 * @module
 */

export interface Queue<T> {
  items: T[];
  head: number;
  size: number;
  capacity: number;
}

export function createQueue<T>(capacity: number = Infinity): Queue<T> {
  if (!(capacity >= 1)) {
    throw new RangeError(`Queue capacity must be at least 1, got ${capacity}`);
  }

  const bounded = Number.isFinite(capacity);
  return {
    items: bounded ? new Array<T>(capacity) : [],
    head: 0,
    size: 0,
    capacity,
  };
}

function slot<T>(queue: Queue<T>, offset: number): number {
  return Number.isFinite(queue.capacity)
    ? (queue.head + offset) % queue.capacity
    : queue.head + offset;
}

export function enqueue<T>(queue: Queue<T>, item: T): void {
  if (isFull(queue)) {
    throw new Error(`Queue overflow: cannot add item, capacity ${queue.capacity} reached`);
  }

  queue.items[slot(queue, queue.size)] = item;
  queue.size++;
}

export function dequeue<T>(queue: Queue<T>): T | undefined {
  if (isEmpty(queue)) return undefined;

  const item = queue.items[queue.head];
  // Release the reference
  delete queue.items[queue.head];

  if (Number.isFinite(queue.capacity)) {
    queue.head = (queue.head + 1) % queue.capacity;
  } else {
    queue.head++;
    // Compact once the dead prefix outweighs the live part
    if (queue.head > 32 && queue.head * 2 > queue.items.length) {
      queue.items = queue.items.slice(queue.head);
      queue.head = 0;
    }
  }

  queue.size--;
  return item;
}

export function isEmpty<T>(queue: Queue<T>): boolean {
  return queue.size === 0;
}

export function isFull<T>(queue: Queue<T>): boolean {
  return queue.size >= queue.capacity;
}

/** Oldest-first copy of the contents. */
export function toArray<T>(queue: Queue<T>): T[] {
  const result: T[] = [];
  for (let i = 0; i < queue.size; i++) result.push(queue.items[slot(queue, i)]);
  return result;
}
