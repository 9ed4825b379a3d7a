import { expect, test } from "vitest";

import { createQueue, dequeue, enqueue, isEmpty, isFull, toArray } from "../queue.ts";

test("bounded queue keeps insertion order across wrap-around", () => {
  const queue = createQueue<number>(3);

  enqueue(queue, 1);
  enqueue(queue, 2);
  enqueue(queue, 3);
  expect(isFull(queue)).toBe(true);

  expect(dequeue(queue)).toBe(1);
  enqueue(queue, 4);

  expect(toArray(queue)).toEqual([2, 3, 4]);
});

test("enqueue on a full queue throws", () => {
  const queue = createQueue<string>(1);
  enqueue(queue, "a");
  expect(() => enqueue(queue, "b")).toThrow("Queue overflow: cannot add item, capacity 1 reached");
});

test("capacity below one is rejected", () => {
  expect(() => createQueue(0)).toThrow(RangeError);
});

test("unbounded queue grows and compacts without losing order", () => {
  const queue = createQueue<number>();
  for (let i = 0; i < 50; i++) enqueue(queue, i);
  for (let i = 0; i < 40; i++) dequeue(queue);

  expect(isFull(queue)).toBe(false);
  expect(toArray(queue)).toEqual([40, 41, 42, 43, 44, 45, 46, 47, 48, 49]);

  enqueue(queue, 50);
  expect(dequeue(queue)).toBe(40);
  expect(toArray(queue)).toHaveLength(10);
});

test("dequeue on an empty queue returns undefined", () => {
  const queue = createQueue<number>(2);
  expect(dequeue(queue)).toBeUndefined();
  expect(isEmpty(queue)).toBe(true);
});
