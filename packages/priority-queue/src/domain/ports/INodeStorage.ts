import type { HeapSlot } from "@domain/entities/HeapNode";

export interface INodeStorage<T> {
  readonly length: number;
  readonly capacity: number;
  get(index: number): HeapSlot<T>;
  set(index: number, slot: HeapSlot<T>): void;
  append(slot: HeapSlot<T>): void;
  removeLast(): HeapSlot<T>;
  ensureCapacity(capacity: number): void;
  release(): void;
}
