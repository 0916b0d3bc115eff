import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class GetQueueCapacity<T> {
  constructor(private heap: BinaryHeap<T>) {}

  execute() {
    return this.heap.capacity;
  }
}
