import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class GetQueueLength<T> {
  constructor(private heap: BinaryHeap<T>) {}

  execute() {
    return this.heap.count;
  }
}
