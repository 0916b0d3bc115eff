import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class ClearQueue<T> {
  constructor(private heap: BinaryHeap<T>) {}

  execute() {
    this.heap.clear();
  }
}
