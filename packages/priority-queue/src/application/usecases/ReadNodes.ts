import { toHandle, type HeapNodeHandle } from "@domain/entities/HeapNode";
import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class ReadNodes<T> {
  constructor(private heap: BinaryHeap<T>) {}

  execute(): HeapNodeHandle<T>[] {
    return Array.from(this.heap.nodes(), (node) => toHandle(node));
  }
}
