import { toHandle, type HeapNodeHandle } from "@domain/entities/HeapNode";
import { EmptyQueueError } from "@domain/errors/PriorityQueueErrors";
import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class DequeueNode<T> {
  constructor(private heap: BinaryHeap<T>) {}

  execute(): HeapNodeHandle<T> {
    if (this.heap.count === 0) throw new EmptyQueueError();
    return toHandle(this.heap.removeAt(1));
  }
}
