import type { HeapNodeHandle } from "@domain/entities/HeapNode";
import type { EqualityComparer } from "@domain/interfaces/IEqualityComparer";
import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class CheckNodePresence<T> {
  constructor(
    private heap: BinaryHeap<T>,
    private equals: EqualityComparer<T>
  ) {}

  execute({ value, priority, position }: HeapNodeHandle<T>): boolean {
    if (
      !Number.isInteger(position) ||
      position < 1 ||
      position > this.heap.count
    ) {
      return false;
    }

    const node = this.heap.nodeAt(position);
    return node.priority === priority && this.equals(node.value, value);
  }
}
