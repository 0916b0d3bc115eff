import type { HeapNode } from "@domain/entities/HeapNode";
import { InvalidArgumentError } from "@domain/errors/PriorityQueueErrors";
import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class UpdateNodePriority<T> {
  constructor(private heap: BinaryHeap<T>) {}

  execute(matches: (node: HeapNode<T>) => boolean, priority: number): number {
    if (!Number.isSafeInteger(priority)) {
      throw new InvalidArgumentError(
        `Priority must be a safe integer, got ${priority}`
      );
    }

    const found = this.heap.findAll(matches);

    for (const node of found) {
      node.priority = priority;
      this.heap.resift(node);
    }

    return found.length;
  }
}
