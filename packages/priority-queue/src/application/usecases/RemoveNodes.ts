import type { HeapNode } from "@domain/entities/HeapNode";
import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class RemoveNodes<T> {
  constructor(private heap: BinaryHeap<T>) {}

  /**
   * Matches are collected up front and then removed at their current
   * position, which each move keeps up to date.
   */
  execute(matches: (node: HeapNode<T>) => boolean): number {
    const found = this.heap.findAll(matches);

    for (const node of found) {
      this.heap.removeAt(node.position);
    }

    return found.length;
  }
}
