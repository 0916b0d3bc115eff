import { SENTINEL, type HeapNode } from "@domain/entities/HeapNode";
import type { INodeStorage } from "@domain/ports/INodeStorage";
import { CapacityOverflowError, MAX_CAPACITY } from "@indexed-heap/storage";

/**
 * Array-backed binary min-heap over 1-based slots. Slot 0 holds a sentinel,
 * so the parent of `i` is `i >> 1` and its children are `2i` and `2i + 1`.
 *
 * Every write goes through {@link BinaryHeap.place}, which keeps each node's
 * `position` equal to the slot it sits in.
 */
export class BinaryHeap<T> {
  static MAX_CAPACITY = MAX_CAPACITY - 1;

  constructor(private storage: INodeStorage<T>) {
    if (storage.length === 0) {
      storage.append(SENTINEL);
    }
  }

  get count(): number {
    return this.storage.length - 1;
  }

  get capacity(): number {
    return this.storage.capacity - 1;
  }

  /** Overflow is reported in entries, without the sentinel slot. */
  reserve(capacity: number) {
    try {
      this.storage.ensureCapacity(capacity + 1);
    } catch (error) {
      if (error instanceof CapacityOverflowError) {
        throw new CapacityOverflowError(error.requested - 1, error.limit - 1);
      }
      throw error;
    }
  }

  nodeAt(position: number): HeapNode<T> {
    const slot = this.storage.get(position);
    if ("sentinel" in slot) {
      throw new RangeError(`Slot ${position} does not hold a live node`);
    }
    return slot;
  }

  push(node: HeapNode<T>) {
    this.reserve(this.count + 1);
    node.position = this.count + 1;
    this.storage.append(node);
    this.siftUp(node);
  }

  /**
   * Moves the last node into `position`, truncates, then restores order
   * around the moved node. Returns the node that was removed.
   */
  removeAt(position: number): HeapNode<T> {
    const removed = this.nodeAt(position);
    const lastPosition = this.count;
    const last = this.nodeAt(lastPosition);

    this.storage.removeLast();

    if (position !== lastPosition) {
      this.place(position, last);
      this.resift(last);
    }

    return removed;
  }

  /** Re-sifts a node whose priority changed or that was just moved. */
  resift(node: HeapNode<T>) {
    const parentPosition = node.position >> 1;

    if (
      parentPosition > 0 &&
      node.priority < this.nodeAt(parentPosition).priority
    ) {
      this.siftUp(node);
    } else {
      // the root can only move down
      this.siftDown(node);
    }
  }

  findAll(matches: (node: HeapNode<T>) => boolean): HeapNode<T>[] {
    const found: HeapNode<T>[] = [];
    for (let i = 1; i <= this.count; i++) {
      const node = this.nodeAt(i);
      if (matches(node)) found.push(node);
    }
    return found;
  }

  *nodes(): Generator<HeapNode<T>> {
    for (let i = 1; i <= this.count; i++) {
      yield this.nodeAt(i);
    }
  }

  clear() {
    while (this.count > 0) {
      this.storage.removeLast();
    }
  }

  release() {
    this.storage.release();
  }

  private place(position: number, node: HeapNode<T>) {
    node.position = position;
    this.storage.set(position, node);
  }

  // Ties stay below the existing parent.
  private siftUp(node: HeapNode<T>) {
    let position = node.position;

    while (position > 1) {
      const parentPosition = position >> 1;
      const parent = this.nodeAt(parentPosition);
      if (parent.priority <= node.priority) break;

      this.place(position, parent);
      position = parentPosition;
    }

    this.place(position, node);
  }

  // The left child is taken only when strictly lower than the right one.
  private siftDown(node: HeapNode<T>) {
    const count = this.count;
    let position = node.position;

    while (true) {
      const leftPosition = position * 2;
      if (leftPosition > count) break;

      const rightPosition = leftPosition + 1;
      let target = position;
      let child = this.nodeAt(leftPosition);

      if (child.priority < node.priority) {
        target = leftPosition;

        if (rightPosition <= count) {
          const right = this.nodeAt(rightPosition);
          if (!(child.priority < right.priority)) {
            child = right;
            target = rightPosition;
          }
        }
      } else if (rightPosition <= count) {
        const right = this.nodeAt(rightPosition);
        if (right.priority < node.priority) {
          child = right;
          target = rightPosition;
        }
      }

      if (target === position) break;

      this.place(position, child);
      position = target;
    }

    this.place(position, node);
  }
}
