import type { IAccessGuard } from "@domain/interfaces/IAccessGuard";
import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class CollectMetrics<T> {
  constructor(
    private heap: BinaryHeap<T>,
    private guard: IAccessGuard
  ) {}

  execute() {
    const disposed = this.guard.isDisposed;

    return {
      length: disposed ? 0 : this.heap.count,
      capacity: disposed ? 0 : this.heap.capacity,
      disposed,
      scheduled: this.guard.isScheduled,
    };
  }
}
