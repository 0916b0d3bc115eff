import type { IAccessGuard } from "@domain/interfaces/IAccessGuard";
import type { ILogger } from "@domain/interfaces/ILogger";
import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class ReleaseQueue<T> {
  constructor(
    private heap: BinaryHeap<T>,
    private guard: IAccessGuard,
    private logger?: ILogger
  ) {}

  execute() {
    const { count, capacity } = this.heap;

    this.heap.release();
    this.guard.markDisposed();

    this.logger?.log("Queue disposed", { length: count, capacity });
  }
}
