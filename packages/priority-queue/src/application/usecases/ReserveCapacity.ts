import { InvalidArgumentError } from "@domain/errors/PriorityQueueErrors";
import type { ILogger } from "@domain/interfaces/ILogger";
import type { BinaryHeap } from "@domain/services/BinaryHeap";

export class ReserveCapacity<T> {
  constructor(
    private heap: BinaryHeap<T>,
    private logger?: ILogger
  ) {}

  execute(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new InvalidArgumentError(
        `Capacity must be a non-negative integer, got ${capacity}`
      );
    }

    const previous = this.heap.capacity;
    this.heap.reserve(capacity);

    if (this.heap.capacity !== previous) {
      this.logger?.log(
        "Queue storage reserved",
        { from: previous, to: this.heap.capacity },
        "debug"
      );
    }
  }
}
