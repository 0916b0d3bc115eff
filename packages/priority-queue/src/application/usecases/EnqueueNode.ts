import type { BinaryHeap } from "@domain/services/BinaryHeap";
import type { ILogger } from "@domain/interfaces/ILogger";
import { InvalidArgumentError } from "@domain/errors/PriorityQueueErrors";

export class EnqueueNode<T> {
  constructor(
    private heap: BinaryHeap<T>,
    private logger?: ILogger
  ) {}

  execute(value: T, priority: number) {
    if (!Number.isSafeInteger(priority)) {
      throw new InvalidArgumentError(
        `Priority must be a safe integer, got ${priority}`
      );
    }

    const capacity = this.heap.capacity;
    this.heap.push({ value, priority, position: 0 });

    if (this.heap.capacity !== capacity) {
      this.logger?.log(
        "Queue storage grew",
        { from: capacity, to: this.heap.capacity },
        "debug"
      );
    }
  }
}
