import type { IJobScheduler } from "@app/interfaces/IJobScheduler";
import type { IPriorityQueue } from "@app/interfaces/IPriorityQueue";
import type { IPriorityQueueFactory } from "@app/interfaces/IPriorityQueueFactory";
import type { IPriorityQueueOptions } from "@app/interfaces/IPriorityQueueOptions";
import { PriorityQueue } from "@app/PriorityQueue";
import { CheckNodePresence } from "@app/usecases/CheckNodePresence";
import { ClearQueue } from "@app/usecases/ClearQueue";
import { CollectMetrics } from "@app/usecases/CollectMetrics";
import { DequeueNode } from "@app/usecases/DequeueNode";
import { EnqueueNode } from "@app/usecases/EnqueueNode";
import { GetQueueCapacity } from "@app/usecases/GetQueueCapacity";
import { GetQueueLength } from "@app/usecases/GetQueueLength";
import { PeekNode } from "@app/usecases/PeekNode";
import { ReadNodes } from "@app/usecases/ReadNodes";
import { ReleaseQueue } from "@app/usecases/ReleaseQueue";
import { RemoveNodes } from "@app/usecases/RemoveNodes";
import { ReserveCapacity } from "@app/usecases/ReserveCapacity";
import { UpdateNodePriority } from "@app/usecases/UpdateNodePriority";
import type { HeapSlot } from "@domain/entities/HeapNode";
import type { ILogger } from "@domain/interfaces/ILogger";
import { InvalidArgumentError } from "@domain/errors/PriorityQueueErrors";
import { BinaryHeap } from "@domain/services/BinaryHeap";
import { AccessGuard } from "@infra/safety/AccessGuard";
import { JobScheduler } from "@infra/scheduling/JobScheduler";
import { ConfigValidator } from "@infra/validation/ConfigValidator";
import {
  AllocatorFactory,
  CapacityOverflowError,
  GrowableArray,
} from "@indexed-heap/storage";

export class PriorityQueueFactory implements IPriorityQueueFactory {
  static INITIAL_CAPACITY = 16;

  private validator = new ConfigValidator();
  private allocators = new AllocatorFactory();
  private scheduler: IJobScheduler;

  constructor(private logger?: ILogger) {
    this.scheduler = new JobScheduler(logger);
  }

  create<T>(options: IPriorityQueueOptions<T> = {}): IPriorityQueue<T> {
    const { equals = Object.is, ...config } = options;
    if (typeof equals !== "function") {
      throw new InvalidArgumentError(
        "Invalid queue options: equals must be a function"
      );
    }

    const {
      initialCapacity = PriorityQueueFactory.INITIAL_CAPACITY,
      growthFactor,
      allocator = "dynamic",
      safetyChecks = process.env.NODE_ENV !== "production",
    } = this.validator.validate(config);

    if (initialCapacity > BinaryHeap.MAX_CAPACITY) {
      throw new CapacityOverflowError(initialCapacity, BinaryHeap.MAX_CAPACITY);
    }

    // one extra slot for the sentinel at index 0
    const storage = new GrowableArray<HeapSlot<T>>(
      this.allocators.create<HeapSlot<T>>(allocator, { growthFactor }),
      initialCapacity + 1
    );
    const heap = new BinaryHeap<T>(storage);
    const guard = new AccessGuard(safetyChecks);
    const { logger } = this;

    return new PriorityQueue<T>(
      new GetQueueLength(heap),
      new GetQueueCapacity(heap),
      new ReserveCapacity(heap, logger),
      new EnqueueNode(heap, logger),
      new DequeueNode(heap),
      new PeekNode(heap),
      new RemoveNodes(heap),
      new UpdateNodePriority(heap),
      new CheckNodePresence(heap, equals),
      new ReadNodes(heap),
      new ClearQueue(heap),
      new ReleaseQueue(heap, guard, logger),
      new CollectMetrics(heap, guard),
      guard,
      this.scheduler,
      equals
    );
  }
}
