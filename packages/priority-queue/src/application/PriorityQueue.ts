import type { IJobHandle } from "@app/interfaces/IJobHandle";
import type { IJobScheduler, QueueJob } from "@app/interfaces/IJobScheduler";
import type { IPriorityQueue } from "@app/interfaces/IPriorityQueue";
import type { HeapNodeHandle } from "@domain/entities/HeapNode";
import type { IAccessGuard } from "@domain/interfaces/IAccessGuard";
import type { EqualityComparer } from "@domain/interfaces/IEqualityComparer";
import type { CheckNodePresence } from "./usecases/CheckNodePresence";
import type { ClearQueue } from "./usecases/ClearQueue";
import type { CollectMetrics } from "./usecases/CollectMetrics";
import type { DequeueNode } from "./usecases/DequeueNode";
import type { EnqueueNode } from "./usecases/EnqueueNode";
import type { GetQueueCapacity } from "./usecases/GetQueueCapacity";
import type { GetQueueLength } from "./usecases/GetQueueLength";
import type { PeekNode } from "./usecases/PeekNode";
import type { ReadNodes } from "./usecases/ReadNodes";
import type { ReleaseQueue } from "./usecases/ReleaseQueue";
import type { RemoveNodes } from "./usecases/RemoveNodes";
import type { ReserveCapacity } from "./usecases/ReserveCapacity";
import type { UpdateNodePriority } from "./usecases/UpdateNodePriority";

export class PriorityQueue<T> implements IPriorityQueue<T> {
  constructor(
    private getQueueLength: GetQueueLength<T>,
    private getQueueCapacity: GetQueueCapacity<T>,
    private reserveCapacity: ReserveCapacity<T>,
    private enqueueNode: EnqueueNode<T>,
    private dequeueNode: DequeueNode<T>,
    private peekNode: PeekNode<T>,
    private removeNodes: RemoveNodes<T>,
    private updateNodePriority: UpdateNodePriority<T>,
    private checkNodePresence: CheckNodePresence<T>,
    private readNodes: ReadNodes<T>,
    private clearQueue: ClearQueue<T>,
    private releaseQueue: ReleaseQueue<T>,
    private collectMetrics: CollectMetrics<T>,
    private guard: IAccessGuard,
    private scheduler: IJobScheduler,
    private equals: EqualityComparer<T>
  ) {}

  get length(): number {
    this.guard.check();
    return this.getQueueLength.execute();
  }

  get capacity(): number {
    this.guard.check();
    return this.getQueueCapacity.execute();
  }

  setCapacity(capacity: number) {
    this.guard.check();
    this.reserveCapacity.execute(capacity);
  }

  isEmpty() {
    return this.length === 0;
  }

  enqueue(value: T, priority: number) {
    this.guard.check();
    this.enqueueNode.execute(value, priority);
  }

  dequeue() {
    this.guard.check();
    return this.dequeueNode.execute();
  }

  peek() {
    this.guard.check();
    return this.peekNode.execute();
  }

  removeByValue(value: T) {
    this.guard.check();
    return this.removeNodes.execute((node) => this.equals(node.value, value));
  }

  removeByPriority(priority: number) {
    this.guard.check();
    return this.removeNodes.execute((node) => node.priority === priority);
  }

  updatePriorityByValue(value: T, priority: number) {
    this.guard.check();
    return this.updateNodePriority.execute(
      (node) => this.equals(node.value, value),
      priority
    );
  }

  contains(handle: HeapNodeHandle<T>) {
    this.guard.check();
    return this.checkNodePresence.execute(handle);
  }

  clear() {
    this.guard.check();
    this.clearQueue.execute();
  }

  toArray() {
    this.guard.check();
    return this.readNodes.execute();
  }

  [Symbol.iterator]() {
    return this.toArray()[Symbol.iterator]();
  }

  schedule(job: QueueJob<IPriorityQueue<T>>, dependsOn?: IJobHandle): IJobHandle {
    return this.scheduler.schedule<IPriorityQueue<T>>(
      this,
      this.guard,
      job,
      dependsOn
    );
  }

  disposeAfter(dependsOn: IJobHandle): IJobHandle {
    return this.schedule((queue) => queue.dispose(), dependsOn);
  }

  dispose() {
    this.guard.check();
    this.releaseQueue.execute();
  }

  getMetrics() {
    return this.collectMetrics.execute();
  }
}
