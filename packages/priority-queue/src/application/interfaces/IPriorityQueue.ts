import type { HeapNodeHandle } from "@domain/entities/HeapNode";
import type { IJobHandle } from "./IJobHandle";
import type { QueueJob } from "./IJobScheduler";

export interface IPriorityQueueMetrics {
  length: number;
  capacity: number;
  disposed: boolean;
  scheduled: boolean;
}

export interface IPriorityQueue<T> extends Iterable<HeapNodeHandle<T>> {
  readonly length: number;
  readonly capacity: number;
  setCapacity(capacity: number): void;
  isEmpty(): boolean;
  enqueue(value: T, priority: number): void;
  dequeue(): HeapNodeHandle<T>;
  peek(): HeapNodeHandle<T>;
  removeByValue(value: T): number;
  removeByPriority(priority: number): number;
  updatePriorityByValue(value: T, priority: number): number;
  contains(handle: HeapNodeHandle<T>): boolean;
  clear(): void;
  toArray(): HeapNodeHandle<T>[];
  schedule(job: QueueJob<IPriorityQueue<T>>, dependsOn?: IJobHandle): IJobHandle;
  disposeAfter(dependsOn: IJobHandle): IJobHandle;
  dispose(): void;
  getMetrics(): IPriorityQueueMetrics;
}
