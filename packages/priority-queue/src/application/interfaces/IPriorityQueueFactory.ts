import type { IPriorityQueue } from "./IPriorityQueue";
import type { IPriorityQueueOptions } from "./IPriorityQueueOptions";

export interface IPriorityQueueFactory {
  create<T>(options?: IPriorityQueueOptions<T>): IPriorityQueue<T>;
}
