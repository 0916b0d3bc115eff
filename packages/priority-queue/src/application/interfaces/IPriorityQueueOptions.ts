import type { AllocationStrategy } from "@indexed-heap/storage";
import type { EqualityComparer } from "@domain/interfaces/IEqualityComparer";

/** The JSON-serializable part of the options, checked against a schema. */
export interface IPriorityQueueConfig {
  initialCapacity?: number;
  growthFactor?: number;
  allocator?: AllocationStrategy;
  safetyChecks?: boolean;
}

export interface IPriorityQueueOptions<T> extends IPriorityQueueConfig {
  /** Decides which entries `removeByValue` and `updatePriorityByValue` touch. */
  equals?: EqualityComparer<T>;
}
