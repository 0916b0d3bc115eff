import {
  CapacityOverflowError,
  MAX_CAPACITY,
} from "../../domain/errors/StorageErrors";
import type {
  AllocationStrategy,
  IAllocator,
  Slots,
} from "../../domain/interfaces/IAllocator";

export abstract class BaseAllocator<T> implements IAllocator<T> {
  abstract readonly strategy: AllocationStrategy;

  abstract grow(slots: Slots<T>, length: number, required: number): Slots<T>;

  allocate(capacity: number): Slots<T> {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Capacity must be a non-negative integer, got ${capacity}`);
    }
    if (capacity > MAX_CAPACITY) {
      throw new CapacityOverflowError(capacity);
    }

    return new Array<T | undefined>(capacity);
  }

  release(slots: Slots<T>): void {
    slots.length = 0;
  }
}
