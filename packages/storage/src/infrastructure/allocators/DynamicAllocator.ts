import {
  CapacityOverflowError,
  MAX_CAPACITY,
} from "../../domain/errors/StorageErrors";
import type { Slots } from "../../domain/interfaces/IAllocator";
import { BaseAllocator } from "./BaseAllocator";

/** Geometric growth: each reallocation multiplies the capacity by `growthFactor`. */
export class DynamicAllocator<T> extends BaseAllocator<T> {
  static GROWTH_FACTOR = 1.5;

  readonly strategy = "dynamic";

  constructor(private readonly growthFactor = DynamicAllocator.GROWTH_FACTOR) {
    super();

    if (!(growthFactor > 1)) {
      throw new RangeError(`Growth factor must be greater than 1, got ${growthFactor}`);
    }
  }

  grow(slots: Slots<T>, length: number, required: number): Slots<T> {
    if (required > MAX_CAPACITY) {
      throw new CapacityOverflowError(required);
    }

    const capacity = Math.min(
      MAX_CAPACITY,
      Math.max(required, Math.floor(slots.length * this.growthFactor))
    );

    const next = new Array<T | undefined>(capacity);
    for (let i = 0; i < length; i++) {
      next[i] = slots[i];
    }

    return next;
  }
}
