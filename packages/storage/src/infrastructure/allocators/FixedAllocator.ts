import { CapacityOverflowError } from "../../domain/errors/StorageErrors";
import type { Slots } from "../../domain/interfaces/IAllocator";
import { BaseAllocator } from "./BaseAllocator";

/** Never reallocates; the capacity given at construction is a hard bound. */
export class FixedAllocator<T> extends BaseAllocator<T> {
  readonly strategy = "fixed";

  grow(slots: Slots<T>, _length: number, required: number): Slots<T> {
    throw new CapacityOverflowError(required, slots.length);
  }
}
