import type {
  AllocationStrategy,
  IAllocator,
} from "../../domain/interfaces/IAllocator";
import { DynamicAllocator } from "../allocators/DynamicAllocator";
import { FixedAllocator } from "../allocators/FixedAllocator";

export interface IAllocatorOptions {
  growthFactor?: number;
}

export class AllocatorFactory {
  create<T>(
    strategy: AllocationStrategy,
    options: IAllocatorOptions = {}
  ): IAllocator<T> {
    switch (strategy) {
      case "dynamic":
        return new DynamicAllocator<T>(options.growthFactor);
      case "fixed":
        return new FixedAllocator<T>();
      default: {
        const unknown: never = strategy;
        throw new RangeError(`Unknown allocation strategy: ${String(unknown)}`);
      }
    }
  }
}
