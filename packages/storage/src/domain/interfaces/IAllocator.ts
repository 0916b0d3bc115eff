export type Slots<T> = Array<T | undefined>;

export type AllocationStrategy = "dynamic" | "fixed";

export interface IAllocator<T> {
  readonly strategy: AllocationStrategy;
  allocate(capacity: number): Slots<T>;
  /**
   * Returns a buffer of at least `required` slots holding the first `length`
   * items of `slots`. Throws without touching `slots` when it cannot.
   */
  grow(slots: Slots<T>, length: number, required: number): Slots<T>;
  release(slots: Slots<T>): void;
}
