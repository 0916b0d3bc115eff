import { StorageReleasedError } from "../domain/errors/StorageErrors";
import type { IAllocator, Slots } from "../domain/interfaces/IAllocator";
import type { IGrowableArray } from "../domain/interfaces/IGrowableArray";

export class GrowableArray<T extends object> implements IGrowableArray<T> {
  private slots?: Slots<T>;
  private size = 0;

  constructor(
    private allocator: IAllocator<T>,
    initialCapacity = 0
  ) {
    this.slots = allocator.allocate(initialCapacity);
  }

  get length(): number {
    this.requireSlots();
    return this.size;
  }

  get capacity(): number {
    return this.requireSlots().length;
  }

  get isReleased(): boolean {
    return this.slots === undefined;
  }

  get(index: number): T {
    const slots = this.requireSlots();
    this.checkIndex(index);

    const value = slots[index];
    if (value === undefined) {
      throw new RangeError(`Slot ${index} is empty`);
    }

    return value;
  }

  set(index: number, value: T): void {
    const slots = this.requireSlots();
    this.checkIndex(index);
    slots[index] = value;
  }

  append(value: T): void {
    if (this.size === this.requireSlots().length) {
      this.ensureCapacity(this.size + 1);
    }

    this.requireSlots()[this.size++] = value;
  }

  removeLast(): T {
    if (this.size === 0) {
      throw new RangeError("Cannot remove from empty storage");
    }

    const last = this.get(this.size - 1);
    this.requireSlots()[--this.size] = undefined;
    return last;
  }

  ensureCapacity(capacity: number): void {
    const slots = this.requireSlots();
    if (capacity <= slots.length) return;

    // grow() throws before anything is swapped, so a failure keeps the old buffer
    this.slots = this.allocator.grow(slots, this.size, capacity);
    this.allocator.release(slots);
  }

  release(): void {
    const slots = this.requireSlots();
    this.allocator.release(slots);
    this.slots = undefined;
    this.size = 0;
  }

  private requireSlots(): Slots<T> {
    if (!this.slots) throw new StorageReleasedError();
    return this.slots;
  }

  private checkIndex(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Index ${index} is out of bounds [0, ${this.size})`);
    }
  }
}
