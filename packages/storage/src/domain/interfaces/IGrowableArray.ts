export interface IGrowableArray<T> {
  readonly length: number;
  readonly capacity: number;
  readonly isReleased: boolean;
  get(index: number): T;
  set(index: number, value: T): void;
  append(value: T): void;
  removeLast(): T;
  ensureCapacity(capacity: number): void;
  release(): void;
}
