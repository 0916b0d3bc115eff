export const MAX_CAPACITY = 2 ** 31 - 1;

export class CapacityOverflowError extends RangeError {
  readonly code = "CAPACITY_OVERFLOW";

  constructor(
    readonly requested: number,
    readonly limit = MAX_CAPACITY
  ) {
    super(`Requested capacity ${requested} exceeds the limit of ${limit} slots`);
    this.name = "CapacityOverflowError";
  }
}

export class StorageReleasedError extends Error {
  readonly code = "STORAGE_RELEASED";

  constructor() {
    super("Storage has already been released");
    this.name = "StorageReleasedError";
  }
}
