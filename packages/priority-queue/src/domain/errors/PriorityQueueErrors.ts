export type PriorityQueueErrorCode =
  | "INVALID_ARGUMENT"
  | "EMPTY_QUEUE"
  | "USE_AFTER_DISPOSE"
  | "ACCESS_CONFLICT"
  | "SNAPSHOT_CORRUPTED";

export class PriorityQueueError extends Error {
  constructor(
    readonly code: PriorityQueueErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends PriorityQueueError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_ARGUMENT", message, options);
  }
}

export class EmptyQueueError extends PriorityQueueError {
  constructor() {
    super("EMPTY_QUEUE", "Queue is empty");
  }
}

export class UseAfterDisposeError extends PriorityQueueError {
  constructor() {
    super("USE_AFTER_DISPOSE", "Queue has been disposed");
  }
}

export class AccessConflictError extends PriorityQueueError {
  constructor() {
    super(
      "ACCESS_CONFLICT",
      "Queue is owned by a scheduled job; wait for its handle to complete"
    );
  }
}

export class SnapshotCorruptedError extends PriorityQueueError {
  constructor(message: string, options?: ErrorOptions) {
    super("SNAPSHOT_CORRUPTED", message, options);
  }
}
