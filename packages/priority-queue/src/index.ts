export * from "@app/interfaces/IJobHandle";
export * from "@app/interfaces/IJobScheduler";
export * from "@app/interfaces/IPriorityQueue";
export * from "@app/interfaces/IPriorityQueueFactory";
export * from "@app/interfaces/IPriorityQueueOptions";
export * from "@domain/entities/HeapNode";
export * from "@domain/errors/PriorityQueueErrors";
export * from "@domain/interfaces/IEqualityComparer";
export * from "@domain/interfaces/ILogDriver";
export * from "@domain/interfaces/ILogger";
export * from "@domain/interfaces/ILoggerFactory";
export * from "@infra/factories/PriorityQueueFactory";
export * from "@infra/logging/BufferLoggerFactory";
export * from "@infra/logging/BufferedLogger";
export * from "@infra/serialization/HeapSnapshotCodec";
export {
  CapacityOverflowError,
  MAX_CAPACITY,
  StorageReleasedError,
} from "@indexed-heap/storage";
