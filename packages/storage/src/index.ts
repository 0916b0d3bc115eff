export * from "./domain/errors/StorageErrors";
export * from "./domain/interfaces/IAllocator";
export * from "./domain/interfaces/IGrowableArray";
export * from "./infrastructure/allocators/DynamicAllocator";
export * from "./infrastructure/allocators/FixedAllocator";
export * from "./infrastructure/factories/AllocatorFactory";
export * from "./infrastructure/GrowableArray";
