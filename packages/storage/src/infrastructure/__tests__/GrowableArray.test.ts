import { describe, expect, it } from "vitest";
import {
  CapacityOverflowError,
  MAX_CAPACITY,
  StorageReleasedError,
} from "../../domain/errors/StorageErrors";
import { DynamicAllocator } from "../allocators/DynamicAllocator";
import { FixedAllocator } from "../allocators/FixedAllocator";
import { AllocatorFactory } from "../factories/AllocatorFactory";
import { GrowableArray } from "../GrowableArray";

type Box = { id: number };

function fill(store: GrowableArray<Box>, count: number) {
  for (let i = 0; i < count; i++) store.append({ id: i });
}

describe("GrowableArray", () => {
  it("grows geometrically from the initial capacity", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(), 2);
    const capacities: number[] = [];

    for (let i = 0; i < 5; i++) {
      store.append({ id: i });
      capacities.push(store.capacity);
    }

    expect(capacities).toEqual([2, 2, 3, 4, 6]);
    expect(store.length).toBe(5);
    expect(store.get(4)).toEqual({ id: 4 });
  });

  it("grows from zero capacity", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(2), 0);
    fill(store, 3);
    expect(store.capacity).toBe(4);
    expect([0, 1, 2].map((i) => store.get(i).id)).toEqual([0, 1, 2]);
  });

  it("keeps items in place across reallocation", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(), 1);
    const first = { id: 42 };
    store.append(first);
    fill(store, 20);
    expect(store.get(0)).toBe(first);
    expect(store.length).toBe(21);
  });

  it("set overwrites within the logical length only", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(), 4);
    fill(store, 2);
    store.set(1, { id: 9 });
    expect(store.get(1).id).toBe(9);
    expect(() => store.set(2, { id: 1 })).toThrow(RangeError);
    expect(() => store.get(-1)).toThrow(RangeError);
    expect(() => store.get(0.5)).toThrow(RangeError);
  });

  it("removeLast shrinks the length but not the capacity", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(), 4);
    fill(store, 3);
    expect(store.removeLast()).toEqual({ id: 2 });
    expect(store.length).toBe(2);
    expect(store.capacity).toBe(4);
    expect(() => store.get(2)).toThrow(RangeError);
  });

  it("removeLast on empty storage throws", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(), 1);
    expect(() => store.removeLast()).toThrow("Cannot remove from empty storage");
  });

  it("ensureCapacity reserves ahead and never shrinks", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(), 2);
    store.ensureCapacity(10);
    expect(store.capacity).toBe(10);
    store.ensureCapacity(3);
    expect(store.capacity).toBe(10);
  });

  it("rejects capacities past the limit and keeps the old buffer", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(), 2);
    fill(store, 2);
    expect(() => store.ensureCapacity(MAX_CAPACITY + 1)).toThrow(
      CapacityOverflowError
    );
    expect(store.capacity).toBe(2);
    expect(store.get(1).id).toBe(1);
  });

  it("rejects an initial capacity past the limit", () => {
    expect(
      () => new GrowableArray<Box>(new DynamicAllocator(), MAX_CAPACITY + 1)
    ).toThrow(CapacityOverflowError);
    expect(() => new GrowableArray<Box>(new DynamicAllocator(), -1)).toThrow(
      RangeError
    );
  });

  it("fails fast after release", () => {
    const store = new GrowableArray<Box>(new DynamicAllocator(), 2);
    fill(store, 1);
    store.release();

    expect(store.isReleased).toBe(true);
    expect(() => store.length).toThrow(StorageReleasedError);
    expect(() => store.get(0)).toThrow(StorageReleasedError);
    expect(() => store.append({ id: 1 })).toThrow(StorageReleasedError);
    expect(() => store.release()).toThrow(StorageReleasedError);
  });
});

describe("FixedAllocator", () => {
  it("refuses to grow past the initial capacity", () => {
    const store = new GrowableArray<Box>(new FixedAllocator(), 2);
    fill(store, 2);

    let error: unknown;
    try {
      store.append({ id: 2 });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(CapacityOverflowError);
    expect(error).toMatchObject({ requested: 3, limit: 2 });
    expect(store.length).toBe(2);
  });
});

describe("AllocatorFactory", () => {
  it("creates allocators by strategy", () => {
    const factory = new AllocatorFactory();
    expect(factory.create<Box>("dynamic").strategy).toBe("dynamic");
    expect(factory.create<Box>("fixed").strategy).toBe("fixed");
  });

  it("passes the growth factor through", () => {
    const allocator = new AllocatorFactory().create<Box>("dynamic", {
      growthFactor: 3,
    });
    const store = new GrowableArray<Box>(allocator, 2);
    fill(store, 3);
    expect(store.capacity).toBe(6);
  });

  it("rejects growth factors that would not grow", () => {
    expect(() => new DynamicAllocator(1)).toThrow(RangeError);
    expect(() => new DynamicAllocator(Number.NaN)).toThrow(RangeError);
  });
});
