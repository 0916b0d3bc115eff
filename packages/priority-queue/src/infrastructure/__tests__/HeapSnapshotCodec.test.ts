import { encode } from "@msgpack/msgpack";
import crc from "crc-32";
import { describe, expect, it } from "vitest";
import { SnapshotCorruptedError } from "../../domain/errors/PriorityQueueErrors";
import { PriorityQueueFactory } from "../factories/PriorityQueueFactory";
import { HeapSnapshotCodec } from "../serialization/HeapSnapshotCodec";

const isString = (value: unknown): value is string => typeof value === "string";

function frame(body: Uint8Array) {
  const header = Buffer.alloc(8);
  header.writeUInt32BE(body.length, 0);
  header.writeUInt32BE(crc.buf(body) >>> 0, 4);
  return Buffer.concat([header, body]);
}

describe("HeapSnapshotCodec", () => {
  const factory = new PriorityQueueFactory();
  const codec = new HeapSnapshotCodec(factory);

  function sampleQueue() {
    const queue = factory.create<string>();
    queue.enqueue("d", 15);
    queue.enqueue("a", 10);
    queue.enqueue("c", 3);
    queue.enqueue("b", 7);
    queue.enqueue("e", 3);
    return queue;
  }

  it("rebuilds the same heap layout", () => {
    const queue = sampleQueue();
    const restored = codec.decode(codec.encode(queue), isString);

    expect(restored.toArray()).toEqual(queue.toArray());
    expect(restored.capacity).toBe(5);
  });

  it("keeps a larger requested capacity", () => {
    const restored = codec.decode(codec.encode(sampleQueue()), isString, {
      initialCapacity: 32,
    });
    expect(restored.capacity).toBe(32);
  });

  it("round-trips an empty queue", () => {
    const restored = codec.decode(
      codec.encode(factory.create<string>()),
      isString
    );
    expect(restored.length).toBe(0);
  });

  it("writes the body length and checksum into the header", () => {
    const buffer = codec.encode(sampleQueue());
    const body = buffer.subarray(8);

    expect(buffer.readUInt32BE(0)).toBe(body.length);
    expect(buffer.readUInt32BE(4)).toBe(crc.buf(body) >>> 0);
  });

  it("rejects a truncated header", () => {
    expect(() => codec.decode(Buffer.alloc(4), isString)).toThrow(
      "Snapshot is shorter than its header"
    );
  });

  it("rejects a body of the wrong length", () => {
    const buffer = codec.encode(sampleQueue());
    const truncated = buffer.subarray(0, buffer.length - 1);

    expect(() => codec.decode(truncated, isString)).toThrow(
      `Snapshot body has ${buffer.length - 9} bytes, expected ${buffer.length - 8}`
    );
  });

  it("rejects a body that fails the checksum", () => {
    const buffer = Buffer.from(codec.encode(sampleQueue()));
    buffer[buffer.length - 1] ^= 0xff;

    expect(() => codec.decode(buffer, isString)).toThrow(SnapshotCorruptedError);
    expect(() => codec.decode(buffer, isString)).toThrow(
      "Snapshot checksum mismatch"
    );
  });

  it("rejects bodies of an unknown shape", () => {
    expect(() => codec.decode(frame(encode({ items: [] })), isString)).toThrow(
      "Snapshot body has an unknown shape"
    );
    expect(() =>
      codec.decode(frame(encode({ version: 2, entries: [] })), isString)
    ).toThrow("Unsupported snapshot version 2");
  });

  it("rejects entries the value guard refuses", () => {
    const numbers = factory.create<number>();
    numbers.enqueue(1, 1);

    expect(() => codec.decode(codec.encode(numbers), isString)).toThrow(
      "Entry 0 has an invalid shape"
    );
    expect(() =>
      codec.decode(frame(encode({ version: 1, entries: [["a", 1.5]] })), isString)
    ).toThrow("Entry 0 has an invalid shape");
    expect(() =>
      codec.decode(frame(encode({ version: 1, entries: [["a"]] })), isString)
    ).toThrow("Entry 0 is not a pair");
  });

  it("tags corruption errors with their code", () => {
    try {
      codec.decode(Buffer.alloc(0), isString);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SnapshotCorruptedError);
      expect(error).toMatchObject({ code: "SNAPSHOT_CORRUPTED" });
    }
  });
});
