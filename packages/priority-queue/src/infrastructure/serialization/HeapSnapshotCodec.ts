import type { IPriorityQueue } from "@app/interfaces/IPriorityQueue";
import type { IPriorityQueueFactory } from "@app/interfaces/IPriorityQueueFactory";
import type { IPriorityQueueOptions } from "@app/interfaces/IPriorityQueueOptions";
import { SnapshotCorruptedError } from "@domain/errors/PriorityQueueErrors";
import { decode, encode } from "@msgpack/msgpack";
import crc from "crc-32";

/**
 * Frame: `[u32 body length][u32 crc32 of body]` followed by a msgpack body
 * `{ version, entries: [value, priority][] }` with entries in heap order.
 */
export class HeapSnapshotCodec {
  static VERSION = 1;
  static HEADER_SIZE = 8;

  constructor(private factory: IPriorityQueueFactory) {}

  encode<T>(queue: IPriorityQueue<T>): Buffer {
    const entries = queue
      .toArray()
      .map(({ value, priority }) => [value, priority]);

    const body = Buffer.from(
      encode({ version: HeapSnapshotCodec.VERSION, entries })
    );

    const header = Buffer.alloc(HeapSnapshotCodec.HEADER_SIZE);
    header.writeUInt32BE(body.length, 0);
    header.writeUInt32BE(crc.buf(body) >>> 0, 4);

    return Buffer.concat([header, body]);
  }

  /**
   * Rebuilds a queue from a snapshot. Entries are enqueued in heap order,
   * so the rebuilt queue has the same layout as the one that was encoded.
   */
  decode<T>(
    buffer: Buffer,
    isValue: (value: unknown) => value is T,
    options: IPriorityQueueOptions<T> = {}
  ): IPriorityQueue<T> {
    const { HEADER_SIZE } = HeapSnapshotCodec;

    if (buffer.length < HEADER_SIZE) {
      throw new SnapshotCorruptedError("Snapshot is shorter than its header");
    }

    const length = buffer.readUInt32BE(0);
    const checksum = buffer.readUInt32BE(4);
    const body = buffer.subarray(HEADER_SIZE);

    if (body.length !== length) {
      throw new SnapshotCorruptedError(
        `Snapshot body has ${body.length} bytes, expected ${length}`
      );
    }
    if (crc.buf(body) >>> 0 !== checksum) {
      throw new SnapshotCorruptedError("Snapshot checksum mismatch");
    }

    let decoded: unknown;
    try {
      decoded = decode(body);
    } catch (cause) {
      throw new SnapshotCorruptedError("Snapshot body is not valid msgpack", {
        cause,
      });
    }

    const entries = this.readEntries(decoded, isValue);
    const queue = this.factory.create<T>({
      ...options,
      initialCapacity: Math.max(entries.length, options.initialCapacity ?? 0),
    });

    for (const [value, priority] of entries) {
      queue.enqueue(value, priority);
    }

    return queue;
  }

  private readEntries<T>(
    decoded: unknown,
    isValue: (value: unknown) => value is T
  ): [T, number][] {
    if (
      typeof decoded !== "object" ||
      decoded === null ||
      !("version" in decoded) ||
      !("entries" in decoded)
    ) {
      throw new SnapshotCorruptedError("Snapshot body has an unknown shape");
    }
    if (decoded.version !== HeapSnapshotCodec.VERSION) {
      throw new SnapshotCorruptedError(
        `Unsupported snapshot version ${String(decoded.version)}`
      );
    }

    const { entries } = decoded;
    if (!Array.isArray(entries)) {
      throw new SnapshotCorruptedError("Snapshot entries must be an array");
    }

    return entries.map((entry: unknown, index): [T, number] => {
      if (!Array.isArray(entry) || entry.length !== 2) {
        throw new SnapshotCorruptedError(`Entry ${index} is not a pair`);
      }

      const [value, priority]: unknown[] = entry;
      if (
        !isValue(value) ||
        typeof priority !== "number" ||
        !Number.isSafeInteger(priority)
      ) {
        throw new SnapshotCorruptedError(`Entry ${index} has an invalid shape`);
      }

      return [value, priority];
    });
  }
}
