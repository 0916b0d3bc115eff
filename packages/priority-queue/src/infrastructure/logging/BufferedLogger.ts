import type { ILogDriver } from "@domain/interfaces/ILogDriver";
import type { ILogger } from "@domain/interfaces/ILogger";

type LogEntry = [message: string, extra: object, level: keyof ILogDriver];

/** Collects log calls and hands them to the driver in chunks on `setImmediate`. */
export class BufferedLogger implements ILogger {
  private flushId?: NodeJS.Immediate;
  private buffer: LogEntry[] = [];

  constructor(
    private driver: ILogDriver,
    private chunkSize = 50,
    private label?: string
  ) {}

  log(msg: string, extra?: object, level: keyof ILogDriver = "info") {
    this.buffer.push([msg, extra ?? {}, level]);
    this.scheduleFlush();
  }

  private scheduleFlush() {
    this.flushId ??= setImmediate(this.flush);
  }

  flush = () => {
    if (this.flushId) clearImmediate(this.flushId);
    this.flushId = undefined;

    const ts = Date.now();
    const { label } = this;
    const chunk = this.buffer.splice(0, this.chunkSize);

    for (const [message, extra, level] of chunk) {
      this.driver[level]?.(message, { ...extra, label, ts });
    }

    if (this.buffer.length > 0) {
      this.scheduleFlush();
    }
  };

  destroy() {
    clearImmediate(this.flushId);
    this.flushId = undefined;
    this.buffer = [];
  }
}
