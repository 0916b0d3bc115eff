import { describe, expect, it, vi } from "vitest";
import type { ILogDriver } from "../../domain/interfaces/ILogDriver";
import { BufferLoggerFactory } from "../logging/BufferLoggerFactory";
import { BufferedLogger } from "../logging/BufferedLogger";

function fakeDriver() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies ILogDriver;
}

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("BufferedLogger", () => {
  it("writes nothing until the buffer is flushed", async () => {
    const driver = fakeDriver();
    const logger = new BufferedLogger(driver, 50, "queue");

    logger.log("Queue disposed", { length: 2 });
    expect(driver.info).not.toHaveBeenCalled();

    await nextTurn();
    expect(driver.info).toHaveBeenCalledWith("Queue disposed", {
      length: 2,
      label: "queue",
      ts: expect.any(Number),
    });
  });

  it("routes entries to the driver method of their level", () => {
    const driver = fakeDriver();
    const logger = new BufferedLogger(driver);

    logger.log("grew", { from: 1, to: 2 }, "debug");
    logger.log("failed", undefined, "error");
    logger.flush();

    expect(driver.debug).toHaveBeenCalledWith("grew", {
      from: 1,
      to: 2,
      label: undefined,
      ts: expect.any(Number),
    });
    expect(driver.error).toHaveBeenCalledWith("failed", {
      label: undefined,
      ts: expect.any(Number),
    });
  });

  it("skips levels the driver does not implement", () => {
    const driver = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const logger = new BufferedLogger(driver);

    logger.log("grew", {}, "debug");
    logger.flush();

    expect(driver.info).not.toHaveBeenCalled();
  });

  it("flushes in chunks across turns", async () => {
    const driver = fakeDriver();
    const logger = new BufferedLogger(driver, 2);

    logger.log("one");
    logger.log("two");
    logger.log("three");
    logger.flush();
    expect(driver.info).toHaveBeenCalledTimes(2);

    await nextTurn();
    expect(driver.info).toHaveBeenCalledTimes(3);
    expect(driver.info).toHaveBeenLastCalledWith("three", {
      label: undefined,
      ts: expect.any(Number),
    });
  });

  it("drops pending entries on destroy", async () => {
    const driver = fakeDriver();
    const logger = new BufferedLogger(driver);

    logger.log("lost");
    logger.destroy();

    await nextTurn();
    expect(driver.info).not.toHaveBeenCalled();
  });

  it("labels loggers created by the factory", () => {
    const driver = fakeDriver();
    const logger = new BufferLoggerFactory(driver).create("scheduler");

    logger.log("ready");
    logger.flush();

    expect(driver.info).toHaveBeenCalledWith("ready", {
      label: "scheduler",
      ts: expect.any(Number),
    });
  });
});
