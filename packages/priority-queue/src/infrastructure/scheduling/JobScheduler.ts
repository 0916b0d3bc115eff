import type { IJobHandle } from "@app/interfaces/IJobHandle";
import type { IJobScheduler, QueueJob } from "@app/interfaces/IJobScheduler";
import type { IAccessGuard } from "@domain/interfaces/IAccessGuard";
import type { ILogger } from "@domain/interfaces/ILogger";
import { setImmediate } from "node:timers/promises";
import { JobHandle } from "./JobHandle";

/**
 * Hands a queue to one deferred job at a time. Jobs on the same queue run in
 * the order they were scheduled, each on its own turn of the event loop, and
 * the queue refuses outside access until every pending job has finished.
 */
export class JobScheduler implements IJobScheduler {
  // settles once the last job scheduled on a queue has finished
  private tails = new WeakMap<IAccessGuard, Promise<void>>();

  constructor(private logger?: ILogger) {}

  schedule<Q>(
    queue: Q,
    guard: IAccessGuard,
    job: QueueJob<Q>,
    dependsOn?: IJobHandle
  ): IJobHandle {
    guard.claim();

    const previous = this.tails.get(guard);
    const handle = new JobHandle(
      this.run(queue, guard, job, previous, dependsOn)
    );
    this.tails.set(guard, handle.settled);

    return handle;
  }

  private async run<Q>(
    queue: Q,
    guard: IAccessGuard,
    job: QueueJob<Q>,
    previous?: Promise<void>,
    dependsOn?: IJobHandle
  ) {
    await previous;

    try {
      if (dependsOn) await this.waitFor(dependsOn);
      await setImmediate();

      guard.enterJob();
      this.execute(queue, job);
    } finally {
      guard.leaveJob();
    }
  }

  private async waitFor(dependsOn: IJobHandle) {
    try {
      await dependsOn.complete();
    } catch (cause) {
      this.logger?.log("Scheduled job skipped", { error: cause }, "warn");
      throw new Error("Dependency of scheduled job failed", { cause });
    }
  }

  private execute<Q>(queue: Q, job: QueueJob<Q>) {
    try {
      job(queue);
    } catch (error) {
      this.logger?.log("Scheduled job failed", { error }, "error");
      throw error;
    }
  }
}
