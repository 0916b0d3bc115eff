import type { IJobHandle } from "@app/interfaces/IJobHandle";

export class JobHandle implements IJobHandle {
  private finished = false;
  private failure?: { error: unknown };

  /** Resolves once the job has run or failed; never rejects. */
  readonly settled: Promise<void>;

  constructor(run: Promise<void>) {
    // the outcome is kept here so a handle nobody awaits never rejects unobserved
    this.settled = run.then(
      () => {
        this.finished = true;
      },
      (error: unknown) => {
        this.finished = true;
        this.failure = { error };
      }
    );
  }

  get isCompleted() {
    return this.finished;
  }

  async complete(): Promise<void> {
    await this.settled;
    if (this.failure) throw this.failure.error;
  }
}
