import {
  AccessConflictError,
  UseAfterDisposeError,
} from "@domain/errors/PriorityQueueErrors";
import type { IAccessGuard } from "@domain/interfaces/IAccessGuard";

/**
 * Disposal is always enforced. Ownership by a pending job is only enforced
 * when `safetyChecks` is on.
 */
export class AccessGuard implements IAccessGuard {
  private disposed = false;
  private pendingJobs = 0;
  private jobRunning = false;

  constructor(private safetyChecks = true) {}

  get isDisposed() {
    return this.disposed;
  }

  get isScheduled() {
    return this.pendingJobs > 0;
  }

  check() {
    if (this.disposed) {
      throw new UseAfterDisposeError();
    }
    if (this.safetyChecks && this.pendingJobs > 0 && !this.jobRunning) {
      throw new AccessConflictError();
    }
  }

  markDisposed() {
    this.disposed = true;
  }

  claim() {
    if (this.disposed) {
      throw new UseAfterDisposeError();
    }
    this.pendingJobs++;
  }

  enterJob() {
    this.jobRunning = true;
  }

  leaveJob() {
    this.jobRunning = false;
    this.pendingJobs = Math.max(0, this.pendingJobs - 1);
  }
}
