import type { IAccessGuard } from "@domain/interfaces/IAccessGuard";
import type { IJobHandle } from "./IJobHandle";

export type QueueJob<Q> = (queue: Q) => void;

export interface IJobScheduler {
  schedule<Q>(
    queue: Q,
    guard: IAccessGuard,
    job: QueueJob<Q>,
    dependsOn?: IJobHandle
  ): IJobHandle;
}
