export interface IJobHandle {
  readonly isCompleted: boolean;
  /** Resolves once the job has run; rejects with the job's failure. */
  complete(): Promise<void>;
}
