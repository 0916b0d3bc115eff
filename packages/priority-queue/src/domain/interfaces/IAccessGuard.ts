export interface IAccessGuard {
  readonly isDisposed: boolean;
  readonly isScheduled: boolean;
  check(): void;
  markDisposed(): void;
  claim(): void;
  enterJob(): void;
  leaveJob(): void;
}
