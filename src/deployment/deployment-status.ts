export enum DeploymentStatus {
  Pending = 'pending',
  InProgress = 'in_progress',
  Completed = 'completed',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

export type TerminalStatus =
  | DeploymentStatus.Completed
  | DeploymentStatus.Failed
  | DeploymentStatus.Cancelled;

/** Allowed targets per current status. Terminal statuses accept nothing. */
export const STATUS_TRANSITIONS: Readonly<Record<DeploymentStatus, readonly DeploymentStatus[]>> = {
  [DeploymentStatus.Pending]: [
    DeploymentStatus.InProgress,
    DeploymentStatus.Failed,
    DeploymentStatus.Cancelled,
  ],
  [DeploymentStatus.InProgress]: [
    DeploymentStatus.InProgress,
    DeploymentStatus.Completed,
    DeploymentStatus.Failed,
    DeploymentStatus.Cancelled,
  ],
  [DeploymentStatus.Completed]: [],
  [DeploymentStatus.Failed]: [],
  [DeploymentStatus.Cancelled]: [],
};

export function isTerminal(status: DeploymentStatus): status is TerminalStatus {
  return STATUS_TRANSITIONS[status].length === 0;
}

export function canTransition(from: DeploymentStatus, to: DeploymentStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

export function isCancellable(status: DeploymentStatus): boolean {
  return canTransition(status, DeploymentStatus.Cancelled);
}
