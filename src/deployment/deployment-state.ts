import { Deployment } from '../database/entities/deployment.entity';
import { StatusPatch } from '../database/deployment.store';
import { DeploymentStatus, canTransition } from './deployment-status';
import { InvalidTransitionError } from './deployment.errors';

export type StatusChange =
  | {
      status: DeploymentStatus.InProgress | DeploymentStatus.Completed | DeploymentStatus.Cancelled;
      logs?: string[];
    }
  | { status: DeploymentStatus.Failed; errorMessage: string; logs?: string[] };

export type DeploymentSnapshot = Pick<
  Deployment,
  'id' | 'status' | 'created_at' | 'started_at' | 'completed_at' | 'error_message'
>;

const FALLBACK_FAILURE_MESSAGE = 'Deployment failed';

export function formatLogLine(line: string, at: Date): string {
  return `[${at.toISOString()}] ${line}`;
}

function notBefore(now: Date, floor: Date): Date {
  return now.getTime() < floor.getTime() ? new Date(floor.getTime()) : now;
}

/**
 * Computes the columns for one transition. Throws InvalidTransitionError (and changes nothing)
 * for any move the table in deployment-status.ts does not allow.
 */
export function applyTransition(
  current: DeploymentSnapshot,
  change: StatusChange,
  now: Date,
): StatusPatch {
  if (!canTransition(current.status, change.status)) {
    throw new InvalidTransitionError(current.id, current.status, change.status);
  }

  const logs = (change.logs ?? []).map((line) => formatLogLine(line, now));

  switch (change.status) {
    case DeploymentStatus.InProgress:
      return {
        status: change.status,
        started_at: current.started_at ?? notBefore(now, current.created_at),
        completed_at: null,
        error_message: null,
        logs,
      };
    case DeploymentStatus.Completed:
    case DeploymentStatus.Cancelled:
      return {
        status: change.status,
        started_at: current.started_at,
        completed_at: notBefore(now, current.started_at ?? current.created_at),
        error_message: null,
        logs,
      };
    case DeploymentStatus.Failed:
      return {
        status: change.status,
        started_at: current.started_at,
        completed_at: notBefore(now, current.started_at ?? current.created_at),
        error_message: change.errorMessage.trim() || FALLBACK_FAILURE_MESSAGE,
        logs,
      };
  }
}
