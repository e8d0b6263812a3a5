import { DeploymentSnapshot, applyTransition, formatLogLine } from './deployment-state';
import { DeploymentStatus, isCancellable, isTerminal } from './deployment-status';
import { InvalidTransitionError } from './deployment.errors';

const created = new Date('2024-05-01T10:00:00.000Z');
const started = new Date('2024-05-01T10:00:05.000Z');
const now = new Date('2024-05-01T10:01:00.000Z');

function snapshot(overrides: Partial<DeploymentSnapshot> = {}): DeploymentSnapshot {
  return {
    id: 'dep-1',
    status: DeploymentStatus.Pending,
    created_at: created,
    started_at: null,
    completed_at: null,
    error_message: null,
    ...overrides,
  };
}

describe('applyTransition', () => {
  it('starts a pending deployment and stamps its log lines', () => {
    const patch = applyTransition(
      snapshot(),
      { status: DeploymentStatus.InProgress, logs: ['Picked up'] },
      now,
    );

    expect(patch).toEqual({
      status: DeploymentStatus.InProgress,
      started_at: now,
      completed_at: null,
      error_message: null,
      logs: ['[2024-05-01T10:01:00.000Z] Picked up'],
    });
  });

  it('keeps started_at when an in-progress deployment is marked in progress again', () => {
    const patch = applyTransition(
      snapshot({ status: DeploymentStatus.InProgress, started_at: started }),
      { status: DeploymentStatus.InProgress },
      now,
    );

    expect(patch.started_at).toBe(started);
  });

  it('never puts started_at before created_at', () => {
    const earlier = new Date('2024-05-01T09:59:59.000Z');
    const patch = applyTransition(snapshot(), { status: DeploymentStatus.InProgress }, earlier);

    expect(patch.started_at).toEqual(created);
  });

  it('never puts completed_at before started_at', () => {
    const earlier = new Date('2024-05-01T10:00:01.000Z');
    const patch = applyTransition(
      snapshot({ status: DeploymentStatus.InProgress, started_at: started }),
      { status: DeploymentStatus.Completed },
      earlier,
    );

    expect(patch.completed_at).toEqual(started);
  });

  it('completes with completed_at and no error message', () => {
    const patch = applyTransition(
      snapshot({ status: DeploymentStatus.InProgress, started_at: started }),
      { status: DeploymentStatus.Completed, logs: ['Deployment completed successfully'] },
      now,
    );

    expect(patch).toEqual({
      status: DeploymentStatus.Completed,
      started_at: started,
      completed_at: now,
      error_message: null,
      logs: ['[2024-05-01T10:01:00.000Z] Deployment completed successfully'],
    });
  });

  it('records the error message when failing', () => {
    const patch = applyTransition(
      snapshot({ status: DeploymentStatus.InProgress, started_at: started }),
      { status: DeploymentStatus.Failed, errorMessage: '  exit code 2 ' },
      now,
    );

    expect(patch.error_message).toBe('exit code 2');
    expect(patch.completed_at).toBe(now);
  });

  it('falls back to a generic message for a blank failure', () => {
    const patch = applyTransition(
      snapshot(),
      { status: DeploymentStatus.Failed, errorMessage: '   ' },
      now,
    );

    expect(patch.error_message).toBe('Deployment failed');
    expect(patch.started_at).toBeNull();
    expect(patch.completed_at).toBe(now);
  });

  it('allows a pending deployment to be cancelled before it starts', () => {
    const patch = applyTransition(snapshot(), { status: DeploymentStatus.Cancelled }, now);

    expect(patch.status).toBe(DeploymentStatus.Cancelled);
    expect(patch.started_at).toBeNull();
    expect(patch.completed_at).toBe(now);
  });

  it('rejects completing a deployment that never started', () => {
    expect(() => applyTransition(snapshot(), { status: DeploymentStatus.Completed }, now)).toThrow(
      'Cannot transition deployment dep-1 from pending to completed',
    );
  });

  it.each([DeploymentStatus.Completed, DeploymentStatus.Failed, DeploymentStatus.Cancelled])(
    'rejects every change out of %s',
    (terminal) => {
      const current = snapshot({ status: terminal, started_at: started, completed_at: now });

      expect(() =>
        applyTransition(current, { status: DeploymentStatus.InProgress }, now),
      ).toThrow(InvalidTransitionError);
      expect(() => applyTransition(current, { status: DeploymentStatus.Completed }, now)).toThrow(
        InvalidTransitionError,
      );
      expect(() => applyTransition(current, { status: DeploymentStatus.Cancelled }, now)).toThrow(
        InvalidTransitionError,
      );
      expect(() =>
        applyTransition(current, { status: DeploymentStatus.Failed, errorMessage: 'x' }, now),
      ).toThrow(InvalidTransitionError);
    },
  );
});

describe('status helpers', () => {
  it('knows which statuses are terminal', () => {
    expect(isTerminal(DeploymentStatus.Pending)).toBe(false);
    expect(isTerminal(DeploymentStatus.InProgress)).toBe(false);
    expect(isTerminal(DeploymentStatus.Completed)).toBe(true);
    expect(isTerminal(DeploymentStatus.Failed)).toBe(true);
    expect(isTerminal(DeploymentStatus.Cancelled)).toBe(true);
  });

  it('only lets pending and in-progress deployments be cancelled', () => {
    expect(isCancellable(DeploymentStatus.Pending)).toBe(true);
    expect(isCancellable(DeploymentStatus.InProgress)).toBe(true);
    expect(isCancellable(DeploymentStatus.Failed)).toBe(false);
  });

  it('prefixes log lines with an ISO timestamp', () => {
    expect(formatLogLine('hello', now)).toBe('[2024-05-01T10:01:00.000Z] hello');
  });
});
