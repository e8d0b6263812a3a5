import { Inject, Injectable } from '@nestjs/common';
import { Observable, concatMap, defer, exhaustMap, from, takeWhile, timer } from 'rxjs';
import { DeploymentStore } from '../database/deployment.store';
import { DEPLOY_OPTIONS, DeployOptions } from '../config/deploy-options';
import { ActiveDeploymentRegistry } from '../deployment/active-deployments.registry';
import { DeploymentLogService } from '../deployment/deployment-log.service';
import { DeploymentStatus, isTerminal } from '../deployment/deployment-status';

export type DeploymentStreamEvent =
  | { type: 'log'; data: string }
  | { type: 'status'; data: DeploymentStatus }
  | { type: 'error'; data: string };

interface PollResult {
  events: DeploymentStreamEvent[];
  done: boolean;
}

/**
 * Live view of one deployment, polled from the log sink: existing lines first, then new lines
 * as they land, and a status event whenever the status changes. Completes after the poll that
 * sees a terminal status (so every line committed with it is included), or once the deployment
 * is neither running nor tracked any more.
 */
@Injectable()
export class DeploymentStreamService {
  constructor(
    private readonly deployments: DeploymentStore,
    private readonly logs: DeploymentLogService,
    private readonly registry: ActiveDeploymentRegistry,
    @Inject(DEPLOY_OPTIONS) private readonly options: DeployOptions,
  ) {}

  watch(deploymentId: string): Observable<DeploymentStreamEvent> {
    return defer(() => {
      let since = 0;
      let lastStatus: DeploymentStatus | null = null;

      const poll = async (): Promise<PollResult> => {
        // status before logs: lines committed with a terminal status are then always read
        const deployment = await this.deployments.findOne(deploymentId);
        if (!deployment) {
          return { events: [{ type: 'error', data: 'Deployment not found' }], done: true };
        }

        const lines = await this.logs.read(deploymentId, since);
        since += lines.length;
        const events: DeploymentStreamEvent[] = lines.map((line) => ({ type: 'log', data: line }));

        if (deployment.status !== lastStatus) {
          lastStatus = deployment.status;
          events.push({ type: 'status', data: deployment.status });
        }

        const done = isTerminal(deployment.status) || !this.registry.has(deploymentId);
        return { events, done };
      };

      return timer(0, this.options.streamPollMs).pipe(
        // ticks that land while a poll is in flight are dropped
        exhaustMap(() => poll()),
        takeWhile((result) => !result.done, true),
        concatMap((result) => from(result.events)),
      );
    });
  }
}
