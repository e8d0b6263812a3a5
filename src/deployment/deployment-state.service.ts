import { Injectable, Logger } from '@nestjs/common';
import { Deployment } from '../database/entities/deployment.entity';
import { DeploymentStore } from '../database/deployment.store';
import { StatusChange, applyTransition } from './deployment-state';
import { DeploymentNotFoundError } from './deployment.errors';

/**
 * The only writer of deployment status. Each call is one locked read-modify-write in the store,
 * so the status and the log lines passed with it become visible together.
 */
@Injectable()
export class DeploymentStateService {
  private readonly logger = new Logger(DeploymentStateService.name);

  constructor(private readonly store: DeploymentStore) {}

  /**
   * @throws DeploymentNotFoundError for an unknown id
   * @throws InvalidTransitionError when the current status does not allow the change
   */
  async transition(deploymentId: string, change: StatusChange): Promise<Deployment> {
    const updated = await this.store.updateStatus(deploymentId, (current) =>
      applyTransition(current, change, new Date()),
    );
    if (!updated) {
      throw new DeploymentNotFoundError(deploymentId);
    }
    this.logger.log(`Updated deployment ${deploymentId} status to ${updated.status}`);
    return updated;
  }
}
