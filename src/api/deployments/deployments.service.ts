import {
  BadRequestException,
  ForbiddenException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { Deployment } from '../../database/entities/deployment.entity';
import { DeploymentStore } from '../../database/deployment.store';
import {
  DeploymentExecutorService,
  DeploymentStatusView,
} from '../../deployment/deployment-executor.service';
import { DeploymentLogService } from '../../deployment/deployment-log.service';
import { DeploymentStatus, isCancellable } from '../../deployment/deployment-status';
import { ConfigNotFoundError } from '../../deployment/deployment.errors';
import { CallerIdentity } from '../../common/caller.decorator';
import { ListDeploymentsQuery } from '../../dto/list-deployments.dto';
import { TriggerDeploymentInput } from '../../dto/trigger-deployment.dto';

export interface TriggerResponse {
  deployment_id: string;
  status: DeploymentStatus;
  message: string;
  logs_url: string;
}

export interface DeploymentLogsResponse {
  id: string;
  status: DeploymentStatus;
  logs: string[];
}

/** Deployments as seen by their owner; the engine itself lives in DeploymentExecutorService. */
@Injectable()
export class DeploymentsService {
  constructor(
    private readonly deployments: DeploymentStore,
    private readonly executor: DeploymentExecutorService,
    private readonly logs: DeploymentLogService,
  ) {}

  async trigger(caller: CallerIdentity, input: TriggerDeploymentInput): Promise<TriggerResponse> {
    let deployment: Deployment;
    try {
      deployment = await this.executor.start(caller.id, {
        repo_full_name: input.repo_full_name,
        commit_sha: input.commit_sha,
        branch: input.branch,
        manual_trigger: true,
        triggered_by: caller.username,
      });
    } catch (err) {
      if (err instanceof ConfigNotFoundError) {
        throw new NotFoundException('No deployment configuration found for this repository');
      }
      throw err;
    }

    return {
      deployment_id: deployment.id,
      status: deployment.status,
      message: 'Deployment started successfully',
      logs_url: `/deployments/${deployment.id}/logs`,
    };
  }

  async list(userId: string, query: ListDeploymentsQuery): Promise<Deployment[]> {
    return this.deployments.list({ ...query, user_id: userId });
  }

  /** @throws NotFoundException, or ForbiddenException when the caller is not the owner */
  async findOwned(id: string, userId: string): Promise<Deployment> {
    const deployment = await this.deployments.findOne(id);
    if (!deployment) throw new NotFoundException('Deployment not found');
    if (deployment.user_id !== userId) {
      throw new ForbiddenException('Not authorized to access this deployment');
    }
    return deployment;
  }

  async logsOf(id: string, userId: string): Promise<DeploymentLogsResponse> {
    const deployment = await this.findOwned(id, userId);
    return { id, status: deployment.status, logs: await this.logs.read(id) };
  }

  async statusOf(id: string, userId: string): Promise<DeploymentStatusView> {
    await this.findOwned(id, userId);
    return this.executor.status(id);
  }

  async cancel(id: string, userId: string): Promise<{ message: string }> {
    const deployment = await this.findOwned(id, userId);
    if (!isCancellable(deployment.status)) {
      throw new BadRequestException(`Cannot cancel deployment with status '${deployment.status}'`);
    }

    const cancelled = await this.executor.cancel(id);
    if (!cancelled) {
      // finished between the read above and the transition
      const current = await this.findOwned(id, userId);
      throw new BadRequestException(`Cannot cancel deployment with status '${current.status}'`);
    }
    return { message: 'Deployment cancelled successfully' };
  }

  async remove(id: string, userId: string): Promise<void> {
    await this.findOwned(id, userId);
    await this.deployments.remove(id, userId);
  }
}
