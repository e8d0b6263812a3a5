import { Injectable, Logger } from '@nestjs/common';
import { DeploymentConfigStore } from '../../database/deployment.store';
import { Deployment } from '../../database/entities/deployment.entity';
import { DeploymentExecutorService } from '../../deployment/deployment-executor.service';
import { PushEvent } from './push-event';

export const WEBHOOK_TRIGGER = 'webhook';

/**
 * Auto-deploy rule: a push to a branch deploys with the oldest config that has
 * auto_deploy on for that repository and branch. Other matching configs are left alone.
 */
@Injectable()
export class PushTriggerService {
  private readonly logger = new Logger(PushTriggerService.name);

  constructor(
    private readonly configs: DeploymentConfigStore,
    private readonly executor: DeploymentExecutorService,
  ) {}

  /** Returns the started deployment, or null when nothing is configured to auto-deploy. */
  async handlePush(event: PushEvent): Promise<Deployment | null> {
    const [config] = await this.configs.findAutoDeploy(event.repoFullName, event.branch);
    if (!config) {
      this.logger.log(`No auto-deploy config for ${event.repoFullName}@${event.branch}`);
      return null;
    }

    const deployment = await this.executor.start(config.user_id, {
      repo_full_name: event.repoFullName,
      commit_sha: event.commitSha,
      branch: event.branch,
      manual_trigger: false,
      triggered_by: WEBHOOK_TRIGGER,
    });
    this.logger.log(
      `Push to ${event.repoFullName}@${event.branch} started deployment ${deployment.id}`,
    );
    return deployment;
  }
}
