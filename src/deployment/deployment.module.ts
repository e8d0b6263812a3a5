import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEPLOY_OPTIONS, loadDeployOptions } from '../config/deploy-options';
import { ActiveDeploymentRegistry } from './active-deployments.registry';
import { CommandRunnerService } from './command-runner.service';
import { DeploymentExecutorService } from './deployment-executor.service';
import { DeploymentLogService } from './deployment-log.service';
import { DeploymentStateService } from './deployment-state.service';
import { WorkspaceService } from './workspace.service';

@Module({
  providers: [
    {
      provide: DEPLOY_OPTIONS,
      useFactory: loadDeployOptions,
      inject: [ConfigService],
    },
    CommandRunnerService,
    WorkspaceService,
    DeploymentLogService,
    DeploymentStateService,
    ActiveDeploymentRegistry,
    DeploymentExecutorService,
  ],
  exports: [
    DEPLOY_OPTIONS,
    DeploymentExecutorService,
    DeploymentLogService,
    ActiveDeploymentRegistry,
  ],
})
export class DeploymentModule {}
