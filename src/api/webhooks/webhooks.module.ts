import { Module } from '@nestjs/common';
import { DeploymentModule } from '../../deployment/deployment.module';
import { GithubWebhookController } from './github-webhook.controller';
import { PushTriggerService } from './push-trigger.service';

@Module({
  imports: [DeploymentModule],
  controllers: [GithubWebhookController],
  providers: [PushTriggerService],
})
export class WebhooksModule {}
