import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { DeploymentModule } from './deployment/deployment.module';
import { ConfigsModule } from './api/configs/configs.module';
import { DeploymentsModule } from './api/deployments/deployments.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { StreamingModule } from './streaming/streaming.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    DatabaseModule,
    DeploymentModule,
    ConfigsModule,
    DeploymentsModule,
    WebhooksModule,
    StreamingModule,
  ],
})
export class AppModule {}
