import { Module } from '@nestjs/common';
import { DeploymentModule } from '../deployment/deployment.module';
import { DeploymentStreamService } from './deployment-stream.service';
import { SSEController } from './sse.controller';

@Module({
  imports: [DeploymentModule],
  controllers: [SSEController],
  providers: [DeploymentStreamService],
})
export class StreamingModule {}
