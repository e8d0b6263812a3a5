import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Deployment, DeploymentConfig, DeploymentLog } from './entities';
import { DeploymentConfigStore, DeploymentStore } from './deployment.store';
import { TypeOrmDeploymentStore } from './typeorm-deployment.store';
import { TypeOrmDeploymentConfigStore } from './typeorm-deployment-config.store';

@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        url: config.get<string>('DATABASE_URL'),
        entities: [DeploymentConfig, Deployment, DeploymentLog],
        // Only one process should synchronize the database
        synchronize: config.get('SYNC_DATABASE') !== 'false',
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [
    { provide: DeploymentStore, useClass: TypeOrmDeploymentStore },
    { provide: DeploymentConfigStore, useClass: TypeOrmDeploymentConfigStore },
  ],
  exports: [DeploymentStore, DeploymentConfigStore],
})
export class DatabaseModule {}
