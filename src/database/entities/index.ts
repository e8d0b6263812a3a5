/**
 * Database entities: deployment_configs, deployments, deployment_logs.
 */
export { DeploymentConfig } from './deployment-config.entity';
export { Deployment } from './deployment.entity';
export { DeploymentLog } from './deployment-log.entity';
