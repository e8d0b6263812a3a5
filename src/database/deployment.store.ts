import { Deployment } from './entities/deployment.entity';
import { DeploymentConfig } from './entities/deployment-config.entity';
import { DeploymentStatus } from '../deployment/deployment-status';

export interface CreateDeploymentInput {
  user_id: string;
  config_id: string | null;
  repo_full_name: string;
  commit_sha: string;
  branch: string;
  triggered_by: string | null;
  manual_trigger: boolean;
}

export interface DeploymentFilter {
  repo_full_name?: string;
  user_id?: string;
  limit: number;
  offset: number;
}

/** Columns written by one status transition, plus the log lines committed with it. */
export interface StatusPatch {
  status: DeploymentStatus;
  started_at: Date | null;
  completed_at: Date | null;
  error_message: string | null;
  logs: string[];
}

/**
 * Persistence seen by the deployment engine.
 * updateStatus runs `decide` against the locked current row; whatever it throws aborts the write.
 */
export abstract class DeploymentStore {
  abstract create(input: CreateDeploymentInput): Promise<Deployment>;

  abstract findOne(id: string): Promise<Deployment | null>;

  abstract list(filter: DeploymentFilter): Promise<Deployment[]>;

  abstract remove(id: string, userId: string): Promise<boolean>;

  abstract updateStatus(
    id: string,
    decide: (current: Deployment) => StatusPatch,
  ): Promise<Deployment | null>;

  /** False when the deployment is unknown or already terminal. */
  abstract appendLog(id: string, line: string): Promise<boolean>;

  abstract readLogs(id: string, since: number): Promise<string[]>;
}

export interface DeploymentConfigInput {
  repo_id?: number | null;
  repo_full_name: string;
  branch: string;
  auto_deploy: boolean;
  deploy_command: string;
  environment_variables: Record<string, string>;
}

export type DeploymentConfigPatch = Partial<Omit<DeploymentConfigInput, 'repo_full_name'>>;

export abstract class DeploymentConfigStore {
  abstract findOne(id: string): Promise<DeploymentConfig | null>;

  abstract findForRepository(repoFullName: string, userId: string): Promise<DeploymentConfig | null>;

  /** Configs with auto_deploy on for this repository and branch, oldest first. */
  abstract findAutoDeploy(repoFullName: string, branch: string): Promise<DeploymentConfig[]>;

  abstract listForUser(userId: string): Promise<DeploymentConfig[]>;

  abstract create(userId: string, input: DeploymentConfigInput): Promise<DeploymentConfig>;

  abstract update(
    id: string,
    userId: string,
    patch: DeploymentConfigPatch,
  ): Promise<DeploymentConfig | null>;

  abstract remove(id: string, userId: string): Promise<boolean>;
}
