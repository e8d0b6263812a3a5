import { randomUUID } from 'node:crypto';
import { Deployment } from '../../src/database/entities/deployment.entity';
import { DeploymentConfig } from '../../src/database/entities/deployment-config.entity';
import {
  CreateDeploymentInput,
  DeploymentConfigInput,
  DeploymentConfigPatch,
  DeploymentConfigStore,
  DeploymentFilter,
  DeploymentStore,
  StatusPatch,
} from '../../src/database/deployment.store';
import { DeploymentStatus, isTerminal } from '../../src/deployment/deployment-status';

function copyDeployment(source: Deployment): Deployment {
  return Object.assign(new Deployment(), source);
}

function copyConfig(source: DeploymentConfig): DeploymentConfig {
  return Object.assign(new DeploymentConfig(), source, {
    environment_variables: { ...source.environment_variables },
  });
}

/** Same contract as the TypeORM store, kept in process. Callers get copies, never the rows. */
export class InMemoryDeploymentStore extends DeploymentStore {
  readonly rows = new Map<string, Deployment>();
  readonly logs = new Map<string, string[]>();

  async create(input: CreateDeploymentInput): Promise<Deployment> {
    const deployment = Object.assign(new Deployment(), {
      ...input,
      id: randomUUID(),
      status: DeploymentStatus.Pending,
      created_at: new Date(),
      started_at: null,
      completed_at: null,
      error_message: null,
    });
    this.rows.set(deployment.id, deployment);
    this.logs.set(deployment.id, []);
    return copyDeployment(deployment);
  }

  async findOne(id: string): Promise<Deployment | null> {
    const row = this.rows.get(id);
    return row ? copyDeployment(row) : null;
  }

  async list(filter: DeploymentFilter): Promise<Deployment[]> {
    return [...this.rows.values()]
      .filter((row) => !filter.user_id || row.user_id === filter.user_id)
      .filter((row) => !filter.repo_full_name || row.repo_full_name === filter.repo_full_name)
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .slice(filter.offset, filter.offset + filter.limit)
      .map(copyDeployment);
  }

  async remove(id: string, userId: string): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.user_id !== userId) return false;
    this.rows.delete(id);
    this.logs.delete(id);
    return true;
  }

  async updateStatus(
    id: string,
    decide: (current: Deployment) => StatusPatch,
  ): Promise<Deployment | null> {
    const row = this.rows.get(id);
    if (!row) return null;

    const { logs, ...columns } = decide(copyDeployment(row));
    Object.assign(row, columns);
    this.logs.get(id)?.push(...logs);
    return copyDeployment(row);
  }

  async appendLog(id: string, line: string): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || isTerminal(row.status)) return false;
    this.logs.get(id)?.push(line);
    return true;
  }

  async readLogs(id: string, since: number): Promise<string[]> {
    return (this.logs.get(id) ?? []).slice(since);
  }
}

export class InMemoryDeploymentConfigStore extends DeploymentConfigStore {
  readonly rows = new Map<string, DeploymentConfig>();
  private clock = Date.parse('2024-01-01T00:00:00.000Z');

  async findOne(id: string): Promise<DeploymentConfig | null> {
    const row = this.rows.get(id);
    return row ? copyConfig(row) : null;
  }

  async findForRepository(repoFullName: string, userId: string): Promise<DeploymentConfig | null> {
    const row = [...this.rows.values()].find(
      (config) => config.repo_full_name === repoFullName && config.user_id === userId,
    );
    return row ? copyConfig(row) : null;
  }

  async findAutoDeploy(repoFullName: string, branch: string): Promise<DeploymentConfig[]> {
    return [...this.rows.values()]
      .filter(
        (config) =>
          config.repo_full_name === repoFullName && config.branch === branch && config.auto_deploy,
      )
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime())
      .map(copyConfig);
  }

  async listForUser(userId: string): Promise<DeploymentConfig[]> {
    return [...this.rows.values()]
      .filter((config) => config.user_id === userId)
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map(copyConfig);
  }

  async create(userId: string, input: DeploymentConfigInput): Promise<DeploymentConfig> {
    // strictly increasing, so "oldest first" is deterministic
    const createdAt = new Date((this.clock += 1000));
    const { repo_id, ...rest } = input;
    const config = Object.assign(new DeploymentConfig(), {
      ...rest,
      id: randomUUID(),
      user_id: userId,
      repo_id: repo_id == null ? null : String(repo_id),
      created_at: createdAt,
      updated_at: createdAt,
    });
    this.rows.set(config.id, config);
    return copyConfig(config);
  }

  async update(
    id: string,
    userId: string,
    patch: DeploymentConfigPatch,
  ): Promise<DeploymentConfig | null> {
    const row = this.rows.get(id);
    if (!row || row.user_id !== userId) return null;

    const { repo_id, ...rest } = patch;
    Object.assign(row, rest, { updated_at: new Date() });
    if (repo_id !== undefined) row.repo_id = repo_id === null ? null : String(repo_id);
    return copyConfig(row);
  }

  async remove(id: string, userId: string): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.user_id !== userId) return false;
    this.rows.delete(id);
    return true;
  }
}
