import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { DeploymentConfig } from './entities/deployment-config.entity';
import {
  DeploymentConfigInput,
  DeploymentConfigPatch,
  DeploymentConfigStore,
} from './deployment.store';

@Injectable()
export class TypeOrmDeploymentConfigStore extends DeploymentConfigStore {
  constructor(private readonly dataSource: DataSource) {
    super();
  }

  private get repo() {
    return this.dataSource.getRepository(DeploymentConfig);
  }

  async findOne(id: string): Promise<DeploymentConfig | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findForRepository(repoFullName: string, userId: string): Promise<DeploymentConfig | null> {
    return this.repo.findOne({ where: { repo_full_name: repoFullName, user_id: userId } });
  }

  async findAutoDeploy(repoFullName: string, branch: string): Promise<DeploymentConfig[]> {
    return this.repo.find({
      where: { repo_full_name: repoFullName, branch, auto_deploy: true },
      order: { created_at: 'ASC' },
    });
  }

  async listForUser(userId: string): Promise<DeploymentConfig[]> {
    return this.repo.find({ where: { user_id: userId }, order: { created_at: 'DESC' } });
  }

  async create(userId: string, input: DeploymentConfigInput): Promise<DeploymentConfig> {
    const { repo_id, ...rest } = input;
    const config = this.repo.create({
      ...rest,
      user_id: userId,
      repo_id: repo_id == null ? null : String(repo_id),
    });
    return this.repo.save(config);
  }

  async update(
    id: string,
    userId: string,
    patch: DeploymentConfigPatch,
  ): Promise<DeploymentConfig | null> {
    const config = await this.repo.findOne({ where: { id, user_id: userId } });
    if (!config) return null;

    const { repo_id, ...rest } = patch;
    Object.assign(config, rest);
    if (repo_id !== undefined) config.repo_id = repo_id === null ? null : String(repo_id);
    return this.repo.save(config);
  }

  async remove(id: string, userId: string): Promise<boolean> {
    const result = await this.repo.delete({ id, user_id: userId });
    return (result.affected ?? 0) > 0;
  }
}
