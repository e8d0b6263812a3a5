import { Injectable } from '@nestjs/common';
import { DataSource, FindOptionsWhere } from 'typeorm';
import { Deployment } from './entities/deployment.entity';
import { DeploymentLog } from './entities/deployment-log.entity';
import {
  CreateDeploymentInput,
  DeploymentFilter,
  DeploymentStore,
  StatusPatch,
} from './deployment.store';
import { DeploymentStatus, isTerminal } from '../deployment/deployment-status';

/**
 * Postgres-backed deployments. Status updates and log appends take a lock on the
 * deployment row, so a line can never land after the terminal transition.
 */
@Injectable()
export class TypeOrmDeploymentStore extends DeploymentStore {
  constructor(private readonly dataSource: DataSource) {
    super();
  }

  private get repo() {
    return this.dataSource.getRepository(Deployment);
  }

  async create(input: CreateDeploymentInput): Promise<Deployment> {
    const deployment = this.repo.create({
      ...input,
      status: DeploymentStatus.Pending,
      created_at: new Date(),
      started_at: null,
      completed_at: null,
      error_message: null,
    });
    return this.repo.save(deployment);
  }

  async findOne(id: string): Promise<Deployment | null> {
    return this.repo.findOne({ where: { id } });
  }

  async list(filter: DeploymentFilter): Promise<Deployment[]> {
    const where: FindOptionsWhere<Deployment> = {};
    if (filter.repo_full_name) where.repo_full_name = filter.repo_full_name;
    if (filter.user_id) where.user_id = filter.user_id;

    return this.repo.find({
      where,
      order: { created_at: 'DESC' },
      take: filter.limit,
      skip: filter.offset,
    });
  }

  async remove(id: string, userId: string): Promise<boolean> {
    const result = await this.repo.delete({ id, user_id: userId });
    return (result.affected ?? 0) > 0;
  }

  async updateStatus(
    id: string,
    decide: (current: Deployment) => StatusPatch,
  ): Promise<Deployment | null> {
    return this.dataSource.transaction(async (manager) => {
      const current = await manager.findOne(Deployment, {
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });
      if (!current) return null;

      const { logs, ...columns } = decide(current);
      await manager.update(Deployment, { id }, columns);
      if (logs.length > 0) {
        await manager.insert(
          DeploymentLog,
          logs.map((line) => ({ deployment_id: id, line })),
        );
      }
      return Object.assign(current, columns);
    });
  }

  async appendLog(id: string, line: string): Promise<boolean> {
    return this.dataSource.transaction(async (manager) => {
      const current = await manager.findOne(Deployment, {
        where: { id },
        select: { id: true, status: true },
        lock: { mode: 'pessimistic_read' },
      });
      if (!current || isTerminal(current.status)) return false;

      await manager.insert(DeploymentLog, { deployment_id: id, line });
      return true;
    });
  }

  async readLogs(id: string, since: number): Promise<string[]> {
    const rows = await this.dataSource.getRepository(DeploymentLog).find({
      where: { deployment_id: id },
      select: { id: true, line: true },
      order: { id: 'ASC' },
      skip: since,
    });
    return rows.map((row) => row.line);
  }
}
