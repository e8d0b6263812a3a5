import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DeploymentConfig } from '../../database/entities/deployment-config.entity';
import { DeploymentConfigStore } from '../../database/deployment.store';
import { CreateConfigInput } from '../../dto/create-config.dto';
import { UpdateConfigInput } from '../../dto/update-config.dto';

@Injectable()
export class ConfigsService {
  private readonly logger = new Logger(ConfigsService.name);

  constructor(private readonly configs: DeploymentConfigStore) {}

  async create(userId: string, input: CreateConfigInput): Promise<DeploymentConfig> {
    const existing = await this.configs.findForRepository(input.repo_full_name, userId);
    if (existing) {
      throw new BadRequestException('Deployment configuration already exists for this repository');
    }
    const config = await this.configs.create(userId, input);
    this.logger.log(`Created deployment config ${config.id} for ${config.repo_full_name}`);
    return config;
  }

  async findAll(userId: string): Promise<DeploymentConfig[]> {
    return this.configs.listForUser(userId);
  }

  async findForRepository(userId: string, repoFullName: string): Promise<DeploymentConfig> {
    const config = await this.configs.findForRepository(repoFullName, userId);
    if (!config) throw new NotFoundException('Deployment configuration not found');
    return config;
  }

  async update(id: string, userId: string, patch: UpdateConfigInput): Promise<DeploymentConfig> {
    const config = await this.configs.update(id, userId, patch);
    if (!config) throw new NotFoundException('Deployment configuration not found');
    return config;
  }

  async remove(id: string, userId: string): Promise<void> {
    const removed = await this.configs.remove(id, userId);
    if (!removed) throw new NotFoundException('Deployment configuration not found');
  }
}
