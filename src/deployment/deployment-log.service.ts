import { Injectable, Logger } from '@nestjs/common';
import { DeploymentStore } from '../database/deployment.store';
import { formatLogLine } from './deployment-state';

/**
 * Append-only log of a deployment. Every append is its own committed write,
 * so pollers and the live stream see lines as soon as they are appended.
 */
@Injectable()
export class DeploymentLogService {
  private readonly logger = new Logger(DeploymentLogService.name);

  constructor(private readonly store: DeploymentStore) {}

  /** Returns false when the deployment is unknown or already terminal; the line is dropped. */
  async append(deploymentId: string, line: string): Promise<boolean> {
    const accepted = await this.store.appendLog(deploymentId, formatLogLine(line, new Date()));
    if (!accepted) {
      this.logger.debug(`Dropped log line for closed or unknown deployment ${deploymentId}`);
    }
    return accepted;
  }

  /** Lines in append order, starting at index `since`. */
  async read(deploymentId: string, since = 0): Promise<string[]> {
    return this.store.readLogs(deploymentId, Math.max(0, Math.floor(since)));
  }
}
