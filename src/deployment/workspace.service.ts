import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomBytes } from 'node:crypto';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { CommandRunnerService } from './command-runner.service';
import { DEPLOY_OPTIONS, DeployOptions } from '../config/deploy-options';
import { WorkspaceSetupError, describeError } from './deployment.errors';

/**
 * One fresh checkout per deployment attempt, under a random directory name.
 * release() never throws: a directory that cannot be removed is logged and left behind.
 */
@Injectable()
export class WorkspaceService {
  private readonly logger = new Logger(WorkspaceService.name);

  constructor(
    private readonly runner: CommandRunnerService,
    @Inject(DEPLOY_OPTIONS) private readonly options: DeployOptions,
  ) {}

  /**
   * Full clone of sourceUrl, then checkout of the exact commit.
   * On failure the partial directory is released before WorkspaceSetupError propagates.
   */
  async prepare(sourceUrl: string, commit: string, signal?: AbortSignal): Promise<string> {
    if (commit.startsWith('-')) {
      throw new WorkspaceSetupError(`Invalid commit identifier: ${commit}`, '');
    }

    const dir = join(this.options.workspaceRoot, `deploy_${randomBytes(16).toString('hex')}`);
    await mkdir(dir, { recursive: true });

    try {
      await this.git(
        ['clone', '--', sourceUrl, dir],
        this.options.workspaceRoot,
        'Failed to clone repository',
        signal,
      );
      // --detach: a name that is not a revision fails instead of restoring a file
      await this.git(
        ['checkout', '--detach', commit],
        dir,
        `Failed to checkout commit ${commit}`,
        signal,
      );
    } catch (err) {
      await this.release(dir);
      throw err;
    }
    return dir;
  }

  async release(workspacePath: string): Promise<void> {
    try {
      await rm(workspacePath, { recursive: true, force: true });
    } catch (err) {
      this.logger.error(
        `Failed to clean up deployment directory ${workspacePath}: ${describeError(err)}`,
      );
    }
  }

  /** prepare, run fn, release exactly once whatever fn does. */
  async withWorkspace<T>(
    sourceUrl: string,
    commit: string,
    fn: (workspacePath: string) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const workspacePath = await this.prepare(sourceUrl, commit, signal);
    try {
      return await fn(workspacePath);
    } finally {
      await this.release(workspacePath);
    }
  }

  private async git(
    args: string[],
    cwd: string,
    failure: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const result = await this.runner.run(['git', ...args], {
      cwd,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      signal,
    });
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new WorkspaceSetupError(stderr ? `${failure}: ${stderr}` : failure, result.stderr);
    }
  }
}
