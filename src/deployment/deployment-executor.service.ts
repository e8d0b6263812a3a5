import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { access, chmod, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Deployment } from '../database/entities/deployment.entity';
import { DeploymentConfig } from '../database/entities/deployment-config.entity';
import { DeploymentConfigStore, DeploymentStore } from '../database/deployment.store';
import { DEPLOY_OPTIONS, DeployOptions, resolveSourceUrl } from '../config/deploy-options';
import { ActiveDeploymentEntry, ActiveDeploymentRegistry } from './active-deployments.registry';
import { CommandRunnerService, formatOutputLine } from './command-runner.service';
import { buildDeploymentEnv, renderDotenv } from './deployment-env';
import { DeploymentLogService } from './deployment-log.service';
import { StatusChange } from './deployment-state';
import { DeploymentStateService } from './deployment-state.service';
import { DeploymentStatus } from './deployment-status';
import { WorkspaceService } from './workspace.service';
import {
  CommandExecutionError,
  ConfigNotFoundError,
  DeploymentNotFoundError,
  InternalDeploymentError,
  InvalidTransitionError,
  ScriptMissingError,
  describeError,
} from './deployment.errors';

export interface DeploymentRequest {
  repo_full_name: string;
  commit_sha: string;
  branch: string;
  manual_trigger: boolean;
  triggered_by: string | null;
}

export type CompletionCallback = (
  deploymentId: string,
  status: DeploymentStatus,
) => void | Promise<void>;

export type DeploymentStatusView =
  | ActiveDeploymentEntry
  | { id: string; status: 'unknown'; message: string };

interface RunningDeployment {
  abort: AbortController;
  task: Promise<void>;
}

interface LogQueue {
  push(line: string): void;
  drain(): Promise<void>;
}

const SHUTDOWN_MESSAGE = 'Deployment interrupted by service shutdown';

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs deployments:
 * - start() persists a Pending record and dispatches execution as a supervised task
 * - execution: in_progress -> config -> workspace (clone + checkout) -> deploy script -> terminal
 * - the workspace is released on every path, then the registry entry is scheduled for eviction
 * - cancel() flips the status and aborts the task, which kills the deploy command
 */
@Injectable()
export class DeploymentExecutorService implements OnModuleDestroy {
  private readonly logger = new Logger(DeploymentExecutorService.name);
  private readonly running = new Map<string, RunningDeployment>();
  private shuttingDown = false;

  constructor(
    private readonly deployments: DeploymentStore,
    private readonly configs: DeploymentConfigStore,
    private readonly state: DeploymentStateService,
    private readonly logs: DeploymentLogService,
    private readonly workspaces: WorkspaceService,
    private readonly runner: CommandRunnerService,
    private readonly registry: ActiveDeploymentRegistry,
    @Inject(DEPLOY_OPTIONS) private readonly options: DeployOptions,
  ) {}

  /**
   * Returns as soon as the Pending record exists; execution continues in the background.
   * @throws ConfigNotFoundError when the user has no config for the repository
   */
  async start(
    userId: string,
    request: DeploymentRequest,
    onComplete?: CompletionCallback,
  ): Promise<Deployment> {
    const config = await this.configs.findForRepository(request.repo_full_name, userId);
    if (!config) {
      throw new ConfigNotFoundError(request.repo_full_name);
    }

    const deployment = await this.deployments.create({
      user_id: userId,
      config_id: config.id,
      repo_full_name: request.repo_full_name,
      commit_sha: request.commit_sha,
      branch: request.branch,
      triggered_by: request.triggered_by,
      manual_trigger: request.manual_trigger,
    });
    this.logger.log(`Created deployment ${deployment.id} for ${deployment.repo_full_name}`);

    this.dispatch(deployment, onComplete);
    return deployment;
  }

  /**
   * Pending/in-progress -> cancelled. The running deploy command, if any, is killed.
   * Returns false for unknown ids and for deployments already terminal.
   */
  async cancel(deploymentId: string): Promise<boolean> {
    try {
      const updated = await this.state.transition(deploymentId, {
        status: DeploymentStatus.Cancelled,
        logs: ['Deployment cancelled by user'],
      });
      this.registry.update(deploymentId, updated.status);
    } catch (err) {
      if (err instanceof InvalidTransitionError || err instanceof DeploymentNotFoundError) {
        return false;
      }
      throw err;
    }

    this.running.get(deploymentId)?.abort.abort();
    return true;
  }

  status(deploymentId: string): DeploymentStatusView {
    return (
      this.registry.get(deploymentId) ?? {
        id: deploymentId,
        status: 'unknown',
        message: 'Deployment not found in active deployments',
      }
    );
  }

  /** Resolves once the deployment's task has finished (immediately if none is running). */
  async settled(deploymentId: string): Promise<void> {
    await this.running.get(deploymentId)?.task;
  }

  /** Aborts every running deployment; each one fails as interrupted by the shutdown. */
  async onModuleDestroy(): Promise<void> {
    this.shuttingDown = true;
    const tasks = [...this.running.values()];
    for (const { abort } of tasks) abort.abort();
    await Promise.allSettled(tasks.map(({ task }) => task));
  }

  private dispatch(deployment: Deployment, onComplete?: CompletionCallback): void {
    const abort = new AbortController();
    // start_time is restamped once execution enters in_progress
    this.registry.track(deployment.id, deployment.status, deployment.created_at);

    const task = this.execute(deployment.id, abort.signal, onComplete)
      .catch((err: unknown) => {
        this.logger.error(`Deployment task ${deployment.id} crashed: ${describeError(err)}`);
      })
      .finally(() => {
        this.running.delete(deployment.id);
      });
    this.running.set(deployment.id, { abort, task });
  }

  private async execute(
    deploymentId: string,
    signal: AbortSignal,
    onComplete?: CompletionCallback,
  ): Promise<void> {
    let finalStatus: DeploymentStatus | null;
    try {
      finalStatus = await this.run(deploymentId, signal);
    } catch (err) {
      this.logger.error(
        `Critical error in deployment execution ${deploymentId}: ${describeError(err)}`,
      );
      finalStatus = await this.failInternally(deploymentId, err);
    } finally {
      this.registry.scheduleEviction(deploymentId, this.options.registryRetentionMs);
    }

    if (finalStatus === null || !onComplete) return;
    try {
      await onComplete(deploymentId, finalStatus);
    } catch (err) {
      this.logger.error(
        `Completion callback for deployment ${deploymentId} failed: ${describeError(err)}`,
      );
    }
  }

  /** Returns the final status, or null when the record vanished. */
  private async run(deploymentId: string, signal: AbortSignal): Promise<DeploymentStatus | null> {
    let deployment: Deployment;
    try {
      deployment = await this.state.transition(deploymentId, {
        status: DeploymentStatus.InProgress,
      });
    } catch (err) {
      if (err instanceof DeploymentNotFoundError) {
        this.logger.error(`Deployment ${deploymentId} not found`);
        return null;
      }
      if (err instanceof InvalidTransitionError) {
        // cancelled before it started
        this.logger.log(`Deployment ${deploymentId} closed before it started (${err.from})`);
        this.registry.update(deploymentId, err.from);
        return err.from;
      }
      throw err;
    }
    this.registry.track(deploymentId, deployment.status, deployment.started_at ?? new Date());

    const config = await this.configs.findForRepository(
      deployment.repo_full_name,
      deployment.user_id,
    );
    if (!config) {
      const error = new ConfigNotFoundError(deployment.repo_full_name);
      this.logger.error(error.message);
      return this.finish(deploymentId, {
        status: DeploymentStatus.Failed,
        errorMessage: error.message,
      });
    }

    const outcome = await this.deploy(deployment, config, signal);
    return this.finish(deploymentId, outcome);
  }

  private async deploy(
    deployment: Deployment,
    config: DeploymentConfig,
    signal: AbortSignal,
  ): Promise<StatusChange> {
    const log = this.createLogQueue(deployment.id);
    const variables = config.environment_variables ?? {};
    const hasVariables = Object.keys(variables).length > 0;

    log.push(
      `Starting deployment of ${deployment.repo_full_name} at commit ${deployment.commit_sha}`,
    );
    if (hasVariables) log.push('Setting environment variables from config');
    const env = buildDeploymentEnv(process.env, deployment, variables);

    log.push('Preparing deployment directory');
    const sourceUrl = resolveSourceUrl(this.options.sourceUrlTemplate, deployment.repo_full_name);

    try {
      return await this.workspaces.withWorkspace(
        sourceUrl,
        deployment.commit_sha,
        async (workspace) => {
          try {
            await this.runScript(config, workspace, env, variables, log, signal);
            return {
              status: DeploymentStatus.Completed,
              logs: ['Deployment completed successfully'],
            };
          } catch (err) {
            const message = describeError(err);
            this.logger.error(`Deployment ${deployment.id} failed during execution: ${message}`);
            return {
              status: DeploymentStatus.Failed,
              errorMessage: message,
              logs: [formatOutputLine(`Deployment failed: ${message}`, 'stderr')],
            };
          } finally {
            log.push('Cleaning up deployment directory');
            await log.drain();
          }
        },
        signal,
      );
    } catch (err) {
      // only prepare() failures get here: fn above never throws
      const message =
        signal.aborted && this.shuttingDown ? SHUTDOWN_MESSAGE : describeError(err);
      this.logger.error(`Deployment ${deployment.id} failed during setup: ${message}`);
      await log.drain();
      return {
        status: DeploymentStatus.Failed,
        errorMessage: message,
        logs: [formatOutputLine(`Deployment setup failed: ${message}`, 'stderr')],
      };
    }
  }

  private async runScript(
    config: DeploymentConfig,
    workspace: string,
    env: NodeJS.ProcessEnv,
    variables: Record<string, string>,
    log: LogQueue,
    signal: AbortSignal,
  ): Promise<void> {
    const scriptPath = join(workspace, this.options.scriptName);
    if (!(await fileExists(scriptPath))) {
      const error = new ScriptMissingError(this.options.scriptName);
      log.push(`Error: ${error.message}`);
      throw error;
    }

    log.push('Setting execute permissions on deploy script');
    await chmod(scriptPath, 0o755);

    if (Object.keys(variables).length > 0) {
      log.push('Creating .env file');
      await writeFile(join(workspace, '.env'), renderDotenv(variables));
    }

    if (signal.aborted) {
      throw new CommandExecutionError(
        this.shuttingDown ? SHUTDOWN_MESSAGE : 'Deployment cancelled before the deploy command ran',
        1,
      );
    }

    log.push(`Running: ${config.deploy_command}`);
    const result = await this.runner.run(config.deploy_command, {
      cwd: workspace,
      env,
      signal,
      timeoutMs: this.options.commandTimeoutMs,
      onLine: (line, origin) => log.push(formatOutputLine(line, origin)),
    });

    if (result.timedOut) {
      const seconds = Math.round(this.options.commandTimeoutMs / 1000);
      throw new CommandExecutionError(
        `Deploy command timed out after ${seconds} seconds`,
        result.exitCode,
      );
    }
    if (result.aborted) {
      throw new CommandExecutionError(
        this.shuttingDown ? SHUTDOWN_MESSAGE : 'Deploy command was cancelled',
        result.exitCode,
      );
    }
    if (result.exitCode !== 0) {
      throw new CommandExecutionError(
        `Deploy command failed with exit code ${result.exitCode}`,
        result.exitCode,
      );
    }
  }

  /** Terminal transition; a deployment cancelled meanwhile keeps its Cancelled status. */
  private async finish(deploymentId: string, change: StatusChange): Promise<DeploymentStatus> {
    try {
      const updated = await this.state.transition(deploymentId, change);
      this.registry.update(deploymentId, updated.status);
      return updated.status;
    } catch (err) {
      if (!(err instanceof InvalidTransitionError)) throw err;
      this.logger.debug(
        `Deployment ${deploymentId} already ${err.from}; ${change.status} not recorded`,
      );
      this.registry.update(deploymentId, err.from);
      return err.from;
    }
  }

  private async failInternally(
    deploymentId: string,
    cause: unknown,
  ): Promise<DeploymentStatus | null> {
    const error = new InternalDeploymentError(cause);
    try {
      return await this.finish(deploymentId, {
        status: DeploymentStatus.Failed,
        errorMessage: error.message,
      });
    } catch (err) {
      this.logger.error(
        `Could not record the failure of deployment ${deploymentId}: ${describeError(err)}`,
      );
      return null;
    }
  }

  /** Appends lines one after another, in the order they were pushed. */
  private createLogQueue(deploymentId: string): LogQueue {
    let tail: Promise<void> = Promise.resolve();
    return {
      push: (line) => {
        tail = tail
          .then(async () => {
            await this.logs.append(deploymentId, line);
          })
          .catch((err: unknown) => {
            this.logger.warn(
              `Failed to persist log line for deployment ${deploymentId}: ${describeError(err)}`,
            );
          });
      },
      drain: () => tail,
    };
  }
}
