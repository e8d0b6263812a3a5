import { DeploymentStatus } from './deployment-status';

export type DeploymentErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'WORKSPACE_SETUP_ERROR'
  | 'SCRIPT_MISSING'
  | 'COMMAND_EXECUTION_ERROR'
  | 'INVALID_TRANSITION'
  | 'DEPLOYMENT_NOT_FOUND'
  | 'INTERNAL_ERROR';

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Base class of everything the deployment engine raises on purpose.
 * Anything else reaching the executor's top level is wrapped in InternalDeploymentError.
 */
export class DeploymentError extends Error {
  public readonly code: DeploymentErrorCode;

  constructor(message: string, code: DeploymentErrorCode) {
    super(message);
    this.name = 'DeploymentError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ConfigNotFoundError extends DeploymentError {
  constructor(public readonly repoFullName: string) {
    super(`Deployment configuration for ${repoFullName} not found`, 'CONFIG_NOT_FOUND');
    this.name = 'ConfigNotFoundError';
  }
}

/** Clone or checkout failed; `stderr` is the git output. */
export class WorkspaceSetupError extends DeploymentError {
  constructor(
    message: string,
    public readonly stderr: string,
  ) {
    super(message, 'WORKSPACE_SETUP_ERROR');
    this.name = 'WorkspaceSetupError';
  }
}

export class ScriptMissingError extends DeploymentError {
  constructor(public readonly scriptName: string) {
    super(`${scriptName} script not found in repository`, 'SCRIPT_MISSING');
    this.name = 'ScriptMissingError';
  }
}

export class CommandExecutionError extends DeploymentError {
  constructor(
    message: string,
    public readonly exitCode: number,
  ) {
    super(message, 'COMMAND_EXECUTION_ERROR');
    this.name = 'CommandExecutionError';
  }
}

export class InvalidTransitionError extends DeploymentError {
  constructor(
    public readonly deploymentId: string,
    public readonly from: DeploymentStatus,
    public readonly to: DeploymentStatus,
  ) {
    super(
      `Cannot transition deployment ${deploymentId} from ${from} to ${to}`,
      'INVALID_TRANSITION',
    );
    this.name = 'InvalidTransitionError';
  }
}

export class DeploymentNotFoundError extends DeploymentError {
  constructor(public readonly deploymentId: string) {
    super(`Deployment ${deploymentId} not found`, 'DEPLOYMENT_NOT_FOUND');
    this.name = 'DeploymentNotFoundError';
  }
}

export class InternalDeploymentError extends DeploymentError {
  constructor(cause: unknown) {
    super(`Internal error: ${describeError(cause)}`, 'INTERNAL_ERROR');
    this.name = 'InternalDeploymentError';
  }
}
