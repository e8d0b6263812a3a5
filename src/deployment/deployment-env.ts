import { Deployment } from '../database/entities/deployment.entity';

type DeploymentIdentity = Pick<Deployment, 'id' | 'repo_full_name' | 'commit_sha' | 'branch'>;

/**
 * Environment of the deploy command: ambient variables, then the deployment's identity,
 * then the config's variables. Later layers win.
 */
export function buildDeploymentEnv(
  ambient: NodeJS.ProcessEnv,
  deployment: DeploymentIdentity,
  configured: Record<string, string>,
): NodeJS.ProcessEnv {
  return {
    ...ambient,
    DEPLOYMENT_ID: deployment.id,
    REPO_NAME: deployment.repo_full_name,
    COMMIT_SHA: deployment.commit_sha,
    BRANCH: deployment.branch,
    ...configured,
  };
}

/** `KEY=value` per line, in the map's order. */
export function renderDotenv(variables: Record<string, string>): string {
  return Object.entries(variables)
    .map(([key, value]) => `${key}=${value}\n`)
    .join('');
}
