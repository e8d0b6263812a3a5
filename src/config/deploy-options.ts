import { ConfigService } from '@nestjs/config';
import { tmpdir } from 'node:os';

/** Knobs of the deployment engine, resolved once from the environment. */
export interface DeployOptions {
  /** Clone URL template; `{repo}` is replaced with the repository full name. */
  sourceUrlTemplate: string;
  /** Script that must exist at the workspace root. */
  scriptName: string;
  /** Parent directory of the per-deployment workspaces. */
  workspaceRoot: string;
  /** 0 disables the deploy command timeout. */
  commandTimeoutMs: number;
  registryRetentionMs: number;
  streamPollMs: number;
}

export const DEPLOY_OPTIONS = Symbol('DEPLOY_OPTIONS');

export const DEFAULT_SOURCE_URL_TEMPLATE = 'https://github.com/{repo}.git';

function readString(config: ConfigService, key: string, fallback: string): string {
  const value = config.get<string>(key);
  return value ? String(value) : fallback;
}

function readNumber(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<number | string>(key);
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

export function loadDeployOptions(config: ConfigService): DeployOptions {
  return {
    sourceUrlTemplate: readString(config, 'DEPLOY_SOURCE_URL_TEMPLATE', DEFAULT_SOURCE_URL_TEMPLATE),
    scriptName: readString(config, 'DEPLOY_SCRIPT_NAME', 'deploy.sh'),
    workspaceRoot: readString(config, 'DEPLOY_WORKSPACE_ROOT', tmpdir()),
    commandTimeoutMs: readNumber(config, 'DEPLOY_COMMAND_TIMEOUT_SECONDS', 0) * 1000,
    registryRetentionMs: readNumber(config, 'DEPLOY_REGISTRY_RETENTION_SECONDS', 3600) * 1000,
    streamPollMs: readNumber(config, 'DEPLOY_STREAM_POLL_MS', 1000),
  };
}

export function resolveSourceUrl(template: string, repoFullName: string): string {
  return template.split('{repo}').join(repoFullName);
}
