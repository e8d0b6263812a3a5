import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { DeployOptions } from '../../src/config/deploy-options';
import { CommandRunnerService } from '../../src/deployment/command-runner.service';
import { WorkspaceService } from '../../src/deployment/workspace.service';
import { WorkspaceSetupError } from '../../src/deployment/deployment.errors';

const TIMESTAMP_PREFIX = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /;

export function stripTimestamp(line: string): string {
  return line.replace(TIMESTAMP_PREFIX, '');
}

/** Polls until the predicate holds, or fails after timeoutMs. */
export async function waitFor(
  predicate: () => boolean | Promise<boolean>,
  timeoutMs = 5000,
  intervalMs = 10,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

export function testDeployOptions(workspaceRoot: string, overrides: Partial<DeployOptions> = {}) {
  return {
    sourceUrlTemplate: 'https://git.invalid/{repo}.git',
    scriptName: 'deploy.sh',
    workspaceRoot,
    commandTimeoutMs: 0,
    registryRetentionMs: 60_000,
    streamPollMs: 10,
    ...overrides,
  } satisfies DeployOptions;
}

/**
 * Workspace without git: prepare() creates a directory holding the given files
 * (or fails like a clone would). release() is the real one.
 */
export class StubWorkspaceService extends WorkspaceService {
  files: Record<string, string> = {};
  failure: string | null = null;
  readonly prepared: string[] = [];
  readonly requests: Array<{ sourceUrl: string; commit: string }> = [];

  constructor(
    runner: CommandRunnerService,
    private readonly stubOptions: DeployOptions,
  ) {
    super(runner, stubOptions);
  }

  override async prepare(sourceUrl: string, commit: string): Promise<string> {
    this.requests.push({ sourceUrl, commit });
    if (this.failure !== null) {
      throw new WorkspaceSetupError(`Failed to clone repository: ${this.failure}`, this.failure);
    }

    const dir = join(this.stubOptions.workspaceRoot, `deploy_${randomBytes(16).toString('hex')}`);
    await mkdir(dir, { recursive: true });
    for (const [name, content] of Object.entries(this.files)) {
      await writeFile(join(dir, name), content);
    }
    this.prepared.push(dir);
    return dir;
  }
}
