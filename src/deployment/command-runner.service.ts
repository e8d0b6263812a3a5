import { Injectable, Logger } from '@nestjs/common';
import { ChildProcess, spawn } from 'node:child_process';
import { describeError } from './deployment.errors';

export type OutputOrigin = 'stdout' | 'stderr';

/** A shell string, or an argv run without a shell. */
export type CommandSpec = string | readonly [string, ...string[]];

export interface RunOptions {
  cwd: string;
  /** Full environment of the child; nothing is inherited implicitly. */
  env: NodeJS.ProcessEnv;
  /** Called for every complete line as it arrives, before the process exits. */
  onLine?: (line: string, origin: OutputOrigin) => void;
  /** Aborting kills the child's process group. */
  signal?: AbortSignal;
  /** 0 or absent: no timeout. */
  timeoutMs?: number;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
}

/** Time a killed command gets to exit on SIGTERM before its process group is sent SIGKILL. */
export const KILL_GRACE_MS = 2000;

const RED = '\u001b[0;31m';
const RESET = '\u001b[0m';

/** Persisted form of an output line: stderr is wrapped in an ANSI red marker. */
export function formatOutputLine(line: string, origin: OutputOrigin): string {
  return origin === 'stderr' ? `${RED}${line}${RESET}` : line;
}

function createLineBuffer(onLine: (line: string) => void) {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;

      // Split into complete lines; keep the last partial line in buffer.
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';

      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}

function describeCommand(command: CommandSpec): string {
  return typeof command === 'string' ? command : command.join(' ');
}

/**
 * Runs one external command. stdout and stderr are drained by their own listeners, so neither
 * pipe can fill up and stall the child. Resolves after 'close', when both streams are drained.
 * A nonzero exit code is a normal result.
 */
@Injectable()
export class CommandRunnerService {
  private readonly logger = new Logger(CommandRunnerService.name);

  run(command: CommandSpec, options: RunOptions): Promise<RunResult> {
    this.logger.log(`Running command: ${describeCommand(command)}`);

    return new Promise<RunResult>((resolve) => {
      const stdoutChunks: string[] = [];
      const stderrChunks: string[] = [];
      let timedOut = false;
      let aborted = false;
      let settled = false;

      // detached: the child leads its own process group, so a kill reaches what the shell started
      const child: ChildProcess =
        typeof command === 'string'
          ? spawn(command, { cwd: options.cwd, env: options.env, shell: true, detached: true })
          : spawn(command[0], command.slice(1), {
              cwd: options.cwd,
              env: options.env,
              detached: true,
            });

      const stdoutBuffer = createLineBuffer((line) => options.onLine?.(line, 'stdout'));
      const stderrBuffer = createLineBuffer((line) => options.onLine?.(line, 'stderr'));

      const signalGroup = (signal: NodeJS.Signals) => {
        try {
          if (child.pid !== undefined) process.kill(-child.pid, signal);
          else child.kill(signal);
        } catch (err) {
          this.logger.warn(
            `Failed to send ${signal} to ${describeCommand(command)}: ${describeError(err)}`,
          );
          child.kill(signal);
        }
      };

      // SIGTERM first; whatever still holds the pipes after the grace period gets SIGKILL
      let killTimer: NodeJS.Timeout | null = null;
      const kill = () => {
        if (settled || killTimer) return;
        signalGroup('SIGTERM');
        killTimer = setTimeout(() => signalGroup('SIGKILL'), KILL_GRACE_MS);
      };

      const timer =
        options.timeoutMs && options.timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              kill();
            }, options.timeoutMs)
          : null;

      const onAbort = () => {
        aborted = true;
        kill();
      };
      if (options.signal?.aborted) onAbort();
      else options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (exitCode: number) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);

        // Flush any partial line that didn't end in \n
        stdoutBuffer.flush();
        stderrBuffer.flush();
        resolve({
          exitCode,
          stdout: stdoutChunks.join(''),
          stderr: stderrChunks.join(''),
          timedOut,
          aborted,
        });
      };

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdoutChunks.push(chunk);
        stdoutBuffer.write(chunk);
      });
      child.stderr?.on('data', (chunk: string) => {
        stderrChunks.push(chunk);
        stderrBuffer.write(chunk);
      });

      child.on('close', (code) => finish(code ?? 1));
      child.on('error', (err) => {
        stderrChunks.push(`${err.message}\n`);
        options.onLine?.(`Execution error: ${err.message}`, 'stderr');
        finish(1);
      });
    });
  }
}
