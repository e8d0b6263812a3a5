import { tmpdir } from 'node:os';
import {
  CommandRunnerService,
  KILL_GRACE_MS,
  OutputOrigin,
  formatOutputLine,
} from './command-runner.service';

describe('CommandRunnerService', () => {
  const runner = new CommandRunnerService();
  const cwd = tmpdir();

  function collect() {
    const lines: Array<[string, OutputOrigin]> = [];
    return { lines, onLine: (line: string, origin: OutputOrigin) => lines.push([line, origin]) };
  }

  it('streams stdout lines and resolves with the full output', async () => {
    const { lines, onLine } = collect();

    const result = await runner.run('echo one; echo two', { cwd, env: process.env, onLine });

    expect(result).toEqual({
      exitCode: 0,
      stdout: 'one\ntwo\n',
      stderr: '',
      timedOut: false,
      aborted: false,
    });
    expect(lines).toEqual([
      ['one', 'stdout'],
      ['two', 'stdout'],
    ]);
  });

  it('tags stderr lines and reports a nonzero exit code as a result', async () => {
    const { lines, onLine } = collect();

    const result = await runner.run('echo oops 1>&2; exit 3', { cwd, env: process.env, onLine });

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('oops\n');
    expect(lines).toEqual([['oops', 'stderr']]);
  });

  it('delivers a trailing line without a newline', async () => {
    const { lines, onLine } = collect();

    await runner.run("printf 'first\\nlast'", { cwd, env: process.env, onLine });

    expect(lines).toEqual([
      ['first', 'stdout'],
      ['last', 'stdout'],
    ]);
  });

  it('runs an argv command without a shell', async () => {
    const result = await runner.run(['echo', '$HOME; ls'], { cwd, env: process.env });

    expect(result.stdout).toBe('$HOME; ls\n');
  });

  it('uses exactly the environment it is given', async () => {
    const result = await runner.run('echo "$DEPLOY_TEST_VALUE"', {
      cwd,
      env: { ...process.env, DEPLOY_TEST_VALUE: 'from-env' },
    });

    expect(result.stdout).toBe('from-env\n');
  });

  it('kills the command when the timeout expires', async () => {
    const started = Date.now();

    const result = await runner.run('sleep 5', { cwd, env: process.env, timeoutMs: 100 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).not.toBe(0);
    expect(Date.now() - started).toBeLessThan(4000);
  });

  it('kills the command when the signal aborts', async () => {
    const abort = new AbortController();
    setTimeout(() => abort.abort(), 100);

    const result = await runner.run('sleep 5; echo late', {
      cwd,
      env: process.env,
      signal: abort.signal,
    });

    expect(result.aborted).toBe(true);
    expect(result.exitCode).not.toBe(0);
    expect(result.stdout).toBe('');
  });

  it('falls back to SIGKILL when the command ignores SIGTERM on timeout', async () => {
    const started = Date.now();

    const result = await runner.run("trap '' TERM; sleep 6; echo survived", {
      cwd,
      env: process.env,
      timeoutMs: 100,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).not.toBe(0);
    expect(result.stdout).toBe('');
    expect(Date.now() - started).toBeLessThan(100 + KILL_GRACE_MS + 2000);
  });

  it('falls back to SIGKILL when the command ignores SIGTERM on abort', async () => {
    const abort = new AbortController();
    setTimeout(() => abort.abort(), 100);
    const started = Date.now();

    const result = await runner.run("trap '' TERM; sleep 6; echo survived", {
      cwd,
      env: process.env,
      signal: abort.signal,
    });

    expect(result.aborted).toBe(true);
    expect(result.exitCode).not.toBe(0);
    expect(result.stdout).toBe('');
    expect(Date.now() - started).toBeLessThan(100 + KILL_GRACE_MS + 2000);
  });

  it('resolves with exit code 1 when the program cannot be started', async () => {
    const { lines, onLine } = collect();

    const result = await runner.run(['deploy-runner-missing-binary'], {
      cwd,
      env: process.env,
      onLine,
    });

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('ENOENT');
    expect(lines).toHaveLength(1);
    expect(lines[0][1]).toBe('stderr');
    expect(lines[0][0]).toMatch(/^Execution error: .*ENOENT/);
  });
});

describe('formatOutputLine', () => {
  it('wraps stderr lines in red and leaves stdout alone', () => {
    expect(formatOutputLine('warn', 'stderr')).toBe('\u001b[0;31mwarn\u001b[0m');
    expect(formatOutputLine('info', 'stdout')).toBe('info');
  });
});
