import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ProcessExecutor } from '../../src/executor/process-executor.js';
import { ErrorCodes, SetupError } from '../../src/errors.js';

const node = process.execPath;

describe('ProcessExecutor', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stress-loop-exec-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('captures stdout of a passing command', async () => {
    const executor = new ProcessExecutor(
      node,
      ['-e', "process.stdout.write('hello')"],
      { cwd: tempDir },
    );

    await expect(executor.invoke()).resolves.toEqual({
      exitCode: 0,
      stdout: 'hello',
      stderr: '',
    });
  });

  it('resolves a non-zero exit with its captured stderr', async () => {
    const executor = new ProcessExecutor(
      node,
      ['-e', "process.stderr.write('assertion failed'); process.exit(3)"],
      { cwd: tempDir },
    );

    await expect(executor.invoke()).resolves.toEqual({
      exitCode: 3,
      stdout: '',
      stderr: 'assertion failed',
    });
  });

  it('reports a command killed by a signal as 128 + signal number', async () => {
    const executor = new ProcessExecutor(
      node,
      ['-e', "process.kill(process.pid, 'SIGTERM')"],
      { cwd: tempDir },
    );

    const result = await executor.invoke();

    expect(result.exitCode).toBe(128 + os.constants.signals.SIGTERM);
  });

  it('runs in the configured working directory', async () => {
    const executor = new ProcessExecutor(
      node,
      ['-e', 'process.stdout.write(process.cwd())'],
      { cwd: tempDir },
    );

    const result = await executor.invoke();

    expect(fs.realpathSync(result.stdout)).toBe(fs.realpathSync(tempDir));
  });

  it('passes extra environment variables', async () => {
    const executor = new ProcessExecutor(
      node,
      ['-e', 'process.stdout.write(process.env.STRESS_LOOP_TEST_VAR)'],
      { cwd: tempDir, env: { STRESS_LOOP_TEST_VAR: 'from-env' } },
    );

    const result = await executor.invoke();

    expect(result.stdout).toBe('from-env');
  });

  it('rejects with a setup error when the command does not exist', async () => {
    const executor = new ProcessExecutor('stress-loop-no-such-command', [], {
      cwd: tempDir,
    });

    const error = await executor.invoke().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SetupError);
    expect(error).toMatchObject({
      code: ErrorCodes.COMMAND_NOT_FOUND,
      message: 'Command not found: stress-loop-no-such-command',
    });
  });

  describe('verify', () => {
    it('fails for a command path that does not exist', async () => {
      const executor = new ProcessExecutor('./missing-tests.sh', [], {
        cwd: tempDir,
      });

      await expect(executor.verify()).rejects.toMatchObject({
        code: ErrorCodes.COMMAND_NOT_FOUND,
        message: `Command not found: ${path.join(tempDir, 'missing-tests.sh')}`,
      });
    });

    it('fails for a working directory that does not exist', async () => {
      const missingDir = path.join(tempDir, 'nope');
      const executor = new ProcessExecutor(node, [], { cwd: missingDir });

      await expect(executor.verify()).rejects.toMatchObject({
        code: ErrorCodes.INVALID_CWD,
        message: `Working directory does not exist: ${missingDir}`,
      });
    });

    it('leaves bare command names to PATH lookup', async () => {
      const executor = new ProcessExecutor('stress-loop-no-such-command', [], {
        cwd: tempDir,
      });

      await expect(executor.verify()).resolves.toBeUndefined();
    });
  });

  it('describes the command line', () => {
    const executor = new ProcessExecutor('make', ['test', 'FAST=1'], {
      cwd: tempDir,
    });

    expect(executor.describe()).toBe('make test FAST=1');
  });
});
