import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CommandResult } from '../types.js';
import type { Executor } from './executor.js';
import { ErrorCodes, SetupError } from '../errors.js';

export interface ProcessExecutorOptions {
  cwd: string;
  env?: Record<string, string>;
}

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(os.constants.signals),
);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function toSetupError(
  command: string,
  error: unknown,
): SetupError | null {
  if (!isErrnoException(error)) return null;

  if (error.code === 'ENOENT') {
    return new SetupError(
      `Command not found: ${command}`,
      ErrorCodes.COMMAND_NOT_FOUND,
    );
  }

  if (error.code === 'EACCES') {
    return new SetupError(
      `Command is not executable: ${command}`,
      ErrorCodes.COMMAND_NOT_EXECUTABLE,
    );
  }

  return null;
}

export class ProcessExecutor implements Executor {
  constructor(
    private readonly command: string,
    private readonly args: string[],
    private readonly options: ProcessExecutorOptions,
  ) {}

  describe(): string {
    return [this.command, ...this.args].join(' ');
  }

  async verify(): Promise<void> {
    const cwdStat = fs.statSync(this.options.cwd, { throwIfNoEntry: false });
    if (!cwdStat || !cwdStat.isDirectory()) {
      throw new SetupError(
        `Working directory does not exist: ${this.options.cwd}`,
        ErrorCodes.INVALID_CWD,
      );
    }

    // Bare names are resolved through PATH by spawn itself
    if (this.command.includes('/') || this.command.includes(path.sep)) {
      const commandPath = path.resolve(this.options.cwd, this.command);
      if (!fs.existsSync(commandPath)) {
        throw new SetupError(
          `Command not found: ${commandPath}`,
          ErrorCodes.COMMAND_NOT_FOUND,
        );
      }
    }
  }

  invoke(): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, this.args, {
        cwd: this.options.cwd,
        env: this.options.env ? { ...process.env, ...this.options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');

      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });

      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error) => {
        reject(toSetupError(this.command, error) ?? error);
      });

      child.on('close', (code, signal) => {
        if (code !== null) {
          resolve({ exitCode: code, stdout, stderr });
          return;
        }
        // Killed by a signal: report the shell convention 128 + signal number
        const signalNumber = signal ? (SIGNAL_NUMBERS.get(signal) ?? 0) : 0;
        resolve({ exitCode: 128 + signalNumber, stdout, stderr });
      });
    });
  }
}
