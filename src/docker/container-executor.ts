import * as path from 'path';
import type { CommandResult } from '../types.js';
import type { Executor } from '../executor/executor.js';
import type { RunCommandOptions } from './container.js';
import { ErrorCodes, SetupError, errorMessage } from '../errors.js';

const CONTAINER_WORKDIR = '/workspace';

/** The slice of ContainerManager the executor needs. */
export interface ContainerRunner {
  ping(): Promise<void>;
  hasImage(image: string): Promise<boolean>;
  runCommand(
    image: string,
    command: string[],
    options: RunCommandOptions,
  ): Promise<CommandResult>;
}

export interface ContainerExecutorOptions {
  image: string;
  hostDir: string;
  keepContainers?: boolean;
  env?: Record<string, string>;
}

/**
 * Runs each invocation in a fresh container, with the host working
 * directory mounted at /workspace.
 */
export class ContainerExecutor implements Executor {
  private runCount = 0;

  constructor(
    private readonly manager: ContainerRunner,
    private readonly command: string[],
    private readonly options: ContainerExecutorOptions,
  ) {}

  describe(): string {
    return `${this.command.join(' ')} (in ${this.options.image})`;
  }

  async verify(): Promise<void> {
    try {
      await this.manager.ping();
    } catch (error) {
      throw new SetupError(
        `Docker daemon is not reachable: ${errorMessage(error)}`,
        ErrorCodes.DOCKER_UNAVAILABLE,
      );
    }

    if (!(await this.manager.hasImage(this.options.image))) {
      throw new SetupError(
        `Docker image not found locally: ${this.options.image}`,
        ErrorCodes.IMAGE_NOT_FOUND,
      );
    }
  }

  async invoke(): Promise<CommandResult> {
    this.runCount += 1;

    try {
      return await this.manager.runCommand(this.options.image, this.command, {
        workDir: CONTAINER_WORKDIR,
        mounts: [
          {
            hostPath: path.resolve(this.options.hostDir),
            containerPath: CONTAINER_WORKDIR,
          },
        ],
        env: this.options.env,
        keepContainer: this.options.keepContainers,
        containerName: this.options.keepContainers
          ? `stress-loop-run-${this.runCount}-${Date.now()}`
          : undefined,
      });
    } catch (error) {
      if (/executable file not found|no such file or directory/i.test(errorMessage(error))) {
        throw new SetupError(
          `Command not found in ${this.options.image}: ${this.command[0]}`,
          ErrorCodes.COMMAND_NOT_FOUND,
        );
      }
      throw error;
    }
  }
}
