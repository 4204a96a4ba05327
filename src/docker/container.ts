import Docker from 'dockerode';
import { PassThrough } from 'stream';
import type { CommandResult } from '../types.js';

export interface MountConfig {
  hostPath: string;
  containerPath: string;
  readOnly?: boolean;
}

export interface RunCommandOptions {
  workDir: string;
  mounts?: MountConfig[];
  env?: Record<string, string>;
  keepContainer?: boolean;
  containerName?: string;
}

export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    error.statusCode === 404
  );
}

export class ContainerManager {
  private docker: Docker;

  constructor(socketPath: string = '/var/run/docker.sock') {
    this.docker = new Docker({ socketPath });
  }

  async ping(): Promise<void> {
    await this.docker.ping();
  }

  async hasImage(image: string): Promise<boolean> {
    try {
      await this.docker.getImage(image).inspect();
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  async runCommand(
    image: string,
    command: string[],
    options: RunCommandOptions,
  ): Promise<CommandResult> {
    const binds: string[] = [];
    if (options.mounts) {
      for (const mount of options.mounts) {
        const mode = mount.readOnly ? 'ro' : 'rw';
        binds.push(`${mount.hostPath}:${mount.containerPath}:${mode}`);
      }
    }

    const envArray: string[] = [];
    if (options.env) {
      for (const [key, value] of Object.entries(options.env)) {
        envArray.push(`${key}=${value}`);
      }
    }

    const container = await this.docker.createContainer({
      Image: image,
      Cmd: command,
      Tty: false,
      AttachStdout: true,
      AttachStderr: true,
      WorkingDir: options.workDir,
      Env: envArray.length > 0 ? envArray : undefined,
      HostConfig: {
        Binds: binds.length > 0 ? binds : undefined,
        AutoRemove: false, // removed manually once output is collected
      },
      name: options.containerName,
    });

    // Attach before starting so no early output is lost
    const stream = await container.attach({
      stream: true,
      stdout: true,
      stderr: true,
    });

    let stdout = '';
    let stderr = '';

    const stdoutStream = new PassThrough();
    const stderrStream = new PassThrough();

    stdoutStream.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    stderrStream.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    this.docker.modem.demuxStream(stream, stdoutStream, stderrStream);

    try {
      await container.start();

      const waitResult: { StatusCode: number } = await container.wait();

      // Give streams a moment to flush
      await new Promise((resolve) => setTimeout(resolve, 100));

      return {
        exitCode: waitResult.StatusCode,
        stdout,
        stderr,
      };
    } finally {
      if (!options.keepContainer) {
        await container.remove({ force: true }).catch((error: unknown) => {
          console.error(
            `Warning: could not remove container ${container.id}: ${
              error instanceof Error ? error.message : String(error)
            }`,
          );
        });
      }
    }
  }
}
