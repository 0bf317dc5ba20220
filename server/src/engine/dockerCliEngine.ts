import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ContainerEngineError, errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ResourceLimits } from '../types.js';
import type { ContainerEngine, ContainerStatus, ImageSpec, RunOptions, RunResult } from './containerEngine.js';

const execFileAsync = promisify(execFile);

const NO_SUCH_CONTAINER = /no such (container|object)/i;

export interface DockerCliEngineOptions {
  binary: string;
  containerPort: number;
  endpointHost: string;
  logger: Logger;
  /**
   * Variables set inside every desktop container. Only the names reach the
   * command line (`-e NAME`); values travel in the docker CLI's environment.
   */
  containerEnv?: Record<string, string>;
  commandTimeoutMs?: number;
  buildTimeoutMs?: number;
}

export type CommandRunner = (
  binary: string,
  args: string[],
  timeoutMs: number,
  env?: Record<string, string>,
) => Promise<{ stdout: string; stderr: string }>;

const defaultRunner: CommandRunner = async (binary, args, timeoutMs, env) => {
  const { stdout, stderr } = await execFileAsync(binary, args, {
    timeout: timeoutMs,
    maxBuffer: 10 * 1024 * 1024,
    env: env ? { ...process.env, ...env } : process.env,
  });
  return { stdout, stderr };
};

/**
 * Drives the docker CLI. The container publishes its VNC port on the host
 * port chosen by the controller.
 */
export class DockerCliEngine implements ContainerEngine {
  private readonly commandTimeoutMs: number;
  private readonly buildTimeoutMs: number;

  constructor(
    private readonly options: DockerCliEngineOptions,
    private readonly runCommand: CommandRunner = defaultRunner,
  ) {
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30_000;
    this.buildTimeoutMs = options.buildTimeoutMs ?? 10 * 60_000;
  }

  async build(spec: ImageSpec): Promise<void> {
    if (!spec.build) {
      if (await this.imageExists(spec.image)) return;
      await this.exec(['pull', spec.image], this.buildTimeoutMs);
      return;
    }
    const args = ['build', '-t', spec.image];
    if (spec.build.dockerfile) {
      args.push('-f', spec.build.dockerfile);
    }
    args.push(spec.build.context);
    await this.exec(args, this.buildTimeoutMs);
  }

  async run(image: string, limits: ResourceLimits, options: RunOptions): Promise<RunResult> {
    const args = [
      'run',
      '-d',
      '--name',
      options.name,
      '-p',
      `${options.hostPort}:${this.options.containerPort}`,
    ];
    if (limits.cpus !== undefined) {
      args.push('--cpus', String(limits.cpus));
    }
    if (limits.memoryMb !== undefined) {
      args.push('--memory', `${limits.memoryMb}m`);
    }
    const env = this.options.containerEnv ?? {};
    for (const name of Object.keys(env)) {
      args.push('-e', name);
    }
    args.push(image);

    const { stdout } = await this.exec(args, this.commandTimeoutMs, Object.keys(env).length > 0 ? env : undefined);
    const containerId = stdout.trim();
    if (!containerId) {
      throw new ContainerEngineError(`docker run returned no container id for ${options.name}`);
    }
    return {
      containerId,
      endpoint: { host: this.options.endpointHost, port: options.hostPort },
    };
  }

  async stop(containerId: string): Promise<void> {
    try {
      await this.exec(['rm', '-f', containerId], this.commandTimeoutMs);
    } catch (error) {
      if (NO_SUCH_CONTAINER.test(errorMessage(error))) {
        return;
      }
      throw error;
    }
  }

  async status(containerId: string): Promise<ContainerStatus> {
    try {
      const { stdout } = await this.exec(
        ['inspect', '--format', '{{.State.Running}}', containerId],
        this.commandTimeoutMs,
      );
      return stdout.trim() === 'true' ? 'running' : 'exited';
    } catch (error) {
      if (NO_SUCH_CONTAINER.test(errorMessage(error))) {
        return 'missing';
      }
      throw error;
    }
  }

  private async imageExists(image: string): Promise<boolean> {
    try {
      await this.exec(['image', 'inspect', image], this.commandTimeoutMs);
      return true;
    } catch {
      return false;
    }
  }

  private async exec(
    args: string[],
    timeoutMs: number,
    env?: Record<string, string>,
  ): Promise<{ stdout: string; stderr: string }> {
    this.options.logger.debug({ args }, 'docker_exec');
    try {
      return env
        ? await this.runCommand(this.options.binary, args, timeoutMs, env)
        : await this.runCommand(this.options.binary, args, timeoutMs);
    } catch (error) {
      throw new ContainerEngineError(`docker ${args[0]} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
