import type { ImageBuildSpec, NetworkEndpoint, ResourceLimits } from '../types.js';

export type ContainerStatus = 'running' | 'exited' | 'missing';

export interface ImageSpec {
  image: string;
  build?: ImageBuildSpec;
}

export interface RunOptions {
  name: string;
  hostPort: number;
}

export interface RunResult {
  containerId: string;
  endpoint: NetworkEndpoint;
}

/**
 * The four operations the lifecycle controller needs from a container
 * runtime. Implementations must make `stop` safe to call on a container that
 * already exited or was removed.
 */
export interface ContainerEngine {
  build(spec: ImageSpec): Promise<void>;
  run(image: string, limits: ResourceLimits, options: RunOptions): Promise<RunResult>;
  stop(containerId: string): Promise<void>;
  status(containerId: string): Promise<ContainerStatus>;
}
