import pino from 'pino';
import { ControlChannel } from '../../../src/control/controlChannel.js';
import type { ControlEvent, ControlEventDraft } from '../../../src/control/events.js';
import type { ContainerEngine, ContainerStatus, ImageSpec, RunOptions, RunResult } from '../../../src/engine/containerEngine.js';
import type { ReadinessCheck } from '../../../src/lifecycle/readiness.js';
import type { EnvironmentState, NetworkEndpoint, ResourceLimits } from '../../../src/types.js';

export const testLogger = pino({ level: 'silent' });

interface FakeContainer {
  name: string;
  image: string;
  hostPort: number;
  limits: ResourceLimits;
  status: ContainerStatus;
}

export class FakeContainerEngine implements ContainerEngine {
  readonly calls: string[] = [];
  readonly containers = new Map<string, FakeContainer>();
  buildError: Error | null = null;
  runError: Error | null = null;
  stopError: Error | null = null;
  private counter = 0;

  async build(spec: ImageSpec): Promise<void> {
    this.calls.push(`build:${spec.image}`);
    if (this.buildError) throw this.buildError;
  }

  async run(image: string, limits: ResourceLimits, options: RunOptions): Promise<RunResult> {
    this.calls.push(`run:${options.name}`);
    if (this.runError) throw this.runError;
    this.counter += 1;
    const containerId = `c${this.counter}`;
    this.containers.set(containerId, { name: options.name, image, hostPort: options.hostPort, limits, status: 'running' });
    return { containerId, endpoint: { host: '127.0.0.1', port: options.hostPort } };
  }

  async stop(containerId: string): Promise<void> {
    this.calls.push(`stop:${containerId}`);
    if (this.stopError) throw this.stopError;
    this.containers.delete(containerId);
  }

  async status(containerId: string): Promise<ContainerStatus> {
    return this.containers.get(containerId)?.status ?? 'missing';
  }

  crash(containerId: string): void {
    const container = this.containers.get(containerId);
    if (container) {
      container.status = 'exited';
    }
  }
}

export class FakeReadinessCheck implements ReadinessCheck {
  ready = true;
  readonly checked: NetworkEndpoint[] = [];

  async check(endpoint: NetworkEndpoint): Promise<boolean> {
    this.checked.push({ ...endpoint });
    return this.ready;
  }
}

/** Keeps every published event in order. */
export class RecordingChannel extends ControlChannel {
  readonly published: ControlEvent[] = [];

  override publish(draft: ControlEventDraft): ControlEvent {
    const event = super.publish(draft);
    this.published.push(event);
    return event;
  }

  statesOf(teamId: string): EnvironmentState[] {
    const states: EnvironmentState[] = [];
    for (const event of this.published) {
      if (event.kind === 'environment_state_changed' && event.payload.teamId === teamId) {
        states.push(event.payload.state);
      }
    }
    return states;
  }
}
