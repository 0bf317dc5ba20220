import {
  AsyncQueue,
  ControlChannel,
  MembershipRegistry,
  type ControlEvent,
  type EnvironmentState,
  type NetworkEndpoint,
} from '@rangelab/server';
import type { ControlFeed, ControlMessage } from '../../src/control/controlFeed.js';

/**
 * Control feed wired straight to the controller's channel and registry, the
 * way the WebSocket layer wires them: a snapshot first, then live events.
 */
export class LocalControlFeed implements ControlFeed {
  readonly channel: ControlChannel;
  readonly registry: MembershipRegistry;
  snapshotRequests = 0;
  /** Events still to withhold from subscribers, to simulate lost messages. */
  dropEvents = 0;
  private readonly queues = new Set<AsyncQueue<ControlMessage>>();

  constructor(channel = new ControlChannel(), registry = new MembershipRegistry(channel)) {
    this.channel = channel;
    this.registry = registry;
  }

  subscribe(signal?: AbortSignal): AsyncIterableIterator<ControlMessage> {
    const events = this.channel.subscribe();
    const queue: AsyncQueue<ControlMessage> = new AsyncQueue(() => {
      this.queues.delete(queue);
      void events.return?.();
    });
    this.queues.add(queue);
    queue.push({ type: 'snapshot', snapshot: this.registry.snapshot() });
    void this.forward(events, queue);

    if (signal) {
      if (signal.aborted) {
        void queue.return();
      } else {
        signal.addEventListener('abort', () => void queue.return(), { once: true });
      }
    }
    return queue;
  }

  requestSnapshot(): void {
    this.snapshotRequests += 1;
    const snapshot = this.registry.snapshot();
    for (const queue of this.queues) {
      queue.push({ type: 'snapshot', snapshot });
    }
  }

  get subscribers(): number {
    return this.queues.size;
  }

  /** Shortcut for announcing an environment transition without a controller. */
  environment(teamId: string, state: EnvironmentState, endpoint?: NetworkEndpoint): ControlEvent {
    return this.registry.recordEnvironment({
      teamId,
      image: 'lab/desktop:1',
      state,
      updatedAt: Date.now(),
      ...(endpoint ? { endpoint } : {}),
    });
  }

  private async forward(events: AsyncIterableIterator<ControlEvent>, queue: AsyncQueue<ControlMessage>): Promise<void> {
    for await (const event of events) {
      if (this.dropEvents > 0) {
        this.dropEvents -= 1;
        continue;
      }
      queue.push({ type: 'event', event });
    }
  }
}
