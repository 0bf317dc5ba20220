import { AsyncQueue } from '../lib/asyncQueue.js';
import type { ControlEvent, ControlEventDraft } from './events.js';

export interface SubscribeOptions {
  signal?: AbortSignal;
}

/**
 * Controller-side publisher. Stamps every event with the next sequence number
 * of its scope and fans it out to live subscribers. No history is kept: a
 * subscriber that reconnects asks for a snapshot instead of a replay.
 */
export class ControlChannel {
  private sequencesByScope = new Map<string, number>();
  private subscribers = new Set<AsyncQueue<ControlEvent>>();

  publish(draft: ControlEventDraft): ControlEvent {
    const sequence = (this.sequencesByScope.get(draft.scope) ?? 0) + 1;
    this.sequencesByScope.set(draft.scope, sequence);
    const event: ControlEvent = { ...draft, sequence };
    for (const subscriber of this.subscribers) {
      subscriber.push(event);
    }
    return event;
  }

  subscribe(options: SubscribeOptions = {}): AsyncIterableIterator<ControlEvent> {
    const queue: AsyncQueue<ControlEvent> = new AsyncQueue(() => {
      this.subscribers.delete(queue);
    });
    this.subscribers.add(queue);

    const { signal } = options;
    if (signal) {
      if (signal.aborted) {
        void queue.return();
      } else {
        signal.addEventListener('abort', () => void queue.return(), { once: true });
      }
    }
    return queue;
  }

  sequences(): Record<string, number> {
    return Object.fromEntries(this.sequencesByScope);
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }
}
