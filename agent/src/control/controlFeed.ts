import type { ControlEvent, MembershipSnapshot } from '@rangelab/server';

export type ControlMessage =
  | { type: 'snapshot'; snapshot: MembershipSnapshot }
  | { type: 'event'; event: ControlEvent };

/**
 * Agent-side view of the control channel: an endless stream that starts over
 * from a snapshot after every reconnect instead of replaying history.
 */
export interface ControlFeed {
  subscribe(signal?: AbortSignal): AsyncIterableIterator<ControlMessage>;
  /** Ask for a fresh snapshot, e.g. after a sequence gap. */
  requestSnapshot(): void;
}
