import type { EnvironmentState } from '../types.js';

const TRANSITIONS: Record<EnvironmentState, readonly EnvironmentState[]> = {
  pending: ['building'],
  building: ['starting', 'failed'],
  starting: ['running', 'failed'],
  running: ['stopping', 'failed'],
  stopping: ['stopped'],
  stopped: [],
  failed: [],
};

export const canTransition = (from: EnvironmentState, to: EnvironmentState): boolean =>
  TRANSITIONS[from].includes(to);

export const isTerminal = (state: EnvironmentState): boolean =>
  state === 'stopped' || state === 'failed';

export const isLive = (state: EnvironmentState): boolean => !isTerminal(state);

export class InvalidTransitionError extends Error {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly teamId: string,
    readonly from: EnvironmentState,
    readonly to: EnvironmentState,
  ) {
    super(`Environment for team '${teamId}' cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}
