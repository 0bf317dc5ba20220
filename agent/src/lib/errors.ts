/** Malformed or unsupported wire data. The session is torn down, never resynced. */
export class ProtocolError extends Error {
  readonly code = 'PROTOCOL_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** Version, security or init negotiation failed. Not retried. */
export class HandshakeError extends Error {
  readonly code = 'HANDSHAKE_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HandshakeError';
  }
}

/** Recoverable network fault; drives the reconnect policy. */
export class TransportError extends Error {
  readonly code = 'TRANSPORT_FAILURE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export type SessionLostReason =
  | 'reconnect_exhausted'
  | 'protocol_error'
  | 'handshake_failed'
  | 'resized'
  | 'environment_down'
  | 'closed';

/** Terminal: the session is gone and the UI layer should show it. */
export class SessionLost extends Error {
  readonly code = 'SESSION_LOST';
  readonly reason: SessionLostReason;

  constructor(reason: SessionLostReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionLost';
    this.reason = reason;
  }
}

/** The agent holds a session for a team it no longer belongs to. */
export class StaleAssignment extends Error {
  readonly code = 'STALE_ASSIGNMENT';

  constructor(
    readonly agentId: string,
    readonly sessionTeamId: string,
    readonly currentTeamId: string | undefined,
  ) {
    super(
      currentTeamId
        ? `Agent '${agentId}' moved from team '${sessionTeamId}' to '${currentTeamId}'`
        : `Agent '${agentId}' is no longer assigned to team '${sessionTeamId}'`,
    );
    this.name = 'StaleAssignment';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
