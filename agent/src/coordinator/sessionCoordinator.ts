import type { NetworkEndpoint } from '@rangelab/server';
import type { ControlFeed } from '../control/controlFeed.js';
import { SessionLost, StaleAssignment, TransportError, errorMessage } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import { MembershipMirror } from '../membership/membershipMirror.js';
import { DEFAULT_BACKOFF, backoffDelay, type BackoffPolicy } from '../session/backoff.js';
import type { RemoteDesktopSession } from '../session/remoteDesktopSession.js';

export type SessionConnector = (endpoint: NetworkEndpoint) => Promise<RemoteDesktopSession>;

export interface SessionCoordinatorOptions {
  agentId: string;
  feed: ControlFeed;
  connect: SessionConnector;
  /** Retries for a first connect that fails with a TransportError. */
  retry?: Partial<BackoffPolicy>;
  logger?: Logger;
}

export interface ActiveSession {
  teamId: string;
  endpoint: NetworkEndpoint;
  session: RemoteDesktopSession;
}

export type CoordinatorIssue = SessionLost | StaleAssignment;

/**
 * Keeps at most one session for the agent, bound to its team's running
 * endpoint. All reconciliation runs on one promise chain, so a reassignment
 * always finishes tearing the old session down before the next connect.
 */
export class SessionCoordinator {
  private readonly mirror = new MembershipMirror();
  private readonly lifetime = new AbortController();
  private readonly logger: Logger;
  private active: ActiveSession | null = null;
  /** Endpoint whose session was lost; not retried until the team announces another. */
  private parkedKey: string | null = null;
  private connectFailures: { key: string; attempts: number } | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private readonly retryPolicy: BackoffPolicy;
  private chain: Promise<void> = Promise.resolve();
  private pump: Promise<void> | null = null;
  private stopped = false;

  private readonly sessionListeners = new Set<(active: ActiveSession | null) => void>();
  private readonly issueListeners = new Set<(issue: CoordinatorIssue) => void>();

  constructor(private readonly options: SessionCoordinatorOptions) {
    this.logger = (options.logger ?? silentLogger).child({ agentId: options.agentId });
    this.retryPolicy = { ...DEFAULT_BACKOFF, ...options.retry };
  }

  start(): void {
    if (this.pump || this.stopped) return;
    this.pump = this.consume();
  }

  get current(): ActiveSession | null {
    return this.active ? { ...this.active } : null;
  }

  get membership(): MembershipMirror {
    return this.mirror;
  }

  onSessionChange(listener: (active: ActiveSession | null) => void): () => void {
    this.sessionListeners.add(listener);
    return () => {
      this.sessionListeners.delete(listener);
    };
  }

  onIssue(listener: (issue: CoordinatorIssue) => void): () => void {
    this.issueListeners.add(listener);
    return () => {
      this.issueListeners.delete(listener);
    };
  }

  /** Resolves once every queued reconciliation has run. */
  settled(): Promise<void> {
    return this.chain;
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.lifetime.abort();
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    await this.pump;
    await this.chain;
    await this.release(null);
  }

  private async consume(): Promise<void> {
    for await (const message of this.options.feed.subscribe(this.lifetime.signal)) {
      if (message.type === 'snapshot') {
        this.mirror.applySnapshot(message.snapshot);
        this.logger.debug({ version: message.snapshot.version }, 'membership_snapshot');
      } else {
        const result = this.mirror.applyEvent(message.event);
        if (result === 'stale') continue;
        if (result === 'gap') {
          this.logger.info({ scope: message.event.scope, sequence: message.event.sequence }, 'membership_gap');
          this.options.feed.requestSnapshot();
          continue;
        }
      }
      await this.schedule();
    }
  }

  private schedule(): Promise<void> {
    this.chain = this.chain
      .then(() => this.reconcile())
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'session_reconcile_failed');
      });
    return this.chain;
  }

  private async reconcile(): Promise<void> {
    if (this.stopped) return;
    const { agentId } = this.options;
    const teamId = this.mirror.teamOf(agentId);
    const endpoint = teamId ? this.mirror.endpointOf(teamId) : undefined;
    if (!endpoint) {
      this.parkedKey = null;
      this.connectFailures = null;
    }

    const active = this.active;
    if (active) {
      if (active.teamId !== teamId) {
        await this.release(new StaleAssignment(agentId, active.teamId, teamId));
      } else if (!endpoint) {
        const state = teamId ? this.mirror.team(teamId)?.state : undefined;
        await this.release(
          new SessionLost('environment_down', `Environment for team '${active.teamId}' is ${state ?? 'gone'}`),
        );
      } else if (!sameEndpoint(active.endpoint, endpoint)) {
        this.logger.info({ teamId, from: active.endpoint, to: endpoint }, 'session_endpoint_changed');
        await this.release(null);
      } else {
        return;
      }
    }

    if (!teamId || !endpoint) return;
    const key = endpointKey(teamId, endpoint);
    if (this.parkedKey === key) return;

    let session: RemoteDesktopSession;
    try {
      session = await this.options.connect(endpoint);
    } catch (error) {
      this.handleConnectFailure(teamId, endpoint, key, error);
      return;
    }
    if (this.stopped) {
      await session.close();
      return;
    }
    this.connectFailures = null;
    if (session.lost) {
      this.park(teamId, endpoint, key, session.lost);
      return;
    }

    const next: ActiveSession = { teamId, endpoint, session };
    this.active = next;
    session.onLost((lost) => this.handleLost(next, lost));
    this.logger.info({ teamId, endpoint }, 'session_opened');
    this.emitSession(next);
  }

  /**
   * A refused or timed-out connect is retried on the backoff policy, since
   * the desktop may still be starting. Anything else parks the endpoint.
   */
  private handleConnectFailure(teamId: string, endpoint: NetworkEndpoint, key: string, error: unknown): void {
    if (error instanceof TransportError) {
      const attempts = this.connectFailures?.key === key ? this.connectFailures.attempts + 1 : 1;
      if (attempts < this.retryPolicy.maxAttempts) {
        this.connectFailures = { key, attempts };
        const delayMs = backoffDelay(attempts, this.retryPolicy);
        this.logger.info({ teamId, endpoint, attempt: attempts, delayMs, err: error }, 'session_connect_retry');
        this.scheduleRetry(delayMs);
        return;
      }
      this.connectFailures = null;
      this.park(
        teamId,
        endpoint,
        key,
        new SessionLost('reconnect_exhausted', `Gave up after ${attempts} connect attempt(s): ${error.message}`, {
          cause: error,
        }),
      );
      return;
    }
    this.connectFailures = null;
    const lost =
      error instanceof SessionLost
        ? error
        : new SessionLost('handshake_failed', errorMessage(error), { cause: error });
    this.park(teamId, endpoint, key, lost);
  }

  private park(teamId: string, endpoint: NetworkEndpoint, key: string, lost: SessionLost): void {
    this.parkedKey = key;
    this.logger.warn({ teamId, endpoint, reason: lost.reason, err: lost }, 'session_connect_failed');
    this.emitIssue(lost);
  }

  private scheduleRetry(delayMs: number): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
    }
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      void this.schedule();
    }, delayMs);
  }

  private handleLost(entry: ActiveSession, lost: SessionLost): void {
    if (this.active !== entry) return;
    this.active = null;
    this.parkedKey = endpointKey(entry.teamId, entry.endpoint);
    this.logger.warn({ teamId: entry.teamId, reason: lost.reason }, 'session_lost');
    this.emitSession(null);
    this.emitIssue(lost);
  }

  private async release(issue: CoordinatorIssue | null): Promise<void> {
    const active = this.active;
    if (!active) return;
    this.active = null;
    await active.session.close();
    this.logger.info({ teamId: active.teamId, reason: issue?.name }, 'session_released');
    this.emitSession(null);
    if (issue) {
      this.emitIssue(issue);
    }
  }

  private emitSession(active: ActiveSession | null): void {
    for (const listener of this.sessionListeners) {
      listener(active ? { ...active } : null);
    }
  }

  private emitIssue(issue: CoordinatorIssue): void {
    for (const listener of this.issueListeners) {
      listener(issue);
    }
  }
}

const endpointKey = (teamId: string, endpoint: NetworkEndpoint): string =>
  `${teamId}@${endpoint.host}:${endpoint.port}`;

const sameEndpoint = (a: NetworkEndpoint, b: NetworkEndpoint): boolean => a.host === b.host && a.port === b.port;
