import { customAlphabet } from 'nanoid';
import type { ContainerEngine } from '../engine/containerEngine.js';
import type { EndpointPool } from '../engine/endpointPool.js';
import { EnvironmentConflictError, ProvisionError, errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { MembershipRegistry } from '../membership/membershipRegistry.js';
import type { Environment, EnvironmentState, Scenario, TeamSpec } from '../types.js';
import { InvalidTransitionError, canTransition, isLive } from './environmentStates.js';
import { KeyedMutex } from './keyedMutex.js';
import { waitUntilReady, type ReadinessCheck } from './readiness.js';

const SUFFIX_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';
const generateSuffix = customAlphabet(SUFFIX_ALPHABET, 6);

export type ConflictPolicy = 'reject' | 'replace';

export interface EnvironmentControllerOptions {
  engine: ContainerEngine;
  endpoints: EndpointPool;
  readiness: ReadinessCheck;
  registry: MembershipRegistry;
  logger: Logger;
  readinessTimeoutMs: number;
  readinessPollMs: number;
  livenessIntervalMs: number;
  conflictPolicy?: ConflictPolicy;
  containerPrefix?: string;
}

export interface ScenarioStartResult {
  environments: Environment[];
  failures: Array<{ teamId: string; error: Error }>;
}

/**
 * Owns the team → environment map. Transitions for one team are serialized
 * through a per-team mutex; different teams provision in parallel.
 */
export class EnvironmentController {
  private environments = new Map<string, Environment>();
  private locks = new KeyedMutex();
  private livenessTimer: NodeJS.Timeout | null = null;
  private reconciling: Promise<void> | null = null;
  private readonly conflictPolicy: ConflictPolicy;

  constructor(private readonly options: EnvironmentControllerOptions) {
    this.conflictPolicy = options.conflictPolicy ?? 'reject';
  }

  createEnvironment(team: TeamSpec): Promise<Environment> {
    this.options.registry.defineTeams([team.name]);
    return this.locks.run(team.name, () => this.provision(team));
  }

  stopEnvironment(teamId: string): Promise<void> {
    return this.locks.run(teamId, () => this.teardown(teamId));
  }

  listEnvironments(): Environment[] {
    return Array.from(this.environments.values()).map(copyEnvironment);
  }

  getEnvironment(teamId: string): Environment | undefined {
    const environment = this.environments.get(teamId);
    return environment ? copyEnvironment(environment) : undefined;
  }

  async startScenario(scenario: Scenario): Promise<ScenarioStartResult> {
    this.options.registry.defineTeams(scenario.teams.map((team) => team.name));
    this.options.logger.info({ scenarioId: scenario.id, teams: scenario.teams.length }, 'scenario_starting');

    const settled = await Promise.allSettled(scenario.teams.map((team) => this.createEnvironment(team)));
    const result: ScenarioStartResult = { environments: [], failures: [] };
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        result.environments.push(outcome.value);
        return;
      }
      const error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      result.failures.push({ teamId: scenario.teams[index].name, error });
    });

    this.options.logger.info(
      { scenarioId: scenario.id, running: result.environments.length, failed: result.failures.length },
      'scenario_started',
    );
    return result;
  }

  async stopScenario(): Promise<void> {
    const teamIds = Array.from(this.environments.keys());
    await Promise.all(teamIds.map((teamId) => this.stopEnvironment(teamId)));
  }

  startLivenessMonitor(): void {
    if (this.livenessTimer) return;
    this.livenessTimer = setInterval(() => {
      this.reconcile().catch((error: unknown) => {
        this.options.logger.error({ err: error }, 'liveness_check_failed');
      });
    }, this.options.livenessIntervalMs);
    this.livenessTimer.unref();
  }

  stopLivenessMonitor(): void {
    if (!this.livenessTimer) return;
    clearInterval(this.livenessTimer);
    this.livenessTimer = null;
  }

  /**
   * Compares every Running environment with the engine. An instance that
   * exited or vanished outside the controller's control becomes Failed.
   * Overlapping calls share one pass.
   */
  reconcile(): Promise<void> {
    if (!this.reconciling) {
      this.reconciling = this.checkLiveness().finally(() => {
        this.reconciling = null;
      });
    }
    return this.reconciling;
  }

  private async checkLiveness(): Promise<void> {
    const running = Array.from(this.environments.values()).filter(
      (env) => env.state === 'running' && env.containerId !== undefined,
    );
    await Promise.all(
      running.map(async ({ teamId, containerId }) => {
        if (!containerId) return;
        const status = await this.options.engine.status(containerId);
        if (status === 'running') return;
        await this.locks.run(teamId, () =>
          this.markCrashed(teamId, containerId, status === 'missing' ? 'container missing' : 'container exited'),
        );
      }),
    );
  }

  private async markCrashed(teamId: string, containerId: string, reason: string): Promise<void> {
    const environment = this.environments.get(teamId);
    if (!environment || environment.state !== 'running' || environment.containerId !== containerId) {
      return;
    }
    this.options.logger.warn({ teamId, containerId, reason }, 'environment_crashed');
    environment.failureReason = reason;
    this.transition(environment, 'failed');
    await this.removeContainerQuietly(teamId, containerId);
    this.releaseEndpoint(environment);
  }

  private async provision(team: TeamSpec): Promise<Environment> {
    const teamId = team.name;
    const existing = this.environments.get(teamId);
    if (existing && isLive(existing.state)) {
      if (this.conflictPolicy === 'reject') {
        throw new EnvironmentConflictError(teamId);
      }
      this.options.logger.info({ teamId }, 'environment_replacing');
      await this.teardown(teamId);
    }

    const environment: Environment = {
      teamId,
      image: team.image,
      state: 'pending',
      updatedAt: Date.now(),
    };
    this.environments.set(teamId, environment);
    this.options.registry.recordEnvironment(environment);

    try {
      this.transition(environment, 'building');
      try {
        await this.options.engine.build({ image: team.image, build: team.build });
      } catch (error) {
        throw new ProvisionError(teamId, 'BUILD_FAILED', `Image build failed for team '${teamId}': ${errorMessage(error)}`, {
          cause: error,
        });
      }

      this.transition(environment, 'starting');
      const endpoint = this.options.endpoints.acquire();
      if (!endpoint) {
        throw new ProvisionError(teamId, 'NO_ENDPOINT', `No free port left for team '${teamId}'`);
      }
      environment.endpoint = endpoint;

      const prefix = this.options.containerPrefix ?? 'rangelab';
      try {
        const { containerId, endpoint: published } = await this.options.engine.run(team.image, team.resources, {
          name: `${prefix}-${slug(teamId)}-${generateSuffix()}`,
          hostPort: endpoint.port,
        });
        environment.containerId = containerId;
        environment.endpoint = published;
      } catch (error) {
        throw new ProvisionError(teamId, 'RUN_FAILED', `Container start failed for team '${teamId}': ${errorMessage(error)}`, {
          cause: error,
        });
      }

      const ready = await waitUntilReady(this.options.readiness, environment.endpoint, {
        timeoutMs: this.options.readinessTimeoutMs,
        pollMs: this.options.readinessPollMs,
      });
      if (!ready) {
        throw new ProvisionError(
          teamId,
          'NOT_READY',
          `Environment for team '${teamId}' did not become ready within ${this.options.readinessTimeoutMs}ms`,
        );
      }

      this.transition(environment, 'running');
      this.options.logger.info({ teamId, endpoint: environment.endpoint }, 'environment_running');
      return copyEnvironment(environment);
    } catch (error) {
      await this.abandon(environment, error);
      throw error instanceof ProvisionError
        ? error
        : new ProvisionError(teamId, 'RUN_FAILED', errorMessage(error), { cause: error });
    }
  }

  /** Undoes a failed provisioning attempt so no orphaned instance or port remains. */
  private async abandon(environment: Environment, error: unknown): Promise<void> {
    const { teamId, containerId } = environment;
    this.options.logger.error({ teamId, err: error }, 'environment_provision_failed');
    if (containerId) {
      await this.removeContainerQuietly(teamId, containerId);
    }
    this.releaseEndpoint(environment);
    environment.failureReason = errorMessage(error);
    if (canTransition(environment.state, 'failed')) {
      this.transition(environment, 'failed');
    }
    if (this.environments.get(teamId) === environment) {
      this.environments.delete(teamId);
    }
  }

  private async teardown(teamId: string): Promise<void> {
    const environment = this.environments.get(teamId);
    if (!environment || !isLive(environment.state)) {
      return;
    }
    // A previous stop that failed leaves the environment in Stopping; retry the engine call.
    if (environment.state === 'running') {
      this.transition(environment, 'stopping');
    } else if (environment.state !== 'stopping') {
      throw new InvalidTransitionError(teamId, environment.state, 'stopping');
    }

    const { containerId } = environment;
    if (containerId) {
      try {
        await this.options.engine.stop(containerId);
      } catch (error) {
        this.options.logger.error({ teamId, containerId, err: error }, 'environment_stop_failed');
        throw error;
      }
    }
    this.releaseEndpoint(environment);
    this.transition(environment, 'stopped');
    this.options.logger.info({ teamId }, 'environment_stopped');
  }

  private transition(environment: Environment, next: EnvironmentState): void {
    if (!canTransition(environment.state, next)) {
      throw new InvalidTransitionError(environment.teamId, environment.state, next);
    }
    environment.state = next;
    environment.updatedAt = Date.now();
    this.options.logger.debug({ teamId: environment.teamId, state: next }, 'environment_transition');
    this.options.registry.recordEnvironment(copyEnvironment(environment));
  }

  private releaseEndpoint(environment: Environment): void {
    if (environment.endpoint) {
      this.options.endpoints.release(environment.endpoint.port);
    }
  }

  private async removeContainerQuietly(teamId: string, containerId: string): Promise<void> {
    try {
      await this.options.engine.stop(containerId);
    } catch (error) {
      this.options.logger.warn({ teamId, containerId, err: error }, 'container_cleanup_failed');
    }
  }
}

const copyEnvironment = (environment: Environment): Environment => ({
  ...environment,
  endpoint: environment.endpoint ? { ...environment.endpoint } : undefined,
});

const slug = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '') || 'team';
