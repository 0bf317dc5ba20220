import type { ControlChannel } from '../control/controlChannel.js';
import {
  agentScope,
  teamScope,
  type ControlEvent,
  type MembershipSnapshot,
} from '../control/events.js';
import { MembershipError } from '../lib/errors.js';
import type { AgentRecord, Environment, EnvironmentState, NetworkEndpoint } from '../types.js';

interface TeamRecord {
  teamId: string;
  state?: EnvironmentState;
  endpoint?: NetworkEndpoint;
}

/**
 * Authoritative agent → team and team → endpoint mapping. Every mutation runs
 * synchronously on the controller's event loop, so the registry is its own
 * single writer; readers only ever get copies.
 */
export class MembershipRegistry {
  private agents = new Map<string, AgentRecord>();
  private teams = new Map<string, TeamRecord>();
  private version = 0;

  constructor(private readonly channel: ControlChannel) {}

  defineTeams(teamIds: Iterable<string>): void {
    for (const teamId of teamIds) {
      if (!this.teams.has(teamId)) {
        this.teams.set(teamId, { teamId });
        this.version += 1;
      }
    }
  }

  hasTeam(teamId: string): boolean {
    return this.teams.has(teamId);
  }

  registerAgent(agentId: string, displayName: string): AgentRecord {
    const existing = this.agents.get(agentId);
    const record: AgentRecord = existing
      ? { ...existing, displayName, online: true }
      : { agentId, displayName, online: true };
    this.agents.set(agentId, record);
    this.version += 1;
    return { ...record };
  }

  markOffline(agentId: string): void {
    const existing = this.agents.get(agentId);
    if (!existing || !existing.online) return;
    this.agents.set(agentId, { ...existing, online: false });
    this.version += 1;
  }

  /**
   * Assigns or reassigns an agent. Agents that have not connected yet are
   * recorded offline so an operator can pre-assign seats. Returns null when
   * the agent already belongs to the team.
   */
  assign(agentId: string, teamId: string): ControlEvent | null {
    if (!this.teams.has(teamId)) {
      throw new MembershipError('UNKNOWN_TEAM', `Team '${teamId}' is not part of the active scenario`);
    }
    const existing = this.agents.get(agentId) ?? { agentId, displayName: agentId, online: false };
    if (existing.assignedTeamId === teamId) {
      return null;
    }

    const previousTeamId = existing.assignedTeamId;
    this.agents.set(agentId, { ...existing, assignedTeamId: teamId });
    this.version += 1;
    return this.channel.publish({
      scope: agentScope(agentId),
      kind: 'assigned',
      payload: previousTeamId ? { agentId, teamId, previousTeamId } : { agentId, teamId },
    });
  }

  unassign(agentId: string): ControlEvent | null {
    const existing = this.agents.get(agentId);
    if (!existing?.assignedTeamId) {
      return null;
    }
    const previousTeamId = existing.assignedTeamId;
    const { assignedTeamId: _dropped, ...rest } = existing;
    this.agents.set(agentId, rest);
    this.version += 1;
    return this.channel.publish({
      scope: agentScope(agentId),
      kind: 'unassigned',
      payload: { agentId, previousTeamId },
    });
  }

  /** Records an environment transition and announces it on the team's scope. */
  recordEnvironment(environment: Environment): ControlEvent {
    const endpoint = environment.state === 'running' ? environment.endpoint : undefined;
    this.teams.set(environment.teamId, {
      teamId: environment.teamId,
      state: environment.state,
      endpoint: endpoint ? { ...endpoint } : undefined,
    });
    this.version += 1;
    return this.channel.publish({
      scope: teamScope(environment.teamId),
      kind: 'environment_state_changed',
      payload: {
        teamId: environment.teamId,
        state: environment.state,
        ...(endpoint ? { endpoint: { ...endpoint } } : {}),
        ...(environment.failureReason ? { reason: environment.failureReason } : {}),
      },
    });
  }

  teamOf(agentId: string): string | undefined {
    return this.agents.get(agentId)?.assignedTeamId;
  }

  endpointOf(teamId: string): NetworkEndpoint | undefined {
    const endpoint = this.teams.get(teamId)?.endpoint;
    return endpoint ? { ...endpoint } : undefined;
  }

  agentsForTeam(teamId: string): AgentRecord[] {
    return Array.from(this.agents.values())
      .filter((agent) => agent.assignedTeamId === teamId)
      .map((agent) => ({ ...agent }));
  }

  listAgents(): AgentRecord[] {
    return Array.from(this.agents.values()).map((agent) => ({ ...agent }));
  }

  snapshot(): MembershipSnapshot {
    return {
      version: this.version,
      agents: Array.from(this.agents.values()).map((agent) => ({
        agentId: agent.agentId,
        displayName: agent.displayName,
        online: agent.online,
        ...(agent.assignedTeamId ? { teamId: agent.assignedTeamId } : {}),
      })),
      teams: Array.from(this.teams.values()).map((team) => ({
        teamId: team.teamId,
        ...(team.state ? { state: team.state } : {}),
        ...(team.endpoint ? { endpoint: { ...team.endpoint } } : {}),
      })),
      sequences: this.channel.sequences(),
    };
  }
}
