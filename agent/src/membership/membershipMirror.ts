import type { AgentView, ControlEvent, MembershipSnapshot, NetworkEndpoint, TeamView } from '@rangelab/server';

export type ApplyResult = 'applied' | 'stale' | 'gap';

/**
 * Read-only replica of the controller's membership registry. Events are
 * applied only in per-scope sequence order; anything else is reported so the
 * caller can resync from a snapshot.
 */
export class MembershipMirror {
  private agents = new Map<string, AgentView>();
  private teams = new Map<string, TeamView>();
  private sequences = new Map<string, number>();
  private snapshotVersion: number | null = null;

  get synced(): boolean {
    return this.snapshotVersion !== null;
  }

  get version(): number | null {
    return this.snapshotVersion;
  }

  applySnapshot(snapshot: MembershipSnapshot): void {
    this.agents = new Map(snapshot.agents.map((agent) => [agent.agentId, cloneAgent(agent)]));
    this.teams = new Map(snapshot.teams.map((team) => [team.teamId, cloneTeam(team)]));
    this.sequences = new Map(Object.entries(snapshot.sequences));
    this.snapshotVersion = snapshot.version;
  }

  applyEvent(event: ControlEvent): ApplyResult {
    if (!this.synced) return 'gap';
    const last = this.sequences.get(event.scope) ?? 0;
    if (event.sequence <= last) return 'stale';
    if (event.sequence !== last + 1) return 'gap';
    this.sequences.set(event.scope, event.sequence);

    switch (event.kind) {
      case 'assigned': {
        const { agentId, teamId } = event.payload;
        const existing = this.agents.get(agentId) ?? { agentId, displayName: agentId, online: false };
        this.agents.set(agentId, { ...existing, teamId });
        break;
      }
      case 'unassigned': {
        const existing = this.agents.get(event.payload.agentId);
        if (existing) {
          const { teamId: _previous, ...rest } = existing;
          this.agents.set(existing.agentId, rest);
        }
        break;
      }
      case 'environment_state_changed': {
        const { teamId, state, endpoint } = event.payload;
        this.teams.set(teamId, {
          teamId,
          state,
          ...(state === 'running' && endpoint ? { endpoint: { ...endpoint } } : {}),
        });
        break;
      }
    }
    return 'applied';
  }

  teamOf(agentId: string): string | undefined {
    return this.agents.get(agentId)?.teamId;
  }

  team(teamId: string): TeamView | undefined {
    const team = this.teams.get(teamId);
    return team ? cloneTeam(team) : undefined;
  }

  /** The team's endpoint, only while its environment is running. */
  endpointOf(teamId: string): NetworkEndpoint | undefined {
    const team = this.teams.get(teamId);
    return team?.state === 'running' && team.endpoint ? { ...team.endpoint } : undefined;
  }

  agent(agentId: string): AgentView | undefined {
    const agent = this.agents.get(agentId);
    return agent ? cloneAgent(agent) : undefined;
  }

  lastSequence(scope: string): number {
    return this.sequences.get(scope) ?? 0;
  }
}

const cloneAgent = (agent: AgentView): AgentView => ({ ...agent });

const cloneTeam = (team: TeamView): TeamView => ({
  ...team,
  ...(team.endpoint ? { endpoint: { ...team.endpoint } } : {}),
});
