import type { ControlEvent, MembershipSnapshot } from '@rangelab/server';
import { beforeEach, describe, expect, it } from 'vitest';
import { MembershipMirror } from '../../../src/membership/membershipMirror.js';

const snapshot = (): MembershipSnapshot => ({
  version: 3,
  agents: [{ agentId: 'a1', displayName: 'Ada', online: true, teamId: 'blue' }],
  teams: [{ teamId: 'blue', state: 'running', endpoint: { host: '127.0.0.1', port: 7000 } }, { teamId: 'red' }],
  sequences: { 'agent:a1': 1, 'team:blue': 2 },
});

describe('MembershipMirror', () => {
  let mirror: MembershipMirror;

  beforeEach(() => {
    mirror = new MembershipMirror();
  });

  it('reports a gap for any event before the first snapshot', () => {
    const event: ControlEvent = {
      scope: 'agent:a1',
      sequence: 1,
      kind: 'assigned',
      payload: { agentId: 'a1', teamId: 'blue' },
    };

    expect(mirror.applyEvent(event)).toBe('gap');
    expect(mirror.synced).toBe(false);
    expect(mirror.teamOf('a1')).toBeUndefined();
  });

  it('answers lookups from the snapshot', () => {
    mirror.applySnapshot(snapshot());

    expect(mirror.version).toBe(3);
    expect(mirror.teamOf('a1')).toBe('blue');
    expect(mirror.endpointOf('blue')).toEqual({ host: '127.0.0.1', port: 7000 });
    expect(mirror.endpointOf('red')).toBeUndefined();
    expect(mirror.lastSequence('team:blue')).toBe(2);
    expect(mirror.lastSequence('team:red')).toBe(0);
  });

  it('applies the next event of a scope and skips replays', () => {
    mirror.applySnapshot(snapshot());
    const moved: ControlEvent = {
      scope: 'agent:a1',
      sequence: 2,
      kind: 'assigned',
      payload: { agentId: 'a1', teamId: 'red', previousTeamId: 'blue' },
    };

    expect(mirror.applyEvent(moved)).toBe('applied');
    expect(mirror.applyEvent(moved)).toBe('stale');
    expect(mirror.teamOf('a1')).toBe('red');
    expect(mirror.lastSequence('agent:a1')).toBe(2);
  });

  it('refuses to skip ahead within a scope', () => {
    mirror.applySnapshot(snapshot());

    const result = mirror.applyEvent({
      scope: 'agent:a1',
      sequence: 3,
      kind: 'unassigned',
      payload: { agentId: 'a1', previousTeamId: 'blue' },
    });

    expect(result).toBe('gap');
    expect(mirror.teamOf('a1')).toBe('blue');
    expect(mirror.lastSequence('agent:a1')).toBe(1);
  });

  it('starts a scope it has never seen at sequence 1', () => {
    mirror.applySnapshot(snapshot());

    const result = mirror.applyEvent({
      scope: 'team:red',
      sequence: 1,
      kind: 'environment_state_changed',
      payload: { teamId: 'red', state: 'running', endpoint: { host: '127.0.0.1', port: 7001 } },
    });

    expect(result).toBe('applied');
    expect(mirror.endpointOf('red')).toEqual({ host: '127.0.0.1', port: 7001 });
  });

  it('drops the endpoint once the environment leaves running', () => {
    mirror.applySnapshot(snapshot());

    mirror.applyEvent({
      scope: 'team:blue',
      sequence: 3,
      kind: 'environment_state_changed',
      payload: { teamId: 'blue', state: 'failed', reason: 'container exited' },
    });

    expect(mirror.endpointOf('blue')).toBeUndefined();
    expect(mirror.team('blue')).toEqual({ teamId: 'blue', state: 'failed' });
  });

  it('clears the team of an unassigned agent', () => {
    mirror.applySnapshot(snapshot());

    mirror.applyEvent({
      scope: 'agent:a1',
      sequence: 2,
      kind: 'unassigned',
      payload: { agentId: 'a1', previousTeamId: 'blue' },
    });

    expect(mirror.agent('a1')).toEqual({ agentId: 'a1', displayName: 'Ada', online: true });
  });

  it('records agents it first hears about through an assignment', () => {
    mirror.applySnapshot(snapshot());

    mirror.applyEvent({
      scope: 'agent:a2',
      sequence: 1,
      kind: 'assigned',
      payload: { agentId: 'a2', teamId: 'red' },
    });

    expect(mirror.agent('a2')).toEqual({ agentId: 'a2', displayName: 'a2', online: false, teamId: 'red' });
  });

  it('hands out copies', () => {
    const source = snapshot();
    mirror.applySnapshot(source);
    source.agents[0].teamId = 'red';

    const endpoint = mirror.endpointOf('blue');
    if (endpoint) endpoint.port = 1;
    const team = mirror.team('blue');
    if (team?.endpoint) team.endpoint.port = 2;

    expect(mirror.teamOf('a1')).toBe('blue');
    expect(mirror.endpointOf('blue')).toEqual({ host: '127.0.0.1', port: 7000 });
  });

  it('replaces all state on a new snapshot', () => {
    mirror.applySnapshot(snapshot());
    mirror.applySnapshot({ version: 9, agents: [], teams: [], sequences: {} });

    expect(mirror.version).toBe(9);
    expect(mirror.teamOf('a1')).toBeUndefined();
    expect(mirror.lastSequence('agent:a1')).toBe(0);
  });
});
