import type WebSocket from 'ws';

export interface ResourceLimits {
  cpus?: number;
  memoryMb?: number;
}

export interface ImageBuildSpec {
  context: string;
  dockerfile?: string;
}

export interface TeamSpec {
  name: string;
  image: string;
  build?: ImageBuildSpec;
  resources: ResourceLimits;
}

export interface Scenario {
  id: string;
  name?: string;
  teams: TeamSpec[];
}

export interface NetworkEndpoint {
  host: string;
  port: number;
}

export type EnvironmentState =
  | 'pending'
  | 'building'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'failed';

export interface Environment {
  teamId: string;
  image: string;
  containerId?: string;
  endpoint?: NetworkEndpoint;
  state: EnvironmentState;
  updatedAt: number;
  failureReason?: string;
}

export interface AgentRecord {
  agentId: string;
  displayName: string;
  assignedTeamId?: string;
  online: boolean;
}

export interface ClientContext {
  id: string;
  socket: WebSocket;
  agentId?: string;
  lastHeartbeat: number;
  isAlive: boolean;
}
