import { z } from 'zod';

export const endpointSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().max(65_535),
});

export const environmentStateSchema = z.enum([
  'pending',
  'building',
  'starting',
  'running',
  'stopping',
  'stopped',
  'failed',
]);

const eventHeader = {
  sequence: z.number().int().positive(),
  scope: z.string().min(1),
};

export const assignedEventSchema = z.object({
  ...eventHeader,
  kind: z.literal('assigned'),
  payload: z.object({
    agentId: z.string().min(1),
    teamId: z.string().min(1),
    previousTeamId: z.string().optional(),
  }),
});

export const unassignedEventSchema = z.object({
  ...eventHeader,
  kind: z.literal('unassigned'),
  payload: z.object({
    agentId: z.string().min(1),
    previousTeamId: z.string().min(1),
  }),
});

export const environmentStateChangedEventSchema = z.object({
  ...eventHeader,
  kind: z.literal('environment_state_changed'),
  payload: z.object({
    teamId: z.string().min(1),
    state: environmentStateSchema,
    endpoint: endpointSchema.optional(),
    reason: z.string().optional(),
  }),
});

export const controlEventSchema = z.discriminatedUnion('kind', [
  assignedEventSchema,
  unassignedEventSchema,
  environmentStateChangedEventSchema,
]);

export type ControlEvent = z.infer<typeof controlEventSchema>;
export type ControlEventKind = ControlEvent['kind'];

type WithoutSequence<T> = T extends unknown ? Omit<T, 'sequence'> : never;
export type ControlEventDraft = WithoutSequence<ControlEvent>;

export const membershipSnapshotSchema = z.object({
  version: z.number().int().nonnegative(),
  agents: z.array(
    z.object({
      agentId: z.string().min(1),
      displayName: z.string(),
      teamId: z.string().optional(),
      online: z.boolean(),
    }),
  ),
  teams: z.array(
    z.object({
      teamId: z.string().min(1),
      state: environmentStateSchema.optional(),
      endpoint: endpointSchema.optional(),
    }),
  ),
  sequences: z.record(z.number().int().nonnegative()),
});

export type MembershipSnapshot = z.infer<typeof membershipSnapshotSchema>;
export type AgentView = MembershipSnapshot['agents'][number];
export type TeamView = MembershipSnapshot['teams'][number];

export const agentScope = (agentId: string): string => `agent:${agentId}`;
export const teamScope = (teamId: string): string => `team:${teamId}`;
