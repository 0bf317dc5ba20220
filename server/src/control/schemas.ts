import { z } from 'zod';

export const envelopeSchema = z.object({
  type: z.string(),
  payload: z.unknown(),
  ref: z.string().optional(),
});

export const agentHelloSchema = z.object({
  agentId: z.string().min(1).max(64),
  displayName: z.string().min(1).max(64),
});

export const agentLogSchema = z.object({
  message: z.string().min(1).max(2_000),
});

export const assignmentBodySchema = z.object({
  teamId: z.string().min(1),
});
