import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const envSchema = z.object({
  CONTROLLER_URL: z.string().url().default('ws://127.0.0.1:8080/ws'),
  AGENT_ID: z.string().min(1).max(64).optional(),
  DISPLAY_NAME: z.string().min(1).max(64).default('student'),
  LOG_LEVEL: z.string().default('info'),
  HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RECONNECT_MAX_ATTEMPTS: z.coerce.number().int().positive().default(6),
  RECONNECT_BASE_MS: z.coerce.number().int().positive().default(500),
  RECONNECT_MAX_MS: z.coerce.number().int().positive().default(8_000),
  CONTROL_RECONNECT_MS: z.coerce.number().int().positive().default(2_000),
  VNC_PASSWORD: z.string().min(6).max(8).optional(),
});

const parsed = envSchema.parse(process.env);

export const config = {
  controllerUrl: parsed.CONTROLLER_URL,
  agentId: parsed.AGENT_ID ?? uuid(),
  displayName: parsed.DISPLAY_NAME,
  logLevel: parsed.LOG_LEVEL,
  handshakeTimeoutMs: parsed.HANDSHAKE_TIMEOUT_MS,
  reconnect: {
    maxAttempts: parsed.RECONNECT_MAX_ATTEMPTS,
    baseDelayMs: parsed.RECONNECT_BASE_MS,
    maxDelayMs: parsed.RECONNECT_MAX_MS,
  },
  controlReconnectMs: parsed.CONTROL_RECONNECT_MS,
  vncPassword: parsed.VNC_PASSWORD,
};
