import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(15_000),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:5173,http://127.0.0.1:5173'),
  LOG_LEVEL: z.string().default('info'),
  SCENARIO_PATH: z.string().optional(),
  SCENARIO_DIR: z.string().default('scenarios'),
  DOCKER_BINARY: z.string().default('docker'),
  VNC_CONTAINER_PORT: z.coerce.number().int().positive().default(5901),
  ENDPOINT_HOST: z.string().default('127.0.0.1'),
  PORT_RANGE_START: z.coerce.number().int().positive().default(6400),
  PORT_RANGE_END: z.coerce.number().int().positive().default(6499),
  READINESS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  READINESS_POLL_MS: z.coerce.number().int().positive().default(1_000),
  LIVENESS_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  CONFLICT_POLICY: z.enum(['reject', 'replace']).default('reject'),
  // VNC authentication uses only the first 8 characters.
  VNC_PASSWORD: z.string().min(6).max(8).optional(),
});

const parsed = envSchema.parse(process.env);

export const config = {
  port: parsed.PORT,
  heartbeatMs: parsed.WS_HEARTBEAT_MS,
  corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
  logLevel: parsed.LOG_LEVEL,
  scenarioPath: parsed.SCENARIO_PATH,
  scenarioDir: path.resolve(process.cwd(), parsed.SCENARIO_DIR),
  dockerBinary: parsed.DOCKER_BINARY,
  containerPort: parsed.VNC_CONTAINER_PORT,
  endpointHost: parsed.ENDPOINT_HOST,
  portRange: { start: parsed.PORT_RANGE_START, end: parsed.PORT_RANGE_END },
  readinessTimeoutMs: parsed.READINESS_TIMEOUT_MS,
  readinessPollMs: parsed.READINESS_POLL_MS,
  livenessIntervalMs: parsed.LIVENESS_INTERVAL_MS,
  conflictPolicy: parsed.CONFLICT_POLICY,
  vncPassword: parsed.VNC_PASSWORD,
};
