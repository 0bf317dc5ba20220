import type { Response } from 'express';
import {
  ContainerEngineError,
  EnvironmentConflictError,
  MembershipError,
  ProvisionError,
  ScenarioError,
  errorMessage,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { InvalidTransitionError } from '../lifecycle/environmentStates.js';

export function statusFor(error: unknown): number {
  if (error instanceof ScenarioError) {
    return error.code === 'SCENARIO_NOT_FOUND' ? 404 : 400;
  }
  if (error instanceof MembershipError) return 404;
  if (error instanceof EnvironmentConflictError || error instanceof InvalidTransitionError) return 409;
  if (error instanceof ProvisionError || error instanceof ContainerEngineError) return 502;
  return 500;
}

export const errorCode = (error: unknown): string =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : 'INTERNAL';

/** Answers with the mapped status and `{ error, message }`; only unexpected errors are logged at error level. */
export function sendError(res: Response, error: unknown, logger: Logger, event: string): void {
  const status = statusFor(error);
  if (status === 500) {
    logger.error({ err: error }, event);
  } else {
    logger.warn({ code: errorCode(error), message: errorMessage(error) }, event);
  }
  res.status(status).json({ error: errorCode(error), message: errorMessage(error) });
}
