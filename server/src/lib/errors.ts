export type ProvisionErrorCode =
  | 'BUILD_FAILED'
  | 'RUN_FAILED'
  | 'NOT_READY'
  | 'NO_ENDPOINT'
  | 'CANCELLED';

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  readonly teamId: string;

  constructor(teamId: string, code: ProvisionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisionError';
    this.teamId = teamId;
    this.code = code;
  }
}

export class EnvironmentConflictError extends Error {
  readonly code = 'ENVIRONMENT_EXISTS';
  readonly teamId: string;

  constructor(teamId: string) {
    super(`Team '${teamId}' already has a live environment`);
    this.name = 'EnvironmentConflictError';
    this.teamId = teamId;
  }
}

export class ContainerEngineError extends Error {
  readonly code = 'ENGINE_FAILURE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContainerEngineError';
  }
}

export type ScenarioErrorCode = 'INVALID_SCENARIO' | 'SCENARIO_NOT_FOUND';

export class ScenarioError extends Error {
  readonly code: ScenarioErrorCode;

  constructor(message: string, options?: { cause?: unknown; code?: ScenarioErrorCode }) {
    super(message, options);
    this.name = 'ScenarioError';
    this.code = options?.code ?? 'INVALID_SCENARIO';
  }
}

export type MembershipErrorCode = 'UNKNOWN_TEAM';

export class MembershipError extends Error {
  readonly code: MembershipErrorCode;

  constructor(code: MembershipErrorCode, message: string) {
    super(message);
    this.name = 'MembershipError';
    this.code = code;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
