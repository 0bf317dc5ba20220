export * from './control/events.js';
export { ControlChannel, type SubscribeOptions } from './control/controlChannel.js';
export { envelopeSchema, agentHelloSchema, agentLogSchema } from './control/schemas.js';
export { MembershipRegistry } from './membership/membershipRegistry.js';
export {
  EnvironmentController,
  type ConflictPolicy,
  type EnvironmentControllerOptions,
  type ScenarioStartResult,
} from './lifecycle/environmentController.js';
export { canTransition, isLive, isTerminal, InvalidTransitionError } from './lifecycle/environmentStates.js';
export { RfbGreetingCheck, waitUntilReady, type ReadinessCheck } from './lifecycle/readiness.js';
export type { ContainerEngine, ContainerStatus, ImageSpec, RunOptions, RunResult } from './engine/containerEngine.js';
export { EndpointPool } from './engine/endpointPool.js';
export { DockerCliEngine } from './engine/dockerCliEngine.js';
export { parseScenario, loadScenario } from './scenario/scenarioLoader.js';
export { createApp } from './app.js';
export { registerWebSocketServer } from './ws/server.js';
export * from './lib/errors.js';
export { AsyncQueue } from './lib/asyncQueue.js';
export type * from './types.js';
