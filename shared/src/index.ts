export type {
  BlockLayout,
  SimulationConfig,
  SimulationSnapshot,
  SimulationState,
  VelocityPair
} from "./state/types.js";

export {
  InvalidArgumentError,
  InvalidConfigurationError,
  SimulationError,
  isSimulationError
} from "./errors.js";
export type { SimulationErrorCode } from "./errors.js";

export { PROTOCOL_VERSION } from "./protocol/messages.js";
export type { ClientToServer, ServerToClient } from "./protocol/messages.js";
export { isClientToServer } from "./protocol/guards.js";

export { DEFAULT_FRAME_DT, DEFAULT_LAYOUT, MASS_SMALL, displaySizeForMass } from "./physics/params.js";
export {
  advanceInPlace,
  elasticVelocities,
  isTerminal,
  timeToBlock,
  timeToWall
} from "./physics/step.js";
export type { AdvanceResult, CollisionEvent, CollisionKind, CollisionListener } from "./physics/step.js";
export { CollisionEngine, createEngine, createSimulationState } from "./physics/engine.js";
export { theoreticalCollisionCount } from "./physics/theory.js";
export { DEFAULT_MAX_STEPS, runToCompletion } from "./physics/run.js";
export type { RunOptions, RunReport } from "./physics/run.js";
