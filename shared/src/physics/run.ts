import { InvalidArgumentError } from "../errors.js";
import type { SimulationConfig, VelocityPair } from "../state/types.js";
import { createEngine } from "./engine.js";
import { DEFAULT_FRAME_DT } from "./params.js";
import { theoreticalCollisionCount } from "./theory.js";

export type RunOptions = {
  dt?: number;
  // Upper bound on frames, for inputs that would take too long to settle.
  maxSteps?: number;
};

export type RunReport = {
  config: SimulationConfig;
  collisionCount: number;
  theoreticalCount: number;
  finished: boolean;
  steps: number;
  elapsed: number;
  velocities: VelocityPair;
};

export const DEFAULT_MAX_STEPS = 1_000_000;

/**
 * Drives a fresh engine frame by frame until it reaches its terminal state,
 * the way a display loop would, but without one.
 */
export function runToCompletion(config: SimulationConfig, opts: RunOptions = {}): RunReport {
  const dt = opts.dt ?? DEFAULT_FRAME_DT;
  const maxSteps = opts.maxSteps ?? DEFAULT_MAX_STEPS;
  if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
    throw new InvalidArgumentError(`maxSteps must be a positive integer, got ${maxSteps}`);
  }

  const engine = createEngine(config.massLarge, config.velocityLarge);
  let steps = 0;
  while (!engine.isFinished() && steps < maxSteps) {
    engine.advance(dt);
    steps++;
  }

  return {
    config: { ...config },
    collisionCount: engine.collisionCount(),
    theoreticalCount: theoreticalCollisionCount(config.massLarge),
    finished: engine.isFinished(),
    steps,
    elapsed: steps * dt,
    velocities: { large: engine.velocityLarge(), small: engine.velocitySmall() }
  };
}
