import { InvalidConfigurationError } from "../errors.js";
import type { BlockLayout, SimulationSnapshot, SimulationState } from "../state/types.js";
import { DEFAULT_LAYOUT, MASS_SMALL } from "./params.js";
import { advanceInPlace, type AdvanceResult, type CollisionListener } from "./step.js";

function validateLayout(layout: BlockLayout) {
  const { positionLarge, positionSmall, widthLarge, widthSmall } = layout;
  const fields = [positionLarge, positionSmall, widthLarge, widthSmall];
  if (!fields.every(Number.isFinite)) {
    throw new InvalidConfigurationError("layout values must be finite numbers");
  }
  if (widthLarge <= 0 || widthSmall <= 0) {
    throw new InvalidConfigurationError("block widths must be positive");
  }
  if (positionSmall < 0) {
    throw new InvalidConfigurationError("small block must start on the right of the wall");
  }
  if (positionLarge <= positionSmall + widthSmall) {
    throw new InvalidConfigurationError("large block must start clear of the small block");
  }
}

export function createSimulationState(
  massLarge: number,
  velocityLarge: number,
  layout: BlockLayout = DEFAULT_LAYOUT
): SimulationState {
  if (!Number.isFinite(massLarge) || massLarge <= 0) {
    throw new InvalidConfigurationError(`massLarge must be a positive number, got ${massLarge}`);
  }
  if (!Number.isFinite(velocityLarge)) {
    throw new InvalidConfigurationError(`velocityLarge must be a finite number, got ${velocityLarge}`);
  }
  validateLayout(layout);

  return {
    massLarge,
    massSmall: MASS_SMALL,
    positionLarge: layout.positionLarge,
    positionSmall: layout.positionSmall,
    widthLarge: layout.widthLarge,
    widthSmall: layout.widthSmall,
    velocityLarge,
    velocitySmall: 0,
    collisionCount: 0,
    finished: false
  };
}

/**
 * Owns one simulation. A new configuration means a new engine; nothing
 * outside advance() mutates the state.
 */
export class CollisionEngine {
  private readonly state: SimulationState;

  constructor(massLarge: number, velocityLarge: number, layout?: BlockLayout) {
    this.state = createSimulationState(massLarge, velocityLarge, layout);
  }

  advance(dt: number, onEvent?: CollisionListener): AdvanceResult {
    return advanceInPlace(this.state, dt, onEvent);
  }

  positionLarge(): number {
    return this.state.positionLarge;
  }

  positionSmall(): number {
    return this.state.positionSmall;
  }

  velocityLarge(): number {
    return this.state.velocityLarge;
  }

  velocitySmall(): number {
    return this.state.velocitySmall;
  }

  massLarge(): number {
    return this.state.massLarge;
  }

  massSmall(): number {
    return this.state.massSmall;
  }

  widthLarge(): number {
    return this.state.widthLarge;
  }

  widthSmall(): number {
    return this.state.widthSmall;
  }

  collisionCount(): number {
    return this.state.collisionCount;
  }

  isFinished(): boolean {
    return this.state.finished;
  }

  snapshot(): SimulationSnapshot {
    return Object.freeze({ ...this.state });
  }
}

export function createEngine(
  massLarge: number,
  velocityLarge: number,
  layout?: BlockLayout
): CollisionEngine {
  return new CollisionEngine(massLarge, velocityLarge, layout);
}
