import { InvalidArgumentError } from "../errors.js";
import type { SimulationState, VelocityPair } from "../state/types.js";

export type CollisionKind = "wall" | "block";

export type CollisionEvent = {
  kind: CollisionKind;
  // Offset of the impact from the start of the advance() call.
  at: number;
  // 1-based collision number over the whole simulation.
  index: number;
  before: VelocityPair;
  after: VelocityPair;
};

export type AdvanceResult = {
  // Collisions resolved during this call.
  collisions: number;
  collided: boolean;
  finished: boolean;
};

export type CollisionListener = (event: CollisionEvent) => void;

export function timeToWall(s: SimulationState): number {
  // Strict: a small block at rest against the wall never "hits" it.
  if (s.velocitySmall < 0) return s.positionSmall / Math.abs(s.velocitySmall);
  return Infinity;
}

export function timeToBlock(s: SimulationState): number {
  // The large block sits to the right, so it only gains ground when it is
  // algebraically slower than the small one.
  if (s.velocityLarge < s.velocitySmall) {
    const gap = s.positionLarge - (s.positionSmall + s.widthSmall);
    const closingSpeed = s.velocitySmall - s.velocityLarge;
    return Math.max(0, gap) / closingSpeed;
  }
  return Infinity;
}

/**
 * Post-impact velocities of a 1-D perfectly elastic collision.
 * Both outputs are computed from the pre-impact pair.
 */
export function elasticVelocities(
  massLarge: number,
  massSmall: number,
  u: VelocityPair
): VelocityPair {
  const m1 = massLarge;
  const m2 = massSmall;
  const total = m1 + m2;
  return {
    large: ((m1 - m2) * u.large + 2 * m2 * u.small) / total,
    small: ((m2 - m1) * u.small + 2 * m1 * u.large) / total
  };
}

export function isTerminal(s: SimulationState): boolean {
  return s.velocityLarge >= 0 && s.velocitySmall >= 0 && s.velocityLarge >= s.velocitySmall;
}

function drift(s: SimulationState, t: number) {
  s.positionLarge += s.velocityLarge * t;
  s.positionSmall += s.velocitySmall * t;
}

// Rounding can leave a drift step a hair past a contact.
function settleContacts(s: SimulationState) {
  if (s.positionSmall < 0) s.positionSmall = 0;
  const contact = s.positionSmall + s.widthSmall;
  if (s.positionLarge < contact) s.positionLarge = contact;
}

function velocities(s: SimulationState): VelocityPair {
  return { large: s.velocityLarge, small: s.velocitySmall };
}

function resolveWall(s: SimulationState) {
  s.positionSmall = 0;
  s.velocitySmall = -s.velocitySmall;
  s.collisionCount++;
}

// Same formulas as elasticVelocities, without allocating on the hot path.
function resolveBlock(s: SimulationState) {
  s.positionLarge = s.positionSmall + s.widthSmall;
  const m1 = s.massLarge;
  const m2 = s.massSmall;
  const u1 = s.velocityLarge;
  const u2 = s.velocitySmall;
  s.velocityLarge = ((m1 - m2) * u1 + 2 * m2 * u2) / (m1 + m2);
  s.velocitySmall = ((m2 - m1) * u2 + 2 * m1 * u1) / (m1 + m2);
  s.collisionCount++;
}

/**
 * Advances the state by exactly `dt`, jumping from one analytic impact to
 * the next and resolving every collision that falls inside the interval.
 * A single call may resolve millions of collisions; `onEvent` is only
 * invoked (and event objects only built) when a listener is passed.
 *
 * Throws InvalidArgumentError (before mutating) unless `dt` is a positive
 * finite number.
 */
export function advanceInPlace(
  s: SimulationState,
  dt: number,
  onEvent?: CollisionListener
): AdvanceResult {
  if (!Number.isFinite(dt) || dt <= 0) {
    throw new InvalidArgumentError(`dt must be a positive finite number, got ${dt}`);
  }

  const startCount = s.collisionCount;
  let remaining = dt;

  while (remaining > 0) {
    const tWall = timeToWall(s);
    const tBlock = timeToBlock(s);
    const tNext = Math.min(tWall, tBlock);

    if (tNext > remaining) {
      drift(s, remaining);
      break;
    }

    drift(s, tNext);
    remaining -= tNext;

    const before = onEvent ? velocities(s) : null;
    // Block wins exact ties.
    const kind: CollisionKind = tWall < tBlock ? "wall" : "block";
    if (kind === "wall") resolveWall(s);
    else resolveBlock(s);

    if (onEvent && before) {
      onEvent({
        kind,
        at: dt - remaining,
        index: s.collisionCount,
        before,
        after: velocities(s)
      });
    }
  }

  settleContacts(s);
  if (isTerminal(s)) s.finished = true;

  const collisions = s.collisionCount - startCount;
  return {
    collisions,
    collided: collisions > 0,
    finished: s.finished
  };
}
